/**
 * apptrack CLI — Approval Prompt
 *
 * Asks the operator, for each fetched release, whether it may be
 * deployed. "y" approves, "n" or an empty answer rejects; anything else
 * asks again. Once the input is closed (end of file), every pending and
 * later question fails with an IO_ERROR.
 */

import * as readline from "readline";
import { TrackerFailure } from "@apptrack/engine";
import type { ApprovalPrompt } from "@apptrack/engine";

export const INPUT_CLOSED = "The input was closed before the release was approved or rejected";

export function parseAnswer(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "y") return true;
  if (normalized === "" || normalized === "n") return false;
  return null;
}

export interface InteractivePrompt {
  prompt: ApprovalPrompt;
  close(): void;
}

export function createApprovalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): InteractivePrompt {
  const rl = readline.createInterface({ input, output });
  const pending = new Set<(err: Error) => void>();
  let closed = false;

  rl.on("close", () => {
    closed = true;
    for (const reject of pending) reject(new TrackerFailure("IO_ERROR", INPUT_CLOSED));
    pending.clear();
  });

  const ask = (question: string) =>
    new Promise<string>((resolve, reject) => {
      if (closed) {
        reject(new TrackerFailure("IO_ERROR", INPUT_CLOSED));
        return;
      }
      pending.add(reject);
      rl.question(question, (answer) => {
        pending.delete(reject);
        resolve(answer);
      });
    });

  const prompt: ApprovalPrompt = async (product, appId) => {
    const question = `Approve ${product.display_name || product.name} [${appId}]? (y/N) `;
    for (;;) {
      const decision = parseAnswer(await ask(question));
      if (decision !== null) return decision;
      output.write('Please answer "y" or "n".\n');
    }
  };

  return { prompt, close: () => rl.close() };
}
