/**
 * apptrack CLI — Task Commands
 *
 * Usage:
 *   apptrack pull              Look up the latest releases
 *   apptrack fetch             Download the installers of the pulled releases
 *   apptrack approve [-y]      Approve the fetched releases
 *   apptrack make              Write the applists
 *   apptrack run               pull, fetch, approve (forced) and make
 *
 * Output:
 *
 *   Pull: 3 application(s)
 *
 *     [1/3] firefox updated 42.0.1
 *     [2/3] makemkv unchanged 1.9.10
 *     [3/3] dummy disabled (Tracking deactivated)
 *
 *   ✔ pull done in 1.2s
 */

import { Command } from "commander";
import type { Ora } from "ora";
import type {
  Position,
  ProductOutcome,
  TaskName,
  TaskResult,
  Tracker,
  TrackerEvent,
} from "@apptrack/engine";
import { GlobalOptions, setupTracker } from "../config";
import {
  colors,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  formatStatus,
  printConfigIssues,
  printDebug,
  printError,
  printHeader,
  printInfo,
  printSuccess,
  printWarn,
} from "../output";
import { createApprovalPrompt } from "../prompt";

const TASK_TITLES: Record<TaskName, string> = {
  pull: "Pull",
  fetch: "Fetch",
  approve: "Approve",
  make: "Make",
  run: "Run",
};

export function formatOutcomeLine(outcome: ProductOutcome, position: Position): string {
  let line = `[${position.index}/${position.count}] ${colors.app(outcome.app_id)} ${formatStatus(outcome.status)}`;
  if (outcome.version) line += ` ${colors.version(outcome.version)}`;
  if (outcome.message) line += ` ${colors.dim(`(${outcome.message})`)}`;
  return line;
}

/**
 * Follows the tracker events on the terminal: a spinner while an
 * application is processed, one line once it is done.
 */
export class TaskView {
  private spinner: Ora = createSpinner("");

  readonly handle = (event: TrackerEvent): void => {
    switch (event.type) {
      case "task_start":
        printHeader(`${TASK_TITLES[event.task]}: ${event.data.count} application(s)`);
        if (event.task !== "run") this.spinner.start("Working...");
        break;
      case "product":
        this.spinner.stop();
        console.log(`  ${formatOutcomeLine(event.data, event.position)}`);
        if (event.position.index < event.position.count) this.spinner.start("Working...");
        break;
      case "progress":
        this.spinner.text = `Downloading ${event.data.app_id}... ${event.data.percent}%`;
        break;
      case "warning": {
        const spinning = this.spinner.isSpinning;
        this.spinner.stop();
        printWarn(event.data.message);
        if (spinning) this.spinner.start();
        break;
      }
      case "task_end":
        this.spinner.stop();
        break;
    }
  };

  /** Stop the spinner, e.g. before asking the operator something. */
  pause(): void {
    this.spinner.stop();
  }
}

function runTask(tracker: Tracker, task: TaskName, yes: boolean): Promise<TaskResult> {
  switch (task) {
    case "pull":
      return tracker.pull();
    case "fetch":
      return tracker.fetch();
    case "approve":
      return tracker.approve(yes);
    case "make":
      return tracker.make();
    case "run":
      return tracker.run();
  }
}

export function printTaskSummary(result: TaskResult): void {
  console.log();
  for (const error of result.errors) {
    const where = error.app_id ? ` [${error.app_id}]` : "";
    printError(`${formatErrorCategory(error.category)}${where}: ${error.message}`);
    if (error.details) printDebug(JSON.stringify(error.details));
  }
  const reports = [result, ...(result.steps ?? [])]
    .map((r) => r.report_path)
    .filter((p): p is string => p !== undefined);
  for (const report of reports) {
    printInfo(`Report written to ${report}`);
  }
  const elapsed = Date.parse(result.finished_at) - Date.parse(result.started_at);
  if (result.ok) {
    printSuccess(`${result.task} done in ${formatDuration(elapsed)}`);
  } else {
    printError(`${result.task} finished with ${result.errors.length} error(s)`);
  }
}

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Run one task and return the exit code. The approval questions go
 * through `streams`, the terminal by default.
 */
export async function executeTask(
  task: TaskName,
  globals: GlobalOptions,
  yes = false,
  streams?: PromptStreams,
): Promise<number> {
  const view = new TaskView();
  const interactive =
    task === "approve" && !yes ? createApprovalPrompt(streams?.input, streams?.output) : null;
  const setup = setupTracker(globals, {
    prompt: interactive
      ? (product, appId) => {
          view.pause();
          return interactive.prompt(product, appId);
        }
      : undefined,
  });

  try {
    if (!setup.ok) {
      printConfigIssues(setup.file, setup.issues);
      return 1;
    }
    setup.tracker.on(view.handle);
    const result = await runTask(setup.tracker, task, yes);
    printTaskSummary(result);
    return result.ok ? 0 : 1;
  } finally {
    view.pause();
    interactive?.close();
  }
}

export function registerTaskCommands(program: Command): void {
  const globals = () => program.opts<GlobalOptions>();

  program
    .command("pull")
    .description("Look up the latest release of every application")
    .action(async () => {
      process.exitCode = await executeTask("pull", globals());
    });

  program
    .command("fetch")
    .description("Download the installers of the pulled releases")
    .action(async () => {
      process.exitCode = await executeTask("fetch", globals());
    });

  program
    .command("approve")
    .description("Approve the fetched releases for deployment")
    .option("-y, --yes", "Approve without asking", false)
    .action(async (opts: { yes: boolean }) => {
      process.exitCode = await executeTask("approve", globals(), opts.yes);
    });

  program
    .command("make")
    .description("Write the applists from the approved releases")
    .action(async () => {
      process.exitCode = await executeTask("make", globals());
    });

  program
    .command("run")
    .description("Pull, fetch, approve and make in one go")
    .action(async () => {
      process.exitCode = await executeTask("run", globals());
    });
}
