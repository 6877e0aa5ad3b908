/**
 * apptrack CLI — Compare Command
 *
 * Usage:
 *   apptrack compare 42.0 42.0.1           42.0 < 42.0.1
 *   apptrack compare --semver 1.0.0-rc.1 1.0.0
 */

import { Command } from "commander";
import { compareSemver } from "@apptrack/catalog";
import { compareVersionIds } from "@apptrack/engine";
import { printError } from "../output";

/** "a < b", or null when the versions cannot be compared */
export function describeComparison(a: string, b: string, semver = false): string | null {
  const cmp = semver ? compareSemver(a, b) : compareVersionIds(a, b);
  if (cmp === null) return null;
  const sign = cmp < 0 ? "<" : cmp > 0 ? ">" : "=";
  return `${a} ${sign} ${b}`;
}

export function registerCompareCommand(program: Command): void {
  program
    .command("compare <a> <b>")
    .description("Compare two version strings")
    .option("--semver", "Use strict semantic versioning", false)
    .action((a: string, b: string, opts: { semver: boolean }) => {
      const description = describeComparison(a, b, opts.semver);
      if (description === null) {
        printError(`Cannot compare "${a}" and "${b}"`);
        process.exitCode = 1;
        return;
      }
      console.log(description);
    });
}
