/**
 * apptrack CLI — Program
 *
 * Builds the commander program. Kept apart from the entry point so the
 * tests can parse command lines without running anything.
 */

import { Command, CommanderError } from "commander";
import { PROJECT_VERSION } from "@apptrack/engine";
import { registerCheckConfigCommand } from "./commands/check-config";
import { registerCompareCommand } from "./commands/compare";
import { registerPlanCommand } from "./commands/plan";
import { registerStatusCommand } from "./commands/status";
import { registerTaskCommands } from "./commands/tasks";
import { setDebugMode } from "./output";

/** Invalid command line: unknown command or option, missing argument */
export const EXIT_USAGE = 2;

/**
 * Exit code for an error the parse rejected with. Help and --version
 * also end in a CommanderError, with exit code 0.
 */
export function exitCodeOf(err: unknown): number {
  if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : EXIT_USAGE;
  return 1;
}

export function createProgram(): Command {
  const program = new Command();

  // Set before the commands are added: they inherit it
  program.exitOverride();

  program
    .name("apptrack")
    .description("Track third-party application releases and prepare their deployment")
    .version(PROJECT_VERSION)
    .option("-c, --config <file>", "Configuration file (default: $APPTRACK_CONFIG or apptrack.yaml)")
    .option("--debug", "Log everything on stderr", false)
    .hook("preAction", () => {
      setDebugMode(program.opts<{ debug: boolean }>().debug);
    });

  // ─── Tracking tasks ─────────────────────────────────────────
  registerTaskCommands(program);

  // ─── Inspection ─────────────────────────────────────────────
  registerCheckConfigCommand(program);
  registerStatusCommand(program);
  registerCompareCommand(program);
  registerPlanCommand(program);

  return program;
}
