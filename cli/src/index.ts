#!/usr/bin/env node

/**
 * apptrack CLI — Entry Point
 *
 * Tracking:
 *   apptrack pull                 Look up the latest releases
 *   apptrack fetch                Download the installers
 *   apptrack approve [-y]         Approve the fetched releases
 *   apptrack make                 Write the applists
 *   apptrack run                  All of the above, approval forced
 *
 * Inspection:
 *   apptrack check-config         Validate the configuration
 *   apptrack status               Releases recorded in the catalog
 *   apptrack compare <a> <b>      Compare two versions
 *   apptrack plan <applist> -i <inventory>
 *
 * Exit codes: 0 success, 1 failure, 2 invalid command line.
 */

import { CommanderError } from "commander";
import { createProgram, exitCodeOf } from "./program";
import { printError } from "./output";

const program = createProgram();

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  // commander has already printed its own messages
  if (!(err instanceof CommanderError)) {
    printError(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exitCode = exitCodeOf(err);
});
