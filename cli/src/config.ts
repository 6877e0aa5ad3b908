/**
 * apptrack CLI — Configuration
 *
 * Locates the configuration file and builds the tracker from it.
 *
 *   -c/--config FILE   first
 *   APPTRACK_CONFIG    then
 *   ./apptrack.yaml    otherwise
 */

import * as path from "path";
import {
  ApprovalPrompt,
  ConfigIssue,
  createDefaultRegistry,
  createLogger,
  HandlerRegistry,
  loadConfig,
  Logger,
  ReportHandler,
  Tracker,
  TrackerConfig,
} from "@apptrack/engine";
import { isDebugMode } from "./output";

export const CONFIG_ENV = "APPTRACK_CONFIG";
export const DEFAULT_CONFIG_FILE = "apptrack.yaml";

/** Options every command inherits from the program */
export interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

export function resolveConfigPath(
  option: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return path.resolve(option ?? env[CONFIG_ENV] ?? DEFAULT_CONFIG_FILE);
}

export type TrackerSetup =
  | { ok: true; tracker: Tracker; config: TrackerConfig; logger: Logger }
  | { ok: false; file: string; issues: ConfigIssue[] };

export interface SetupOptions {
  prompt?: ApprovalPrompt;
  reportHandlers?: ReportHandler[];
  registry?: HandlerRegistry;
}

/**
 * Load the configuration and build a tracker. --debug overrides the
 * configured log level.
 */
export function setupTracker(globals: GlobalOptions, options: SetupOptions = {}): TrackerSetup {
  const registry = options.registry ?? createDefaultRegistry();
  const loaded = loadConfig(resolveConfigPath(globals.config), registry);
  if (!loaded.ok) {
    return { ok: false, file: loaded.file, issues: loaded.issues };
  }

  const config = loaded.config;
  const logger = createLogger({ level: globals.debug || isDebugMode() ? "debug" : config.logLevel });
  const tracker = new Tracker({
    config,
    registry,
    logger,
    prompt: options.prompt,
    reportHandlers: options.reportHandlers,
  });
  return { ok: true, tracker, config, logger };
}
