/**
 * apptrack Engine — Structured Logger
 *
 * Wraps pino for structured logging. Every engine module receives a
 * Logger instead of writing to the console.
 *
 * Logging is silent by default so the CLI only prints its own output.
 * The `--debug` flag or `core.log_level` in the configuration turns it on;
 * records then go to stderr, one JSON object per line.
 *
 * NOTE: pino.destination() is used instead of pino transports because
 * transports spawn worker_threads, which outlive one-shot CLI runs.
 */

import pino from "pino";

/** Levels accepted by `core.log_level` */
export const LOG_LEVELS = ["silent", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level: LogLevel;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(options: Partial<LoggerOptions> = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
