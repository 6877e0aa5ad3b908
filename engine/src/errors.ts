/**
 * apptrack Engine — Failures
 *
 * Handlers and the downloader throw a TrackerFailure; the tracker turns
 * it into a TrackerError entry of the task result and goes on with the
 * next application.
 */

import { ErrorCategory, TrackerError } from "./types";

export class TrackerFailure extends Error {
  public readonly category: ErrorCategory;
  public readonly context?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "TrackerFailure";
    this.category = category;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Convert anything thrown while processing an application. Errors that
 * are not TrackerFailures are blamed on the handler.
 */
export function toTrackerError(err: unknown, appId?: string): TrackerError {
  if (err instanceof TrackerFailure) {
    return {
      category: err.category,
      message: err.message,
      app_id: appId,
      details: err.context,
    };
  }
  return {
    category: "HANDLER_ERROR",
    message: err instanceof Error ? err.message : String(err),
    app_id: appId,
  };
}
