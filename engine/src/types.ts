/**
 * apptrack Engine — Core Type Definitions
 *
 * Types shared by the tracker, the product handlers and the front ends.
 * Catalog types (Product, Target, ...) live in @apptrack/catalog.
 */

import type { Product } from "@apptrack/catalog";

// ─── Errors ──────────────────────────────────────────────────────

export type ErrorCategory =
  | "CONFIG_ERROR"
  | "CATALOG_ERROR"
  | "HANDLER_ERROR"
  | "NETWORK_ERROR"
  | "INTEGRITY_ERROR"
  | "IO_ERROR";

export interface TrackerError {
  category: ErrorCategory;
  message: string;
  /** Application the error is about, absent for task-wide errors */
  app_id?: string;
  details?: Record<string, unknown>;
}

// ─── Tasks ───────────────────────────────────────────────────────

export type TaskName = "pull" | "fetch" | "approve" | "make" | "run";

export type OutcomeStatus =
  | "updated" // pull: a newer release was found
  | "unchanged" // pull: nothing newer than the approved release
  | "fetched"
  | "approved"
  | "rejected"
  | "listed" // make: written to the applists
  | "disabled"
  | "skipped" // nothing to do at this stage
  | "failed";

export interface ProductOutcome {
  app_id: string;
  status: OutcomeStatus;
  version?: string;
  message?: string;
}

export interface TaskResult {
  task: TaskName;
  ok: boolean;
  started_at: string;
  finished_at: string;
  outcomes: ProductOutcome[];
  errors: TrackerError[];
  /** Written report, when reports are configured and there was something to tell */
  report_path?: string;
  /** Results of the tasks a run chained, in order */
  steps?: TaskResult[];
}

// ─── Approval ────────────────────────────────────────────────────

/** Asks the operator whether a fetched release may be deployed */
export type ApprovalPrompt = (product: Product, appId: string) => Promise<boolean>;

// ─── Events ──────────────────────────────────────────────────────

export interface DownloadProgressData {
  app_id: string;
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

/** 1-based position of the application among the tracked ones */
export interface Position {
  index: number;
  count: number;
}

interface EventBase {
  timestamp: string;
  task: TaskName;
}

export type TrackerEvent =
  | (EventBase & { type: "task_start"; data: { count: number } })
  | (EventBase & { type: "task_end"; data: TaskResult })
  | (EventBase & { type: "product"; position: Position; data: ProductOutcome })
  | (EventBase & { type: "progress"; data: DownloadProgressData })
  | (EventBase & { type: "warning"; data: { message: string; app_id?: string } });

export type TrackerEventType = TrackerEvent["type"];

export type TrackerEventHandler = (event: TrackerEvent) => void;
