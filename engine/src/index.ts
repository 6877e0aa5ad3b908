/**
 * apptrack Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, never from internal modules.
 */

// Tracker
export { Tracker, DEACTIVATED } from "./tracker";
export type { TrackerOptions } from "./tracker";

// All types
export type {
  ErrorCategory,
  TrackerError,
  TaskName,
  OutcomeStatus,
  ProductOutcome,
  TaskResult,
  ApprovalPrompt,
  DownloadProgressData,
  Position,
  TrackerEvent,
  TrackerEventType,
  TrackerEventHandler,
} from "./types";
export { TrackerFailure, toTrackerError } from "./errors";
export { PROJECT_NAME, PROJECT_VERSION, USER_AGENT } from "./version";

// Configuration
export { loadConfig, parseConfig, splitApplists, ALL_SET, DEFAULT_TIMEOUT_SECONDS } from "./config";
export type {
  TrackerConfig,
  ApplicationConfig,
  ReportSettings,
  ReportFormat,
  ConfigIssue,
  ConfigLoadResult,
} from "./config";

// Product handlers
export { BaseProduct } from "./products/base-product";
export type { ProductContext } from "./products/base-product";
export { HandlerRegistry, createDefaultRegistry } from "./products/registry";
export type { ProductFactory } from "./products/registry";
export { DummyProduct } from "./products/dummy";
export { MozillaProduct, FIREFOX_WIN, FIREFOX_WIN64, THUNDERBIRD_WIN } from "./products/mozilla";
export { MakeMkvProduct } from "./products/makemkv";

// Applists and deployment planning
export {
  applistFileName,
  applistNameOf,
  applistHeader,
  formatApplistLine,
  parseApplist,
  planDeployment,
  productKey,
  supportsTarget,
  parseInventory,
  loadInventory,
} from "./applist";
export type {
  ApplistEntry,
  ApplistIssue,
  ParsedApplist,
  Architecture,
  DeploymentAction,
  DeploymentStep,
  InstalledApplication,
} from "./applist";

// Reports
export { Report, FileReportHandler, StreamReportHandler } from "./report";
export type { ReportHandler, RenderedReport } from "./report";

// Downloads and checksums
export { downloadFile, retrieveText } from "./downloader";
export type { DownloadOptions, DownloadResult, DownloadProgress } from "./downloader";
export { computeFileHash, verifyChecksum, DEFAULT_HASH_ALGORITHM } from "./verifier";
export type { VerificationResult } from "./verifier";

// Utilities (exposed for CLI use)
export {
  parseVersionId,
  compareVersionIds,
  classifyVersionChange,
  isValidVersionId,
  extractVersionId,
} from "./utils/version-id";
export type { VersionId, VersionChange, VersionFormat } from "./utils/version-id";
export { createLogger, LOG_LEVELS } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
