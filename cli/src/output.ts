/**
 * apptrack CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type {
  ConfigIssue,
  DeploymentAction,
  ErrorCategory,
  OutcomeStatus,
} from "@apptrack/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
  bullet: chalk.gray("\u2022"), // •
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

/**
 * Print a bold header line, e.g.  "Pulling 3 application(s)"
 */
export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

const ASCII_CHARS: Table.TableConstructorOptions["chars"] = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

/**
 * Truncate a plain-text string to `max` visible characters, appending "..."
 * if it was shortened. Never returns a string longer than `max`.
 */
export function truncateText(s: string, max: number): string {
  if (max < 4) return s.slice(0, max);
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + "...";
}

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function renderTable({ head, rows }: TableOptions): string {
  const ascii = shouldUseAsciiBorders();
  const options: Table.TableConstructorOptions = {
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
  };
  if (ascii) {
    options.chars = ASCII_CHARS;
  }
  const table = new Table(options);
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

export function printTable(options: TableOptions): void {
  console.log(renderTable(options));
}

// ─── Outcome Badges ─────────────────────────────────────────

const STATUS_COLORS: Record<OutcomeStatus, chalk.Chalk> = {
  updated: chalk.green,
  unchanged: chalk.gray,
  fetched: chalk.green,
  approved: chalk.green,
  rejected: chalk.yellow,
  listed: chalk.cyan,
  disabled: chalk.gray,
  skipped: chalk.gray,
  failed: chalk.red,
};

export function formatStatus(status: OutcomeStatus): string {
  return STATUS_COLORS[status](status);
}

const ACTION_COLORS: Record<DeploymentAction, chalk.Chalk> = {
  install: chalk.green,
  upgrade: chalk.cyan,
  "up-to-date": chalk.gray,
  "newer-installed": chalk.yellow,
  unknown: chalk.red,
  unsupported: chalk.gray,
};

export function formatAction(action: DeploymentAction): string {
  return ACTION_COLORS[action](action);
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  CONFIG_ERROR: "Invalid configuration",
  CATALOG_ERROR: "Unreadable catalog",
  HANDLER_ERROR: "Product handler failure",
  NETWORK_ERROR: "Network or download failure",
  INTEGRITY_ERROR: "File integrity check failed",
  IO_ERROR: "File system failure",
};

export function formatErrorCategory(category: ErrorCategory): string {
  return ERROR_LABELS[category];
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes < 0) return "unknown";
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}

// ─── Configuration Issues ───────────────────────────────────

export function printConfigIssues(file: string, issues: ConfigIssue[]): void {
  printError(`Invalid configuration ${colors.bold(file)}`);
  for (const issue of issues) {
    console.error(`  ${symbols.bullet} ${colors.dim(issue.path)}: ${issue.message}`);
    if (issue.solution) {
      console.error(`    ${symbols.arrow} ${issue.solution}`);
    }
  }
}
