/**
 * apptrack Engine — Applists
 *
 * An applist is the text file a deployment script reads to know which
 * installers to run. One file per applist name, `applist-<name>.txt`:
 *
 *   # comment lines start with "#"
 *   target;display_name;version;installer;silent_inst_args
 *
 * The deployment side compares each line with what is installed on the
 * machine and only runs the installers of missing or outdated software.
 */

import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { Product, Target, TARGETS } from "@apptrack/catalog";
import { classifyVersionChange } from "./utils/version-id";
import { PROJECT_NAME, PROJECT_VERSION } from "./version";

export const APPLIST_PREFIX = "applist-";
export const APPLIST_SUFFIX = ".txt";

export const APPLIST_COLUMNS = "target;display_name;version;installer;silent_inst_args";

export interface ApplistEntry {
  target: Target;
  display_name: string;
  version: string;
  installer: string;
  silent_inst_args: string;
  /** 1-based line number in the file */
  line: number;
}

export interface ApplistIssue {
  line: number;
  message: string;
}

export interface ParsedApplist {
  entries: ApplistEntry[];
  issues: ApplistIssue[];
}

// ─── Files ───────────────────────────────────────────────────────

export function applistFileName(name: string): string {
  return `${APPLIST_PREFIX}${name}${APPLIST_SUFFIX}`;
}

/** "applist-office.txt" → "office"; null for any other file name */
export function applistNameOf(fileName: string): string | null {
  if (!fileName.startsWith(APPLIST_PREFIX) || !fileName.endsWith(APPLIST_SUFFIX)) return null;
  const name = fileName.slice(APPLIST_PREFIX.length, -APPLIST_SUFFIX.length);
  return name.length > 0 ? name : null;
}

export function applistHeader(name: string, generated: string): string {
  return [
    `# ${PROJECT_NAME} ${PROJECT_VERSION} - applist "${name}"`,
    `# Generated on ${generated}`,
    "# This file is automatically generated. Do not edit it by hand.",
    "#",
    `# ${APPLIST_COLUMNS}`,
    "",
  ].join("\n");
}

function field(value: string): string {
  return value.replace(/[;\r\n]+/g, " ").trim();
}

export function formatApplistLine(product: Product): string {
  return [
    product.target,
    field(product.display_name),
    field(product.version),
    field(product.installer),
    product.silent_inst_args.replace(/[\r\n]+/g, " ").trim(),
  ].join(";");
}

function isTarget(value: string): value is Target {
  return TARGETS.some((target) => target === value);
}

/**
 * Read an applist. Blank and comment lines are skipped; lines that
 * cannot be read are reported and left out.
 */
export function parseApplist(text: string): ParsedApplist {
  const entries: ApplistEntry[] = [];
  const issues: ApplistIssue[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    const content = raw.trim();
    if (content === "" || content.startsWith("#")) return;

    const parts = content.split(";");
    if (parts.length < 5) {
      issues.push({ line, message: `Expected 5 fields, found ${parts.length}` });
      return;
    }
    const [target, displayName, version, installer, ...args] = parts.map((p) => p.trim());
    if (!isTarget(target)) {
      issues.push({ line, message: `Unknown target "${target}"` });
      return;
    }
    if (version === "") {
      issues.push({ line, message: "The version is empty" });
      return;
    }
    entries.push({
      target,
      display_name: displayName,
      version,
      installer,
      // arguments may themselves contain ";"
      silent_inst_args: args.join(";"),
      line,
    });
  });

  return { entries, issues };
}

// ─── Deployment Planning ─────────────────────────────────────────

export type Architecture = "x86" | "x64";

export type DeploymentAction =
  | "install"
  | "upgrade"
  | "up-to-date"
  | "newer-installed"
  | "unknown"
  | "unsupported";

export interface InstalledApplication {
  name: string;
  version: string;
}

export interface DeploymentStep {
  entry: ApplistEntry;
  action: DeploymentAction;
  /** Matching installed application, if any */
  installed?: InstalledApplication;
}

const VERSION_TOKEN = /^(?:v\d+(?:\.\w+)*|\d+(?:\.\w+)+)$/i;

/**
 * Name used to match an applist entry with an installed application:
 * lower case, without version tokens, build numbers or parenthesised
 * remarks.
 *
 *   "Mozilla Firefox 42.0 (x86 fr)" → "mozilla firefox"
 *   "MakeMKV v1.9.10"               → "makemkv"
 */
export function productKey(name: string): string {
  return name
    .replace(/\([^)]*\)/g, " ")
    .replace(/\bbuild\s+\d+\b/gi, " ")
    .split(/\s+/)
    .filter((word) => word !== "" && !VERSION_TOKEN.test(word))
    .join(" ")
    .toLowerCase();
}

/** x86 installers run on 32-bit machines only, x64 on 64-bit ones. */
export function supportsTarget(target: Target, arch: Architecture): boolean {
  return target === "unified" || target === arch;
}

/**
 * Decide, for every entry, what the deployment has to do on a machine
 * with the given architecture and installed applications. An installed
 * copy that is newer than the entry is never downgraded.
 */
export function planDeployment(
  entries: ApplistEntry[],
  inventory: InstalledApplication[],
  arch: Architecture,
): DeploymentStep[] {
  return entries.map((entry) => {
    if (!supportsTarget(entry.target, arch)) {
      return { entry, action: "unsupported" };
    }
    const key = productKey(entry.display_name);
    const installed = inventory.find((app) => productKey(app.name) === key);
    if (!installed) {
      return { entry, action: "install" };
    }

    const change = classifyVersionChange(installed.version, entry.version);
    const action: DeploymentAction =
      change === "same"
        ? "up-to-date"
        : change === "upgrade"
          ? "upgrade"
          : change === "downgrade"
            ? "newer-installed"
            : "unknown";
    return { entry, action, installed };
  });
}

// ─── Inventory ───────────────────────────────────────────────────

const InventorySchema = z.union([
  z.array(z.object({ name: z.string().min(1), version: z.coerce.string() })),
  z.record(z.coerce.string()),
]);

/**
 * Read an inventory of installed applications, YAML or JSON, either a
 * list of `{ name, version }` or a `name: version` map.
 */
export function parseInventory(text: string): InstalledApplication[] {
  const parsed = InventorySchema.parse(parseYaml(text) ?? []);
  return Array.isArray(parsed)
    ? parsed
    : Object.entries(parsed).map(([name, version]) => ({ name, version }));
}

export function loadInventory(file: string): InstalledApplication[] {
  return parseInventory(fs.readFileSync(file, "utf-8"));
}
