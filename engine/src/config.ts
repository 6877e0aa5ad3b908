/**
 * apptrack Engine — Configuration
 *
 * The tracker configuration is a YAML file validated with zod:
 *
 *   core:          store directory, log level, network settings
 *   reports:       optional, where and how to write task reports
 *   sets:          set name → applist names ("all, office" or a list)
 *   applications:  application id → true | false | { enabled, handler, path, set }
 *
 * Relative paths are resolved against the directory of the file.
 * Every problem found is reported, each with a suggested solution.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { APP_ID_PATTERN } from "@apptrack/catalog";
import { HandlerRegistry } from "./products/registry";
import { LOG_LEVELS, LogLevel } from "./utils/logger";

/** Set every application belongs to unless it names another one */
export const ALL_SET = "__all__";

export const DEFAULT_TIMEOUT_SECONDS = 60;

// ─── Schemas ─────────────────────────────────────────────────────

const CoreSchema = z.object({
  store: z.string().min(1),
  log_level: z.enum(LOG_LEVELS).optional().default("silent"),
  allow_insecure: z.boolean().optional().default(false),
  /** Network timeout, in seconds */
  timeout: z.number().int().positive().optional().default(DEFAULT_TIMEOUT_SECONDS),
});

const ReportsSchema = z.object({
  directory: z.string().min(1),
  format: z.enum(["html", "text"]).optional().default("html"),
});

const ApplicationSchema = z.union([
  z.boolean(),
  z.null(),
  z
    .object({
      enabled: z.boolean().optional().default(true),
      handler: z.string().min(1).optional(),
      path: z.string().min(1).optional(),
      set: z.string().min(1).optional(),
    })
    .strict(),
]);

export const ConfigFileSchema = z
  .object({
    core: CoreSchema,
    reports: ReportsSchema.optional(),
    sets: z.record(z.union([z.string(), z.array(z.string())])),
    applications: z.record(ApplicationSchema),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ─── Resolved Configuration ──────────────────────────────────────

export type ReportFormat = "html" | "text";

export interface ReportSettings {
  directory: string;
  format: ReportFormat;
}

export interface ApplicationConfig {
  id: string;
  enabled: boolean;
  handler: string;
  /** Directory the installers are downloaded into */
  path: string;
  set: string;
  /** Applists the application is written to */
  applists: string[];
}

export interface TrackerConfig {
  /** Absolute path of the configuration file ("" when parsed from text) */
  file: string;
  store: string;
  logLevel: LogLevel;
  allowInsecure: boolean;
  timeoutMs: number;
  reports: ReportSettings | null;
  sets: Record<string, string[]>;
  /** Every applist name declared by the sets, sorted */
  applists: string[];
  /** In configuration order */
  applications: ApplicationConfig[];
}

export interface ConfigIssue {
  /** Location in the file, e.g. "applications.firefox.set" */
  path: string;
  message: string;
  solution?: string;
}

export type ConfigLoadResult =
  | { ok: true; config: TrackerConfig }
  | { ok: false; file: string; issues: ConfigIssue[] };

/** "all, office" → ["all", "office"]; null when a name is empty. */
export function splitApplists(value: string | string[]): string[] | null {
  const names = (Array.isArray(value) ? value : value.split(",")).map((n) => n.trim());
  return names.every((n) => n.length > 0) ? names : null;
}

function issuesFromZod(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => {
    const at = issue.path.join(".");
    const missingSection =
      issue.code === "invalid_type" && issue.received === "undefined" && issue.path.length === 1;
    return missingSection
      ? {
          path: at,
          message: `Section "${at}" is missing`,
          solution: `Add a "${at}" section to the configuration file`,
        }
      : { path: at || "(root)", message: issue.message };
  });
}

/**
 * Validate and resolve a configuration given as YAML text.
 *
 * `file` is used for messages and to resolve relative paths; pass the
 * directory the paths are relative to through `baseDir` when `file` is "".
 */
export function parseConfig(
  text: string,
  file: string,
  registry: HandlerRegistry,
  baseDir: string = path.dirname(path.resolve(file || ".")),
): ConfigLoadResult {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, file, issues: [{ path: "(root)", message: `Invalid YAML: ${msg}` }] };
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return { ok: false, file, issues: issuesFromZod(parsed.error) };
  }
  const data = parsed.data;
  const issues: ConfigIssue[] = [];

  // ─── Sets ───
  const sets: Record<string, string[]> = {};
  for (const [name, value] of Object.entries(data.sets)) {
    if (name === ALL_SET) {
      issues.push({
        path: `sets.${name}`,
        message: `"${ALL_SET}" is reserved`,
        solution: "Rename the set",
      });
      continue;
    }
    const applists = splitApplists(value);
    if (applists === null) {
      issues.push({
        path: `sets.${name}`,
        message: "An applist name is empty",
        solution: 'Write the applist names separated by commas, e.g. "all, office"',
      });
      continue;
    }
    sets[name] = [...new Set(applists)];
  }
  const applists = [...new Set(Object.values(sets).flat())].sort();

  // ─── Applications ───
  const store = path.resolve(baseDir, data.core.store);
  const applications: ApplicationConfig[] = [];
  for (const [id, value] of Object.entries(data.applications)) {
    const options: { enabled: boolean; handler?: string; path?: string; set?: string } =
      value === null || typeof value === "boolean" ? { enabled: value ?? true } : value;
    const handler = options.handler ?? id;
    const set = options.set ?? ALL_SET;
    const dir = options.path ? path.resolve(baseDir, options.path) : path.join(store, id);

    if (!APP_ID_PATTERN.test(id)) {
      issues.push({
        path: `applications.${id}`,
        message: `"${id}" is not a valid application id`,
        solution:
          "Start the id with a letter or digit and use only letters, digits, '.', '_' and '-'",
      });
    }
    if (!registry.has(handler)) {
      issues.push({
        path: `applications.${id}.handler`,
        message: `Unknown handler "${handler}"`,
        solution: `Use one of: ${registry.names().join(", ")}`,
      });
    }
    if (set !== ALL_SET && !(set in sets)) {
      issues.push({
        path: `applications.${id}.set`,
        message: `Set "${set}" is not declared`,
        solution: `Declare "${set}" in the sets section`,
      });
    }

    applications.push({
      id,
      enabled: options.enabled,
      handler,
      path: dir,
      set,
      applists: set === ALL_SET ? applists : (sets[set] ?? []),
    });
  }

  if (issues.length > 0) return { ok: false, file, issues };

  return {
    ok: true,
    config: {
      file,
      store,
      logLevel: data.core.log_level,
      allowInsecure: data.core.allow_insecure,
      timeoutMs: data.core.timeout * 1000,
      reports: data.reports
        ? { directory: path.resolve(baseDir, data.reports.directory), format: data.reports.format }
        : null,
      sets,
      applists,
      applications,
    },
  };
}

/**
 * Read and validate a configuration file.
 */
export function loadConfig(file: string, registry: HandlerRegistry): ConfigLoadResult {
  const absolute = path.resolve(file);
  let text: string;
  try {
    text = fs.readFileSync(absolute, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      file: absolute,
      issues: [
        {
          path: "(file)",
          message: `Cannot read the configuration file: ${msg}`,
          solution: "Check the path given with -c/--config or APPTRACK_CONFIG",
        },
      ],
    };
  }
  return parseConfig(text, absolute, registry);
}
