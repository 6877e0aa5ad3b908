/**
 * apptrack Engine — Version Identifiers
 *
 * Editors publish versions in many shapes: "42.0", "1.9.10",
 * "5.0.0.1187", "2.4 build 3", "1.0b2", "1.0.2k", "3.0 (2016-01-31)".
 * This module parses each of them into the ordered tuple
 * (major, minor, patch, suffix) and compares tuples lexicographically.
 *
 * Suffix ordering:
 *   pre:  alpha / beta / rc / preview builds, below the release
 *   none: the release itself
 *   post: build numbers, file-version revisions, letter patches
 *
 *   1.0-beta < 1.0 < 1.0.0.1 < 1.0 build 2 ... and 1.0.2 < 1.0.2a < 1.0.2k
 *
 * A string that matches none of the conventions is never guessed at:
 * the comparison reports null ("unknown") and callers decide.
 */

import { compareDigits, compareIdentifier } from "@apptrack/catalog";

export type VersionFormat =
  | "semantic"
  | "file-version"
  | "build"
  | "labelled"
  | "lettered"
  | "short";

export type SuffixKind = "pre" | "none" | "post";

export interface VersionSuffix {
  kind: SuffixKind;
  ids: string[];
}

export interface VersionId {
  major: number;
  minor: number;
  patch: number;
  /** major, minor and patch as digits without leading zeros, compared exactly */
  release: [string, string, string];
  suffix: VersionSuffix;
  format: VersionFormat;
  /** Input after normalization */
  normalized: string;
}

export type VersionChange = "same" | "upgrade" | "downgrade" | "unknown";

// ─── Recognized Conventions ──────────────────────────────────────

const NUMBERS = String.raw`(\d+)(?:\.(\d+))?(?:\.(\d+))?`;

const SEMANTIC_RE =
  /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;
const FILE_VERSION_RE = /^(\d+)\.(\d+)\.(\d+)\.(\d+)$/;
const BUILD_RE = new RegExp(`^${NUMBERS}[\\s-]*(?:build|bld)[\\s.#-]*(\\d+)$`, "i");
const LABELLED_RE = new RegExp(
  `^${NUMBERS}[\\s.-]?(preview|alpha|beta|rc|pre)(?:[\\s.-]?(\\d+))?$`,
  "i",
);
const SHORT_LABEL_RE = new RegExp(`^${NUMBERS}(a|b)(\\d+)$`, "i");
const LETTERED_RE = /^(\d+)\.(\d+)(?:\.(\d+))?([a-zA-Z])$/;
const SHORT_RE = /^(\d+)(?:\.(\d+))?$/;

const LABELS: Record<string, string> = {
  a: "alpha",
  alpha: "alpha",
  b: "beta",
  beta: "beta",
  pre: "pre",
  preview: "pre",
  rc: "rc",
};

const NONE: VersionSuffix = { kind: "none", ids: [] };

/**
 * Trim, drop a leading "v", drop a trailing parenthesised remark and
 * collapse inner whitespace.
 *
 *   " v1.9.10 ( 25.4.2016 ) " → "1.9.10"
 *   "2.4   build 3"           → "2.4 build 3"
 */
export function normalizeVersionId(text: string): string {
  return text
    .trim()
    .replace(/\s*\([^)]*\)\s*$/, "")
    .replace(/^[vV](?=\d)/, "")
    .replace(/\s+/g, " ")
    .trim();
}

function digits(part: string | undefined): string {
  return part === undefined ? "0" : part.replace(/^0+(?=\d)/, "");
}

function num(part: string | undefined): number {
  return parseInt(digits(part), 10);
}

function make(
  match: RegExpExecArray,
  suffix: VersionSuffix,
  format: VersionFormat,
  normalized: string,
): VersionId {
  return {
    major: num(match[1]),
    minor: num(match[2]),
    patch: num(match[3]),
    release: [digits(match[1]), digits(match[2]), digits(match[3])],
    suffix,
    format,
    normalized,
  };
}

/**
 * Parse a version string. Conventions are tried from the most to the
 * least specific; null when none applies.
 */
export function parseVersionId(text: string): VersionId | null {
  const normalized = normalizeVersionId(text);
  if (normalized === "") return null;

  let m = SEMANTIC_RE.exec(normalized);
  if (m) {
    const suffix: VersionSuffix = m[4]
      ? { kind: "pre", ids: m[4].split(".") }
      : NONE;
    return make(m, suffix, "semantic", normalized);
  }

  m = FILE_VERSION_RE.exec(normalized);
  if (m) {
    const revision = digits(m[4]);
    const suffix: VersionSuffix =
      revision === "0" ? NONE : { kind: "post", ids: [revision] };
    return make(m, suffix, "file-version", normalized);
  }

  m = BUILD_RE.exec(normalized);
  if (m) {
    return make(m, { kind: "post", ids: [digits(m[4])] }, "build", normalized);
  }

  m = LABELLED_RE.exec(normalized) ?? SHORT_LABEL_RE.exec(normalized);
  if (m) {
    const ids = [LABELS[m[4].toLowerCase()]];
    if (m[5] !== undefined) ids.push(digits(m[5]));
    return make(m, { kind: "pre", ids }, "labelled", normalized);
  }

  m = LETTERED_RE.exec(normalized);
  if (m) {
    return make(
      m,
      { kind: "post", ids: [m[4].toLowerCase()] },
      "lettered",
      normalized,
    );
  }

  m = SHORT_RE.exec(normalized);
  if (m) {
    return make(m, NONE, "short", normalized);
  }

  return null;
}

export function isValidVersionId(text: string): boolean {
  return parseVersionId(text) !== null;
}

// ─── Comparison ──────────────────────────────────────────────────

const KIND_RANK: Record<SuffixKind, number> = { pre: 0, none: 1, post: 2 };

function compareNumber(a: number, b: number): -1 | 0 | 1 {
  if (a === b) return 0;
  return a > b ? 1 : -1;
}

function compareSuffix(a: VersionSuffix, b: VersionSuffix): -1 | 0 | 1 {
  if (a.kind !== b.kind) return compareNumber(KIND_RANK[a.kind], KIND_RANK[b.kind]);

  const count = Math.min(a.ids.length, b.ids.length);
  for (let i = 0; i < count; i++) {
    const cmp = compareIdentifier(a.ids[i], b.ids[i]);
    if (cmp !== 0) return cmp;
  }
  return compareNumber(a.ids.length, b.ids.length);
}

/** Compare two parsed identifiers. */
export function compareParsed(a: VersionId, b: VersionId): -1 | 0 | 1 {
  return (
    compareDigits(a.release[0], b.release[0]) ||
    compareDigits(a.release[1], b.release[1]) ||
    compareDigits(a.release[2], b.release[2]) ||
    compareSuffix(a.suffix, b.suffix)
  );
}

/**
 * Compare two version strings.
 *
 * Returns -1, 0 or 1 like a sort comparator, or null when either side
 * cannot be parsed.
 */
export function compareVersionIds(a: string, b: string): -1 | 0 | 1 | null {
  const pa = parseVersionId(a);
  const pb = parseVersionId(b);
  if (!pa || !pb) return null;
  return compareParsed(pa, pb);
}

/**
 * Relationship between an installed version and a target version.
 */
export function classifyVersionChange(
  installed: string,
  target: string,
): VersionChange {
  const cmp = compareVersionIds(installed, target);
  if (cmp === null) return "unknown";
  if (cmp === 0) return "same";
  if (cmp < 0) return "upgrade";
  return "downgrade";
}

// ─── Extraction ──────────────────────────────────────────────────

const EMBEDDED_RE =
  /(?:^|[^\d.])v?(\d+(?:\.\d+)+(?:-[0-9A-Za-z]+(?:\.[0-9A-Za-z]+)*)?(?: build \d+)?)/i;

/**
 * Find the first version-like token in free text.
 *
 *   "MakeMKV v1.9.10 ( 25.4.2016 )" → "1.9.10"
 *   "Release 2.4 build 3 is out"    → "2.4 build 3"
 */
export function extractVersionId(text: string): string | null {
  const match = EMBEDDED_RE.exec(text.replace(/\s+/g, " "));
  if (!match) return null;
  const candidate = match[1];
  return isValidVersionId(candidate) ? candidate : null;
}
