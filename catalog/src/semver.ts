/**
 * apptrack Catalog — Semantic Versioning
 *
 * Strict Semantic Versioning 2.0.0 (https://semver.org) parsing and
 * precedence. Used where a version is under our control, such as the
 * catalog scheme version. Editor-published versions go through the
 * lenient parser of the engine instead.
 *
 * Numbers are compared as digit strings, so identifiers beyond
 * Number.MAX_SAFE_INTEGER keep their order.
 */

export interface SemverParts {
  major: number;
  minor: number;
  patch: number;
  /** Dot-separated pre-release identifiers, empty for a release */
  prerelease: string[];
  /** Build metadata, ignored for precedence */
  build: string;
  /** Initial development (major 0) or pre-release */
  unstable: boolean;
  /** Input after normalization */
  normalized: string;
}

// Regular expression given by the SemVer 2.0.0 specification (§9, §10)
const SEMVER_RE =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?$/;

const NUMERIC_ID = /^\d+$/;

/**
 * Strip a leading 'v' or 'V' and surrounding whitespace.
 *
 *   'v1.2.3'  → '1.2.3'
 *   ' 1.0.0 ' → '1.0.0'
 */
export function normalizeSemver(version: string): string {
  return version.trim().replace(/^[vV]/, '');
}

/**
 * Parse a strict semantic version. Returns null when the string does not
 * follow the specification (missing patch, leading zeros, empty ids...).
 */
export function parseSemver(version: string): SemverParts | null {
  const normalized = normalizeSemver(version);
  const match = SEMVER_RE.exec(normalized);
  if (!match) return null;

  const major = parseInt(match[1], 10);
  const prerelease = prereleaseOf(match);
  return {
    major,
    minor: parseInt(match[2], 10),
    patch: parseInt(match[3], 10),
    prerelease,
    build: match[5] ?? '',
    unstable: major === 0 || prerelease.length > 0,
    normalized,
  };
}

export function isValidSemver(version: string): boolean {
  return parseSemver(version) !== null;
}

/**
 * Whether the version is an initial development or a pre-release version.
 * Returns null for an invalid version.
 */
export function isUnstable(version: string): boolean | null {
  const parts = parseSemver(version);
  return parts ? parts.unstable : null;
}

/** Rebuild the canonical string (without build metadata when asked). */
export function formatSemver(parts: SemverParts, withBuild = true): string {
  let text = `${parts.major}.${parts.minor}.${parts.patch}`;
  if (parts.prerelease.length > 0) text += `-${parts.prerelease.join('.')}`;
  if (withBuild && parts.build) text += `+${parts.build}`;
  return text;
}

/**
 * Compare pre-release identifier lists (§11.4). An empty list (a normal
 * release) has higher precedence than any pre-release.
 */
export function comparePrerelease(a: string[], b: string[]): -1 | 0 | 1 {
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;

  const count = Math.min(a.length, b.length);
  for (let i = 0; i < count; i++) {
    const cmp = compareIdentifier(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  if (a.length === b.length) return 0;
  return a.length > b.length ? 1 : -1;
}

/**
 * Compare two runs of decimal digits by value, whatever their length.
 * Leading zeros are ignored.
 *
 *   '9007199254740993' > '9007199254740992'
 *   '007' = '7'
 */
export function compareDigits(a: string, b: string): -1 | 0 | 1 {
  const x = a.replace(/^0+(?=\d)/, '');
  const y = b.replace(/^0+(?=\d)/, '');
  if (x.length !== y.length) return x.length > y.length ? 1 : -1;
  if (x === y) return 0;
  return x > y ? 1 : -1;
}

/**
 * Numeric identifiers compare numerically and sort below alphanumeric
 * ones. Alphanumeric identifiers compare in ASCII order.
 */
export function compareIdentifier(a: string, b: string): -1 | 0 | 1 {
  const aNum = NUMERIC_ID.test(a);
  const bNum = NUMERIC_ID.test(b);
  if (aNum && bNum) return compareDigits(a, b);
  if (aNum) return -1;
  if (bNum) return 1;
  if (a === b) return 0;
  return a > b ? 1 : -1;
}

/**
 * Compare two semantic versions by precedence.
 *
 * Returns:
 *   -1 if a < b
 *    0 if a and b have the same precedence (build metadata ignored)
 *    1 if a > b
 *   null if either string is not a valid semantic version
 */
export function compareSemver(a: string, b: string): -1 | 0 | 1 | null {
  const ma = SEMVER_RE.exec(normalizeSemver(a));
  const mb = SEMVER_RE.exec(normalizeSemver(b));
  if (!ma || !mb) return null;

  for (let i = 1; i <= 3; i++) {
    const cmp = compareDigits(ma[i], mb[i]);
    if (cmp !== 0) return cmp;
  }
  return comparePrerelease(prereleaseOf(ma), prereleaseOf(mb));
}

function prereleaseOf(match: RegExpExecArray): string[] {
  return match[4] !== undefined ? match[4].split('.') : [];
}

/**
 * Two versions are compatible when they share the same major number.
 * Returns false when either version is invalid.
 */
export function isCompatible(a: string, b: string): boolean {
  const ma = SEMVER_RE.exec(normalizeSemver(a));
  const mb = SEMVER_RE.exec(normalizeSemver(b));
  return ma !== null && mb !== null && compareDigits(ma[1], mb[1]) === 0;
}
