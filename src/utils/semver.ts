/**
 * Semantic version parsing and ordering
 *
 * Parsing is strict SemVer 2.0.0 with an optional leading `v`; build
 * metadata is parsed but never takes part in ordering. Precedence comes
 * from the `semver` package. Numbers beyond what it can represent exactly
 * (above Number.MAX_SAFE_INTEGER) are compared here with bigints instead.
 *
 * Parsing never throws: anything that does not match yields `null`, and
 * `sortVersionsDesc` drops such values silently.
 */

import semver from 'semver';

/**
 * Version pattern: [v]MAJOR.MINOR.PATCH[-prerelease][+build]
 */
export const SEMVER_PATTERN =
  /^\s*v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-((?:0|[1-9]\d*|[a-zA-Z-][0-9a-zA-Z-]*)(?:\.(?:0|[1-9]\d*|[a-zA-Z-][0-9a-zA-Z-]*))*))?(?:\+([0-9a-zA-Z-]+(?:\.[0-9a-zA-Z-]+)*))?\s*$/;

const NUMERIC_IDENTIFIER = /^\d+$/;

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
/** Longest version string the semver package accepts */
const SEMVER_MAX_LENGTH = 256;

/**
 * Parsed semantic version
 */
export interface SemVer {
  major: bigint;
  minor: bigint;
  patch: bigint;
  /** Dot-separated prerelease identifiers (empty for a release) */
  prerelease: string[];
  /** Build metadata identifiers */
  build: string[];
  /** Input string as given */
  raw: string;
}

export type CompareResult = -1 | 0 | 1;

/**
 * Parse a version string
 *
 * @example
 * parseSemver('v1.2.3-rc.1+build.5')
 * // { major: 1n, minor: 2n, patch: 3n, prerelease: ['rc', '1'], build: ['build', '5'], raw: 'v1.2.3-rc.1+build.5' }
 * parseSemver('01.2.3') // null
 */
export function parseSemver(value: string): SemVer | null {
  const match = SEMVER_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, major, minor, patch, prerelease, build] = match;

  return {
    major: BigInt(major),
    minor: BigInt(minor),
    patch: BigInt(patch),
    prerelease: prerelease ? prerelease.split('.') : [],
    build: build ? build.split('.') : [],
    raw: value,
  };
}

/**
 * Check whether a string is a parseable version
 */
export function isValidSemver(value: string): boolean {
  return parseSemver(value) !== null;
}

/** MAJOR.MINOR.PATCH[-prerelease], without `v`, whitespace or build metadata */
function canonical(version: SemVer): string {
  const core = `${version.major}.${version.minor}.${version.patch}`;
  return version.prerelease.length > 0 ? `${core}-${version.prerelease.join('.')}` : core;
}

/**
 * True when the semver package orders this version exactly: its core
 * numbers must be safe integers and numeric prerelease identifiers below
 * MAX_SAFE_INTEGER (larger ones it compares as lossy doubles).
 */
function withinPackageLimits(version: SemVer): boolean {
  return (
    version.major <= MAX_SAFE &&
    version.minor <= MAX_SAFE &&
    version.patch <= MAX_SAFE &&
    version.prerelease.every((id) => !NUMERIC_IDENTIFIER.test(id) || BigInt(id) < MAX_SAFE) &&
    canonical(version).length <= SEMVER_MAX_LENGTH
  );
}

function compareBigints(a: bigint, b: bigint): CompareResult {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareIdentifiers(a: string, b: string): CompareResult {
  if (a === b) return 0;

  const aNumeric = NUMERIC_IDENTIFIER.test(a);
  const bNumeric = NUMERIC_IDENTIFIER.test(b);

  if (aNumeric && bNumeric) {
    return compareBigints(BigInt(a), BigInt(b));
  }
  // Numeric identifiers always have lower precedence
  if (aNumeric) return -1;
  if (bNumeric) return 1;

  return a < b ? -1 : 1;
}

/** Same precedence rules as semver.compare, on arbitrarily large numbers */
function compareExact(a: SemVer, b: SemVer): CompareResult {
  const core =
    compareBigints(a.major, b.major) || compareBigints(a.minor, b.minor) || compareBigints(a.patch, b.patch);
  if (core !== 0) {
    return core;
  }

  const aPre = a.prerelease.length > 0;
  const bPre = b.prerelease.length > 0;
  if (!aPre && bPre) return 1;
  if (aPre && !bPre) return -1;

  const shared = Math.min(a.prerelease.length, b.prerelease.length);
  for (let i = 0; i < shared; i++) {
    const result = compareIdentifiers(a.prerelease[i], b.prerelease[i]);
    if (result !== 0) {
      return result;
    }
  }

  return compareBigints(BigInt(a.prerelease.length), BigInt(b.prerelease.length));
}

/**
 * Compare two parsed versions by SemVer precedence
 */
export function compareSemver(a: SemVer, b: SemVer): CompareResult {
  if (withinPackageLimits(a) && withinPackageLimits(b)) {
    return semver.compare(canonical(a), canonical(b));
  }
  return compareExact(a, b);
}

/**
 * Compare two raw version strings.
 * Unparseable strings sort below every parseable one and equal to each other.
 */
export function compareVersionStrings(a: string, b: string): CompareResult {
  const pa = parseSemver(a);
  const pb = parseSemver(b);

  if (pa && pb) return compareSemver(pa, pb);
  if (pa) return 1;
  if (pb) return -1;
  return 0;
}

/**
 * Sort version strings highest first, dropping unparseable ones.
 * The sort is stable: equal-precedence versions (e.g. differing only in
 * build metadata) keep their input order.
 *
 * @example
 * sortVersionsDesc(['1.0.0', '2.1.0', 'nope', '1.10.0'])
 * // ['2.1.0', '1.10.0', '1.0.0']
 */
export function sortVersionsDesc(values: readonly string[]): string[] {
  const parsed: SemVer[] = [];
  for (const value of values) {
    const version = parseSemver(value);
    if (version) {
      parsed.push(version);
    }
  }

  return parsed.sort((a, b) => compareSemver(b, a)).map((version) => version.raw);
}

/**
 * Next patch release after `current`, or `1.0.0` when there is no usable
 * current version. Prerelease and build parts are dropped.
 */
export function nextPatchVersion(current: string | undefined): string {
  const parsed = current ? parseSemver(current) : null;
  if (!parsed) {
    return '1.0.0';
  }
  return `${parsed.major}.${parsed.minor}.${parsed.patch + 1n}`;
}
