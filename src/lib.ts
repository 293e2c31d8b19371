/**
 * Library entrypoint
 *
 * Exposes the registry client, the tag reconciler and the manifest
 * aggregator for use outside the CLI.
 */

export * from './api/index.js';
export * from './reconcilers/tags/index.js';
export * from './manifest/index.js';
export * from './config/index.js';
export {
  parseSemver,
  isValidSemver,
  compareSemver,
  compareVersionStrings,
  sortVersionsDesc,
  nextPatchVersion,
  SEMVER_PATTERN,
  type SemVer,
  type CompareResult,
} from './utils/semver.js';
