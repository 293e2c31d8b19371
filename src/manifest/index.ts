/**
 * Platform manifest aggregation
 */

export type {
  ServiceConfig,
  ResolvedService,
  ResolutionResult,
  SourceStage,
  ManifestApplication,
  PlatformManifest,
  OverrideParseResult,
} from './types.js';
export { SUPPORTED_SOURCE_STAGES } from './types.js';

export { ConfigError, ConfigValidationError } from './errors.js';
export type { ConfigErrorCode } from './errors.js';

export { loadServicesConfig, parseServicesConfig, parseOverrides } from './loader.js';
export type { ServicesConfigLoadOptions } from './loader.js';

export {
  pickLatestProdVersion,
  resolvePromotedVersions,
  computeNextPlatformVersion,
} from './resolve.js';

export {
  buildManifest,
  writeManifest,
  formatSummary,
  formatManifestVersion,
  isSupportedStage,
  MANIFEST_NOTES,
} from './build.js';
