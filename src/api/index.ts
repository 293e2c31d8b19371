/**
 * Trust Registry API client module
 *
 * Provides:
 * - RegistryClient for listing, patching and creating application versions
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 * - Typed registry errors
 */

// Main client
export { createClient, toPatchBody, DEFAULT_LIST_LIMIT, DEFAULT_TIMEOUT_MS } from './client.js';
export type { RegistryClient } from './client.js';

// Errors
export {
  RegistryError,
  RegistryUnavailableError,
  RegistryNotFoundError,
  RegistryRequestError,
  RegistryResponseError,
  errorFromStatus,
  isRegistryError,
  NOT_FOUND_STATUS,
  SERVER_ERROR_THRESHOLD,
} from './errors.js';
export type { RegistryErrorCode } from './errors.js';

// Retry utilities
export {
  withRetry,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  resolveRetryConfig,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';
export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  parseLogLevel,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactObject,
  redactHeaders,
} from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig, LoggerOptions, LogSink } from './logger.js';

// Types
export {
  RELEASE_STATUSES,
  PRODUCTION_STATUSES,
  isProductionStatus,
  toApplicationVersion,
  versionRecordSchema,
  versionListSchema,
  versionContentSchema,
} from './types.js';
export type {
  HttpMethod,
  KnownReleaseStatus,
  ReleaseStatus,
  VersionRecord,
  ApplicationVersion,
  VersionPatch,
  VersionContent,
  SourceVersionRef,
  ListVersionsOptions,
  RegistryClientConfig,
  RetryConfig,
  RetryResult,
} from './types.js';
