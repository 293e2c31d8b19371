/**
 * API types for the Trust Registry client
 *
 * Wire payloads are validated with zod at the client boundary and mapped to
 * camelCase entities before they reach the reconcilers.
 */

import { z } from 'zod';

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods used by the client
 */
export type HttpMethod = 'GET' | 'POST' | 'PATCH';

// =============================================================================
// Release Status
// =============================================================================

/**
 * Release states reported by the registry. Other values may appear and are
 * carried through as plain strings.
 */
export const RELEASE_STATUSES = ['RELEASED', 'TRUSTED_RELEASE', 'STAGED', 'PRE_RELEASE'] as const;

export type KnownReleaseStatus = (typeof RELEASE_STATUSES)[number];

// Keeps autocomplete for known values while accepting anything else
export type ReleaseStatus = KnownReleaseStatus | (string & {});

/**
 * Statuses that take part in tag reconciliation
 */
export const PRODUCTION_STATUSES: ReadonlySet<string> = new Set(['RELEASED', 'TRUSTED_RELEASE']);

/**
 * Whether a status counts as production-eligible (case-insensitive)
 */
export function isProductionStatus(status: string): boolean {
  return PRODUCTION_STATUSES.has(status.toUpperCase());
}

// =============================================================================
// Wire Schemas
// =============================================================================

const propertyValueSchema = z.union([
  z.array(z.string()),
  z.string().transform((value) => [value]),
]);

/**
 * One version record as returned by the registry
 */
export const versionRecordSchema = z.object({
  version: z.string().min(1),
  tag: z.string().nullish(),
  release_status: z.string().nullish(),
  properties: z.record(propertyValueSchema).nullish(),
  created: z.string().nullish(),
  created_at: z.string().nullish(),
});

export type VersionRecord = z.infer<typeof versionRecordSchema>;

/**
 * List-versions response body
 */
export const versionListSchema = z.object({
  versions: z.array(versionRecordSchema).default([]),
});

/**
 * Version content response body (sources and releasables are opaque)
 */
export const versionContentSchema = z.object({
  sources: z.record(z.unknown()).nullish(),
  releasables: z.record(z.unknown()).nullish(),
});

// =============================================================================
// Entity Types
// =============================================================================

/**
 * A published version of an application
 */
export interface ApplicationVersion {
  /** Semantic version string, unique within the application */
  version: string;
  /** Current tag ('' when the registry reports none) */
  tag: string;
  releaseStatus: ReleaseStatus;
  /** Open property map; every value is a list of strings */
  properties: Record<string, string[]>;
  createdAt?: string;
}

/**
 * Map a validated wire record to an entity
 */
export function toApplicationVersion(record: VersionRecord): ApplicationVersion {
  const createdAt = record.created ?? record.created_at ?? undefined;
  return {
    version: record.version,
    tag: record.tag ?? '',
    releaseStatus: record.release_status ?? '',
    properties: record.properties ?? {},
    ...(createdAt ? { createdAt } : {}),
  };
}

/**
 * Mutation applied to a single version.
 * `setProperties` merges/overwrites the given keys, `deleteProperties`
 * removes keys. Omitted fields are left untouched.
 */
export interface VersionPatch {
  tag?: string;
  setProperties?: Record<string, string[]>;
  deleteProperties?: string[];
}

/**
 * Content of a version (sources and releasables)
 */
export interface VersionContent {
  sources: Record<string, unknown>;
  releasables: Record<string, unknown>;
}

/**
 * Reference to a source application version, used when creating an
 * aggregate (platform) version
 */
export interface SourceVersionRef {
  applicationKey: string;
  version: string;
}

/**
 * Options for listing versions
 */
export interface ListVersionsOptions {
  /** Maximum number of versions (default: 200) */
  limit?: number;
  /** Field to order by (default: created) */
  orderBy?: 'created' | 'version';
  /** Ascending order (default: false, newest first) */
  ascending?: boolean;
}

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Registry client configuration options
 */
export interface RegistryClientConfig {
  /** Base URL for the registry API */
  baseUrl: string;
  /** Bearer token */
  token: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Retry behaviour for read requests */
  retry?: RetryConfig;
  /** Fetch implementation (defaults to global fetch) */
  fetch?: typeof fetch;
}

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };
