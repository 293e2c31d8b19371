/**
 * Trust Registry API Client
 *
 * Provides a typed interface to the registry's application-version API with:
 * - Retry with exponential backoff for reads
 * - Rate limit handling (429 status)
 * - JSON logging with secret redaction
 * - Response validation at the boundary
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  versionListSchema,
  versionContentSchema,
  toApplicationVersion,
  type ApplicationVersion,
  type HttpMethod,
  type ListVersionsOptions,
  type RegistryClientConfig,
  type SourceVersionRef,
  type VersionContent,
  type VersionPatch,
} from './types.js';
import { withRetry, parseRetryAfter } from './retry.js';
import {
  RegistryResponseError,
  RegistryUnavailableError,
  errorFromStatus,
} from './errors.js';
import { logger, ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Operations the reconcilers and the aggregator need from the registry.
 * Implementations must not assume the caller relies on list ordering.
 */
export interface RegistryClient {
  /** List versions of an application (newest created first by default) */
  listVersions(appKey: string, options?: ListVersionsOptions): Promise<ApplicationVersion[]>;
  /** Mutate tag and/or properties of one version */
  patchVersion(appKey: string, version: string, patch: VersionPatch): Promise<void>;
  /** Fetch sources and releasables of one version */
  getVersionContent(appKey: string, version: string): Promise<VersionContent>;
  /** Create an aggregate version built from other applications' versions */
  createVersion(appKey: string, version: string, sources: SourceVersionRef[]): Promise<unknown>;
}

export const DEFAULT_LIST_LIMIT = 200;
export const DEFAULT_TIMEOUT_MS = 30000;

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a registry API client with retry and logging
 *
 * @param config - Client configuration options
 * @returns Configured registry client
 */
export function createClient(config: RegistryClientConfig): RegistryClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = config.fetch ?? fetch;
  const log = config.debug ? logger.child({ component: 'registry-client' }) : new ApiLogger({ level: 'warn' });

  if (!config.token) {
    throw new Error('Missing registry token. Set TRUST_REGISTRY_TOKEN or pass --token');
  }

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/json',
    Authorization: `Bearer ${config.token}`,
  };

  /**
   * Make an API request. Reads are retried, writes are sent once.
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: {
      params?: Record<string, string | number | boolean | undefined>;
      body?: unknown;
    } = {}
  ): Promise<unknown> {
    const url = new URL(`${baseUrl}${path}`);
    if (options.params) {
      for (const [key, value] of Object.entries(options.params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    const headers: Record<string, string> = { ...defaultHeaders };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    log.request(method, url.toString(), { headers, body: options.body });

    const makeRequest = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      // The timer stays armed until the whole body has been read
      let response: Response;
      let text: string;
      const startTime = Date.now();
      try {
        response = await fetchImpl(url.toString(), {
          method,
          headers,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
        });
        log.response(response.status, url.toString(), { durationMs: Date.now() - startTime });
        text = await readBody(response, controller.signal);
      } catch (err) {
        const reason = controller.signal.aborted
          ? `timed out after ${timeout}ms`
          : err instanceof Error
            ? err.message
            : String(err);
        throw new RegistryUnavailableError(`${method} ${path} failed: ${reason}`, { cause: err });
      } finally {
        clearTimeout(timeoutId);
      }

      if (!response.ok) {
        let errorMessage = `Registry API error (${response.status}) on ${method} ${path}`;
        let errorDetails: Record<string, unknown> | undefined;

        if (text) {
          const parsed = tryParseJson(text);
          if (isRecord(parsed)) {
            errorDetails = parsed;
            const detail = extractErrorMessage(parsed);
            if (detail) {
              errorMessage = `${errorMessage}: ${detail}`;
            }
          } else {
            errorMessage = `${errorMessage}: ${text.substring(0, 200)}`;
          }
        }

        throw errorFromStatus(errorMessage, response.status, {
          details: errorDetails,
          retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
        });
      }

      if (!text) {
        return undefined;
      }

      const parsed = tryParseJson(text);
      if (parsed === undefined) {
        throw new RegistryResponseError(`Registry returned a non-JSON body for ${method} ${path}`, {
          status: response.status,
        });
      }
      return parsed;
    };

    if (method !== 'GET') {
      return makeRequest();
    }

    const result = await withRetry(makeRequest, { ...config.retry, logger: log });

    if (!result.success) {
      throw result.error;
    }

    return result.data;
  }

  function appPath(appKey: string): string {
    return `/applications/${encodeURIComponent(appKey)}/versions`;
  }

  function versionPath(appKey: string, version: string): string {
    return `${appPath(appKey)}/${encodeURIComponent(version)}`;
  }

  return {
    async listVersions(appKey: string, options: ListVersionsOptions = {}): Promise<ApplicationVersion[]> {
      const path = appPath(appKey);
      const body = await request('GET', path, {
        params: {
          order_by: options.orderBy ?? 'created',
          order_asc: options.ascending ?? false,
          limit: options.limit ?? DEFAULT_LIST_LIMIT,
        },
      });
      const parsed = validate(versionListSchema, body ?? {}, `GET ${path}`);
      return parsed.versions.map(toApplicationVersion);
    },

    async patchVersion(appKey: string, version: string, patch: VersionPatch): Promise<void> {
      await request('PATCH', versionPath(appKey, version), {
        body: toPatchBody(patch),
      });
    },

    async getVersionContent(appKey: string, version: string): Promise<VersionContent> {
      const path = `${versionPath(appKey, version)}/content`;
      const body = await request('GET', path);
      const parsed = validate(versionContentSchema, body ?? {}, `GET ${path}`);
      return {
        sources: parsed.sources ?? {},
        releasables: parsed.releasables ?? {},
      };
    },

    async createVersion(appKey: string, version: string, sources: SourceVersionRef[]): Promise<unknown> {
      return request('POST', appPath(appKey), {
        body: {
          version,
          sources: {
            versions: sources.map((source) => ({
              application_key: source.applicationKey,
              version: source.version,
            })),
          },
        },
      });
    },
  };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Wire body for a version patch. Absent fields are left out entirely.
 */
export function toPatchBody(patch: VersionPatch): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (patch.tag !== undefined) {
    body.tag = patch.tag;
  }
  if (patch.setProperties && Object.keys(patch.setProperties).length > 0) {
    body.properties = patch.setProperties;
  }
  if (patch.deleteProperties && patch.deleteProperties.length > 0) {
    body.delete_properties = patch.deleteProperties;
  }
  return body;
}

function validate<Output>(
  schema: ZodType<Output, ZodTypeDef, unknown>,
  body: unknown,
  context: string
): Output {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RegistryResponseError(`Malformed registry response for ${context}: ${issues}`, {
      details: { issues: result.error.issues },
    });
  }
  return result.data;
}

/**
 * Read the response body, giving up as soon as `signal` aborts
 */
async function readBody(response: Response, signal: AbortSignal): Promise<string> {
  signal.throwIfAborted();
  let onAbort = (): void => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(new Error('body read aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([response.text(), aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractErrorMessage(body: Record<string, unknown>): string | undefined {
  for (const key of ['detail', 'message', 'error']) {
    const value = body[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  const errors = body.errors;
  if (Array.isArray(errors) && errors.length > 0) {
    const first: unknown = errors[0];
    if (isRecord(first) && typeof first.message === 'string') {
      return first.message;
    }
  }
  return undefined;
}
