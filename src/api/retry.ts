/**
 * Backoff and retry for registry reads
 *
 * Only GET requests are wrapped. Tag and property patches are sent once;
 * a failed reconciliation is retried by running it again, which converges
 * from whatever state the registry was left in.
 */

import type { RetryConfig, RetryResult } from './types.js';
import { RegistryError } from './errors.js';
import { logger, type ApiLogger } from './logger.js';

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/** Transport failures worth another attempt, matched against error messages */
const TRANSIENT_NETWORK_ERRORS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'eai_again',
  'fetch failed',
  'socket hang up',
];

export interface RetryOptions extends RetryConfig {
  logger?: ApiLogger;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Replaces the status and network checks of isRetryableError */
  isRetryable?: (error: Error) => boolean;
}

export function resolveRetryConfig(config: RetryConfig = {}): Required<RetryConfig> {
  return {
    maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: config.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: config.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };
}

/**
 * Delay before retry number `attempt` (1-based)
 *
 * A Retry-After hint (seconds) wins over exponential backoff. Either way the
 * result stays within [0, maxDelayMs].
 */
export function calculateDelay(attempt: number, config: Required<RetryConfig>, retryAfter?: number): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const spread = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + spread, config.maxDelayMs);
  }

  const backoff = config.baseDelayMs * 2 ** (attempt - 1);
  // +/- jitterFactor around the backoff
  const spread = backoff * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.min(Math.max(backoff + spread, 0), config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryableError(error: Error, config: Required<RetryConfig>): boolean {
  if (error instanceof RegistryError) {
    // status 0: the request never got a response
    return (error.code === 'UNAVAILABLE' && error.status === 0) || config.retryableStatuses.includes(error.status);
  }
  if (error.name === 'AbortError') {
    return true;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_NETWORK_ERRORS.some((fragment) => message.includes(fragment));
}

/**
 * Retry-After header as whole seconds (delta-seconds or HTTP-date)
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isInteger(seconds) && seconds > 0) {
    return seconds;
  }

  const until = Date.parse(value) - Date.now();
  return until > 0 ? Math.ceil(until / 1000) : undefined;
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or runs
 * out of retries. Never throws; the last error comes back in the result.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<RetryResult<T>> {
  const config = resolveRetryConfig(options);
  const log = options.logger ?? logger;
  const canRetry = options.isRetryable ?? ((error: Error) => isRetryableError(error, config));
  const startedAt = Date.now();

  for (let attempt = 1; ; attempt++) {
    try {
      const data = await fn();
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, { attempts: attempt });
      }
      return { success: true, data, attempts: attempt, totalTimeMs: Date.now() - startedAt };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const retryable = canRetry(error);

      if (!retryable || attempt > config.maxRetries) {
        if (!retryable) {
          log.debug('Error is not retryable', { error: error.message });
        } else if (config.maxRetries > 0) {
          log.warn(`Giving up after ${config.maxRetries} retries`, { error: error.message });
        }
        return { success: false, error, attempts: attempt, totalTimeMs: Date.now() - startedAt };
      }

      const status = error instanceof RegistryError ? error.status : undefined;
      const delayMs = calculateDelay(attempt, config, error instanceof RegistryError ? error.retryAfter : undefined);

      log.info(`Retrying (${attempt}/${config.maxRetries}) in ${Math.round(delayMs)}ms`, {
        error: error.message,
        status,
      });
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}
