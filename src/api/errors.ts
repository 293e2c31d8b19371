/**
 * Trust Registry error types
 *
 * Every failure the client raises is a `RegistryError` with a stable code:
 *
 * - UNAVAILABLE: network failure, timeout, or a 5xx response
 * - NOT_FOUND: the application or version does not exist
 * - REQUEST_FAILED: any other non-2xx response (auth, validation, rate limit)
 * - INVALID_RESPONSE: the body did not match the expected shape
 */

export type RegistryErrorCode =
  | 'UNAVAILABLE'
  | 'NOT_FOUND'
  | 'REQUEST_FAILED'
  | 'INVALID_RESPONSE';

/**
 * HTTP status codes with special handling
 */
export const NOT_FOUND_STATUS = 404;
export const SERVER_ERROR_THRESHOLD = 500;

interface RegistryErrorOptions {
  status?: number;
  details?: Record<string, unknown>;
  retryAfter?: number;
  cause?: unknown;
}

/**
 * Base class for all registry errors
 */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  /** HTTP status, or 0 when no response was received */
  public readonly status: number;
  public readonly details?: Record<string, unknown>;
  /** Retry-After hint in seconds */
  public readonly retryAfter?: number;

  constructor(message: string, code: RegistryErrorCode, options: RegistryErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RegistryError';
    this.code = code;
    this.status = options.status ?? 0;
    this.details = options.details;
    this.retryAfter = options.retryAfter;
  }
}

/**
 * The registry could not be reached or failed on its side
 */
export class RegistryUnavailableError extends RegistryError {
  constructor(message: string, options: RegistryErrorOptions = {}) {
    super(message, 'UNAVAILABLE', options);
    this.name = 'RegistryUnavailableError';
  }
}

/**
 * The referenced application or version does not exist
 */
export class RegistryNotFoundError extends RegistryError {
  constructor(message: string, options: RegistryErrorOptions = {}) {
    super(message, 'NOT_FOUND', { status: NOT_FOUND_STATUS, ...options });
    this.name = 'RegistryNotFoundError';
  }
}

/**
 * The registry rejected the request
 */
export class RegistryRequestError extends RegistryError {
  constructor(message: string, status: number, options: RegistryErrorOptions = {}) {
    super(message, 'REQUEST_FAILED', { ...options, status });
    this.name = 'RegistryRequestError';
  }
}

/**
 * The registry answered with a body we cannot use
 */
export class RegistryResponseError extends RegistryError {
  constructor(message: string, options: RegistryErrorOptions = {}) {
    super(message, 'INVALID_RESPONSE', options);
    this.name = 'RegistryResponseError';
  }
}

/**
 * Map a non-2xx HTTP status to the matching error class
 */
export function errorFromStatus(
  message: string,
  status: number,
  options: Omit<RegistryErrorOptions, 'status'> = {}
): RegistryError {
  if (status === NOT_FOUND_STATUS) {
    return new RegistryNotFoundError(message, options);
  }
  if (status >= SERVER_ERROR_THRESHOLD) {
    return new RegistryUnavailableError(message, { ...options, status });
  }
  return new RegistryRequestError(message, status, options);
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}
