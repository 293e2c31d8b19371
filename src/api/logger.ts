/**
 * Structured logging for platform-release
 *
 * Every line goes through redaction first: registry tokens must never show
 * up in CI logs, whether they sit in a header, a context field or the
 * message itself. Lines are written to stderr so stdout carries only
 * command output.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** One JSON object per line instead of text (default: false) */
  json?: boolean;
  /** Prefix text lines with a timestamp (default: true) */
  timestamps?: boolean;
}

/**
 * Where formatted lines go
 */
export type LogSink = (level: LogLevel, line: string) => void;

// =============================================================================
// Redaction
// =============================================================================

const SECRET_PATTERNS = [
  /Bearer\s+[a-zA-Z0-9._-]+/gi,
  // JWTs (OIDC-exchanged access tokens)
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  // Registry reference tokens (base64 of "ref...")
  /cmVmd[a-zA-Z0-9+/=]{20,}/g,
  /(?:secret|token)[_-]?[a-zA-Z0-9]{10,}/gi,
];

const SECRET_HEADERS = new Set(['authorization', 'proxy-authorization', 'x-jfrog-art-api', 'cookie', 'set-cookie']);

const SECRET_KEYS = new Set([
  'token',
  'access_token',
  'accesstoken',
  'id_token',
  'oidc_token',
  'password',
  'secret',
  'authorization',
  'credentials',
]);

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_REDACT_DEPTH = 10;

/**
 * Mask a secret, keeping its first and last 4 characters
 *
 * @example
 * redactString('abcdefghijklmnop') // 'abcd...mnop'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (value.length < 10) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

/**
 * Mask anything in free text that looks like a secret
 */
export function redactPatterns(value: string): string {
  return SECRET_PATTERNS.reduce((text, pattern) => {
    pattern.lastIndex = 0;
    return text.replace(pattern, (match) => redactString(match));
  }, value);
}

/**
 * Deep copy of a value with secrets masked
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_REDACT_DEPTH) return '[MAX_DEPTH]';
  if (typeof value === 'string') return redactPatterns(value);
  if (Array.isArray(value)) return value.map((item) => redactValue(item, depth + 1));
  if (typeof value === 'object' && value !== null) {
    return redactObject(Object.fromEntries(Object.entries(value)), depth);
  }
  return value;
}

/**
 * Copy of a plain object with secret-named keys masked
 */
export function redactObject(obj: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (!SECRET_KEYS.has(lowerKey) && !SECRET_HEADERS.has(lowerKey)) {
      result[key] = redactValue(value, depth + 1);
    } else if (value === null || value === undefined) {
      result[key] = value;
    } else {
      result[key] = typeof value === 'string' && value.length > 0 ? redactString(value) : '[REDACTED]';
    }
  }
  return result;
}

/**
 * Copy of request/response headers with credentials masked
 */
export function redactHeaders(headers: Headers | Record<string, string>): Record<string, string> {
  const entries = headers instanceof Headers ? Array.from(headers.entries()) : Object.entries(headers);
  return Object.fromEntries(
    entries.map(([key, value]) => [
      key,
      SECRET_HEADERS.has(key.toLowerCase()) ? redactString(value) : redactPatterns(value),
    ])
  );
}

// =============================================================================
// Logger
// =============================================================================

const stderrSink: LogSink = (level, line) => {
  if (level === 'warn') {
    console.warn(line);
  } else {
    console.error(line);
  }
};

export interface LoggerOptions {
  /** Fields added to every entry */
  context?: Record<string, unknown>;
  sink?: LogSink;
}

export class ApiLogger {
  private config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(config: LoggerConfig = {}, options: LoggerOptions = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
    };
    this.baseContext = options.context ?? {};
    this.sink = options.sink ?? stderrSink;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * Outgoing HTTP request, at debug level
   */
  request(method: string, url: string, options: { headers?: Headers | Record<string, string>; body?: unknown } = {}): void {
    this.debug('HTTP Request', {
      method,
      url,
      headers: options.headers ? redactHeaders(options.headers) : undefined,
      body: options.body,
    });
  }

  /**
   * HTTP response; warn for 4xx/5xx, debug otherwise
   */
  response(status: number, url: string, options: { durationMs?: number } = {}): void {
    this.write(status >= 400 ? 'warn' : 'debug', `HTTP Response ${status}: ${url}`, {
      status,
      durationMs: options.durationMs,
    });
  }

  /**
   * Logger sharing this one's config and sink, with extra context
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, {
      context: { ...this.baseContext, ...context },
      sink: this.sink,
    });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (LEVELS[level] < LEVELS[this.config.level]) return;
    this.sink(level, this.render(this.entry(level, message, context, error)));
  }

  private entry(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactObject(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  private render(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.timestamps) parts.push(`[${entry.timestamp}]`);
    parts.push(`[${entry.level.toUpperCase()}]`, entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      // Stack traces only when debugging
      if (entry.error.stack && this.config.level === 'debug') {
        parts.push(`\n  ${entry.error.stack}`);
      }
    }

    return parts.join(' ');
  }
}

/**
 * Parse a log level name, ignoring unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Process-wide logger (PLATFORM_RELEASE_LOG_LEVEL, PLATFORM_RELEASE_LOG_JSON)
 */
export const logger = new ApiLogger({
  level: parseLogLevel(process.env.PLATFORM_RELEASE_LOG_LEVEL),
  json: process.env.PLATFORM_RELEASE_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}, options: LoggerOptions = {}): ApiLogger {
  return new ApiLogger(config, options);
}
