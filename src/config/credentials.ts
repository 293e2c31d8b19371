/**
 * Registry connection resolution for platform-release
 *
 * ## Base URL Resolution Order
 *
 * 1. `--base-url` flag
 * 2. TRUST_REGISTRY_URL
 * 3. APPTRUST_BASE_URL
 *
 * ## Token Resolution Order
 *
 * 1. `--token` flag
 * 2. TRUST_REGISTRY_AUTH_HELPER: external command that prints a token
 *    - Args via TRUST_REGISTRY_AUTH_HELPER_ARGS (whitespace-separated or JSON array)
 *    - Falls through to the variables below when the helper fails
 * 3. TRUST_REGISTRY_TOKEN
 * 4. APPTRUST_ACCESS_TOKEN
 */

import { execFileSync } from 'node:child_process';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';

export const AUTH_HELPER_TIMEOUT_MS = 30000;

export type TokenSource = 'cli' | 'auth_helper' | 'env';

export interface ConnectionOverrides {
  baseUrl?: string;
  token?: string;
}

export interface RegistryConnection {
  baseUrl: string;
  token: string;
  tokenSource: TokenSource;
}

export type ConnectionResolution =
  | { ok: true; connection: RegistryConnection }
  | { ok: false; missing: string[] };

/**
 * Runs the auth helper and returns its stdout
 */
export type HelperRunner = (command: string, args: string[]) => string;

export interface ResolveConnectionOptions {
  env?: NodeJS.ProcessEnv;
  runHelper?: HelperRunner;
  logger?: ApiLogger;
}

const defaultHelperRunner: HelperRunner = (command, args) =>
  execFileSync(command, args, {
    encoding: 'utf-8',
    timeout: AUTH_HELPER_TIMEOUT_MS,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Parse auth helper arguments.
 *
 * Supports a JSON array ('["a", "b"]') or a whitespace-separated string.
 */
export function parseAuthHelperArgs(raw: string | undefined): string[] {
  if (!raw || raw.trim().length === 0) return [];

  const trimmed = raw.trim();

  if (trimmed.startsWith('[')) {
    const parsed = tryParseJson(trimmed);
    if (Array.isArray(parsed)) {
      return parsed.map((arg) => String(arg));
    }
  }

  return trimmed.split(/\s+/).filter((arg) => arg.length > 0);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Registry base URL from the flag or environment, without a trailing slash
 */
export function resolveBaseUrl(
  flag?: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = firstNonEmpty(flag, env.TRUST_REGISTRY_URL, env.APPTRUST_BASE_URL);
  return value?.replace(/\/+$/, '');
}

/**
 * Token from the configured auth helper, or null when there is no helper
 * or it fails
 */
export function resolveAuthHelperToken(options: ResolveConnectionOptions = {}): string | null {
  const env = options.env ?? process.env;
  const helper = env.TRUST_REGISTRY_AUTH_HELPER;
  if (!helper || helper.trim().length === 0) return null;

  const run = options.runHelper ?? defaultHelperRunner;
  const log = options.logger ?? defaultLogger;
  const args = parseAuthHelperArgs(env.TRUST_REGISTRY_AUTH_HELPER_ARGS);

  try {
    const token = run(helper.trim(), args).trim();
    return token.length > 0 ? token : null;
  } catch (err) {
    log.debug(`Auth helper failed: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Resolve the access token along the chain above
 */
export function resolveToken(
  flag?: string,
  options: ResolveConnectionOptions = {}
): { token: string; source: TokenSource } | null {
  const env = options.env ?? process.env;

  const fromFlag = firstNonEmpty(flag);
  if (fromFlag) return { token: fromFlag, source: 'cli' };

  const fromHelper = resolveAuthHelperToken(options);
  if (fromHelper) return { token: fromHelper, source: 'auth_helper' };

  const fromEnv = firstNonEmpty(env.TRUST_REGISTRY_TOKEN, env.APPTRUST_ACCESS_TOKEN);
  if (fromEnv) return { token: fromEnv, source: 'env' };

  return null;
}

/**
 * Resolve everything needed to talk to the registry.
 *
 * @returns The connection, or the names of the settings that are missing
 */
export function resolveRegistryConnection(
  overrides: ConnectionOverrides = {},
  options: ResolveConnectionOptions = {}
): ConnectionResolution {
  const baseUrl = resolveBaseUrl(overrides.baseUrl, options.env);
  const token = resolveToken(overrides.token, options);

  const missing: string[] = [];
  if (!baseUrl) missing.push('base URL (--base-url, TRUST_REGISTRY_URL or APPTRUST_BASE_URL)');
  if (!token) missing.push('access token (--token, TRUST_REGISTRY_AUTH_HELPER, TRUST_REGISTRY_TOKEN or APPTRUST_ACCESS_TOKEN)');

  if (!baseUrl || !token) {
    return { ok: false, missing };
  }

  return {
    ok: true,
    connection: { baseUrl, token: token.token, tokenSource: token.source },
  };
}
