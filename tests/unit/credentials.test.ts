/**
 * Unit Tests: Registry Connection Resolution
 *
 * Tests the base URL and token resolution chains:
 * 1. CLI flags
 * 2. TRUST_REGISTRY_AUTH_HELPER external command (token only)
 * 3. TRUST_REGISTRY_* environment variables
 * 4. APPTRUST_* environment variables
 *
 * @see src/config/credentials.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  parseAuthHelperArgs,
  resolveBaseUrl,
  resolveToken,
  resolveAuthHelperToken,
  resolveRegistryConnection,
  type HelperRunner,
} from '../../src/config/credentials.js';
import { createLogger, type LogSink } from '../../src/api/logger.js';

const quiet = createLogger({ level: 'error' }, { sink: vi.fn<LogSink>() });

// =============================================================================
// parseAuthHelperArgs
// =============================================================================

describe('parseAuthHelperArgs', () => {
  it('returns nothing for unset or blank values', () => {
    expect(parseAuthHelperArgs(undefined)).toEqual([]);
    expect(parseAuthHelperArgs('   ')).toEqual([]);
  });

  it('splits on whitespace', () => {
    expect(parseAuthHelperArgs(' token  --audience registry ')).toEqual(['token', '--audience', 'registry']);
  });

  it('accepts a JSON array', () => {
    expect(parseAuthHelperArgs('["get", "a b", 3]')).toEqual(['get', 'a b', '3']);
  });

  it('falls back to whitespace splitting for broken JSON', () => {
    expect(parseAuthHelperArgs('[oops')).toEqual(['[oops']);
  });
});

// =============================================================================
// Base URL
// =============================================================================

describe('resolveBaseUrl', () => {
  it('prefers the flag, then TRUST_REGISTRY_URL, then APPTRUST_BASE_URL', () => {
    const env = {
      TRUST_REGISTRY_URL: 'https://primary.test/',
      APPTRUST_BASE_URL: 'https://legacy.test',
    };
    expect(resolveBaseUrl('https://flag.test//', env)).toBe('https://flag.test');
    expect(resolveBaseUrl(undefined, env)).toBe('https://primary.test');
    expect(resolveBaseUrl(undefined, { APPTRUST_BASE_URL: 'https://legacy.test' })).toBe('https://legacy.test');
    expect(resolveBaseUrl(undefined, {})).toBeUndefined();
  });
});

// =============================================================================
// Token
// =============================================================================

describe('resolveToken', () => {
  it('uses the flag before anything else', () => {
    const runHelper = vi.fn<HelperRunner>();
    const env = { TRUST_REGISTRY_AUTH_HELPER: '/usr/bin/get-token', TRUST_REGISTRY_TOKEN: 'env-token' };

    expect(resolveToken('flag-token', { env, runHelper })).toEqual({ token: 'flag-token', source: 'cli' });
    expect(runHelper).not.toHaveBeenCalled();
  });

  it('runs the auth helper with its arguments', () => {
    const runHelper = vi.fn<HelperRunner>().mockReturnValue('helper-token\n');
    const env = {
      TRUST_REGISTRY_AUTH_HELPER: '/usr/bin/get-token',
      TRUST_REGISTRY_AUTH_HELPER_ARGS: '["--audience", "registry"]',
      TRUST_REGISTRY_TOKEN: 'env-token',
    };

    expect(resolveToken(undefined, { env, runHelper })).toEqual({ token: 'helper-token', source: 'auth_helper' });
    expect(runHelper).toHaveBeenCalledWith('/usr/bin/get-token', ['--audience', 'registry']);
  });

  it('falls through when the helper fails or prints nothing', () => {
    const env = { TRUST_REGISTRY_AUTH_HELPER: '/usr/bin/get-token', TRUST_REGISTRY_TOKEN: 'env-token' };
    const failing = vi.fn<HelperRunner>().mockImplementation(() => {
      throw new Error('exit code 1');
    });
    const empty = vi.fn<HelperRunner>().mockReturnValue('  \n');

    expect(resolveToken(undefined, { env, runHelper: failing, logger: quiet })).toEqual({
      token: 'env-token',
      source: 'env',
    });
    expect(resolveAuthHelperToken({ env, runHelper: empty })).toBeNull();
  });

  it('falls back to APPTRUST_ACCESS_TOKEN', () => {
    expect(resolveToken(undefined, { env: { APPTRUST_ACCESS_TOKEN: ' legacy-token ' } })).toEqual({
      token: 'legacy-token',
      source: 'env',
    });
  });

  it('returns null when nothing is configured', () => {
    expect(resolveToken(undefined, { env: {} })).toBeNull();
  });
});

// =============================================================================
// resolveRegistryConnection
// =============================================================================

describe('resolveRegistryConnection', () => {
  it('combines base URL and token', () => {
    const resolution = resolveRegistryConnection(
      {},
      { env: { TRUST_REGISTRY_URL: 'https://registry.test', TRUST_REGISTRY_TOKEN: 'test-token' } }
    );

    expect(resolution).toEqual({
      ok: true,
      connection: { baseUrl: 'https://registry.test', token: 'test-token', tokenSource: 'env' },
    });
  });

  it('lists everything that is missing', () => {
    const resolution = resolveRegistryConnection({}, { env: {} });

    expect(resolution.ok).toBe(false);
    if (resolution.ok) return;
    expect(resolution.missing).toHaveLength(2);
    expect(resolution.missing[0]).toContain('base URL');
    expect(resolution.missing[1]).toContain('access token');
  });

  it('lets flags override the environment', () => {
    const resolution = resolveRegistryConnection(
      { baseUrl: 'https://flag.test', token: 'flag-token' },
      { env: { TRUST_REGISTRY_URL: 'https://registry.test', TRUST_REGISTRY_TOKEN: 'test-token' } }
    );

    expect(resolution).toEqual({
      ok: true,
      connection: { baseUrl: 'https://flag.test', token: 'flag-token', tokenSource: 'cli' },
    });
  });
});
