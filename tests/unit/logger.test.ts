/**
 * Unit Tests: Logger
 *
 * Tests secret redaction and level filtering of the structured logger.
 *
 * @see src/api/logger.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createLogger,
  parseLogLevel,
  redactHeaders,
  redactObject,
  redactPatterns,
  redactString,
  type LogSink,
} from '../../src/api/logger.js';

function capture(level: 'debug' | 'info' | 'warn' | 'error' = 'debug', json = false) {
  const sink = vi.fn<LogSink>();
  const logger = createLogger({ level, json, timestamps: false }, { sink });
  return { sink, logger };
}

describe('redaction', () => {
  it('keeps the ends of long values only', () => {
    expect(redactString('abcdefghijklmnop')).toBe('abcd...mnop');
    expect(redactString('short')).toBe('[REDACTED]');
  });

  it('redacts bearer tokens inside text', () => {
    expect(redactPatterns('Authorization: Bearer test-secret-value')).toBe('Authorization: Bear...alue');
  });

  it('redacts sensitive keys at any depth', () => {
    expect(
      redactObject({
        appKey: 'inventory-service',
        nested: { access_token: 'test-secret', password: 42 },
      })
    ).toEqual({
      appKey: 'inventory-service',
      nested: { access_token: 'test...cret', password: '[REDACTED]' },
    });
  });

  it('redacts authorization headers', () => {
    expect(redactHeaders({ Authorization: 'Bearer test-token', Accept: 'application/json' })).toEqual({
      Authorization: 'Bear...oken',
      Accept: 'application/json',
    });
  });
});

describe('ApiLogger', () => {
  it('filters by level', () => {
    const { sink, logger } = capture('warn');
    logger.info('hidden');
    logger.warn('shown');
    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink).toHaveBeenCalledWith('warn', '[WARN] shown');
  });

  it('writes child context with every entry', () => {
    const { sink, logger } = capture('info');
    logger.child({ appKey: 'checkout-service' }).info('Moving latest', { steps: 2 });
    expect(sink).toHaveBeenCalledWith('info', '[INFO] Moving latest {"appKey":"checkout-service","steps":2}');
  });

  it('never writes a token in request logs', () => {
    const { sink, logger } = capture('debug', true);
    logger.request('GET', 'https://registry.test/applications', {
      headers: { Authorization: 'Bearer test-token' },
    });

    const [, line] = sink.mock.calls[0];
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({
      level: 'debug',
      message: 'HTTP Request',
      context: { headers: { Authorization: 'Bear...oken' } },
    });
  });

  it('includes error details', () => {
    const { sink, logger } = capture('error');
    logger.error('Patch failed', new Error('boom'));
    expect(sink.mock.calls[0][1]).toBe('[ERROR] Patch failed \n  Error: Error: boom');
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('warn')).toBe('warn');
  });

  it('ignores unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
