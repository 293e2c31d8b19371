/**
 * Helpers shared by command handlers
 */

import type { CommandContext, CommandResult } from '../types.js';
import { EXIT_FAILURE, EXIT_USAGE } from '../types.js';
import { createClient, type RegistryClient } from '../api/client.js';
import { isRegistryError } from '../api/errors.js';
import { ConfigError } from '../manifest/errors.js';
import { resolveRegistryConnection } from '../config/index.js';
import { error as printError, verbose } from '../utils/output.js';

export type RegistryConnectResult =
  | { ok: true; client: RegistryClient }
  | { ok: false; result: CommandResult<never> };

/**
 * Parse the --timeout option
 */
export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Build a registry client from the global options and environment
 */
export function connectRegistry(ctx: CommandContext): RegistryConnectResult {
  const { options: globalOpts, outputFormat } = ctx;
  const resolution = resolveRegistryConnection({
    baseUrl: globalOpts.baseUrl,
    token: globalOpts.token,
  });

  if (!resolution.ok) {
    const message = 'Registry connection is not configured';
    if (outputFormat === 'human') {
      printError(`${message}. Missing: ${resolution.missing.join('; ')}`);
    }
    return {
      ok: false,
      result: { success: false, message, errors: resolution.missing, exitCode: EXIT_USAGE },
    };
  }

  const { connection } = resolution;
  verbose(`Registry: ${connection.baseUrl} (token from ${connection.tokenSource})`, globalOpts.verbose);

  return {
    ok: true,
    client: createClient({
      baseUrl: connection.baseUrl,
      token: connection.token,
      timeout: parseTimeout(globalOpts.timeout),
      debug: globalOpts.verbose,
    }),
  };
}

/**
 * Turn an error thrown by an operation into a failed result
 */
export function failureResult(err: unknown, operation: string): CommandResult<never> {
  const detail = err instanceof Error ? err.message : String(err);
  const errors = [detail];

  if (isRegistryError(err)) {
    errors.push(`code: ${err.code}${err.status ? ` (HTTP ${err.status})` : ''}`);
  } else if (err instanceof ConfigError) {
    errors.push(`code: ${err.code}`);
  }

  return {
    success: false,
    message: `${operation} failed: ${detail}`,
    errors,
    exitCode: EXIT_FAILURE,
  };
}
