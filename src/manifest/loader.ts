/**
 * services.yaml loading
 *
 * @example
 * ```yaml
 * services:
 *   - name: inventory
 *     apptrust_application: inventory-service
 *   - name: checkout
 *     application_key: checkout-service
 * ```
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, isAbsolute } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { OverrideParseResult, ServiceConfig } from './types.js';
import { ConfigError, ConfigValidationError } from './errors.js';

export interface ServicesConfigLoadOptions {
  /** Base directory for a relative config path (default: cwd) */
  basePath?: string;
}

/**
 * Load and validate a services.yaml file
 *
 * @throws ConfigError if the file is missing or not valid YAML
 * @throws ConfigValidationError if the structure is wrong
 */
export async function loadServicesConfig(
  configPath: string,
  options: ServicesConfigLoadOptions = {}
): Promise<ServiceConfig[]> {
  const absolutePath = isAbsolute(configPath)
    ? configPath
    : resolve(options.basePath ?? process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(
      `Services config not found: ${absolutePath}`,
      'CONFIG_NOT_FOUND',
      { path: absolutePath }
    );
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read services config: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_NOT_FOUND',
      { path: absolutePath, originalError: err }
    );
  }

  return parseServicesConfig(content, absolutePath);
}

/**
 * Parse and validate services config YAML text
 */
export function parseServicesConfig(content: string, sourcePath?: string): ServiceConfig[] {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse services config YAML: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR',
      { path: sourcePath, originalError: err }
    );
  }

  const services = isRecord(data) ? data.services : undefined;
  if (!Array.isArray(services) || services.length === 0) {
    throw new ConfigValidationError(
      "Config 'services' must be a non-empty list",
      ["services: must be a non-empty list"],
      { path: sourcePath }
    );
  }

  const issues: string[] = [];
  const seen = new Map<string, number>();
  const result: ServiceConfig[] = [];

  services.forEach((entry: unknown, index) => {
    const prefix = `services[${index}]`;
    if (!isRecord(entry)) {
      issues.push(`${prefix}: must be a mapping`);
      return;
    }

    const name = readString(entry, 'name', prefix, issues);
    const applicationKey =
      entry.apptrust_application !== undefined
        ? readString(entry, 'apptrust_application', prefix, issues)
        : readString(entry, 'application_key', prefix, issues);

    if (name === undefined) {
      issues.push(`${prefix}: Missing required field: name`);
    }
    if (applicationKey === undefined) {
      issues.push(`${prefix}: Missing required field: apptrust_application`);
    }
    if (!name || !applicationKey) {
      return;
    }

    const previous = seen.get(name);
    if (previous !== undefined) {
      issues.push(`${prefix}: Service name "${name}" is already defined at services[${previous}]`);
      return;
    }
    seen.set(name, index);

    result.push({ name, applicationKey });
  });

  if (issues.length > 0) {
    throw new ConfigValidationError(
      `Services config validation failed:\n  - ${issues.join('\n  - ')}`,
      issues,
      { path: sourcePath }
    );
  }

  return result;
}

/**
 * Parse repeated `SERVICE=VERSION` overrides. Later entries win.
 *
 * @example
 * parseOverrides(['inventory=1.8.5', 'bad', 'checkout = 0.7.3'])
 * // overrides: { inventory => '1.8.5', checkout => '0.7.3' }, malformed: ['bad']
 */
export function parseOverrides(entries: readonly string[]): OverrideParseResult {
  const overrides = new Map<string, string>();
  const malformed: string[] = [];

  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator === -1) {
      malformed.push(entry);
      continue;
    }
    const service = entry.slice(0, separator).trim();
    const version = entry.slice(separator + 1).trim();
    if (!service || !version) {
      malformed.push(entry);
      continue;
    }
    overrides.set(service, version);
  }

  return { overrides, malformed };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Trimmed string value of `key`; undefined when absent or blank. Any other
 * scalar is an issue (null returned): YAML turns unquoted `1.10` into the
 * number 1.1, so converting it back would change the value.
 */
function readString(
  entry: Record<string, unknown>,
  key: string,
  prefix: string,
  issues: string[]
): string | null | undefined {
  const value = entry[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  issues.push(`${prefix}: ${key} must be a string, got ${typeof value} ${JSON.stringify(value)}; quote it in YAML`);
  return null;
}
