/**
 * aggregate command - Build a platform manifest from production versions
 *
 * Resolves the production version of every service in services.yaml,
 * writes `platform-<version>.yaml` and creates the next platform
 * application version from the resolved versions.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { EXIT_FAILURE } from '../types.js';
import {
  loadServicesConfig,
  parseOverrides,
  resolvePromotedVersions,
  computeNextPlatformVersion,
  buildManifest,
  writeManifest,
  formatSummary,
  ConfigValidationError,
  type PlatformManifest,
} from '../manifest/index.js';
import { logger } from '../api/logger.js';
import { connectRegistry, failureResult } from './shared.js';
import { header, info, success, warn, verbose, dryRunNotice, error as printError } from '../utils/output.js';

export const DEFAULT_SERVICES_CONFIG = 'config/services.yaml';
export const DEFAULT_OUTPUT_DIR = 'manifests';
export const DEFAULT_PLATFORM_APP = 'platform';

export interface AggregateOptions {
  /** Path to services.yaml */
  config?: string;
  /** Directory the manifest is written to */
  outputDir?: string;
  /** Stage versions are sourced from */
  sourceStage?: string;
  /** Application key of the platform application */
  platformApp?: string;
  /** Print the summary only; write and create nothing */
  preview?: boolean;
  /** SERVICE=VERSION pins */
  override?: string[];
}

export interface AggregateResult {
  manifest: PlatformManifest;
  /** Written manifest path, absent on preview */
  manifestPath?: string;
  /** Whether the platform version was created in the registry */
  platformVersionCreated: boolean;
}

/**
 * Execute the aggregate command
 */
export async function aggregateCommand(
  ctx: CommandContext,
  options: AggregateOptions = {}
): Promise<CommandResult<AggregateResult>> {
  const { options: globalOpts, outputFormat } = ctx;
  const configPath = options.config ?? DEFAULT_SERVICES_CONFIG;
  const outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
  const sourceStage = (options.sourceStage ?? 'PROD').toUpperCase();
  const platformApp = options.platformApp ?? DEFAULT_PLATFORM_APP;
  const readOnly = Boolean(options.preview) || globalOpts.dryRun;

  verbose(`Services config: ${configPath}`, globalOpts.verbose);
  verbose(`Platform application: ${platformApp}`, globalOpts.verbose);

  const connected = connectRegistry(ctx);
  if (!connected.ok) return connected.result;
  const { client } = connected;

  if (outputFormat === 'human') {
    header('Platform Aggregation');
    if (readOnly) dryRunNotice();
  }

  try {
    const services = await loadServicesConfig(configPath);
    const { overrides, malformed } = parseOverrides(options.override ?? []);
    for (const entry of malformed) {
      logger.warn(`Ignoring malformed override "${entry}" (expected SERVICE=VERSION)`);
    }

    const { resolved, missing } = await resolvePromotedVersions(services, client, overrides);
    if (missing.length > 0) {
      const names = missing.map((service) => `${service.name} (${service.applicationKey})`);
      const message = `No production version found for: ${names.join(', ')}`;
      if (outputFormat === 'human') printError(message);
      return { success: false, message, errors: names, exitCode: EXIT_FAILURE };
    }

    for (const service of resolved) {
      verbose(
        `${service.name}: ${service.resolvedVersion}${service.overridden ? ' (override)' : ''}`,
        globalOpts.verbose
      );
    }

    const manifest = await buildManifest(resolved, client, sourceStage);
    const platformVersion = await computeNextPlatformVersion(client, platformApp, logger);
    manifest.platform_app_version = platformVersion;

    if (readOnly) {
      if (outputFormat === 'human') {
        console.log(formatSummary(manifest));
      }
      return {
        success: true,
        message: `Preview of platform ${platformVersion} (manifest ${manifest.version})`,
        data: { manifest, platformVersionCreated: false },
      };
    }

    const manifestPath = await writeManifest(outputDir, manifest);
    if (outputFormat === 'human') {
      info(`Wrote ${manifestPath}`);
    }

    await client.createVersion(
      platformApp,
      platformVersion,
      resolved.map((service) => ({ applicationKey: service.applicationKey, version: service.resolvedVersion }))
    );

    if (outputFormat === 'human') {
      success(`Created ${platformApp}@${platformVersion}`);
      console.log(formatSummary(manifest));
    }

    return {
      success: true,
      message: `Created ${platformApp}@${platformVersion} (manifest ${manifest.version})`,
      data: { manifest, manifestPath, platformVersionCreated: true },
    };
  } catch (err) {
    if (err instanceof ConfigValidationError && outputFormat === 'human') {
      warn(err.formatIssues());
    }
    const failure = failureResult(err, 'Aggregation');
    if (outputFormat === 'human') printError(failure.message);
    return failure;
  }
}
