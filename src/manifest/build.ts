/**
 * Platform manifest building and output
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import type { RegistryClient } from '../api/client.js';
import { ConfigError } from './errors.js';
import {
  SUPPORTED_SOURCE_STAGES,
  type ManifestApplication,
  type PlatformManifest,
  type ResolvedService,
  type SourceStage,
} from './types.js';

export const MANIFEST_NOTES = 'Auto-generated by platform-release aggregate (applications & versions)';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * CalVer manifest version in UTC, e.g. `2025.09.15.120000`
 */
export function formatManifestVersion(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`,
  ].join('.');
}

export function isSupportedStage(stage: string): stage is SourceStage {
  return SUPPORTED_SOURCE_STAGES.some((supported) => supported === stage);
}

/**
 * Build the manifest for a set of resolved services, fetching each
 * version's content from the registry.
 *
 * @throws ConfigError for any stage other than PROD
 */
export async function buildManifest(
  services: readonly ResolvedService[],
  client: RegistryClient,
  sourceStage: string,
  now: Date = new Date()
): Promise<PlatformManifest> {
  if (!isSupportedStage(sourceStage)) {
    throw new ConfigError(
      `Unsupported source stage "${sourceStage}"; supported: ${SUPPORTED_SOURCE_STAGES.join(', ')}`,
      'UNSUPPORTED_STAGE',
      { sourceStage }
    );
  }

  const applications: ManifestApplication[] = [];
  for (const service of services) {
    const content = await client.getVersionContent(service.applicationKey, service.resolvedVersion);
    applications.push({
      application_key: service.applicationKey,
      version: service.resolvedVersion,
      sources: content.sources,
      releasables: content.releasables,
    });
  }

  return {
    version: formatManifestVersion(now),
    created_at: now.toISOString(),
    source_stage: sourceStage,
    applications,
    provenance: {
      // Signatures and SBOM evidence are produced by the registry itself
      evidence_minimums: { signatures_present: true },
    },
    notes: MANIFEST_NOTES,
  };
}

/**
 * Write the manifest as `platform-<version>.yaml` under `outputDir`
 *
 * @returns Path of the written file
 */
export async function writeManifest(outputDir: string, manifest: PlatformManifest): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const target = join(outputDir, `platform-${manifest.version}.yaml`);
  await writeFile(target, stringifyYaml(manifest), 'utf-8');
  return target;
}

/**
 * Short JSON summary of a manifest for CLI output
 */
export function formatSummary(manifest: PlatformManifest): string {
  return JSON.stringify(
    {
      platform_manifest_version: manifest.version,
      platform_app_version: manifest.platform_app_version ?? '',
      applications: manifest.applications.map((app) => ({
        application_key: app.application_key,
        version: app.version,
      })),
    },
    null,
    2
  );
}
