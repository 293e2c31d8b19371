/**
 * Version resolution for platform aggregation
 */

import type { RegistryClient } from '../api/client.js';
import { isProductionStatus } from '../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { nextPatchVersion, sortVersionsDesc } from '../utils/semver.js';
import type { ResolutionResult, ResolvedService, ServiceConfig } from './types.js';

/**
 * Highest-SemVer production-eligible version of an application, or null
 */
export async function pickLatestProdVersion(
  client: RegistryClient,
  appKey: string
): Promise<string | null> {
  const versions = await client.listVersions(appKey);
  const prod = versions
    .filter((version) => isProductionStatus(version.releaseStatus))
    .map((version) => version.version)
    .filter((version) => version.length > 0);

  return sortVersionsDesc(prod)[0] ?? null;
}

/**
 * Resolve the production version of every configured service.
 *
 * Overridden services are taken as given and never looked up. Services
 * with no production version end up in `missing`.
 */
export async function resolvePromotedVersions(
  services: readonly ServiceConfig[],
  client: RegistryClient,
  overrides: ReadonlyMap<string, string> = new Map()
): Promise<ResolutionResult> {
  const resolved: ResolvedService[] = [];
  const missing: ServiceConfig[] = [];

  for (const service of services) {
    const override = overrides.get(service.name);
    if (override) {
      resolved.push({
        name: service.name,
        applicationKey: service.applicationKey,
        resolvedVersion: override,
        overridden: true,
      });
      continue;
    }

    const latest = await pickLatestProdVersion(client, service.applicationKey);
    if (!latest) {
      missing.push(service);
      continue;
    }

    resolved.push({
      name: service.name,
      applicationKey: service.applicationKey,
      resolvedVersion: latest,
      overridden: false,
    });
  }

  return { resolved, missing };
}

/**
 * Next SemVer for the platform application: patch bump of its most
 * recently created version, or 1.0.0.
 *
 * A failed lookup is logged and treated as "no versions yet".
 */
export async function computeNextPlatformVersion(
  client: RegistryClient,
  platformAppKey: string,
  log: ApiLogger = defaultLogger
): Promise<string> {
  let latest: string | undefined;
  try {
    const versions = await client.listVersions(platformAppKey, { limit: 1 });
    latest = versions[0]?.version;
  } catch (err) {
    log.warn(`Could not read versions of ${platformAppKey}; starting from 1.0.0`, {
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return nextPatchVersion(latest);
}
