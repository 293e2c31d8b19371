/**
 * Tag planning
 *
 * Pure functions that look at an application's versions and work out which
 * tag/property patches bring it back to the `latest` invariant. Nothing here
 * talks to the registry; see apply.ts for that.
 */

import type { ApplicationVersion } from '../../api/types.js';
import { isProductionStatus } from '../../api/types.js';
import { RegistryNotFoundError } from '../../api/errors.js';
import { compareSemver, parseSemver, type SemVer } from '../../utils/semver.js';
import {
  BACKUP_BEFORE_LATEST,
  BACKUP_BEFORE_QUARANTINE,
  DEFAULT_RESTORE_TAG,
  LATEST_TAG,
  QUARANTINE_PREFIX,
  type LatestEnforcementPlan,
  type RollbackPlan,
  type TagPatch,
  type VersionPartition,
} from './types.js';

// =============================================================================
// Classification
// =============================================================================

export function isQuarantined(version: ApplicationVersion): boolean {
  return version.tag.startsWith(QUARANTINE_PREFIX);
}

export function isLatest(version: ApplicationVersion): boolean {
  return version.tag === LATEST_TAG;
}

export function quarantineTag(version: string): string {
  return `${QUARANTINE_PREFIX}${version}`;
}

/**
 * Keep only RELEASED / TRUSTED_RELEASE versions
 */
export function filterProductionVersions(versions: readonly ApplicationVersion[]): ApplicationVersion[] {
  return versions.filter((version) => isProductionStatus(version.releaseStatus));
}

/**
 * Split production-eligible versions by tag. Non-production versions are
 * dropped.
 */
export function partitionVersions(versions: readonly ApplicationVersion[]): VersionPartition {
  const partition: VersionPartition = { quarantined: [], latest: [], other: [] };

  for (const version of filterProductionVersions(versions)) {
    if (isQuarantined(version)) {
      partition.quarantined.push(version);
    } else if (isLatest(version)) {
      partition.latest.push(version);
    } else {
      partition.other.push(version);
    }
  }

  return partition;
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Highest-SemVer version that is neither `excludedVersion` nor quarantined.
 * Versions whose string does not parse are never picked. On equal
 * precedence the earlier entry wins.
 *
 * @param prodVersions - Production-eligible versions, in any order
 */
export function pickNextLatest(
  prodVersions: readonly ApplicationVersion[],
  excludedVersion?: string | null
): ApplicationVersion | null {
  let best: { version: ApplicationVersion; semver: SemVer } | null = null;

  for (const version of prodVersions) {
    if (version.version === excludedVersion || isQuarantined(version)) {
      continue;
    }
    const semver = parseSemver(version.version);
    if (!semver) {
      continue;
    }
    if (!best || compareSemver(semver, best.semver) > 0) {
      best = { version, semver };
    }
  }

  return best?.version ?? null;
}

/**
 * Tag to put back on a version that loses `latest`
 */
export function resolveRestoreTag(version: ApplicationVersion): string {
  const backup = version.properties[BACKUP_BEFORE_LATEST]?.[0];
  if (backup && backup !== LATEST_TAG) {
    return backup;
  }
  return DEFAULT_RESTORE_TAG;
}

// =============================================================================
// Patch Builders
// =============================================================================

export function buildAssignLatestPatch(version: ApplicationVersion): TagPatch {
  return {
    kind: 'assign-latest',
    version: version.version,
    fromTag: version.tag,
    toTag: LATEST_TAG,
    patch: {
      tag: LATEST_TAG,
      setProperties: { [BACKUP_BEFORE_LATEST]: [version.tag] },
    },
  };
}

export function buildRestorePatch(version: ApplicationVersion): TagPatch {
  const restored = resolveRestoreTag(version);
  return {
    kind: 'restore-tag',
    version: version.version,
    fromTag: version.tag,
    toTag: restored,
    patch: {
      tag: restored,
      deleteProperties: [BACKUP_BEFORE_LATEST],
    },
  };
}

/**
 * Quarantine a version. A former `latest` holder also loses its
 * BACKUP_BEFORE_LATEST, which no longer describes a live assignment.
 */
export function buildQuarantinePatch(version: ApplicationVersion): TagPatch {
  const tag = quarantineTag(version.version);
  return {
    kind: 'quarantine',
    version: version.version,
    fromTag: version.tag,
    toTag: tag,
    patch: {
      tag,
      setProperties: { [BACKUP_BEFORE_QUARANTINE]: [version.tag] },
      ...(isLatest(version) ? { deleteProperties: [BACKUP_BEFORE_LATEST] } : {}),
    },
  };
}

// =============================================================================
// Plans
// =============================================================================

/**
 * Work out the patches that leave exactly the right version holding `latest`.
 *
 * The new holder is tagged before any old holder is restored, so a failure
 * part-way never leaves the application without `latest`.
 */
export function planLatestEnforcement(versions: readonly ApplicationVersion[]): LatestEnforcementPlan {
  const prod = filterProductionVersions(versions);
  const holders = prod.filter(isLatest);
  const currentLatest = holders.map((version) => version.version);
  const desired = pickNextLatest(prod);

  if (!desired) {
    return { outcome: 'no-candidates', desiredLatest: null, currentLatest, steps: [] };
  }

  const strayHolders = holders.filter((version) => version.version !== desired.version);

  if (isLatest(desired) && strayHolders.length === 0) {
    return { outcome: 'converged', desiredLatest: desired.version, currentLatest, steps: [] };
  }

  const steps: TagPatch[] = [];
  if (!isLatest(desired)) {
    steps.push(buildAssignLatestPatch(desired));
  }
  for (const holder of strayHolders) {
    steps.push(buildRestorePatch(holder));
  }

  return { outcome: 'reassigned', desiredLatest: desired.version, currentLatest, steps };
}

/**
 * Work out the patches for rolling back `rolledBackVersion`: quarantine it,
 * and if it held `latest`, hand `latest` to the best remaining version.
 *
 * @throws RegistryNotFoundError if the version is not among the
 * production-eligible versions
 */
export function planRollback(
  versions: readonly ApplicationVersion[],
  rolledBackVersion: string
): RollbackPlan {
  const prod = filterProductionVersions(versions);
  const target = prod.find((version) => version.version === rolledBackVersion);

  if (!target) {
    throw new RegistryNotFoundError(
      `Version ${rolledBackVersion} not found among production versions`,
      { details: { version: rolledBackVersion } }
    );
  }

  const base = { rolledBackVersion, previousTag: target.tag };

  if (isQuarantined(target)) {
    return { ...base, outcome: 'already-quarantined', promotedVersion: null, steps: [] };
  }

  const steps: TagPatch[] = [buildQuarantinePatch(target)];

  if (!isLatest(target)) {
    return { ...base, outcome: 'quarantined', promotedVersion: null, steps };
  }

  const replacement = pickNextLatest(prod, rolledBackVersion);
  if (!replacement) {
    return { ...base, outcome: 'no-latest', promotedVersion: null, steps };
  }

  if (!isLatest(replacement)) {
    steps.push(buildAssignLatestPatch(replacement));
  }

  return { ...base, outcome: 'promoted', promotedVersion: replacement.version, steps };
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * One line per step, e.g. `2.1.0: version -> latest (assign-latest)`
 */
export function formatSteps(steps: readonly TagPatch[]): string[] {
  return steps.map((step) => `${step.version}: ${step.fromTag || '(none)'} -> ${step.toTag} (${step.kind})`);
}

/**
 * Human-readable summary of an enforcement plan
 */
export function formatEnforcementPlan(plan: LatestEnforcementPlan): string {
  switch (plan.outcome) {
    case 'no-candidates':
      return 'No production version is eligible for latest';
    case 'converged':
      return `Already converged: ${plan.desiredLatest} holds latest`;
    case 'reassigned':
      return [
        `Move latest to ${plan.desiredLatest} (currently: ${plan.currentLatest.join(', ') || 'none'})`,
        ...formatSteps(plan.steps).map((line) => `  ${line}`),
      ].join('\n');
  }
}

/**
 * Human-readable summary of a rollback plan
 */
export function formatRollbackPlan(plan: RollbackPlan): string {
  const head = (() => {
    switch (plan.outcome) {
      case 'already-quarantined':
        return `${plan.rolledBackVersion} is already quarantined (${plan.previousTag})`;
      case 'quarantined':
        return `Quarantine ${plan.rolledBackVersion}; latest unchanged`;
      case 'promoted':
        return `Quarantine ${plan.rolledBackVersion}; promote ${plan.promotedVersion} to latest`;
      case 'no-latest':
        return `Quarantine ${plan.rolledBackVersion}; no version left to take latest`;
    }
  })();

  return [head, ...formatSteps(plan.steps).map((line) => `  ${line}`)].join('\n');
}
