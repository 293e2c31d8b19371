/**
 * Types for version-tag reconciliation
 *
 * Exactly one production-eligible version of an application carries the
 * `latest` tag: the highest SemVer one that is not quarantined. Any tag the
 * reconciler overwrites is first copied into a backup property so it can be
 * restored later.
 */

import type { ApplicationVersion, VersionPatch } from '../../api/types.js';

// =============================================================================
// Constants
// =============================================================================

export const LATEST_TAG = 'latest';

/**
 * Quarantined versions are tagged `quarantine-<version>`
 */
export const QUARANTINE_PREFIX = 'quarantine-';

/**
 * Property holding a version's tag from before it was made `latest`
 */
export const BACKUP_BEFORE_LATEST = 'BACKUP_BEFORE_LATEST';

/**
 * Property holding a version's tag from before it was quarantined
 */
export const BACKUP_BEFORE_QUARANTINE = 'BACKUP_BEFORE_QUARANTINE';

/**
 * Tag restored onto a former `latest` holder that has no usable backup
 */
export const DEFAULT_RESTORE_TAG = 'version';

// =============================================================================
// Partitioning
// =============================================================================

/**
 * Production-eligible versions split by their current tag
 */
export interface VersionPartition {
  quarantined: ApplicationVersion[];
  latest: ApplicationVersion[];
  other: ApplicationVersion[];
}

// =============================================================================
// Plans
// =============================================================================

/**
 * Why a patch is part of a plan
 */
export type TagPatchKind = 'assign-latest' | 'restore-tag' | 'quarantine';

/**
 * One mutation of one version
 */
export interface TagPatch {
  kind: TagPatchKind;
  /** Version being patched */
  version: string;
  /** Tag before the patch */
  fromTag: string;
  /** Tag after the patch */
  toTag: string;
  patch: VersionPatch;
}

/**
 * Result of planning `latest` enforcement
 *
 * - converged: the right version already holds `latest`, alone
 * - no-candidates: no production-eligible, non-quarantined version exists
 * - reassigned: `latest` moves (or is added, or duplicates are cleared)
 */
export type LatestEnforcementOutcome = 'converged' | 'no-candidates' | 'reassigned';

export interface LatestEnforcementPlan {
  outcome: LatestEnforcementOutcome;
  /** Version that should hold `latest`, if any */
  desiredLatest: string | null;
  /** Versions holding `latest` before the plan runs */
  currentLatest: string[];
  /** Patches in the order they must be issued */
  steps: TagPatch[];
}

/**
 * Result of planning a rollback
 *
 * - promoted: the rolled-back version held `latest` and a replacement gets it
 * - no-latest: it held `latest` and nothing can replace it; the application
 *   is left without a `latest` version
 * - quarantined: it did not hold `latest`; only the quarantine is applied
 * - already-quarantined: nothing to do
 */
export type RollbackOutcome = 'promoted' | 'no-latest' | 'quarantined' | 'already-quarantined';

export interface RollbackPlan {
  outcome: RollbackOutcome;
  rolledBackVersion: string;
  /** Tag of the rolled-back version before quarantine */
  previousTag: string;
  /** Version that receives `latest`, when outcome is `promoted` */
  promotedVersion: string | null;
  steps: TagPatch[];
}

// =============================================================================
// Apply
// =============================================================================

/**
 * Options for applying a tag plan
 */
export interface TagApplyOptions {
  /** If true, only return what would change without applying */
  dryRun?: boolean;
}

/**
 * Result of applying a plan. Either every step was applied, or the first
 * failing patch's error was thrown and nothing is returned.
 */
export interface TagApplyResult {
  appKey: string;
  /** Steps that were issued (empty on dry run) */
  applied: TagPatch[];
  dryRun: boolean;
}

export interface LatestEnforcementResult extends TagApplyResult {
  plan: LatestEnforcementPlan;
}

export interface RollbackResult extends TagApplyResult {
  plan: RollbackPlan;
}
