/**
 * Tag reconciler exports
 *
 * Keeps the `latest` tag on the right version of an application and
 * quarantines rolled-back versions.
 */

// Types from types.ts
export type {
  VersionPartition,
  TagPatchKind,
  TagPatch,
  LatestEnforcementOutcome,
  LatestEnforcementPlan,
  RollbackOutcome,
  RollbackPlan,
  TagApplyOptions,
  TagApplyResult,
  LatestEnforcementResult,
  RollbackResult,
} from './types.js';

export {
  LATEST_TAG,
  QUARANTINE_PREFIX,
  BACKUP_BEFORE_LATEST,
  BACKUP_BEFORE_QUARANTINE,
  DEFAULT_RESTORE_TAG,
} from './types.js';

// Planning functions from diff.ts
export {
  isQuarantined,
  isLatest,
  quarantineTag,
  filterProductionVersions,
  partitionVersions,
  pickNextLatest,
  resolveRestoreTag,
  buildAssignLatestPatch,
  buildRestorePatch,
  buildQuarantinePatch,
  planLatestEnforcement,
  planRollback,
  formatSteps,
  formatEnforcementPlan,
  formatRollbackPlan,
} from './diff.js';

// Apply functions from apply.ts
export {
  applyTagPlan,
  enforceLatestTagInvariants,
  handleRollbackTagging,
  formatApplyResult,
} from './apply.js';
export type { ReconcileOptions } from './apply.js';
