/**
 * Tag apply/reconcile operations
 *
 * Fetches an application's versions, plans the tag changes (diff.ts) and
 * issues the patches one at a time through the registry client.
 *
 * There is no retry and no undo. If a patch fails, its error propagates
 * unchanged and the patches before it stay applied; running the same
 * operation again converges from whatever state was left behind.
 */

import type { RegistryClient } from '../../api/client.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type {
  LatestEnforcementResult,
  RollbackResult,
  TagApplyOptions,
  TagApplyResult,
  TagPatch,
} from './types.js';
import { planLatestEnforcement, planRollback, formatSteps } from './diff.js';

export interface ReconcileOptions extends TagApplyOptions {
  logger?: ApiLogger;
}

/**
 * Issue the steps of a plan sequentially
 *
 * @returns The applied steps, in order
 * @throws The first patch error, unmodified
 */
export async function applyTagPlan(
  client: RegistryClient,
  appKey: string,
  steps: readonly TagPatch[],
  options: ReconcileOptions = {}
): Promise<TagApplyResult> {
  const { dryRun = false } = options;
  const log = (options.logger ?? defaultLogger).child({ appKey });

  if (dryRun) {
    for (const line of formatSteps(steps)) {
      log.info(`[dry-run] ${line}`);
    }
    return { appKey, applied: [], dryRun };
  }

  const applied: TagPatch[] = [];
  for (const step of steps) {
    try {
      await client.patchVersion(appKey, step.version, step.patch);
    } catch (err) {
      log.error(
        `Patch ${step.kind} on ${step.version} failed after ${applied.length} applied step(s)`,
        err instanceof Error ? err : undefined,
        { version: step.version, appliedSteps: applied.length }
      );
      throw err;
    }
    applied.push(step);
    log.info(`Applied ${step.kind}: ${step.version} ${step.fromTag || '(none)'} -> ${step.toTag}`);
  }

  return { appKey, applied, dryRun };
}

/**
 * Make sure the highest production-eligible, non-quarantined version of
 * `appKey` is the only one tagged `latest`.
 *
 * Idempotent: once converged, further runs issue no patches.
 */
export async function enforceLatestTagInvariants(
  client: RegistryClient,
  appKey: string,
  options: ReconcileOptions = {}
): Promise<LatestEnforcementResult> {
  const log = (options.logger ?? defaultLogger).child({ appKey });

  const versions = await client.listVersions(appKey);
  const plan = planLatestEnforcement(versions);

  switch (plan.outcome) {
    case 'no-candidates':
      log.info('No production-eligible version can hold latest; nothing to do');
      break;
    case 'converged':
      log.info(`Latest already on ${plan.desiredLatest}; nothing to do`);
      break;
    case 'reassigned':
      log.info(`Moving latest to ${plan.desiredLatest}`, {
        currentLatest: plan.currentLatest,
        steps: plan.steps.length,
      });
      break;
  }

  const result = await applyTagPlan(client, appKey, plan.steps, options);
  return { ...result, plan };
}

/**
 * Quarantine a rolled-back version and, if it held `latest`, promote the
 * next best version.
 *
 * @throws RegistryNotFoundError if the version is not a production version
 * of `appKey`; nothing is patched in that case
 */
export async function handleRollbackTagging(
  client: RegistryClient,
  appKey: string,
  rolledBackVersion: string,
  options: ReconcileOptions = {}
): Promise<RollbackResult> {
  const log = (options.logger ?? defaultLogger).child({ appKey });

  const versions = await client.listVersions(appKey);
  const plan = planRollback(versions, rolledBackVersion);

  log.info(`Rollback of ${rolledBackVersion}: ${plan.outcome}`, {
    previousTag: plan.previousTag,
    promotedVersion: plan.promotedVersion ?? undefined,
  });

  const result = await applyTagPlan(client, appKey, plan.steps, options);
  return { ...result, plan };
}

/**
 * One-line description of an apply result
 */
export function formatApplyResult(result: TagApplyResult): string {
  if (result.dryRun) {
    return `[dry-run] ${result.appKey}: no patches issued`;
  }
  if (result.applied.length === 0) {
    return `${result.appKey}: no changes`;
  }
  return `${result.appKey}: applied ${result.applied.length} patch(es)`;
}
