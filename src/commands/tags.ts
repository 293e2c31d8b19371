/**
 * tags commands - Keep `latest` on the right version and quarantine rollbacks
 *
 * - tags enforce <app-key>: move `latest` to the highest eligible version
 * - tags rollback <app-key> <version>: quarantine a version, promote a replacement
 * - tags plan <app-key>: show the current tags and what enforce would do
 */

import type { CommandContext, CommandResult } from '../types.js';
import {
  enforceLatestTagInvariants,
  handleRollbackTagging,
  partitionVersions,
  planLatestEnforcement,
  formatEnforcementPlan,
  formatRollbackPlan,
  formatApplyResult,
  type LatestEnforcementPlan,
  type LatestEnforcementResult,
  type RollbackResult,
} from '../reconcilers/tags/index.js';
import { logger } from '../api/logger.js';
import { connectRegistry, failureResult } from './shared.js';
import {
  header,
  info,
  success,
  warn,
  verbose,
  dryRunNotice,
  printTagSteps,
  printTable,
  error as printError,
} from '../utils/output.js';

export interface TagPlanView {
  appKey: string;
  latest: string[];
  quarantined: string[];
  other: string[];
  plan: LatestEnforcementPlan;
}

/**
 * Execute `tags enforce`
 */
export async function enforceCommand(
  ctx: CommandContext,
  appKey: string
): Promise<CommandResult<LatestEnforcementResult>> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Enforcing latest tag for ${appKey}`, globalOpts.verbose);

  const connected = connectRegistry(ctx);
  if (!connected.ok) return connected.result;

  if (outputFormat === 'human') {
    header(`Latest Tag: ${appKey}`);
    if (globalOpts.dryRun) dryRunNotice();
  }

  try {
    const result = await enforceLatestTagInvariants(connected.client, appKey, {
      dryRun: globalOpts.dryRun,
      logger,
    });

    if (outputFormat === 'human') {
      info(formatEnforcementPlan(result.plan));
      printTagSteps(result.plan.steps);
      success(formatApplyResult(result));
    }

    return {
      success: true,
      message: formatApplyResult(result),
      data: result,
    };
  } catch (err) {
    const failure = failureResult(err, `Enforcing latest for ${appKey}`);
    if (outputFormat === 'human') printError(failure.message);
    return failure;
  }
}

/**
 * Execute `tags rollback`
 */
export async function rollbackCommand(
  ctx: CommandContext,
  appKey: string,
  version: string
): Promise<CommandResult<RollbackResult>> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Rolling back ${appKey}@${version}`, globalOpts.verbose);

  const connected = connectRegistry(ctx);
  if (!connected.ok) return connected.result;

  if (outputFormat === 'human') {
    header(`Rollback: ${appKey}@${version}`);
    if (globalOpts.dryRun) dryRunNotice();
  }

  try {
    const result = await handleRollbackTagging(connected.client, appKey, version, {
      dryRun: globalOpts.dryRun,
      logger,
    });

    if (outputFormat === 'human') {
      info(formatRollbackPlan(result.plan));
      printTagSteps(result.plan.steps);
      if (result.plan.outcome === 'no-latest') {
        warn(`${appKey} has no version left to hold latest`);
      }
      success(formatApplyResult(result));
    }

    return {
      success: true,
      message: formatApplyResult(result),
      data: result,
    };
  } catch (err) {
    const failure = failureResult(err, `Rollback of ${appKey}@${version}`);
    if (outputFormat === 'human') printError(failure.message);
    return failure;
  }
}

/**
 * Execute `tags plan` (read-only)
 */
export async function planCommand(
  ctx: CommandContext,
  appKey: string
): Promise<CommandResult<TagPlanView>> {
  const { outputFormat } = ctx;

  const connected = connectRegistry(ctx);
  if (!connected.ok) return connected.result;

  try {
    const versions = await connected.client.listVersions(appKey);
    const partition = partitionVersions(versions);
    const view: TagPlanView = {
      appKey,
      latest: partition.latest.map((v) => v.version),
      quarantined: partition.quarantined.map((v) => v.version),
      other: partition.other.map((v) => v.version),
      plan: planLatestEnforcement(versions),
    };

    if (outputFormat === 'human') {
      header(`Tag Plan: ${appKey}`);
      printTable({
        latest: view.latest.join(', ') || undefined,
        quarantined: view.quarantined.join(', ') || undefined,
        otherProduction: view.other.join(', ') || undefined,
      });
      info(formatEnforcementPlan(view.plan));
      printTagSteps(view.plan.steps);
    }

    return {
      success: true,
      message: `${view.plan.steps.length} tag change(s) pending for ${appKey}`,
      data: view,
    };
  } catch (err) {
    const failure = failureResult(err, `Planning tags for ${appKey}`);
    if (outputFormat === 'human') printError(failure.message);
    return failure;
  }
}
