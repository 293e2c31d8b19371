/**
 * Unit Tests: Tag Apply
 *
 * Tests that enforcement and rollback issue the right patches, in order:
 * - Patch sequences against an in-memory registry
 * - Dry run issues nothing
 * - A failing patch propagates unchanged and keeps earlier patches
 *
 * @see src/reconcilers/tags/apply.ts
 */

import { describe, it, expect, vi } from 'vitest';
import {
  applyTagPlan,
  enforceLatestTagInvariants,
  handleRollbackTagging,
  formatApplyResult,
} from '../../src/reconcilers/tags/apply.js';
import { BACKUP_BEFORE_LATEST, BACKUP_BEFORE_QUARANTINE } from '../../src/reconcilers/tags/types.js';
import { planLatestEnforcement } from '../../src/reconcilers/tags/diff.js';
import { createLogger, type LogSink } from '../../src/api/logger.js';
import { RegistryNotFoundError, RegistryUnavailableError } from '../../src/api/errors.js';
import { FakeRegistry, prodVersion } from './fake-registry.js';

const APP = 'inventory-service';

function quietLogger() {
  const sink = vi.fn<LogSink>();
  return { sink, logger: createLogger({ level: 'debug', timestamps: false }, { sink }) };
}

// =============================================================================
// enforceLatestTagInvariants
// =============================================================================

describe('enforceLatestTagInvariants', () => {
  it('moves latest to the highest version and restores the old holder', async () => {
    const registry = new FakeRegistry({
      [APP]: [prodVersion('2.1.0', 'version'), prodVersion('2.0.0', 'latest'), prodVersion('1.9.0', 'stable')],
    });

    const result = await enforceLatestTagInvariants(registry, APP, { logger: quietLogger().logger });

    expect(registry.patches).toEqual([
      {
        appKey: APP,
        version: '2.1.0',
        patch: { tag: 'latest', setProperties: { [BACKUP_BEFORE_LATEST]: ['version'] } },
      },
      {
        appKey: APP,
        version: '2.0.0',
        patch: { tag: 'version', deleteProperties: [BACKUP_BEFORE_LATEST] },
      },
    ]);
    expect(result.applied).toHaveLength(2);
    expect(result.dryRun).toBe(false);
    expect(result.plan.outcome).toBe('reassigned');

    expect(registry.get(APP, '2.1.0')).toEqual(
      prodVersion('2.1.0', 'latest', { [BACKUP_BEFORE_LATEST]: ['version'] })
    );
    expect(registry.get(APP, '2.0.0')).toEqual(prodVersion('2.0.0', 'version'));
    expect(registry.get(APP, '1.9.0')).toEqual(prodVersion('1.9.0', 'stable'));
  });

  it('issues nothing when already converged', async () => {
    const registry = new FakeRegistry({
      [APP]: [prodVersion('2.0.0', 'latest'), prodVersion('1.0.0', 'version')],
    });

    const result = await enforceLatestTagInvariants(registry, APP, { logger: quietLogger().logger });

    expect(registry.patches).toEqual([]);
    expect(result.plan.outcome).toBe('converged');
    expect(formatApplyResult(result)).toBe(`${APP}: no changes`);
  });

  it('issues nothing when no version is eligible', async () => {
    const registry = new FakeRegistry({
      [APP]: [prodVersion('1.0.0', 'quarantine-1.0.0'), prodVersion('2.0.0', '', {}, 'STAGED')],
    });

    const result = await enforceLatestTagInvariants(registry, APP, { logger: quietLogger().logger });

    expect(registry.patches).toEqual([]);
    expect(result.plan.outcome).toBe('no-candidates');
  });

  it('only plans on dry run', async () => {
    const registry = new FakeRegistry({
      [APP]: [prodVersion('2.1.0', 'version'), prodVersion('2.0.0', 'latest')],
    });
    const { logger, sink } = quietLogger();

    const result = await enforceLatestTagInvariants(registry, APP, { dryRun: true, logger });

    expect(registry.patches).toEqual([]);
    expect(result.applied).toEqual([]);
    expect(result.dryRun).toBe(true);
    expect(result.plan.steps).toHaveLength(2);
    expect(formatApplyResult(result)).toBe(`[dry-run] ${APP}: no patches issued`);

    const lines = sink.mock.calls.map(([, line]) => line);
    expect(lines.some((line) => line.includes('[dry-run] 2.1.0: version -> latest (assign-latest)'))).toBe(true);
  });
});

// =============================================================================
// handleRollbackTagging
// =============================================================================

describe('handleRollbackTagging', () => {
  it('quarantines latest and promotes the next best version', async () => {
    const registry = new FakeRegistry({
      [APP]: [prodVersion('2.0.0', 'latest'), prodVersion('1.9.0', 'stable'), prodVersion('1.8.0', 'version')],
    });

    const result = await handleRollbackTagging(registry, APP, '2.0.0', { logger: quietLogger().logger });

    expect(registry.patches.map(({ version, patch }) => ({ version, patch }))).toEqual([
      {
        version: '2.0.0',
        patch: {
          tag: 'quarantine-2.0.0',
          setProperties: { [BACKUP_BEFORE_QUARANTINE]: ['latest'] },
          deleteProperties: [BACKUP_BEFORE_LATEST],
        },
      },
      {
        version: '1.9.0',
        patch: { tag: 'latest', setProperties: { [BACKUP_BEFORE_LATEST]: ['stable'] } },
      },
    ]);
    expect(result.plan.outcome).toBe('promoted');
    expect(result.plan.promotedVersion).toBe('1.9.0');
  });

  it('clears the latest backup of a quarantined latest holder', async () => {
    const registry = new FakeRegistry({
      [APP]: [
        prodVersion('2.0.0', 'latest', { [BACKUP_BEFORE_LATEST]: ['stable'] }),
        prodVersion('1.9.0', 'version'),
      ],
    });

    await handleRollbackTagging(registry, APP, '2.0.0', { logger: quietLogger().logger });

    expect(registry.get(APP, '2.0.0')?.properties).toEqual({ [BACKUP_BEFORE_QUARANTINE]: ['latest'] });
  });

  it('only quarantines a version that does not hold latest', async () => {
    const registry = new FakeRegistry({
      [APP]: [prodVersion('2.0.0', 'latest'), prodVersion('1.9.0', 'stable')],
    });

    await handleRollbackTagging(registry, APP, '1.9.0', { logger: quietLogger().logger });

    expect(registry.patches.map(({ version, patch }) => ({ version, patch }))).toEqual([
      {
        version: '1.9.0',
        patch: { tag: 'quarantine-1.9.0', setProperties: { [BACKUP_BEFORE_QUARANTINE]: ['stable'] } },
      },
    ]);
    expect(registry.get(APP, '2.0.0')?.tag).toBe('latest');
  });

  it('rejects an unknown version without patching', async () => {
    const registry = new FakeRegistry({ [APP]: [prodVersion('1.0.0', 'latest')] });

    await expect(
      handleRollbackTagging(registry, APP, '3.0.0', { logger: quietLogger().logger })
    ).rejects.toBeInstanceOf(RegistryNotFoundError);
    expect(registry.patches).toEqual([]);
  });

  it('issues nothing for an already-quarantined version', async () => {
    const registry = new FakeRegistry({
      [APP]: [prodVersion('2.0.0', 'quarantine-2.0.0'), prodVersion('1.9.0', 'latest')],
    });

    const result = await handleRollbackTagging(registry, APP, '2.0.0', { logger: quietLogger().logger });

    expect(result.plan.outcome).toBe('already-quarantined');
    expect(registry.patches).toEqual([]);
  });
});

// =============================================================================
// Partial Failure
// =============================================================================

describe('applyTagPlan failures', () => {
  it('propagates the failing patch error unchanged and keeps earlier patches', async () => {
    const failure = new RegistryUnavailableError('PATCH failed: connection reset');
    const registry = new FakeRegistry({
      [APP]: [prodVersion('2.0.0', 'latest'), prodVersion('1.9.0', 'stable')],
    }).failPatchAt(1, failure);
    const { logger, sink } = quietLogger();

    await expect(handleRollbackTagging(registry, APP, '2.0.0', { logger })).rejects.toBe(failure);

    // Quarantine landed, promotion did not
    expect(registry.patches).toHaveLength(1);
    expect(registry.get(APP, '2.0.0')?.tag).toBe('quarantine-2.0.0');
    expect(registry.get(APP, '1.9.0')?.tag).toBe('stable');
    expect(sink.mock.calls.some(([level]) => level === 'error')).toBe(true);
  });

  it('stops at the first failure', async () => {
    const failure = new Error('boom');
    const versions = [prodVersion('2.1.0', 'version'), prodVersion('2.0.0', 'latest')];
    const registry = new FakeRegistry({ [APP]: versions }).failPatchAt(0, failure);
    const plan = planLatestEnforcement(versions);

    await expect(applyTagPlan(registry, APP, plan.steps, { logger: quietLogger().logger })).rejects.toBe(failure);
    expect(registry.patches).toEqual([]);
  });
});
