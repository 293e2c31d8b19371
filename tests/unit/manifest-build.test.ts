/**
 * Unit Tests: Manifest Building
 *
 * Tests manifest assembly, the YAML file written to disk and the summary.
 *
 * @see src/manifest/build.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  buildManifest,
  writeManifest,
  formatSummary,
  formatManifestVersion,
  MANIFEST_NOTES,
} from '../../src/manifest/build.js';
import type { ResolvedService } from '../../src/manifest/types.js';
import { FakeRegistry } from './fake-registry.js';

const NOW = new Date(Date.UTC(2025, 8, 15, 12, 0, 5));

const RESOLVED: ResolvedService[] = [
  { name: 'inventory', applicationKey: 'inventory-service', resolvedVersion: '1.8.2', overridden: false },
  { name: 'web', applicationKey: 'web-frontend', resolvedVersion: '3.1.0', overridden: true },
];

function registry(): FakeRegistry {
  return new FakeRegistry().setContent('inventory-service', '1.8.2', {
    sources: { git: { sha: 'abc123' } },
    releasables: { image: 'inventory:1.8.2' },
  });
}

describe('formatManifestVersion', () => {
  it('formats UTC time as YYYY.MM.DD.HHMMSS', () => {
    expect(formatManifestVersion(NOW)).toBe('2025.09.15.120005');
    expect(formatManifestVersion(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)))).toBe('2026.01.02.030405');
  });
});

describe('buildManifest', () => {
  it('records every resolved application with its content', async () => {
    const manifest = await buildManifest(RESOLVED, registry(), 'PROD', NOW);

    expect(manifest).toEqual({
      version: '2025.09.15.120005',
      created_at: '2025-09-15T12:00:05.000Z',
      source_stage: 'PROD',
      applications: [
        {
          application_key: 'inventory-service',
          version: '1.8.2',
          sources: { git: { sha: 'abc123' } },
          releasables: { image: 'inventory:1.8.2' },
        },
        { application_key: 'web-frontend', version: '3.1.0', sources: {}, releasables: {} },
      ],
      provenance: { evidence_minimums: { signatures_present: true } },
      notes: MANIFEST_NOTES,
    });
  });

  it('rejects stages other than PROD', async () => {
    await expect(buildManifest(RESOLVED, registry(), 'QA', NOW)).rejects.toMatchObject({
      name: 'ConfigError',
      code: 'UNSUPPORTED_STAGE',
    });
  });
});

describe('writeManifest', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'platform-release-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes platform-<version>.yaml, creating the directory', async () => {
    const manifest = await buildManifest(RESOLVED, registry(), 'PROD', NOW);
    const outputDir = join(tempDir, 'out', 'manifests');

    const path = await writeManifest(outputDir, manifest);

    expect(path).toBe(join(outputDir, 'platform-2025.09.15.120005.yaml'));
    const written: unknown = parseYaml(readFileSync(path, 'utf-8'));
    expect(written).toEqual(manifest);
    expect(Object.keys(manifest)).toEqual([
      'version',
      'created_at',
      'source_stage',
      'applications',
      'provenance',
      'notes',
    ]);
  });
});

describe('formatSummary', () => {
  it('lists the manifest and platform versions with each application', async () => {
    const manifest = await buildManifest(RESOLVED.slice(0, 1), registry(), 'PROD', NOW);
    manifest.platform_app_version = '1.0.5';

    const summary = formatSummary(manifest);

    expect(JSON.parse(summary)).toEqual({
      platform_manifest_version: '2025.09.15.120005',
      platform_app_version: '1.0.5',
      applications: [{ application_key: 'inventory-service', version: '1.8.2' }],
    });
    expect(summary.split('\n')[1]).toBe('  "platform_manifest_version": "2025.09.15.120005",');
  });

  it('uses an empty platform version when none was assigned', async () => {
    const manifest = await buildManifest([], registry(), 'PROD', NOW);
    expect(JSON.parse(formatSummary(manifest))).toEqual({
      platform_manifest_version: '2025.09.15.120005',
      platform_app_version: '',
      applications: [],
    });
  });
});
