/**
 * Types for platform manifest aggregation
 *
 * A platform release pins one production version of every configured
 * service. The manifest records those versions together with the content
 * (sources and releasables) the registry reports for each of them.
 */

/**
 * One service entry from services.yaml
 */
export interface ServiceConfig {
  /** Short service name, used for overrides (`inventory=1.8.2`) */
  name: string;
  /** Application key of the service in the registry */
  applicationKey: string;
}

/**
 * A service whose production version has been decided
 */
export interface ResolvedService {
  name: string;
  applicationKey: string;
  resolvedVersion: string;
  /** Whether the version came from an override rather than the registry */
  overridden: boolean;
}

/**
 * Outcome of resolving every configured service
 */
export interface ResolutionResult {
  resolved: ResolvedService[];
  /** Services without any production version */
  missing: ServiceConfig[];
}

/**
 * Stages the aggregator can source versions from
 */
export const SUPPORTED_SOURCE_STAGES = ['PROD'] as const;
export type SourceStage = (typeof SUPPORTED_SOURCE_STAGES)[number];

export interface ManifestApplication {
  application_key: string;
  version: string;
  sources: Record<string, unknown>;
  releasables: Record<string, unknown>;
}

/**
 * Platform manifest document. Keys are written to YAML as-is.
 */
export interface PlatformManifest {
  /** CalVer, UTC: YYYY.MM.DD.HHMMSS */
  version: string;
  /** ISO-8601 UTC timestamp */
  created_at: string;
  source_stage: SourceStage;
  applications: ManifestApplication[];
  provenance: {
    evidence_minimums: {
      signatures_present: boolean;
    };
  };
  notes: string;
  /** SemVer of the platform application version created for this manifest */
  platform_app_version?: string;
}

/**
 * Parsed `SERVICE=VERSION` overrides
 */
export interface OverrideParseResult {
  overrides: Map<string, string>;
  /** Entries that were not of the form SERVICE=VERSION */
  malformed: string[];
}
