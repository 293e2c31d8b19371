/**
 * Shared types and interfaces for the platform-release CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Trust Registry base URL */
  baseUrl?: string;
  /** Registry access token */
  token?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Request timeout in milliseconds */
  timeout?: string;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
  /** Process exit code; defaults to 0 on success and 1 on failure */
  exitCode?: number;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
}

/**
 * Exit codes
 *
 * - 0: success, including "nothing to do"
 * - 1: registry or runtime failure
 * - 2: usage or configuration error
 */
export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
