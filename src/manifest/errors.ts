/**
 * Manifest aggregation errors
 */

export type ConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'
  | 'UNSUPPORTED_STAGE';

/**
 * Errors raised while loading services.yaml or building a manifest
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error for a services config that loaded but has structural problems
 */
export class ConfigValidationError extends ConfigError {
  constructor(
    message: string,
    public readonly issues: string[],
    details?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_INVALID', { ...details, issues });
    this.name = 'ConfigValidationError';
  }

  /**
   * Format the validation issues for display
   */
  formatIssues(): string {
    return this.issues.map((issue) => `❌ ${issue}`).join('\n');
  }
}
