/**
 * ExtractionError
 *
 * Base error class for extraction failures.
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * WorkItemSourceError
 *
 * Inputs could not be collected: a missing or unreadable image, or a PDF
 * tool that failed.
 */
export class WorkItemSourceError extends ExtractionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WorkItemSourceError';
  }
}

/**
 * ConfigError
 *
 * Thrown when configuration values are missing or invalid.
 * Carries one entry per invalid setting.
 */
export class ConfigError extends ExtractionError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
