/**
 * Errors raised while preparing a debug launch
 */

/**
 * A program path could not be resolved at launch time
 */
export class ResolutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

/**
 * The host debug framework could not be loaded
 */
export class CapabilityUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CapabilityUnavailableError';
  }
}

/**
 * A launch-profile file does not match the expected shape
 */
export class ProfileValidationError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid launch profile ${source}:\n  ${issues.join('\n  ')}`);
    this.name = 'ProfileValidationError';
    this.issues = issues;
  }
}
