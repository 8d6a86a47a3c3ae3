/**
 * Configuration error types.
 *
 * @module config/error
 */

export type ConfigErrorCode =
  | 'MISSING_REGION'
  | 'INVALID_ENDPOINT'
  | 'INVALID_CONFIG';

/**
 * Error thrown when signer configuration is missing or invalid.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;

  /**
   * Validation issues, one `path: message` entry per problem.
   */
  public readonly details: string[];

  constructor(message: string, code: ConfigErrorCode, details: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }

    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
