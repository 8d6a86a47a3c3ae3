/**
 * Credential error types.
 *
 * @module credentials/error
 */

/**
 * Error codes for credential operations.
 */
export type CredentialErrorCode =
  | 'MISSING'  // Credentials not found
  | 'INVALID'; // Credentials are malformed

/**
 * Error class for credential-related failures.
 *
 * @example
 * ```typescript
 * throw new CredentialError(
 *   'AWS_ACCESS_KEY_ID environment variable not set',
 *   'MISSING'
 * );
 * ```
 */
export class CredentialError extends Error {
  public override readonly name = 'CredentialError';

  /**
   * @param message - Human-readable error description
   * @param code - Specific error code indicating the type of failure
   */
  constructor(
    message: string,
    public readonly code: CredentialErrorCode
  ) {
    super(message);

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CredentialError);
    }

    Object.setPrototypeOf(this, CredentialError.prototype);
  }

  public override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Type guard to check if an error is a CredentialError.
 */
export function isCredentialError(error: unknown): error is CredentialError {
  return error instanceof CredentialError;
}
