/**
 * Signing Error Types
 *
 * Error types for SigV4 request signing.
 */

/**
 * Error codes for signing operations.
 */
export type SigningErrorCode =
  | 'INVALID_ARGUMENT' // Empty credential, service or region, or no request
  | 'MALFORMED_REQUEST' // Request cannot be signed as it stands
  | 'INVALID_TIMESTAMP'; // Signing time is not a valid date

/**
 * Error thrown during request signing operations.
 *
 * Signing errors are always raised before the request is touched, so a
 * request that failed to sign is left exactly as the caller built it.
 *
 * @example
 * ```typescript
 * throw new SigningError('region must not be empty', 'INVALID_ARGUMENT');
 * ```
 */
export class SigningError extends Error {
  /**
   * Error code indicating the type of signing failure.
   */
  public readonly code: SigningErrorCode;

  /**
   * Creates a new SigningError.
   *
   * @param message - Human-readable error message
   * @param code - Error code indicating the type of failure
   */
  constructor(message: string, code: SigningErrorCode) {
    super(message);
    this.name = 'SigningError';
    this.code = code;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SigningError);
    }

    Object.setPrototypeOf(this, SigningError.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Type guard to check if an error is a SigningError.
 */
export function isSigningError(error: unknown): error is SigningError {
  return error instanceof SigningError;
}
