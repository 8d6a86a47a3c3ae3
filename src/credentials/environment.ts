/**
 * Environment variable credential provider.
 *
 * @module credentials/environment
 */

import type { Credentials, CredentialProvider } from './types.js';
import { CredentialError } from './error.js';

/**
 * Standard AWS environment variable names for credentials.
 */
export const AWS_ENV_VARS = {
  ACCESS_KEY_ID: 'AWS_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'AWS_SECRET_ACCESS_KEY',
} as const;

/**
 * Provider that reads credentials from `AWS_ACCESS_KEY_ID` and
 * `AWS_SECRET_ACCESS_KEY`. Values are trimmed.
 *
 * @example
 * ```typescript
 * const provider = new EnvironmentCredentialProvider();
 * const credentials = await provider.getCredentials();
 * ```
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  /**
   * @param env - Environment to read instead of process.env (useful for testing)
   */
  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  /**
   * @throws {CredentialError} MISSING if either variable is unset or blank
   */
  public async getCredentials(): Promise<Credentials> {
    const accessKeyId = this.env[AWS_ENV_VARS.ACCESS_KEY_ID];
    const secretAccessKey = this.env[AWS_ENV_VARS.SECRET_ACCESS_KEY];

    if (!accessKeyId || accessKeyId.trim() === '') {
      throw new CredentialError(
        `${AWS_ENV_VARS.ACCESS_KEY_ID} environment variable not set or empty`,
        'MISSING'
      );
    }

    if (!secretAccessKey || secretAccessKey.trim() === '') {
      throw new CredentialError(
        `${AWS_ENV_VARS.SECRET_ACCESS_KEY} environment variable not set or empty`,
        'MISSING'
      );
    }

    return {
      accessKeyId: accessKeyId.trim(),
      secretAccessKey: secretAccessKey.trim(),
    };
  }
}
