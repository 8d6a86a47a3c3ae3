/**
 * Static credential provider.
 *
 * @module credentials/static
 */

import type { Credentials, CredentialProvider } from './types.js';
import { CredentialError } from './error.js';

/**
 * Provider that returns a fixed credential pair.
 *
 * @example
 * ```typescript
 * const provider = new StaticCredentialProvider({
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 * });
 *
 * const credentials = await provider.getCredentials();
 * ```
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials: Credentials;

  /**
   * @throws {CredentialError} INVALID if either field is empty
   */
  constructor(credentials: Credentials) {
    if (!credentials.accessKeyId || credentials.accessKeyId.trim() === '') {
      throw new CredentialError('accessKeyId is required and cannot be empty', 'INVALID');
    }

    if (!credentials.secretAccessKey || credentials.secretAccessKey.trim() === '') {
      throw new CredentialError('secretAccessKey is required and cannot be empty', 'INVALID');
    }

    this.credentials = {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
    };
  }

  public async getCredentials(): Promise<Credentials> {
    return this.credentials;
  }
}
