/**
 * Credential types.
 *
 * @module credentials/types
 */

/**
 * Long-lived signing credentials.
 */
export interface Credentials {
  /**
   * Access key ID. Sent in the clear as part of the Authorization header.
   */
  readonly accessKeyId: string;

  /**
   * Secret access key. Only ever used as the seed of the signing key
   * derivation; never sent, logged or stored by the signer.
   */
  readonly secretAccessKey: string;
}

/**
 * Provider interface for retrieving credentials.
 */
export interface CredentialProvider {
  /**
   * Retrieves credentials.
   *
   * @throws {CredentialError} If credentials cannot be retrieved
   */
  getCredentials(): Promise<Credentials>;
}
