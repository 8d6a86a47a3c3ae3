/**
 * Credentials module.
 *
 * @example
 * ```typescript
 * import { EnvironmentCredentialProvider } from './credentials/index.js';
 *
 * const credentials = await new EnvironmentCredentialProvider().getCredentials();
 * ```
 *
 * @module credentials
 */

export type { Credentials, CredentialProvider } from './types.js';

export { CredentialError, isCredentialError } from './error.js';
export type { CredentialErrorCode } from './error.js';

export { StaticCredentialProvider } from './static.js';
export { EnvironmentCredentialProvider, AWS_ENV_VARS } from './environment.js';
