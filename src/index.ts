/**
 * AWS Signature Version 4 request signer
 *
 * Signs HTTP requests with the SigV4 `Authorization` header so that an AWS
 * endpoint (API Gateway, Lambda URLs, any SigV4-verifying service) can
 * authenticate them. Sending the signed request is up to the caller.
 *
 * @example
 * ```typescript
 * import { RequestSigner, SigningRequest } from 'aws-sigv4-signer';
 *
 * const signer = new RequestSigner({
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 * });
 *
 * const request = SigningRequest.fromUrl('POST', 'https://api.example.com/items')
 *   .withJsonBody({ sampleKey: 'sampleValue' });
 *
 * signer.sign(request, 'execute-api', 'ap-northeast-1');
 *
 * const { url, init } = request.toFetchArgs();
 * const response = await fetch(url, init);
 * ```
 *
 * @packageDocumentation
 */

// Signing
export * from './signing/index.js';

// Request description
export * from './http/index.js';

// Credentials
export * from './credentials/index.js';

// Configuration
export {
  loadConfigFromEnv,
  validateConfig,
  signerConfigSchema,
  ConfigError,
  isConfigError,
  CONFIG_ENV_VARS,
  DEFAULT_LOG_LEVEL,
  DEFAULT_SERVICE,
} from './config/index.js';
export type { SignerConfig, SignerConfigInput, ConfigErrorCode } from './config/index.js';

// Logging
export * from './observability/index.js';

// Client
export { SignerClient } from './client.js';
export type { SignerClientFromEnvOptions } from './client.js';
