/**
 * SigV4 Signer Client
 *
 * Binds a {@link RequestSigner} to a configured endpoint, service and region
 * so callers can build and sign requests without repeating them. Sending
 * the signed request is left to the caller.
 *
 * @module client
 */

import { loadConfigFromEnv } from './config/index.js';
import type { SignerConfig } from './config/index.js';
import { EnvironmentCredentialProvider } from './credentials/environment.js';
import type { CredentialProvider } from './credentials/types.js';
import { SigningRequest } from './http/request.js';
import type { SigningRequestInit } from './http/request.js';
import { ConsoleLogger } from './observability/logging.js';
import type { Logger } from './observability/logging.js';
import { SigningError } from './signing/error.js';
import { RequestSigner } from './signing/signer.js';
import type { SignableRequest, SigningResult } from './signing/types.js';

export interface SignerClientFromEnvOptions {
  /** Environment to read instead of process.env */
  env?: Record<string, string | undefined>;
  /** Credential source; defaults to the AWS_* environment variables of `env` */
  credentialProvider?: CredentialProvider;
  /** Logger; defaults to a ConsoleLogger at the configured level */
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const client = await SignerClient.fromEnv();
 *
 * const request = client.createRequest('POST', '/items', {
 *   headers: { 'content-type': 'application/json' },
 *   body: JSON.stringify({ name: 'widget' }),
 * });
 * client.sign(request);
 *
 * const { url, init } = request.toFetchArgs();
 * const response = await fetch(url, init);
 * ```
 */
export class SignerClient {
  constructor(
    public readonly config: SignerConfig,
    public readonly signer: RequestSigner
  ) {}

  /**
   * Create a client from environment configuration and credentials.
   *
   * @throws {ConfigError} If the configuration is invalid
   * @throws {CredentialError} If credentials cannot be loaded
   */
  static async fromEnv(options: SignerClientFromEnvOptions = {}): Promise<SignerClient> {
    const env = options.env ?? process.env;
    const config = loadConfigFromEnv(env);
    const provider = options.credentialProvider ?? new EnvironmentCredentialProvider(env);
    const credentials = await provider.getCredentials();
    const logger = options.logger ?? new ConsoleLogger(config.logLevel);

    logger.debug('Signer client configured', {
      endpoint: config.endpoint,
      region: config.region,
      service: config.service,
    });

    return new SignerClient(config, new RequestSigner(credentials, { logger }));
  }

  /**
   * Build a request against the configured endpoint. `target` is a path,
   * resolved against the endpoint, or an absolute URL.
   *
   * @throws {SigningError} MALFORMED_REQUEST if no endpoint is configured for a relative target
   */
  createRequest(
    method: string,
    target: string,
    init: Omit<SigningRequestInit, 'scheme' | 'query'> = {}
  ): SigningRequest {
    if (/^https?:\/\//i.test(target)) {
      return SigningRequest.fromUrl(method, target, init);
    }

    if (!this.config.endpoint) {
      throw new SigningError(
        `No endpoint configured to resolve ${target} against`,
        'MALFORMED_REQUEST'
      );
    }

    return SigningRequest.fromUrl(method, joinUrl(this.config.endpoint, target), init);
  }

  /**
   * Sign a request for the configured service and region.
   */
  sign(request: SignableRequest, date?: Date): SigningResult {
    return this.signer.sign(request, this.config.service, this.config.region, date);
  }
}

/**
 * Append a path (and query) to an endpoint, keeping the endpoint's own path
 * prefix, such as an API Gateway stage.
 */
function joinUrl(endpoint: string, target: string): string {
  const base = endpoint.endsWith('/') ? endpoint.slice(0, -1) : endpoint;
  return `${base}${target.startsWith('/') ? target : `/${target}`}`;
}
