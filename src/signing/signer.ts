/**
 * RequestSigner - AWS Signature Version 4 request signing
 *
 * @see https://docs.aws.amazon.com/IAM/latest/UserGuide/reference_sigv-create-signed-request.html
 */

import type { Credentials } from '../credentials/types.js';
import { NoopLogger } from '../observability/logging.js';
import type { Logger } from '../observability/logging.js';
import { buildCanonicalRequest } from './canonical.js';
import { hmacSha256, sha256Hex, toHex } from './crypto.js';
import { isSigningError, SigningError } from './error.js';
import { formatDateStamp } from './format.js';
import { AWS4_REQUEST, deriveSigningKey } from './key-derivation.js';
import type { HeaderAddition, SignableRequest, SigningResult } from './types.js';

/**
 * AWS Signature V4 algorithm identifier.
 */
export const ALGORITHM = 'AWS4-HMAC-SHA256';

export interface RequestSignerOptions {
  /** Receives debug output; nothing is logged by default */
  logger?: Logger;
  /** Source of the signing time when `sign` is not given one */
  clock?: () => Date;
}

/**
 * Create the string to sign.
 *
 * Format:
 * ```
 * Algorithm + '\n' +
 * RequestDateTime + '\n' +
 * CredentialScope + '\n' +
 * HashedCanonicalRequest
 * ```
 */
export function createStringToSign(
  amzDate: string,
  credentialScope: string,
  canonicalRequestHash: string
): string {
  return [ALGORITHM, amzDate, credentialScope, canonicalRequestHash].join('\n');
}

/**
 * Calculate the hex-encoded signature of a string to sign.
 */
export function calculateSignature(signingKey: Uint8Array, stringToSign: string): string {
  return toHex(hmacSha256(signingKey, stringToSign));
}

/**
 * Build the Authorization header value.
 *
 * Format:
 * ```
 * AWS4-HMAC-SHA256 Credential=AccessKeyId/CredentialScope,
 * SignedHeaders=SignedHeaders, Signature=Signature
 * ```
 */
export function buildAuthorizationHeader(
  accessKeyId: string,
  credentialScope: string,
  signedHeaders: string,
  signature: string
): string {
  return [
    `${ALGORITHM} Credential=${accessKeyId}/${credentialScope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');
}

function applyHeaderAdditions(request: SignableRequest, additions: HeaderAddition[]): void {
  for (const { name, value, mode } of additions) {
    if (mode === 'set') {
      request.headers.set(name, value);
    } else {
      request.headers.append(name, value);
    }
  }
}

/**
 * Signs requests with one set of credentials.
 *
 * A signer keeps no per-request state, so one instance can sign many
 * independent requests concurrently.
 *
 * @example
 * ```typescript
 * const signer = new RequestSigner({
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 * });
 *
 * const request = SigningRequest.fromUrl('POST', 'https://api.example.com/items', {
 *   headers: { 'content-type': 'application/json' },
 *   body: JSON.stringify({ name: 'widget' }),
 * });
 *
 * signer.sign(request, 'execute-api', 'ap-northeast-1');
 * // request.headers now carries host, x-amz-date and authorization
 * ```
 */
export class RequestSigner {
  private readonly accessKeyId: string;
  private readonly secretAccessKey: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  /**
   * @throws {SigningError} INVALID_ARGUMENT if either credential field is empty
   */
  constructor(credentials: Credentials, options: RequestSignerOptions = {}) {
    if (!credentials?.accessKeyId) {
      throw new SigningError('accessKeyId must not be empty', 'INVALID_ARGUMENT');
    }
    if (!credentials.secretAccessKey) {
      throw new SigningError('secretAccessKey must not be empty', 'INVALID_ARGUMENT');
    }

    this.accessKeyId = credentials.accessKeyId;
    this.secretAccessKey = credentials.secretAccessKey;
    this.logger = options.logger ?? new NoopLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Sign a request in place.
   *
   * Adds `x-amz-date`, `Authorization` and, if missing, `Host`. Either all
   * of them are written or, on error, none are.
   *
   * @param request - Request to sign; its headers are modified
   * @param service - Service name, e.g. `execute-api`
   * @param region - Region, e.g. `ap-northeast-1`
   * @param date - Signing time; defaults to the signer's clock
   * @throws {SigningError} If an argument is empty, the request already has
   *   an Authorization header, or the signing time is invalid
   */
  sign(request: SignableRequest, service: string, region: string, date?: Date): SigningResult {
    try {
      return this.signOrThrow(request, service, region, date ?? this.clock());
    } catch (error) {
      if (isSigningError(error)) {
        this.logger.debug('Request signing rejected', { code: error.code, reason: error.message });
      }
      throw error;
    }
  }

  private signOrThrow(
    request: SignableRequest,
    service: string,
    region: string,
    now: Date
  ): SigningResult {
    if (!request) {
      throw new SigningError('request must be provided', 'INVALID_ARGUMENT');
    }
    if (!service) {
      throw new SigningError('service must not be empty', 'INVALID_ARGUMENT');
    }
    if (!region) {
      throw new SigningError('region must not be empty', 'INVALID_ARGUMENT');
    }
    if (request.headers.has('authorization')) {
      throw new SigningError('Request already carries an Authorization header', 'MALFORMED_REQUEST');
    }

    const { canonicalRequest, amzDate, signedHeaders, headersToAdd } = buildCanonicalRequest(
      request,
      now
    );

    const dateStamp = formatDateStamp(now);
    const credentialScope = `${dateStamp}/${region}/${service}/${AWS4_REQUEST}`;
    const stringToSign = createStringToSign(amzDate, credentialScope, sha256Hex(canonicalRequest));

    const signingKey = deriveSigningKey(this.secretAccessKey, dateStamp, region, service);
    const signature = calculateSignature(signingKey, stringToSign);

    const authorization = buildAuthorizationHeader(
      this.accessKeyId,
      credentialScope,
      signedHeaders,
      signature
    );

    applyHeaderAdditions(request, headersToAdd);
    request.headers.append('Authorization', authorization);

    this.logger.debug('Request signed', {
      method: request.method,
      host: request.host,
      path: request.path,
      service,
      region,
      amzDate,
      signedHeaders,
    });

    return {
      amzDate,
      credentialScope,
      signedHeaders,
      canonicalRequest,
      stringToSign,
      signature,
      authorization,
    };
  }
}
