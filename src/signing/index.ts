/**
 * AWS Signature Version 4 Signing Module
 *
 * Header-based SigV4 signing of single requests.
 *
 * @example Basic usage
 * ```typescript
 * import { RequestSigner } from './signing/index.js';
 * import { SigningRequest } from './http/index.js';
 *
 * const signer = new RequestSigner({
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 * });
 *
 * const request = SigningRequest.fromUrl('GET', 'https://api.example.com/items');
 * signer.sign(request, 'execute-api', 'us-east-1');
 * ```
 *
 * @module signing
 */

// Core signing functionality
export {
  RequestSigner,
  ALGORITHM,
  createStringToSign,
  calculateSignature,
  buildAuthorizationHeader,
} from './signer.js';
export type { RequestSignerOptions } from './signer.js';

// Canonical request utilities
export {
  buildCanonicalRequest,
  uriEncode,
  canonicalUri,
  canonicalQueryString,
  canonicalHeaders,
  hashPayload,
} from './canonical.js';

// Key derivation
export { deriveSigningKey, AWS4_REQUEST } from './key-derivation.js';

// Primitives
export { sha256Hash, sha256Hex, hmacSha256, toHex, EMPTY_SHA256 } from './crypto.js';
export { formatDateStamp, formatAmzDate } from './format.js';

// Error types
export { SigningError, isSigningError } from './error.js';
export type { SigningErrorCode } from './error.js';

// Type definitions
export type {
  HeaderCollection,
  RequestBody,
  SignableRequest,
  HeaderAddition,
  CanonicalRequest,
  SigningResult,
} from './types.js';
