/**
 * Signing key derivation for SigV4
 */

import { utf8ToBytes } from '@noble/hashes/utils';
import { hmacSha256 } from './crypto.js';

/**
 * Termination string for signing key derivation.
 */
export const AWS4_REQUEST = 'aws4_request';

/**
 * Derive signing key using HMAC-SHA256 chaining
 * kSecret  = "AWS4" + secretAccessKey
 * kDate    = HMAC-SHA256(kSecret, dateStamp)
 * kRegion  = HMAC-SHA256(kDate, region)
 * kService = HMAC-SHA256(kRegion, service)
 * kSigning = HMAC-SHA256(kService, "aws4_request")
 *
 * Each step is keyed with the raw bytes of the step before it, never hex.
 * The result is recomputed on every call and is not cached.
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string
): Uint8Array {
  const kSecret = utf8ToBytes(`AWS4${secretAccessKey}`);
  const kDate = hmacSha256(kSecret, dateStamp);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, AWS4_REQUEST);
}
