/**
 * Cryptographic primitives for SigV4 signing
 * Uses @noble/hashes for SHA-256 and HMAC-SHA256. Every call is one-shot,
 * so no hash state is shared between concurrent signing calls.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

/**
 * SHA-256 of the empty byte sequence, hex-encoded.
 */
export const EMPTY_SHA256 =
  'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === 'string' ? utf8ToBytes(data) : data;
}

/**
 * Compute HMAC-SHA256
 */
export function hmacSha256(key: Uint8Array, data: string | Uint8Array): Uint8Array {
  return hmac(sha256, key, toBytes(data));
}

/**
 * Compute SHA-256 hash
 */
export function sha256Hash(data: string | Uint8Array): Uint8Array {
  return sha256(toBytes(data));
}

/**
 * Compute SHA-256 hash and return as lowercase hex
 */
export function sha256Hex(data: string | Uint8Array): string {
  return toHex(sha256Hash(data));
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}
