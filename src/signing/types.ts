/**
 * SigV4 Signing Types
 *
 * The signer only ever sees requests through these interfaces, so any HTTP
 * client's request type can be signed once it is adapted to them.
 */

/**
 * Ordered header multimap with case-insensitive names.
 */
export interface HeaderCollection {
  /** All values stored under `name`, in insertion order. Empty when absent. */
  get(name: string): string[];
  has(name: string): boolean;
  /** Add a value, keeping any existing values for the same name. */
  append(name: string, value: string): void;
  /** Replace every value stored under `name` with a single value. */
  set(name: string, value: string): void;
  /** Every `[name, value]` pair, names spelled as they were added. */
  entries(): IterableIterator<[string, string]>;
}

/**
 * Request body as held in memory.
 */
export type RequestBody = Uint8Array | string;

/**
 * The request description handed to the signer.
 */
export interface SignableRequest {
  /** HTTP method, used verbatim */
  readonly method: string;
  /** Target host, used for `Host` when the request has none */
  readonly host: string;
  /** Absolute path as it appears on the wire */
  readonly path: string;
  /** Query parameters as key/value pairs; repeated keys allowed */
  readonly query: Iterable<readonly [string, string]>;
  /** Request headers, mutated in place by the signer */
  readonly headers: HeaderCollection;
  /** Buffered body bytes, or undefined for no body */
  readBody(): RequestBody | undefined;
}

/**
 * Header values the signer adds once signing has succeeded.
 */
export interface HeaderAddition {
  name: string;
  value: string;
  /** `set` replaces existing values, `append` adds alongside them */
  mode: 'set' | 'append';
}

/**
 * Output of canonical request construction.
 */
export interface CanonicalRequest {
  /** The six-segment canonical request */
  canonicalRequest: string;
  /** `x-amz-date` value (YYYYMMDDTHHMMSSZ) */
  amzDate: string;
  /** Semicolon-separated lowercased header names */
  signedHeaders: string;
  /** Headers that were signed but are not yet on the request */
  headersToAdd: HeaderAddition[];
}

/**
 * Summary of a successful signing call. Holds no secret material.
 */
export interface SigningResult {
  amzDate: string;
  credentialScope: string;
  signedHeaders: string;
  canonicalRequest: string;
  stringToSign: string;
  signature: string;
  authorization: string;
}
