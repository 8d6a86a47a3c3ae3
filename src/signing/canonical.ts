/**
 * Canonical Request Building
 *
 * Functions for creating canonical requests according to AWS Signature V4.
 *
 * @see https://docs.aws.amazon.com/IAM/latest/UserGuide/create-signed-request.html
 */

import { EMPTY_SHA256, sha256Hex } from './crypto.js';
import { SigningError } from './error.js';
import { formatAmzDate } from './format.js';
import type {
  CanonicalRequest,
  HeaderAddition,
  HeaderCollection,
  RequestBody,
  SignableRequest,
} from './types.js';

/**
 * Ordinal (UTF-16 code unit) comparison, independent of locale.
 */
function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * URI encode a string for AWS Signature V4.
 *
 * Every byte is percent-encoded except the RFC 3986 unreserved characters
 * (A-Z, a-z, 0-9, hyphen, underscore, period, tilde). Space becomes %20 and
 * hex digits are uppercase.
 *
 * @throws {SigningError} If the string holds a lone surrogate and so has no UTF-8 form
 *
 * @example
 * ```typescript
 * uriEncode('hello world'); // 'hello%20world'
 * uriEncode('a/b');         // 'a%2Fb'
 * uriEncode("it's");        // 'it%27s'
 * ```
 */
export function uriEncode(input: string): string {
  let encoded: string;
  try {
    encoded = encodeURIComponent(input);
  } catch (error) {
    throw new SigningError(
      `Cannot URI-encode ${JSON.stringify(input)}: ${error instanceof Error ? error.message : String(error)}`,
      'MALFORMED_REQUEST'
    );
  }

  // encodeURIComponent leaves these sub-delimiters alone
  return encoded.replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Build the canonical URI from a request path.
 *
 * The path is split on `/` and each segment encoded on its own, so the
 * separators survive. Segments are not resolved (`.` and `..` stay) and an
 * escape already in the path is escaped again.
 *
 * @example
 * ```typescript
 * canonicalUri('');                // '/'
 * canonicalUri('/a b/c');          // '/a%20b/c'
 * canonicalUri('/docs/my%20file'); // '/docs/my%2520file'
 * ```
 */
export function canonicalUri(path: string): string {
  if (!path) {
    return '/';
  }

  const absolute = path.startsWith('/') ? path : `/${path}`;
  return absolute.split('/').map(uriEncode).join('/');
}

/**
 * Build the canonical query string.
 *
 * - Each value is split on `,` into independent values
 * - Values of one key are sorted before encoding
 * - Keys are sorted by their encoded form
 * - Pairs are joined as `key=value` with `&`
 *
 * @example
 * ```typescript
 * canonicalQueryString(new URLSearchParams('b=2&a=z,y')); // 'a=y&a=z&b=2'
 * canonicalQueryString([]);                               // ''
 * ```
 */
export function canonicalQueryString(query: Iterable<readonly [string, string]>): string {
  const grouped = new Map<string, string[]>();

  for (const [key, value] of query) {
    const values = grouped.get(key) ?? [];
    values.push(...value.split(','));
    grouped.set(key, values);
  }

  const entries = Array.from(grouped, ([key, values]) => ({
    encodedKey: uriEncode(key),
    values: [...values].sort(compareOrdinal),
  }));
  entries.sort((a, b) => compareOrdinal(a.encodedKey, b.encodedKey));

  return entries
    .flatMap(({ encodedKey, values }) => values.map((value) => `${encodedKey}=${uriEncode(value)}`))
    .join('&');
}

/**
 * Trim a header value and collapse inner whitespace runs to one space.
 */
function normalizeHeaderValue(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Create canonical headers string and signed headers list.
 *
 * - Header names are lowercased and sorted
 * - Values sharing a name are merged into one comma-separated line
 * - Each value is trimmed, with inner whitespace runs collapsed
 *
 * @example
 * ```typescript
 * canonicalHeaders([
 *   ['Host', 'example.amazonaws.com'],
 *   ['X-Custom', ' a '],
 *   ['x-custom', 'b'],
 * ]);
 * // canonical: 'host:example.amazonaws.com\nx-custom:a,b\n'
 * // signed:    'host;x-custom'
 * ```
 */
export function canonicalHeaders(
  headers: Iterable<readonly [string, string]>
): { canonical: string; signed: string } {
  const headerMap = new Map<string, string[]>();

  for (const [name, value] of headers) {
    const lowerName = name.toLowerCase();
    const values = headerMap.get(lowerName) ?? [];
    values.push(normalizeHeaderValue(value));
    headerMap.set(lowerName, values);
  }

  const sortedHeaders = Array.from(headerMap.entries()).sort((a, b) => compareOrdinal(a[0], b[0]));

  const canonical = sortedHeaders.map(([name, values]) => `${name}:${values.join(',')}\n`).join('');
  const signed = sortedHeaders.map(([name]) => name).join(';');

  return { canonical, signed };
}

/**
 * Hash a request body, returning the empty-body digest when there is none.
 */
export function hashPayload(body: RequestBody | undefined): string {
  if (body === undefined || body.length === 0) {
    return EMPTY_SHA256;
  }
  return sha256Hex(body);
}

/**
 * Work out which headers signing adds: `Host` when the request has none,
 * and `x-amz-date` always, replacing any value the caller set.
 */
function planHeaderAdditions(request: SignableRequest, amzDate: string): HeaderAddition[] {
  const additions: HeaderAddition[] = [];

  if (!request.headers.has('host')) {
    if (!request.host) {
      throw new SigningError('Request has neither a Host header nor a target host', 'MALFORMED_REQUEST');
    }
    additions.push({ name: 'Host', value: request.host, mode: 'append' });
  }

  additions.push({ name: 'x-amz-date', value: amzDate, mode: 'set' });
  return additions;
}

/**
 * The headers as they will stand once the planned additions are applied.
 */
function headersAfter(
  headers: HeaderCollection,
  additions: HeaderAddition[]
): Array<[string, string]> {
  const replaced = new Set(
    additions.filter((a) => a.mode === 'set').map((a) => a.name.toLowerCase())
  );

  const result = Array.from(headers.entries()).filter(
    ([name]) => !replaced.has(name.toLowerCase())
  );
  for (const { name, value } of additions) {
    result.push([name, value]);
  }
  return result;
}

/**
 * Create the canonical request for a request signed at `date`.
 *
 * Format:
 * ```
 * HTTPMethod + '\n' +
 * CanonicalURI + '\n' +
 * CanonicalQueryString + '\n' +
 * CanonicalHeaders + '\n' +
 * SignedHeaders + '\n' +
 * HashedPayload
 * ```
 *
 * The request is not modified. The `Host` and `x-amz-date` headers are
 * signed as if present and returned in `headersToAdd` for the caller to apply.
 *
 * @throws {SigningError} If the date is invalid or the request cannot be encoded
 */
export function buildCanonicalRequest(request: SignableRequest, date: Date): CanonicalRequest {
  const amzDate = formatAmzDate(date);
  const headersToAdd = planHeaderAdditions(request, amzDate);
  const { canonical, signed } = canonicalHeaders(headersAfter(request.headers, headersToAdd));

  const canonicalRequest = [
    request.method,
    canonicalUri(request.path),
    canonicalQueryString(request.query),
    canonical,
    signed,
    hashPayload(request.readBody()),
  ].join('\n');

  return { canonicalRequest, amzDate, signedHeaders: signed, headersToAdd };
}
