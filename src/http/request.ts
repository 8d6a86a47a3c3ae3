/**
 * Request description handed to the signer.
 *
 * This module provides a client-agnostic request type with a fluent interface
 * for building it, and a conversion to `fetch` arguments for sending it once
 * signed.
 *
 * @module http/request
 */

import { uriEncode } from '../signing/canonical.js';
import { SigningError } from '../signing/error.js';
import type { RequestBody, SignableRequest } from '../signing/types.js';
import { HeaderMultimap } from './headers.js';
import type { HeaderInput } from './headers.js';

export interface SigningRequestInit {
  /** URL scheme used when converting to fetch arguments (default `https`) */
  scheme?: 'http' | 'https';
  query?: Iterable<readonly [string, string]>;
  headers?: HeaderInput;
  body?: RequestBody;
}

/**
 * Arguments for `fetch(url, init)`.
 */
export interface FetchArgs {
  url: string;
  init: RequestInit;
}

/**
 * A mutable HTTP request description.
 *
 * @example
 * ```typescript
 * const request = new SigningRequest('POST', 'api.example.com', '/items')
 *   .withQuery('dryRun', 'true')
 *   .withHeader('Content-Type', 'application/json')
 *   .withBody(JSON.stringify({ name: 'widget' }));
 *
 * signer.sign(request, 'execute-api', 'ap-northeast-1');
 * const { url, init } = request.toFetchArgs();
 * const response = await fetch(url, init);
 * ```
 */
export class SigningRequest implements SignableRequest {
  public readonly scheme: 'http' | 'https';
  public readonly headers: HeaderMultimap;
  private readonly queryParams: Array<[string, string]> = [];
  private body?: RequestBody;

  /**
   * @param method - HTTP method, sent and signed as given
   * @param host - Target host, with port when it is not the scheme's default
   * @param path - Absolute path, already percent-encoded where needed
   */
  constructor(
    public readonly method: string,
    public readonly host: string,
    public readonly path: string = '/',
    init: SigningRequestInit = {}
  ) {
    this.scheme = init.scheme ?? 'https';
    this.headers = new HeaderMultimap(init.headers);
    this.body = init.body;

    for (const [key, value] of init.query ?? []) {
      this.queryParams.push([key, value]);
    }
  }

  /**
   * Build a request from an absolute URL.
   *
   * @throws {SigningError} MALFORMED_REQUEST if the URL cannot be parsed or is not http(s)
   *
   * @example
   * ```typescript
   * const request = SigningRequest.fromUrl('GET', 'https://api.example.com/items?limit=10');
   * request.host; // 'api.example.com'
   * request.path; // '/items'
   * ```
   */
  static fromUrl(
    method: string,
    url: string | URL,
    init: Omit<SigningRequestInit, 'scheme' | 'query'> = {}
  ): SigningRequest {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      throw new SigningError(
        `Invalid request URL: ${error instanceof Error ? error.message : String(error)}`,
        'MALFORMED_REQUEST'
      );
    }

    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      throw new SigningError(
        `Unsupported URL scheme: ${parsed.protocol}`,
        'MALFORMED_REQUEST'
      );
    }

    return new SigningRequest(method, parsed.host, parsed.pathname, {
      ...init,
      scheme: parsed.protocol === 'http:' ? 'http' : 'https',
      query: parsed.searchParams,
    });
  }

  get query(): ReadonlyArray<readonly [string, string]> {
    return this.queryParams;
  }

  withQuery(name: string, value: string): this {
    this.queryParams.push([name, value]);
    return this;
  }

  withHeader(name: string, value: string): this {
    this.headers.append(name, value);
    return this;
  }

  withBody(body: RequestBody | undefined): this {
    this.body = body;
    return this;
  }

  /**
   * Body as a JSON document, with a JSON content type unless one is set.
   */
  withJsonBody(value: unknown): this {
    if (!this.headers.has('content-type')) {
      this.headers.append('Content-Type', 'application/json');
    }
    return this.withBody(JSON.stringify(value));
  }

  readBody(): RequestBody | undefined {
    return this.body;
  }

  /**
   * The full request URL.
   */
  get url(): string {
    const query = this.queryParams
      .map(([key, value]) => `${uriEncode(key)}=${uriEncode(value)}`)
      .join('&');
    const path = this.path.startsWith('/') ? this.path : `/${this.path}`;
    return `${this.scheme}://${this.host}${path}${query ? `?${query}` : ''}`;
  }

  /**
   * Convert into `fetch` arguments. Repeated headers are sent once each.
   *
   * `Host` is left out: fetch derives it from the URL and does not accept
   * it as a request header.
   */
  toFetchArgs(): FetchArgs {
    const headers: Array<[string, string]> = [];
    for (const [name, value] of this.headers) {
      if (name.toLowerCase() !== 'host') {
        headers.push([name, value]);
      }
    }

    const init: RequestInit = { method: this.method, headers };
    if (this.body !== undefined) {
      init.body = this.body;
    }

    return { url: this.url, init };
  }
}
