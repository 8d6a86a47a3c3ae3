/**
 * HTTP request description module.
 *
 * @module http
 */

export { HeaderMultimap } from './headers.js';
export type { HeaderInput } from './headers.js';

export { SigningRequest } from './request.js';
export type { SigningRequestInit, FetchArgs } from './request.js';
