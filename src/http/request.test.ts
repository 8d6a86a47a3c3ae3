/**
 * Tests for SigningRequest
 */

import { describe, it, expect } from 'vitest';
import { SigningRequest } from './request.js';
import { SigningError } from '../signing/error.js';
import { captureError } from '../testing/index.js';

describe('SigningRequest', () => {
  describe('constructor', () => {
    it('should default to https and the root path', () => {
      const request = new SigningRequest('GET', 'example.amazonaws.com');

      expect(request.scheme).toBe('https');
      expect(request.path).toBe('/');
      expect(request.query).toEqual([]);
      expect(request.readBody()).toBeUndefined();
    });

    it('should keep query parameters in the order given', () => {
      const request = new SigningRequest('GET', 'example.amazonaws.com', '/', {
        query: [
          ['b', '2'],
          ['a', '1'],
        ],
      });

      expect(request.query).toEqual([
        ['b', '2'],
        ['a', '1'],
      ]);
    });
  });

  describe('fromUrl', () => {
    it('should split a URL into host, path and query', () => {
      const request = SigningRequest.fromUrl(
        'GET',
        'https://abc123.execute-api.ap-northeast-1.amazonaws.com/prod/items?limit=10&tag=a'
      );

      expect(request.method).toBe('GET');
      expect(request.scheme).toBe('https');
      expect(request.host).toBe('abc123.execute-api.ap-northeast-1.amazonaws.com');
      expect(request.path).toBe('/prod/items');
      expect(request.query).toEqual([
        ['limit', '10'],
        ['tag', 'a'],
      ]);
    });

    it('should keep a non-default port in the host', () => {
      const request = SigningRequest.fromUrl('GET', 'http://localhost:8080/health');

      expect(request.scheme).toBe('http');
      expect(request.host).toBe('localhost:8080');
    });

    it('should carry headers and body', () => {
      const request = SigningRequest.fromUrl('POST', 'https://api.example.com/', {
        headers: { 'X-Trace': 'abc' },
        body: 'payload',
      });

      expect(request.headers.get('x-trace')).toEqual(['abc']);
      expect(request.readBody()).toBe('payload');
    });

    it('should reject an unparseable URL', () => {
      const error = captureError(() => SigningRequest.fromUrl('GET', 'not a url'));

      expect(error).toBeInstanceOf(SigningError);
      expect(error).toMatchObject({ code: 'MALFORMED_REQUEST' });
    });

    it('should reject a non-http scheme', () => {
      expect(captureError(() => SigningRequest.fromUrl('GET', 'ftp://files.example.com/a'))).toMatchObject({
        code: 'MALFORMED_REQUEST',
        message: 'Unsupported URL scheme: ftp:',
      });
    });
  });

  describe('builders', () => {
    it('should chain query, header and body', () => {
      const request = new SigningRequest('POST', 'api.example.com', '/items')
        .withQuery('dryRun', 'true')
        .withHeader('X-Tag', 'a')
        .withHeader('x-tag', 'b')
        .withBody('data');

      expect(request.query).toEqual([['dryRun', 'true']]);
      expect(request.headers.get('X-TAG')).toEqual(['a', 'b']);
      expect(request.readBody()).toBe('data');
    });

    it('should serialize a JSON body and set its content type', () => {
      const request = new SigningRequest('POST', 'api.example.com', '/').withJsonBody({
        sampleKey: 'sampleValue',
      });

      expect(request.readBody()).toBe('{"sampleKey":"sampleValue"}');
      expect(request.headers.get('content-type')).toEqual(['application/json']);
    });

    it('should keep an existing content type for a JSON body', () => {
      const request = new SigningRequest('POST', 'api.example.com', '/', {
        headers: { 'Content-Type': 'application/vnd.api+json' },
      }).withJsonBody([]);

      expect(request.headers.get('content-type')).toEqual(['application/vnd.api+json']);
    });
  });

  describe('url', () => {
    it('should rebuild the URL with an encoded query', () => {
      const request = new SigningRequest('GET', 'api.example.com', '/search', {
        query: [
          ['q', 'hello world'],
          ['path', 'a/b'],
        ],
      });

      expect(request.url).toBe('https://api.example.com/search?q=hello%20world&path=a%2Fb');
    });

    it('should omit an empty query and add a missing leading slash', () => {
      expect(new SigningRequest('GET', 'api.example.com', 'items').url).toBe(
        'https://api.example.com/items'
      );
    });
  });

  describe('toFetchArgs', () => {
    it('should drop Host and pass the other headers and body', () => {
      const request = new SigningRequest('POST', 'api.example.com', '/items', {
        headers: { Host: 'api.example.com', 'x-amz-date': '20200101T000000Z' },
        body: '{}',
      });

      expect(request.toFetchArgs()).toEqual({
        url: 'https://api.example.com/items',
        init: {
          method: 'POST',
          headers: [['x-amz-date', '20200101T000000Z']],
          body: '{}',
        },
      });
    });

    it('should leave out an absent body', () => {
      const { init } = new SigningRequest('GET', 'api.example.com').toFetchArgs();

      expect(init).toEqual({ method: 'GET', headers: [] });
      expect('body' in init).toBe(false);
    });
  });
});
