/**
 * Tests for SignerClient
 */

import { describe, it, expect, vi } from 'vitest';
import { SignerClient } from './client.js';
import { ConfigError } from './config/error.js';
import { CredentialError } from './credentials/error.js';
import { StaticCredentialProvider } from './credentials/static.js';
import { RequestSigner } from './signing/signer.js';
import type { Logger } from './observability/logging.js';
import { captureError } from './testing/index.js';

const ENV = {
  AWS_ACCESS_KEY_ID: 'test-access-key',
  AWS_SECRET_ACCESS_KEY: 'test-secret',
  AWS_REGION: 'ap-northeast-1',
  SIGV4_ENDPOINT: 'https://abc123.execute-api.ap-northeast-1.amazonaws.com/prod/',
};

function createMockLogger(): Logger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
}

describe('SignerClient', () => {
  describe('fromEnv', () => {
    it('should load configuration and credentials from the environment', async () => {
      const logger = createMockLogger();
      const client = await SignerClient.fromEnv({ env: ENV, logger });

      expect(client.config).toEqual({
        endpoint: 'https://abc123.execute-api.ap-northeast-1.amazonaws.com/prod/',
        region: 'ap-northeast-1',
        service: 'execute-api',
        logLevel: 'info',
      });
      expect(logger.debug).toHaveBeenCalledWith('Signer client configured', {
        endpoint: 'https://abc123.execute-api.ap-northeast-1.amazonaws.com/prod/',
        region: 'ap-northeast-1',
        service: 'execute-api',
      });
    });

    it('should prefer an explicit credential provider', async () => {
      const client = await SignerClient.fromEnv({
        env: { AWS_REGION: 'us-east-1' },
        credentialProvider: new StaticCredentialProvider({
          accessKeyId: 'other-access-key',
          secretAccessKey: 'test-secret',
        }),
        logger: createMockLogger(),
      });

      const result = client.sign(
        client.createRequest('GET', 'https://api.example.com/'),
        new Date('2020-01-01T00:00:00Z')
      );

      expect(result.authorization).toMatch(
        /^AWS4-HMAC-SHA256 Credential=other-access-key\/20200101\/us-east-1\/execute-api\/aws4_request, /
      );
    });

    it('should fail without a region', async () => {
      await expect(
        SignerClient.fromEnv({ env: { ...ENV, AWS_REGION: '' }, logger: createMockLogger() })
      ).rejects.toBeInstanceOf(ConfigError);
    });

    it('should fail without credentials', async () => {
      await expect(
        SignerClient.fromEnv({ env: { AWS_REGION: 'us-east-1' }, logger: createMockLogger() })
      ).rejects.toBeInstanceOf(CredentialError);
    });
  });

  describe('createRequest', () => {
    const client = new SignerClient(
      {
        endpoint: 'https://abc123.execute-api.ap-northeast-1.amazonaws.com/prod/',
        region: 'ap-northeast-1',
        service: 'execute-api',
        logLevel: 'info',
      },
      new RequestSigner({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' })
    );

    it('should resolve a path against the endpoint and keep its stage prefix', () => {
      const request = client.createRequest('GET', '/items?limit=5');

      expect(request.host).toBe('abc123.execute-api.ap-northeast-1.amazonaws.com');
      expect(request.path).toBe('/prod/items');
      expect(request.query).toEqual([['limit', '5']]);
    });

    it('should add a missing leading slash', () => {
      expect(client.createRequest('GET', 'items').path).toBe('/prod/items');
    });

    it('should use an absolute URL as is', () => {
      const request = client.createRequest('DELETE', 'http://localhost:3000/items/1');

      expect(request.scheme).toBe('http');
      expect(request.host).toBe('localhost:3000');
      expect(request.path).toBe('/items/1');
    });

    it('should reject a relative target without an endpoint', () => {
      const bare = new SignerClient(
        { region: 'us-east-1', service: 'execute-api', logLevel: 'info' },
        new RequestSigner({ accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' })
      );

      expect(captureError(() => bare.createRequest('GET', '/items'))).toMatchObject({
        code: 'MALFORMED_REQUEST',
      });
    });
  });

  describe('sign', () => {
    it('should sign with the configured service and region', async () => {
      const client = await SignerClient.fromEnv({ env: ENV, logger: createMockLogger() });
      const request = client.createRequest('POST', '/', {
        body: '{"sampleKey":"sampleValue"}',
      });

      const viaClient = client.sign(request, new Date('2020-01-01T00:00:00Z'));
      const direct = new RequestSigner({
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
      }).sign(
        client.createRequest('POST', '/', { body: '{"sampleKey":"sampleValue"}' }),
        'execute-api',
        'ap-northeast-1',
        new Date('2020-01-01T00:00:00Z')
      );

      expect(viaClient.credentialScope).toBe('20200101/ap-northeast-1/execute-api/aws4_request');
      expect(viaClient).toEqual(direct);
      expect(request.headers.first('authorization')).toBe(viaClient.authorization);
    });
  });
});
