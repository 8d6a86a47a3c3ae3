/**
 * Signed Request Example
 *
 * Signs a JSON POST for an API Gateway endpoint and sends it with fetch.
 *
 * Required environment:
 *   AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_REGION, SIGV4_ENDPOINT
 *
 * Optional:
 *   SIGV4_SERVICE (default execute-api), SIGV4_LOG_LEVEL (default info)
 *
 * Run with `npm run example`.
 */

import {
  ConfigError,
  CredentialError,
  SignerClient,
  SigningError,
} from '../src/index.js';

async function main() {
  const client = await SignerClient.fromEnv();

  try {
    const request = client.createRequest('POST', '/').withJsonBody({ sampleKey: 'sampleValue' });

    const result = client.sign(request);
    console.log('Signed headers:', result.signedHeaders);
    console.log('x-amz-date:', request.headers.first('x-amz-date'));
    console.log('Authorization:', result.authorization);

    const { url, init } = request.toFetchArgs();
    const response = await fetch(url, init);

    console.log('Status:', response.status, response.statusText);
    console.log(await response.text());
  } catch (error) {
    if (error instanceof SigningError) {
      console.error('Signing failed:', error.toString());
    } else {
      console.error('Request failed:', error);
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  if (error instanceof ConfigError || error instanceof CredentialError) {
    console.error(error.toString());
    if (error instanceof ConfigError) {
      for (const detail of error.details) {
        console.error(`  - ${detail}`);
      }
    }
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
