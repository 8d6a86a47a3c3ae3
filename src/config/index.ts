/**
 * Signer configuration.
 *
 * Configuration belongs to the caller: the signing core takes service and
 * region as arguments and reads nothing itself. This module is for callers
 * that want those values, plus a target endpoint and log level, from the
 * environment.
 *
 * @example
 * ```typescript
 * const config = loadConfigFromEnv();
 * signer.sign(request, config.service, config.region);
 * ```
 *
 * @module config
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../observability/logging.js';
import { ConfigError } from './error.js';
import { CONFIG_ENV_VARS, DEFAULT_LOG_LEVEL, DEFAULT_SERVICE } from './defaults.js';

export { ConfigError, isConfigError } from './error.js';
export type { ConfigErrorCode } from './error.js';
export { CONFIG_ENV_VARS, DEFAULT_LOG_LEVEL, DEFAULT_SERVICE } from './defaults.js';

/**
 * Zod schema for configuration validation.
 */
export const signerConfigSchema = z.object({
  endpoint: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' })
    .optional(),
  region: z.string().trim().min(1),
  service: z.string().trim().min(1).default(DEFAULT_SERVICE),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
});

/**
 * Validated signer configuration.
 */
export type SignerConfig = z.infer<typeof signerConfigSchema>;

/**
 * Configuration as supplied, before validation and defaults.
 */
export interface SignerConfigInput {
  endpoint?: string;
  region?: string;
  service?: string;
  logLevel?: string;
}

/**
 * Validate configuration and fill in defaults.
 *
 * @throws {ConfigError} MISSING_REGION, INVALID_ENDPOINT or INVALID_CONFIG
 */
export function validateConfig(input: SignerConfigInput): SignerConfig {
  if (input.region === undefined || input.region.trim() === '') {
    throw new ConfigError('region is required', 'MISSING_REGION');
  }

  const result = signerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    const code = result.error.issues.every((i) => i.path[0] === 'endpoint')
      ? 'INVALID_ENDPOINT'
      : 'INVALID_CONFIG';
    throw new ConfigError(`Invalid configuration: ${issues.join(', ')}`, code, issues);
  }

  return result.data;
}

function readEnv(env: Record<string, string | undefined>, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load configuration from environment variables.
 *
 * - SIGV4_ENDPOINT (optional): target endpoint URL
 * - AWS_REGION (required): region to sign for
 * - SIGV4_SERVICE (optional): service to sign for, default `execute-api`
 * - SIGV4_LOG_LEVEL (optional): error, warn, info, debug or trace; default `info`
 *
 * @param env - Environment to read instead of process.env (useful for testing)
 * @throws {ConfigError} If a value is missing or invalid
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): SignerConfig {
  return validateConfig({
    endpoint: readEnv(env, CONFIG_ENV_VARS.ENDPOINT),
    region: readEnv(env, CONFIG_ENV_VARS.REGION),
    service: readEnv(env, CONFIG_ENV_VARS.SERVICE),
    logLevel: readEnv(env, CONFIG_ENV_VARS.LOG_LEVEL)?.toLowerCase(),
  });
}
