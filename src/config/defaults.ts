/**
 * Default configuration values.
 *
 * @module config/defaults
 */

import type { LogLevel } from '../observability/logging.js';

/**
 * Service signed for when none is configured (API Gateway).
 */
export const DEFAULT_SERVICE = 'execute-api';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Environment variable names read by {@link loadConfigFromEnv}.
 */
export const CONFIG_ENV_VARS = {
  ENDPOINT: 'SIGV4_ENDPOINT',
  REGION: 'AWS_REGION',
  SERVICE: 'SIGV4_SERVICE',
  LOG_LEVEL: 'SIGV4_LOG_LEVEL',
} as const;
