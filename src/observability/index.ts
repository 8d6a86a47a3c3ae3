export { ConsoleLogger, NoopLogger, LOG_LEVELS, REDACTED, REDACTED_KEYS, redactContext } from './logging.js';
export type { Logger, LogLevel, LogContext } from './logging.js';
