/**
 * Structured logging for request signing.
 *
 * Log context passes through {@link redactContext} before it is written, so
 * credentials and signature material never reach the output even when a
 * caller puts them in a context object.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/** Levels from most to least severe. */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const satisfies readonly LogLevel[];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

/**
 * Context keys whose values are replaced before logging. Compared
 * case-insensitively.
 */
export const REDACTED_KEYS: readonly string[] = [
  'authorization',
  'signature',
  'signingKey',
  'secretAccessKey',
  'sessionToken',
  'x-amz-security-token',
];

export const REDACTED = '[REDACTED]';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Copy `context`, replacing the value of every sensitive key at any depth.
 */
export function redactContext(context: LogContext, keys: readonly string[] = REDACTED_KEYS): LogContext {
  const sensitive = new Set(keys.map((key) => key.toLowerCase()));

  const visit = (value: unknown): unknown => {
    if (Array.isArray(value)) {
      return value.map(visit);
    }
    if (!isPlainObject(value)) {
      return value;
    }

    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = sensitive.has(key.toLowerCase()) ? REDACTED : visit(inner);
    }
    return result;
  };

  const redacted = visit(context);
  return isPlainObject(redacted) ? redacted : {};
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
  trace: (line) => console.debug(line),
};

/**
 * Console logger printing `[timestamp] [LEVEL] message {context}` lines,
 * dropping anything less severe than `minLevel`.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly redactedKeys: readonly string[] = REDACTED_KEYS
  ) {}

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) > LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }

    const suffix = context ? ` ${JSON.stringify(redactContext(context, this.redactedKeys))}` : '';
    SINKS[level](`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${suffix}`);
  }
}

/**
 * Logger that discards everything. The signer's default.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  trace(_message: string, _context?: LogContext): void {}
}
