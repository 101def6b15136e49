/**
 * Structured logging for the Vault client
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
  /** Prefix every line with the logger target (e.g. `vault.client`) */
  includeTarget: boolean;
  target: string;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Creates a default logging configuration
 */
export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
    includeTarget: true,
    target: 'vault',
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/** Header names whose values never reach a log line. */
const REDACTED_HEADERS = new Set(['x-vault-token', 'authorization']);

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Returns a logger writing under `<target>.<suffix>` with the same settings
   */
  child(suffix: string): ConsoleLogger {
    return new ConsoleLogger({ ...this.config, target: `${this.config.target}.${suffix}` });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;
    const target = this.config.includeTarget ? this.config.target : undefined;

    if (this.config.format === 'json') {
      console.log(JSON.stringify({ timestamp, level, target, message, ...context }));
    } else if (this.config.format === 'compact') {
      const contextStr = context ? ` ${JSON.stringify(context)}` : '';
      const targetStr = target ? ` ${target}:` : '';
      console.log(`[${level.toUpperCase()}]${targetStr} ${message}${contextStr}`);
    } else {
      const parts: string[] = [];
      if (timestamp) parts.push(`[${timestamp}]`);
      parts.push(`[${level.toUpperCase()}]`);
      if (target) parts.push(`${target}:`);
      parts.push(message);
      if (context) {
        parts.push('\n  ' + Object.entries(context)
          .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
          .join('\n  '));
      }
      console.log(parts.join(' '));
    }
  }
}

/**
 * No-op logger for callers that want the client silent
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Copies a header record with credential values masked
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    redacted[name] = REDACTED_HEADERS.has(name.toLowerCase()) ? '[REDACTED]' : value;
  }
  return redacted;
}

/**
 * Logs an outgoing API request. Bodies are secrets and are not logged.
 */
export function logRequest(
  logger: Logger,
  method: string,
  url: string,
  headers: Record<string, string>,
  redirects: number
): void {
  logger.debug('Outgoing request', {
    method,
    url,
    headers: redactHeaders(headers),
    redirects,
  });
}

/**
 * Logs an incoming API response
 */
export function logResponse(
  logger: Logger,
  method: string,
  url: string,
  status: number,
  durationMs: number
): void {
  logger.debug('Incoming response', { method, url, status, durationMs });
}

/**
 * Logs an error with context
 */
export function logError(
  logger: Logger,
  error: unknown,
  context: string
): void {
  if (error instanceof Error) {
    logger.debug('Request failed', {
      context,
      errorName: error.name,
      errorMessage: error.message,
    });
    return;
  }
  logger.debug('Request failed', { context, error: String(error) });
}
