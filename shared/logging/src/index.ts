/**
 * Structured logging shared by the registry and Jenkins integrations.
 *
 * Clients never reach for a process-wide logger: a `Logger` is handed to
 * their constructors and the caller decides where output goes.
 *
 * @module @devops-console/logging
 */

/**
 * Log level enumeration.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'off';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'off'];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  off: 4,
};

/**
 * Structured context attached to a log line.
 */
export type LogContext = Record<string, unknown>;

/**
 * Logging configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to prefix lines with an ISO timestamp. */
  includeTimestamps: boolean;
  /** Emit one JSON object per line instead of text. */
  json: boolean;
  /** Whether to redact secret-looking context keys. */
  redactSensitive: boolean;
}

/**
 * Default log configuration.
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  includeTimestamps: true,
  json: false,
  redactSensitive: true,
};

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const SENSITIVE_KEYS = ['authorization', 'password', 'secret', 'token', 'passphrase', 'privatekey'];

/**
 * Console logger with level filtering and redaction.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(config: Partial<LogConfig> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Formats a line without writing it.
   */
  format(level: Exclude<LogLevel, 'off'>, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const safeContext = context ? this.redact(context) : undefined;

    if (this.config.json) {
      return JSON.stringify({
        ...(this.config.includeTimestamps ? { timestamp } : {}),
        level,
        message,
        ...safeContext,
      });
    }

    const parts: string[] = [];
    if (this.config.includeTimestamps) {
      parts.push(`[${timestamp}]`);
    }
    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);
    if (safeContext && Object.keys(safeContext).length > 0) {
      parts.push(JSON.stringify(safeContext));
    }
    return parts.join(' ');
  }

  private log(level: Exclude<LogLevel, 'off'>, message: string, context?: LogContext): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.config.level]) {
      return;
    }

    const line = this.format(level, message, context);
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }

  private redact(context: LogContext): LogContext {
    if (!this.config.redactSensitive) {
      return context;
    }

    const redacted: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      const lower = key.toLowerCase();
      if (SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive))) {
        redacted[key] = '[REDACTED]';
      } else if (value instanceof Error) {
        redacted[key] = value.message;
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redact(value);
      } else {
        redacted[key] = value;
      }
    }
    return redacted;
  }
}

function isPlainRecord(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}

/**
 * Creates a console logger with the given configuration.
 */
export function createLogger(config?: Partial<LogConfig>): Logger {
  return new ConsoleLogger(config);
}

/**
 * Reads the log level from an environment value, falling back to `info`.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? 'info';
}
