/**
 * Structured logger with JSON output and error tracking
 */

import * as Sentry from '@sentry/node';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  module?: string;
  error?: SerializedError | string;
  [key: string]: unknown;
}

interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

let sentryInitialized = false;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Initialize Sentry error tracking
 */
export function initErrorTracking(dsn?: string, options?: Sentry.NodeOptions): void {
  const sentryDsn = dsn || process.env.SENTRY_DSN;

  if (!sentryDsn || sentryInitialized) {
    return;
  }

  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: 1.0,
    ...options,
  });

  sentryInitialized = true;
}

function serializeError(error: Error): SerializedError {
  return {
    ...Object.fromEntries(Object.entries(error)),
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  useColors: boolean;
}

export class Logger {
  // Children share the root settings so a level change reaches module loggers
  private readonly settings: LoggerSettings;
  private readonly module: string;

  constructor(module: string = '', settings?: LoggerSettings) {
    this.module = module;
    this.settings = settings ?? Logger.settingsFromEnv();
  }

  private static settingsFromEnv(): LoggerSettings {
    const json = process.env.LOG_FORMAT === 'json' || process.env.NODE_ENV === 'production';
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();

    return {
      level: isLogLevel(envLevel) ? envLevel : 'info',
      format: json ? 'json' : 'pretty',
      useColors: !json,
    };
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  setFormat(format: LogFormat): void {
    this.settings.format = format;
    this.settings.useColors = format !== 'json';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.settings.level];
  }

  private formatPretty(entry: LogEntry): string {
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const module = entry.module ? `[${entry.module}] ` : '';

    const { level: _level, message: _message, timestamp, module: _module, error, ...extraFields } = entry;
    const context = typeof error === 'string' ? { ...extraFields, error } : extraFields;

    const contextStr = Object.keys(context).length > 0
      ? ` ${this.dim(JSON.stringify(context))}`
      : '';

    const errorStr = error && typeof error === 'object'
      ? `\n${error.stack || `${error.name}: ${error.message}`}`
      : '';

    if (this.settings.useColors && process.stdout.isTTY) {
      const color = COLORS[entry.level];
      return `${DIM}${timestamp}${RESET} ${color}${levelStr}${RESET} ${module}${entry.message}${contextStr}${errorStr}`;
    }

    return `${timestamp} ${levelStr} ${module}${entry.message}${contextStr}${errorStr}`;
  }

  private dim(text: string): string {
    return this.settings.useColors && process.stdout.isTTY ? `${DIM}${text}${RESET}` : text;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const { error, ...fields } = context ?? {};

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(this.module ? { module: this.module } : {}),
      ...fields,
      // Plain error messages stay in the context, thrown values are serialized
      ...(error instanceof Error ? { error: serializeError(error) } : error !== undefined ? { error: String(error) } : {}),
    };

    const formatted = this.settings.format === 'json'
      ? JSON.stringify(entry)
      : this.formatPretty(entry);

    switch (level) {
      case 'error':
        console.error(formatted);
        if (sentryInitialized) {
          Sentry.captureException(error instanceof Error ? error : new Error(message), {
            level: 'error',
            contexts: {
              logger: {
                module: this.module,
                ...fields,
              },
            },
          });
        }
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
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
   * Create a child logger with a module prefix
   */
  child(module: string): Logger {
    return new Logger(this.module ? `${this.module}:${module}` : module, this.settings);
  }

  /**
   * Flush pending error reports before shutdown
   */
  async flush(): Promise<void> {
    if (sentryInitialized) {
      await Sentry.close(2000);
    }
  }
}

export const logger = new Logger();

export function createLogger(module: string): Logger {
  return logger.child(module);
}
