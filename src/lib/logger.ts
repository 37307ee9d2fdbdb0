/**
 * Structured Logger Utility
 *
 * A lightweight, structured logger for the infobot query pipeline.
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Structured output with timestamp, level, context
 * - Environment-based level control (LOG_LEVEL env var)
 * - JSON output format option (LOG_FORMAT=json)
 * - Per-module loggers, created through a replaceable provider
 * - Query ID tracking so every line logged while answering one query shares an ID
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Query context stored in AsyncLocalStorage */
export interface RequestContext {
  /** Unique ID of the query being answered */
  requestId: string;
  /** Additional context fields to include in all logs */
  fields?: Record<string, unknown>;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Run an async function with request context
 * All logs within the callback will include the request ID
 */
export async function withRequestContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return requestContextStorage.run(context, fn);
}

/**
 * Get the current request context
 * Returns undefined if not within a request context
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/** Numeric values for log level comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Type guard for level names coming from the environment or CLI flags */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/** Log entry structure */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Logger context (module name) */
  context: string;
  message: string;
  /** Optional structured data */
  data?: Record<string, unknown>;
  /** Error stack trace (for error level) */
  stack?: string;
  /** Optional operation name */
  operation?: string;
  /** Query ID (from AsyncLocalStorage) */
  requestId?: string;
  /** Service name for log aggregation */
  service?: string;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format: 'text' for human-readable, 'json' for structured */
  format: 'text' | 'json';
  /** Logger context (module name) */
  context: string;
  /** Whether to include timestamps */
  timestamps: boolean;
  /** Service name (defaults to 'infobot') */
  service?: string;
  /** Default fields to include in all log entries */
  defaultFields?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'text',
  context: 'app',
  timestamps: true,
  service: 'infobot',
};

function getServiceFromEnv(): string {
  return process.env['SERVICE_NAME'] ?? 'infobot';
}

/**
 * Get log level from environment variable
 */
function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

/**
 * Get log format from environment variable
 */
function getLogFormatFromEnv(): 'text' | 'json' {
  const envFormat = process.env['LOG_FORMAT']?.toLowerCase();
  if (envFormat === 'json') {
    return 'json';
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

/**
 * Format a log entry as human-readable text
 */
function formatText(entry: LogEntry, config: LoggerConfig): string {
  const parts: string[] = [];

  if (config.timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    parts.push(`${COLORS.dim}${time}${COLORS.reset}`);
  }

  parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${COLORS.reset}`);

  // Shortened for readability
  if (entry.requestId) {
    const shortId = entry.requestId.split('-')[0] ?? entry.requestId.substring(0, 8);
    parts.push(`${COLORS.dim}[${shortId}]${COLORS.reset}`);
  }

  parts.push(`${COLORS.cyan}[${entry.context}]${COLORS.reset}`);

  if (entry.operation) {
    parts.push(`${COLORS.dim}(${entry.operation})${COLORS.reset}`);
  }

  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    parts.push(`${COLORS.dim}${dataStr}${COLORS.reset}`);
  }

  let output = parts.join(' ');

  if (entry.stack) {
    output += `\n${COLORS.dim}${entry.stack}${COLORS.reset}`;
  }

  return output;
}

/**
 * Logger class for structured logging
 *
 * All output goes to stderr so it never interleaves with answers on stdout.
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly minLevel: number;
  private readonly service: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      level: config.level ?? getLogLevelFromEnv(),
      format: config.format ?? getLogFormatFromEnv(),
      context: config.context ?? DEFAULT_CONFIG.context,
      timestamps: config.timestamps ?? DEFAULT_CONFIG.timestamps,
      service: config.service ?? getServiceFromEnv(),
      ...(config.defaultFields !== undefined ? { defaultFields: config.defaultFields } : {}),
    };
    this.minLevel = LOG_LEVEL_VALUES[this.config.level];
    this.service = this.config.service ?? 'infobot';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= this.minLevel;
  }

  private write(entry: LogEntry): void {
    const output =
      this.config.format === 'json' ? JSON.stringify(entry) : formatText(entry, this.config);
    console.error(output);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const reqContext = getRequestContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.config.context,
      message,
      service: this.service,
    };

    if (reqContext?.requestId) {
      entry.requestId = reqContext.requestId;
    }

    if (this.config.defaultFields) {
      entry.data = { ...this.config.defaultFields };
    }

    if (reqContext?.fields) {
      entry.data = { ...entry.data, ...reqContext.fields };
    }

    if (data) {
      const error = data['error'];
      if (error instanceof Error) {
        if (error.stack) {
          entry.stack = error.stack;
        }
        data = { ...data, error: error.message };
      }
      entry.data = { ...entry.data, ...data };
    }

    if (operation) {
      entry.operation = operation;
    }

    this.write(entry);
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('debug', message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('info', message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('warn', message, data, operation);
  }

  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('error', message, data, operation);
  }

  /**
   * Create a logger scoped to one operation
   */
  withOperation(operation: string): OperationLogger {
    return new OperationLogger(this, operation);
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Operation-scoped logger that automatically includes operation name
 */
export class OperationLogger {
  constructor(
    private readonly logger: Logger,
    private readonly operation: string
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(message, data, this.operation);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(message, data, this.operation);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(message, data, this.operation);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(message, data, this.operation);
  }
}

/**
 * Logger provider interface for dependency injection
 * Allows replacing the logger factory for testing or custom implementations
 */
export interface LoggerProvider {
  /** Create a logger for a specific context */
  createLogger(context: string): Logger;
}

/**
 * Default logger provider; loggers are cached per context
 */
export class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggerCache = new Map<string, Logger>();

  constructor(private readonly defaults: Partial<Omit<LoggerConfig, 'context'>> = {}) {}

  createLogger(context: string): Logger {
    let logger = this.loggerCache.get(context);
    if (!logger) {
      logger = new Logger({ ...this.defaults, context });
      this.loggerCache.set(context, logger);
    }
    return logger;
  }
}

let loggerProvider: LoggerProvider = new DefaultLoggerProvider();

export function getLoggerProvider(): LoggerProvider {
  return loggerProvider;
}

/**
 * Reset to the default logger provider, optionally with new defaults
 * (the CLI uses this to apply --verbose)
 */
export function resetLoggerProvider(defaults: Partial<Omit<LoggerConfig, 'context'>> = {}): void {
  loggerProvider = new DefaultLoggerProvider(defaults);
}

/**
 * Create a logger for a specific module
 * Uses the current logger provider (supports dependency injection)
 */
export function createLogger(context: string): Logger {
  return loggerProvider.createLogger(context);
}

/**
 * Pre-configured module loggers (accessed via provider for DI support)
 */
export const loggers = {
  get matcher() { return createLogger('matcher'); },
  get extract() { return createLogger('extract'); },
  get wikipedia() { return createLogger('wikipedia'); },
  get cli() { return createLogger('cli'); },
} as const;
