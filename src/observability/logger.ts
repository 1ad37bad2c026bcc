/**
 * Structured logging for Iceberg Insights Core
 *
 * JSON logging through pino with context preservation and redaction of
 * credentials that may appear in table locations or provider errors.
 *
 * @license MIT
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

// ==============================================
// Types and Interfaces
// ==============================================

/**
 * Log levels supported by the system
 */
export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Structured log context for operations
 */
export interface LogContext {
  /** Operation being performed */
  operation?: string;
  /** Table location being analyzed */
  location?: string;
  /** Metadata table being fetched */
  fetchKind?: string;
  /** Duration of operation in milliseconds */
  duration?: number;
  /** Component generating the log */
  component?: string;
  /** Number of rows returned */
  rowCount?: number;
  /** Additional context data */
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level (default: info) */
  level?: LogLevel | `${LogLevel}`;
  /** Enable pretty printing for development */
  prettyPrint?: boolean;
  /** Service name for logs */
  serviceName?: string;
  /** Environment (development, production, test) */
  environment?: string;
  /** Enable/disable sensitive data sanitization */
  sanitizeSensitiveData?: boolean;
  /** Additional base context to include in all logs */
  baseContext?: Record<string, unknown>;
  /** Custom Pino options */
  pinoOptions?: Partial<LoggerOptions>;
  /** Where JSON lines are written (default: stderr, leaving stdout to CLI output); takes precedence over prettyPrint */
  destination?: DestinationStream;
}

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, 'destination'>>;

export interface TimingInfo {
  startTime: Date;
  endTime: Date;
  duration: number;
}

// ==============================================
// Sensitive Data Patterns
// ==============================================

const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /credential/i,
  /auth/i,
  /api.*key/i,
  /access.*key/i,
  /session.*key/i,
];

const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'accesskeyid',
  'secretaccesskey',
  'sessiontoken',
  'credentials',
  'authorization',
]);

// ==============================================
// Utility Functions
// ==============================================

/**
 * Sanitize sensitive data from a log value
 */
export function sanitizeLogValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[Maximum depth reached]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return sanitizeLogString(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeLogString(value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeLogValue(item, depth + 1));
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const [key, entry] of Object.entries(value)) {
      if (SENSITIVE_FIELDS.has(key.toLowerCase()) || SENSITIVE_PATTERNS.some(pattern => pattern.test(key))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogValue(entry, depth + 1);
      }
    }

    return sanitized;
  }

  return String(value);
}

/**
 * Redact signed-URL credentials and user info embedded in locations
 */
export function sanitizeLogString(str: string): string {
  return str
    .replace(/(X-Amz-(?:Credential|Signature|Security-Token))=[^&\s]+/gi, '$1=[REDACTED]')
    .replace(/([a-z][a-z0-9+.-]*:\/\/)[^/@\s]+@/gi, '$1***@');
}

// ==============================================
// Structured Logger Implementation
// ==============================================

/**
 * Structured logger with context preservation and sensitive data sanitization
 */
export class StructuredLogger {
  private readonly logger: PinoLogger;
  private readonly config: ResolvedLoggerConfig;
  private readonly baseContext: Record<string, unknown>;
  private readonly destination: DestinationStream | undefined;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level || LogLevel.INFO,
      prettyPrint: config.prettyPrint ?? process.env.NODE_ENV === 'development',
      serviceName: config.serviceName || 'iceberg-insights',
      environment: config.environment || process.env.NODE_ENV || 'development',
      sanitizeSensitiveData: config.sanitizeSensitiveData !== false,
      baseContext: config.baseContext || {},
      pinoOptions: config.pinoOptions || {},
    };
    this.destination = config.destination;

    this.baseContext = {
      service: this.config.serviceName,
      environment: this.config.environment,
      pid: process.pid,
      ...this.config.baseContext,
    };

    const pinoConfig: LoggerOptions = {
      level: this.config.level,
      base: this.baseContext,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      ...this.config.pinoOptions,
    };

    if (this.config.prettyPrint && !this.destination) {
      pinoConfig.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss.l',
          destination: 2,
        },
      };
      this.logger = pino(pinoConfig);
    } else {
      this.logger = pino(pinoConfig, this.destination ?? pino.destination(2));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): StructuredLogger {
    const sanitizedContext = this.sanitize(context);

    return new StructuredLogger({
      ...this.config,
      destination: this.destination,
      baseContext: {
        ...this.config.baseContext,
        ...sanitizedContext,
      },
    });
  }

  /**
   * Create a timing tracker for operations
   */
  createTimer(): {
    end(message?: string, context?: LogContext): TimingInfo;
    getDuration(): number;
  } {
    const startTime = new Date();

    return {
      getDuration: () => Date.now() - startTime.getTime(),
      end: (message?: string, context?: LogContext) => {
        const endTime = new Date();
        const timing = { startTime, endTime, duration: endTime.getTime() - startTime.getTime() };

        if (message) {
          this.info(message, { ...context, duration: timing.duration });
        }

        return timing;
      },
    };
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const errorContext = error ? { error } : {};
    this.log(LogLevel.ERROR, message, { ...errorContext, ...context });
  }

  fatal(message: string, error?: unknown, context?: LogContext): void {
    const errorContext = error ? { error } : {};
    this.log(LogLevel.FATAL, message, { ...errorContext, ...context });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger[level](this.sanitize(context ?? {}), message);
  }

  private sanitize(context: LogContext): Record<string, unknown> {
    if (!this.config.sanitizeSensitiveData) {
      return context;
    }

    const sanitized = sanitizeLogValue(context);
    return isRecord(sanitized) ? sanitized : {};
  }

  /**
   * Get the underlying Pino logger
   */
  getPinoLogger(): PinoLogger {
    return this.logger;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  getConfig(): ResolvedLoggerConfig {
    return { ...this.config };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ==============================================
// Convenience Functions
// ==============================================

/**
 * Create a logger for a specific component
 */
export function createComponentLogger(component: string, config?: LoggerConfig): StructuredLogger {
  return new StructuredLogger({
    ...config,
    baseContext: {
      component,
      ...(config?.baseContext || {}),
    },
  });
}

/**
 * Log a timed operation
 */
export async function logTimedOperation<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const timer = logger.createTimer();

  try {
    logger.debug(`Starting ${operation}`, context);
    const result = await fn();
    timer.end(`Completed ${operation}`, { ...context, success: true });
    return result;
  } catch (error) {
    timer.end(`Failed ${operation}`, { ...context, success: false });
    logger.error(`Operation failed: ${operation}`, error, context);
    throw error;
  }
}
