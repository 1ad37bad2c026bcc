/**
 * Error handling classes for Iceberg Insights Core
 *
 * Standardized error types that keep provider internals (credentials,
 * bucket policies, file contents) out of user-facing messages.
 *
 * @license MIT
 */

import type { FetchKind } from '../types.js';

// ==============================================
// Base Error Class
// ==============================================

/**
 * Base class for all Iceberg Insights errors
 */
export abstract class InsightsError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly sanitized: boolean;

  constructor(message: string, code: string, sanitized = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.sanitized = sanitized;

    // Maintain proper stack trace (when available)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): object {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      sanitized: this.sanitized,
    };
  }
}

// ==============================================
// Specific Error Classes
// ==============================================

/**
 * Error for table locations that would break out of the metadata query
 */
export class SecurityError extends InsightsError {
  public readonly attemptedAction: string;

  constructor(message: string, attemptedAction = 'unknown') {
    super(message, 'SECURITY_VIOLATION', true);
    this.attemptedAction = attemptedAction;
  }

  static unsafeLocation(location: string): SecurityError {
    return new SecurityError(
      'Invalid table location: contains unsafe characters',
      `unsafe_location:${location.length}`
    );
  }
}

/**
 * Error for metadata fetch failures (unreachable location, malformed
 * metadata, permission denied)
 */
export class ProviderError extends InsightsError {
  public readonly fetchKind: FetchKind | 'session';
  public readonly location?: string;

  constructor(
    message: string,
    fetchKind: FetchKind | 'session' = 'session',
    location?: string,
    originalError?: Error
  ) {
    const sanitizedMessage = ProviderError.sanitizeProviderError(message, originalError);
    super(sanitizedMessage, 'PROVIDER_FETCH_FAILED', true);
    this.fetchKind = fetchKind;
    this.location = location;
  }

  private static sanitizeProviderError(message: string, originalError?: Error): string {
    const detail = `${message} ${originalError?.message ?? ''}`.toLowerCase();

    if (detail.includes('no such file') || detail.includes('not found') || detail.includes('does not exist')) {
      return 'Table metadata not found - check the table location';
    }

    if (detail.includes('permission denied') ||
        detail.includes('access denied') ||
        detail.includes('forbidden') ||
        detail.includes('credential')) {
      return 'Access denied - check credentials and bucket permissions';
    }

    if (detail.includes('timeout') || detail.includes('timed out')) {
      return 'Metadata fetch timeout - location may be unreachable';
    }

    if (detail.includes('json') || detail.includes('parse') || detail.includes('invalid')) {
      return 'Malformed table metadata';
    }

    if (detail.includes('extension')) {
      return 'Metadata engine extension could not be loaded';
    }

    return message;
  }

  static fetchFailed(fetchKind: FetchKind, location: string, originalError?: Error): ProviderError {
    return new ProviderError(
      `Failed to fetch ${fetchKind}`,
      fetchKind,
      location,
      originalError
    );
  }

  static sessionFailed(originalError?: Error): ProviderError {
    return new ProviderError(
      'Failed to initialize metadata session',
      'session',
      undefined,
      originalError
    );
  }
}

/**
 * Error for provider operations that exceed their timeout
 */
export class TimeoutError extends InsightsError {
  public readonly operationType: string;
  public readonly timeoutMs: number;

  constructor(
    message: string,
    operationType = 'unknown',
    timeoutMs = 0
  ) {
    super(message, 'OPERATION_TIMEOUT', true);
    this.operationType = operationType;
    this.timeoutMs = timeoutMs;
  }

  static queryTimeout(timeoutMs: number): TimeoutError {
    return new TimeoutError(
      `Metadata query timeout after ${timeoutMs}ms`,
      'query',
      timeoutMs
    );
  }
}

/**
 * Error for configuration and input validation issues
 */
export class ConfigurationError extends InsightsError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'CONFIGURATION_ERROR', true);
    this.field = field;
  }

  static missingRequired(field: string): ConfigurationError {
    return new ConfigurationError(
      `Required configuration field missing: ${field}`,
      field
    );
  }

  static invalidValue(field: string, expected: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid value for ${field}: expected ${expected}`,
      field
    );
  }
}

// ==============================================
// Error Utilities
// ==============================================

/**
 * Utility class for error handling and sanitization
 */
export class ErrorHandler {
  /**
   * Map any error onto the Insights error hierarchy
   */
  static sanitize(error: unknown): InsightsError {
    if (error instanceof InsightsError) {
      return error;
    }

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (message.includes('timeout') || message.includes('timed out')) {
        return new TimeoutError('Operation timeout - request took too long');
      }

      if (message.includes('config')) {
        return new ConfigurationError('Invalid configuration');
      }

      return new ProviderError('Metadata operation failed', 'session', undefined, error);
    }

    return new ProviderError('Unknown error occurred');
  }

  /**
   * Check if error should be logged with full details (for debugging)
   */
  static shouldLogDetails(error: InsightsError): boolean {
    return !error.sanitized || (
      process.env.NODE_ENV === 'development' &&
      !(error instanceof SecurityError)
    );
  }

  /**
   * Get user-safe error message
   */
  static getUserMessage(error: unknown): string {
    return this.sanitize(error).message;
  }

  /**
   * Get error code for reports and exit status
   */
  static getErrorCode(error: unknown): string {
    return this.sanitize(error).code;
  }
}

// ==============================================
// Error Factory Functions
// ==============================================

/**
 * Create standardized error instances
 */
export const createError = {
  security: {
    unsafeLocation: (location: string) => SecurityError.unsafeLocation(location),
  },

  provider: {
    fetchFailed: (kind: FetchKind, location: string, cause?: Error) =>
      ProviderError.fetchFailed(kind, location, cause),
    sessionFailed: (cause?: Error) => ProviderError.sessionFailed(cause),
  },

  timeout: {
    query: (timeoutMs: number) => TimeoutError.queryTimeout(timeoutMs),
  },

  config: {
    missingRequired: (field: string) => ConfigurationError.missingRequired(field),
    invalidValue: (field: string, expected: string) =>
      ConfigurationError.invalidValue(field, expected),
  },
};
