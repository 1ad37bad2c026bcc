/**
 * Tests for the error hierarchy and message sanitization
 *
 * @license MIT
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  createError,
  ErrorHandler,
  InsightsError,
  ProviderError,
  SecurityError,
  TimeoutError,
} from '../../src/errors/index.js';

describe('ProviderError', () => {
  it('should hide provider details behind category messages', () => {
    const cases: Array<[string, string]> = [
      ['IO Error: No such file or directory: /warehouse/t/metadata', 'Table metadata not found - check the table location'],
      ['HTTP 404 Not Found', 'Table metadata not found - check the table location'],
      ['HTTP 403 Forbidden', 'Access denied - check credentials and bucket permissions'],
      ['No credentials found for s3://bucket', 'Access denied - check credentials and bucket permissions'],
      ['Permission denied', 'Access denied - check credentials and bucket permissions'],
      ['connection timed out', 'Metadata fetch timeout - location may be unreachable'],
      ['JSON parse error at offset 12', 'Malformed table metadata'],
      ['extension "iceberg" failed to install', 'Metadata engine extension could not be loaded'],
    ];

    for (const [detail, expected] of cases) {
      expect(ProviderError.fetchFailed('snapshots', 's3://b/t', new Error(detail)).message).toBe(expected);
    }
  });

  it('should keep the message when nothing matches', () => {
    const error = ProviderError.fetchFailed('manifests', 's3://b/t', new Error('HTTP 500'));

    expect(error.message).toBe('Failed to fetch manifests');
    expect(error.code).toBe('PROVIDER_FETCH_FAILED');
    expect(error.fetchKind).toBe('manifests');
    expect(error.location).toBe('s3://b/t');
  });

  it('should default to the session kind', () => {
    const error = ProviderError.sessionFailed();

    expect(error.message).toBe('Failed to initialize metadata session');
    expect(error.fetchKind).toBe('session');
    expect(error.location).toBeUndefined();
  });
});

describe('InsightsError', () => {
  it('should serialize to JSON without internals', () => {
    const error = SecurityError.unsafeLocation("s3://b/t'");
    const json = JSON.parse(JSON.stringify(error));

    expect(error).toBeInstanceOf(InsightsError);
    expect(json).toEqual({
      name: 'SecurityError',
      message: 'Invalid table location: contains unsafe characters',
      code: 'SECURITY_VIOLATION',
      timestamp: error.timestamp.toISOString(),
      sanitized: true,
    });
    expect(error.attemptedAction).toBe('unsafe_location:9');
  });

  it('should describe timeouts and configuration problems', () => {
    const timeout = TimeoutError.queryTimeout(2500);
    expect(timeout.message).toBe('Metadata query timeout after 2500ms');
    expect(timeout.code).toBe('OPERATION_TIMEOUT');
    expect(timeout.timeoutMs).toBe(2500);

    const invalid = ConfigurationError.invalidValue('queryTimeoutMs', 'a positive integer');
    expect(invalid.message).toBe('Invalid value for queryTimeoutMs: expected a positive integer');
    expect(invalid.field).toBe('queryTimeoutMs');

    expect(ConfigurationError.missingRequired('location').message)
      .toBe('Required configuration field missing: location');
  });
});

describe('ErrorHandler', () => {
  it('should return insights errors unchanged', () => {
    const error = TimeoutError.queryTimeout(100);
    expect(ErrorHandler.sanitize(error)).toBe(error);
  });

  it('should classify plain errors', () => {
    const timeout = ErrorHandler.sanitize(new Error('request timed out'));
    expect(timeout).toBeInstanceOf(TimeoutError);
    expect(timeout.message).toBe('Operation timeout - request took too long');

    const config = ErrorHandler.sanitize(new Error('bad config value'));
    expect(config).toBeInstanceOf(ConfigurationError);
    expect(config.message).toBe('Invalid configuration');

    const other = ErrorHandler.sanitize(new Error('boom'));
    expect(other).toBeInstanceOf(ProviderError);
    expect(other.message).toBe('Metadata operation failed');
  });

  it('should sanitize the cause of a plain error', () => {
    expect(ErrorHandler.getUserMessage(new Error('HTTP 403 Forbidden')))
      .toBe('Access denied - check credentials and bucket permissions');
  });

  it('should handle thrown non-errors', () => {
    expect(ErrorHandler.getUserMessage('oops')).toBe('Unknown error occurred');
    expect(ErrorHandler.getErrorCode(undefined)).toBe('PROVIDER_FETCH_FAILED');
  });

  it('should withhold details of sanitized errors outside development', () => {
    expect(ErrorHandler.shouldLogDetails(TimeoutError.queryTimeout(1))).toBe(false);
  });
});

describe('createError', () => {
  it('should build the same errors as the static factories', () => {
    expect(createError.provider.fetchFailed('schema', 's3://b/t').message).toBe('Failed to fetch schema');
    expect(createError.timeout.query(10)).toBeInstanceOf(TimeoutError);
    expect(createError.security.unsafeLocation('x;')).toBeInstanceOf(SecurityError);
    expect(createError.config.missingRequired('location').field).toBe('location');
  });
});
