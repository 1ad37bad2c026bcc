/**
 * Runtime validation utilities for Iceberg Insights Core
 *
 * Structured error handling around the Zod schemas.
 *
 * @license MIT
 */

import { z } from 'zod';
import { schemas } from './schemas.js';
import { ConfigurationError, SecurityError } from '../errors/index.js';

// ==============================================
// Error Types
// ==============================================

/**
 * Structured validation error with path information
 */
export interface ValidationError {
  field: string;
  code: string;
  message: string;
}

/**
 * Result type for validation operations
 */
export type ValidationResult<T> = {
  success: true;
  data: T;
} | {
  success: false;
  errors: ValidationError[];
};

/**
 * Format Zod errors into structured validation errors
 */
export function formatZodErrors(zodError: z.ZodError): ValidationError[] {
  return zodError.issues.map((issue) => ({
    field: issue.path.join('.') || 'root',
    code: issue.code,
    message: issue.message,
  }));
}

/**
 * Validate a value against a schema without throwing
 */
export function validate<T extends z.ZodTypeAny>(schema: T, value: unknown): ValidationResult<z.output<T>> {
  const result = schema.safeParse(value);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodErrors(result.error) };
}

// ==============================================
// Validation Functions
// ==============================================

/**
 * Validate and normalize an Iceberg table location
 *
 * @returns the trimmed location
 * @throws SecurityError when the location would escape the metadata query
 * @throws ConfigurationError for any other invalid location
 */
export function validateTableLocation(location: unknown): string {
  const result = schemas.tableLocation.safeParse(location);

  if (result.success) {
    return result.data;
  }

  const unsafe = result.error.issues.some(
    (issue) => issue.code === z.ZodIssueCode.custom && issue.params?.unsafe === true
  );

  if (unsafe && typeof location === 'string') {
    throw SecurityError.unsafeLocation(location);
  }

  throw new ConfigurationError(result.error.issues[0]?.message ?? 'Invalid table location', 'location');
}

/**
 * Boolean variant of validateTableLocation
 */
export function isValidTableLocation(location: unknown): boolean {
  return schemas.tableLocation.safeParse(location).success;
}
