/**
 * Iceberg Insights validation layer
 *
 * Zod schemas for table locations and configuration, with structured
 * error handling.
 *
 * @license MIT
 */

export * from './schemas.js';
export * from './runtime-validator.js';

export type {
  ValidationError,
  ValidationResult
} from './runtime-validator.js';
