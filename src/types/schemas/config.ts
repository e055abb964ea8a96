/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { NonEmptyString, PositiveInteger } from './common.js';

/**
 * Cache Location Configuration
 */
export const CacheLocationConfigSchema = z.object({
  cache_dir: NonEmptyString.nullable(),
  hub_dir: NonEmptyString.nullable(),
});

/**
 * Inspection Configuration
 */
export const InspectionConfigSchema = z.object({
  timeout_ms: PositiveInteger,
  concurrency: z.number().int().min(1, 'must be >= 1').max(256, 'must be <= 256'),
  max_symlink_depth: z.number().int().min(1, 'must be >= 1').max(255, 'must be <= 255'),
  default_ref: NonEmptyString.regex(/^[^\s]+$/, 'must not contain whitespace'),
});

/**
 * Comparison Configuration
 */
export const ComparisonConfigSchema = z.object({
  match_mode: z.enum(['auto', 'exact', 'substring']),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Complete runtime configuration (after environment overrides are applied)
 */
export const RuntimeConfigSchema = z.object({
  cache: CacheLocationConfigSchema,
  inspection: InspectionConfigSchema,
  comparison: ComparisonConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
