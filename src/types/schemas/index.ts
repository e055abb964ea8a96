/**
 * Zod schema exports
 *
 * @example
 * ```typescript
 * import { CacheFingerprintSchema } from 'hub-cache-verify';
 *
 * const result = CacheFingerprintSchema.safeParse(JSON.parse(raw));
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Config schemas
export * from './config.js';

// Fingerprint wire format
export * from './fingerprint.js';
