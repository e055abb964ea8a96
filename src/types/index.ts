/**
 * Main type exports for hub-cache-verify
 */

export * from './cache.js';
export * from './checks.js';
export * from './comparison.js';
