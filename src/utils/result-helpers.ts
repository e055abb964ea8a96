/**
 * Result Type Helpers
 *
 * Explicit Result values for operations whose failure is an expected
 * outcome (a directory name outside the convention, one unreadable repo in
 * a cache-wide walk) rather than a fault for the whole call.
 *
 * Usage:
 * ```typescript
 * const parsed = parseRepoDirName(entry.name);
 * if (parsed.err) {
 *   // Not a repository; skip it
 * } else {
 *   const identity = parsed.val;
 * }
 * ```
 */

import { Result, Ok, Err } from 'ts-results';

/**
 * Helper to unwrap Result or throw
 *
 * Use when the caller named the input explicitly and a failure is fatal.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.ok) {
    return result.val;
  }
  throw result.val;
}

// Re-export Result types for convenience
export { Result, Ok, Err };
