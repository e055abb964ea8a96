/**
 * Default Configuration Constants
 *
 * Fallbacks used when no runtime.yaml value or option is supplied.
 */

/**
 * Inspection Configuration
 */
export const INSPECTION = {
  /** Ref checked by RefPresent / RefIsCommit */
  DEFAULT_REF: 'main',

  /** Repository subtrees walked at once */
  CONCURRENCY: 8,

  /** Longest symlink chain followed before a link counts as broken */
  MAX_SYMLINK_DEPTH: 16,

  /** Deadline for a whole cache walk (ms) */
  TIMEOUT_MS: 120_000, // 2 minutes
} as const;

/**
 * Cache Location Configuration
 */
export const CACHE_LOCATION = {
  /** Cache root override */
  HOME_ENV: 'HF_HOME',

  /** Hub directory override */
  HUB_CACHE_ENV: 'HF_HUB_CACHE',

  /** Cache root below the home directory when nothing else is set */
  DEFAULT_HOME_SUBDIR: ['.cache', 'huggingface'],
} as const;
