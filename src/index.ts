export {
  CacheInspectionError,
  createAccessFault,
  toInspectionError,
  type InspectionErrorCode,
  type InspectionErrorShape,
} from './api/errors.js';

export * from './core/path-scheme.js';
export { RepoInspector, degradedFingerprint } from './core/repo-inspector.js';
export {
  CacheInspector,
  DEFAULT_INSPECTION_CONCURRENCY,
  type CacheInspectorEvents,
  type CacheInspectorOptions,
} from './core/cache-inspector.js';
export {
  DEFAULT_MAX_SYMLINK_DEPTH,
  findBrokenSymlinks,
  resolveLinkChain,
  scanLinkTree,
  type LinkTreeScan,
  type SymlinkWalkOptions,
} from './core/symlink-resolver.js';
export {
  DEFAULT_REF,
  InvariantChecker,
  checkFingerprint,
  countFailures,
  isCommitHash,
  targetSnapshotCommit,
  type InvariantCheckerOptions,
} from './core/invariant-checker.js';
export {
  CrossImplementationComparator,
  matchRepo,
  type ComparatorOptions,
} from './core/comparator.js';
export { matchesRepo } from './core/repo-matching.js';
export { listCachedRepos, shortCommit } from './core/cache-listing.js';

export {
  initializeConfig,
  getConfig,
  resetConfig,
  loadConfig,
  validateConfig,
  resolveCacheLocation,
  type CacheLocation,
} from './config/loader.js';
export { createLogger } from './utils/logger-helpers.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
