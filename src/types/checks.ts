/**
 * Invariant Check Types
 *
 * Structural violations are values, never exceptions: every check yields a
 * result and the checker reports all of them in one pass.
 *
 * @module types/checks
 */

import type { RepoFingerprint, FriendlyAliasEntry } from './cache.js';

/**
 * Core predicates plus the supplementary hygiene checks
 */
export type CheckName =
  | 'RefPresent'
  | 'RefIsCommit'
  | 'BlobsNonEmpty'
  | 'SnapshotsPresent'
  | 'SnapshotUsesSymlinks'
  | 'SymlinkResolves'
  | 'RefSnapshotExists'
  | 'NoIncompleteDownloads'
  | 'AliasLinksOnly'
  | 'AliasHasRepo';

export type CheckSeverity = 'error' | 'warning';

/**
 * Why a symlink chain failed to land on a file, or landed outside the
 * repository's blob store
 */
export type BrokenLinkCause = 'missing' | 'not-a-file' | 'too-deep' | 'unreadable' | 'outside-blobs';

/**
 * A dangling or otherwise unresolvable link
 */
export interface BrokenSymlink {
  /** Absolute path of the link that was queried */
  path: string;

  /** Raw target of that link as stored on disk */
  target: string;

  cause: BrokenLinkCause;
}

export type Violation =
  | { reason: 'MissingRef'; ref: string }
  | { reason: 'RefIsBranchName'; ref: string; value: string }
  | { reason: 'EmptyBlobStore' }
  | { reason: 'NoSnapshots' }
  | { reason: 'SnapshotNotSymlinked'; commit: string | null }
  | ({ reason: 'BrokenSymlink' } & BrokenSymlink)
  | { reason: 'RefSnapshotMissing'; ref: string; commit: string }
  | { reason: 'IncompleteDownload'; path: string }
  | { reason: 'RegularFileInAlias'; path: string }
  | { reason: 'AliasWithoutRepo'; aliasId: string; repoDirName: string };

export interface CheckResult {
  check: CheckName;
  passed: boolean;
  severity: CheckSeverity;

  /** Empty when passed */
  violations: Violation[];
}

/**
 * Options shared by the fingerprint and live checks
 */
export interface CheckOptions {
  /** Ref checked by RefPresent / RefIsCommit (default: main) */
  ref?: string;

  /** Commit inspected by SnapshotUsesSymlinks; defaults to the ref target */
  snapshot?: string;

  /** Longest symlink chain followed (default: 16) */
  maxSymlinkDepth?: number;
}

/**
 * All results for one hub repository
 */
export interface RepoVerification {
  repo: string;
  path: string;
  fingerprint: RepoFingerprint;
  results: CheckResult[];
}

/**
 * All results for one friendly alias directory
 */
export interface AliasVerification {
  alias: FriendlyAliasEntry;
  path: string;
  results: CheckResult[];
}

export interface VerificationReport {
  cacheRoot: string;
  repos: RepoVerification[];
  aliases: AliasVerification[];

  /** False when the walk deadline cut inspection short */
  complete: boolean;

  errorCount: number;
  warningCount: number;
}

export interface VerifyCacheOptions extends CheckOptions {
  /** Only repos matching this query (see matchesRepo) */
  repoFilter?: string;

  /** Skip the live symlink walks */
  skipLinks?: boolean;

  timeoutMs?: number;
  hubDir?: string;
}
