/**
 * Hub Cache Types
 *
 * Type definitions for the on-disk hub cache layout and the structural
 * fingerprints extracted from it.
 *
 * Cache Structure:
 * ```
 * <cache-root>/
 * ├── hub/
 * │   └── models--<owner>--<name>/
 * │       ├── refs/main                 (trimmed content = commit hash)
 * │       ├── blobs/<content-key>
 * │       └── snapshots/<commit>/...    (leaves are symlinks into ../../blobs/)
 * ├── models/<owner>/<name>/...         (friendly alias symlinks)
 * └── datasets/<owner>/<name>/...
 * ```
 *
 * Fingerprint fields use snake_case: they are the JSON wire format shared
 * with fingerprints written by other implementations.
 *
 * @module types/cache
 */

/**
 * Repository kind. Determines the hub directory prefix and the friendly
 * alias namespace.
 */
export type RepoKind = 'model' | 'dataset';

/**
 * Identity of a repository, recovered from or mapped to a hub directory name
 */
export interface RepoIdentity {
  kind: RepoKind;
  owner: string;
  name: string;
}

/**
 * Per-snapshot counts
 */
export interface SnapshotFingerprint {
  /** Snapshot directory name, taken verbatim as the commit id */
  readonly commit: string;

  /** Regular files plus symlinks anywhere under the snapshot */
  readonly file_count: number;

  /** Symlinks only */
  readonly symlink_count: number;
}

/**
 * Structural summary of one hub repository at a point in time.
 *
 * Never mutated after construction.
 */
export interface RepoFingerprint {
  /** Hub directory name, e.g. `models--owner--name` */
  readonly name: string;

  readonly has_refs: boolean;

  /** Ref name (nested refs joined with `/`) to trimmed file content */
  readonly refs: Readonly<Record<string, string>>;

  readonly has_blobs: boolean;

  /** Number of entries in blobs/, partial downloads included */
  readonly blob_count: number;

  readonly has_snapshots: boolean;

  /** Sorted by commit */
  readonly snapshots: readonly SnapshotFingerprint[];

  /** True when the subtree could not be read and every flag was forced false */
  readonly degraded: boolean;
}

/**
 * Friendly alias directory, joined to its hub repository by directory name
 */
export interface FriendlyAliasEntry {
  readonly kind: RepoKind;
  readonly owner: string;
  readonly name: string;

  /** Hub directory name this alias belongs to (join key into hub_repos) */
  readonly repo_dir_name: string;
}

/**
 * Structural summary of a whole cache root
 */
export interface CacheFingerprint {
  /** Sorted by name */
  readonly hub_repos: readonly RepoFingerprint[];

  /** `owner/name` of every friendly alias directory, sorted and unique */
  readonly friendly_repo_ids: readonly string[];

  /** Kind-qualified alias records, sorted by kind then id */
  readonly friendly_aliases: readonly FriendlyAliasEntry[];

  /** False when the walk deadline cut inspection short */
  readonly complete: boolean;
}

/**
 * Options for a single repository walk
 */
export interface RepoInspectOptions {
  /** Aborts the walk between filesystem operations */
  signal?: AbortSignal;
}

/**
 * Options for a cache-wide walk
 */
export interface CacheInspectOptions {
  /** Deadline for the whole walk in milliseconds */
  timeoutMs?: number;

  /** Overrides `<cacheRoot>/hub` */
  hubDir?: string;
}

/**
 * One row of a cache listing
 */
export interface CacheListEntry {
  kind: RepoKind;

  /** `owner/name` */
  repo_id: string;

  /** First 7 characters of refs/main, empty when absent */
  commit: string;

  /** Completed blob files */
  files: number;

  /** Total size of completed blobs */
  size_bytes: number;

  path: string;
}

/**
 * Options for cache listing
 */
export interface CacheListOptions {
  kind?: RepoKind;
  sort?: 'name' | 'size';
  hubDir?: string;
}
