/**
 * Path Scheme
 *
 * Pure mapping between repository identity and on-disk cache locations.
 * No filesystem access happens here.
 *
 * Layout:
 * ```
 * <cache-root>/hub/<kind>s--<owner>--<name>/
 *     refs/<ref-name>
 *     blobs/<content-key>
 *     snapshots/<commit>/<file...>   -> ../../blobs/<content-key>
 * <cache-root>/<kind>s/<owner>/<name>/<file...>
 * ```
 *
 * `parseRepoDirName` is the discovery contract used by the cache inspector:
 * it reverses `repoDirName` for every identifier whose owner does not itself
 * contain `--`.
 *
 * @module core/path-scheme
 */

import { join, posix } from 'node:path';
import { CacheInspectionError } from '../api/errors.js';
import { Ok, Err, unwrap, type Result } from '../utils/result-helpers.js';
import type { RepoIdentity, RepoKind } from '../types/cache.js';

/** Separator between kind, owner and name in hub directory names */
export const REPO_DIR_SEPARATOR = '--';

/** Content-addressed namespace under the cache root */
export const HUB_DIR_NAME = 'hub';

export const REFS_DIR_NAME = 'refs';
export const BLOBS_DIR_NAME = 'blobs';
export const SNAPSHOTS_DIR_NAME = 'snapshots';

/** Suffix of a partially downloaded blob */
export const INCOMPLETE_SUFFIX = '.incomplete';

/** Suffix of the metadata written beside a partial blob */
export const INCOMPLETE_META_SUFFIX = '.incomplete.meta';

/**
 * Namespace (hub prefix and friendly directory) for each kind
 */
export const KIND_NAMESPACES: Readonly<Record<RepoKind, string>> = {
  model: 'models',
  dataset: 'datasets',
};

export const REPO_KINDS: readonly RepoKind[] = ['model', 'dataset'];

/**
 * Reject owner/name parts that would escape or restructure the layout.
 */
function validatePart(part: string, label: string, input: string): Result<string, CacheInspectionError> {
  if (part.length === 0) {
    return Err(malformed(`${label} is empty`, input));
  }
  if (part === '.' || part === '..') {
    return Err(malformed(`${label} "${part}" is a relative path segment`, input));
  }
  if (part.includes('\\') || part.includes('\0')) {
    return Err(malformed(`${label} contains an illegal character`, input));
  }
  return Ok(part);
}

function malformed(reason: string, input: string): CacheInspectionError {
  return new CacheInspectionError(
    'MalformedIdentifier',
    `Invalid repository identifier "${input}": ${reason} (expected owner/name)`,
    { details: { input } }
  );
}

/**
 * Parse an `owner/name` repository id.
 */
export function tryParseRepoId(repoId: string): Result<{ owner: string; name: string }, CacheInspectionError> {
  const parts = repoId.split('/');
  if (parts.length !== 2) {
    return Err(malformed(`found ${parts.length - 1} "/" separators`, repoId));
  }
  const [owner = '', name = ''] = parts;

  const ownerResult = validatePart(owner, 'owner', repoId);
  if (ownerResult.err) return ownerResult;
  const nameResult = validatePart(name, 'name', repoId);
  if (nameResult.err) return nameResult;

  return Ok({ owner, name });
}

/**
 * Parse an `owner/name` repository id.
 *
 * @throws {CacheInspectionError} MalformedIdentifier
 */
export function parseRepoId(repoId: string): { owner: string; name: string } {
  return unwrap(tryParseRepoId(repoId));
}

/**
 * Hub directory name for a repository, e.g. `models--owner--name`.
 *
 * @throws {CacheInspectionError} MalformedIdentifier
 */
export function repoDirName(kind: RepoKind, owner: string, name: string): string {
  const input = `${owner}/${name}`;
  for (const [part, label] of [
    [owner, 'owner'],
    [name, 'name'],
  ] as const) {
    const checked = validatePart(part, label, input);
    if (checked.err) throw checked.val;
    if (part.includes('/')) {
      throw malformed(`${label} contains "/"`, input);
    }
  }
  if (owner.includes(REPO_DIR_SEPARATOR)) {
    throw malformed(`owner contains "${REPO_DIR_SEPARATOR}"`, input);
  }
  return [KIND_NAMESPACES[kind], owner, name].join(REPO_DIR_SEPARATOR);
}

/**
 * Hub directory name for an `owner/name` id.
 *
 * @throws {CacheInspectionError} MalformedIdentifier
 */
export function repoDirNameForId(kind: RepoKind, repoId: string): string {
  const { owner, name } = parseRepoId(repoId);
  return repoDirName(kind, owner, name);
}

/**
 * Recover repository identity from a hub directory name.
 *
 * The remainder after the kind prefix is split on the first `--`, so names
 * may contain `--` but owners may not.
 */
export function parseRepoDirName(dirName: string): Result<RepoIdentity, CacheInspectionError> {
  for (const kind of REPO_KINDS) {
    const prefix = KIND_NAMESPACES[kind] + REPO_DIR_SEPARATOR;
    if (!dirName.startsWith(prefix)) continue;

    const rest = dirName.slice(prefix.length);
    const split = rest.indexOf(REPO_DIR_SEPARATOR);
    const owner = split === -1 ? '' : rest.slice(0, split);
    const name = split === -1 ? '' : rest.slice(split + REPO_DIR_SEPARATOR.length);

    if (owner.length === 0 || name.length === 0 || owner.includes('/') || name.includes('/')) {
      break;
    }
    return Ok({ kind, owner, name });
  }

  return Err(
    new CacheInspectionError(
      'NotARepo',
      `"${dirName}" does not follow the <models|datasets>--<owner>--<name> convention`,
      { details: { dirName } }
    )
  );
}

/**
 * `owner/name` form of an identity
 */
export function repoIdOf(identity: Pick<RepoIdentity, 'owner' | 'name'>): string {
  return `${identity.owner}/${identity.name}`;
}

/**
 * Location builder for one cache root.
 *
 * @example
 * ```typescript
 * const scheme = new PathScheme('/data/hf');
 * scheme.refPath({ kind: 'model', owner: 'acme', name: 'tiny' }, 'main');
 * // => /data/hf/hub/models--acme--tiny/refs/main
 * ```
 */
export class PathScheme {
  readonly cacheRoot: string;
  readonly hubDir: string;

  constructor(cacheRoot: string, hubDir?: string) {
    this.cacheRoot = cacheRoot;
    this.hubDir = hubDir ?? join(cacheRoot, HUB_DIR_NAME);
  }

  repoDir(repo: RepoIdentity): string {
    return join(this.hubDir, repoDirName(repo.kind, repo.owner, repo.name));
  }

  refsDir(repo: RepoIdentity): string {
    return join(this.repoDir(repo), REFS_DIR_NAME);
  }

  refPath(repo: RepoIdentity, ref: string): string {
    return join(this.refsDir(repo), ref);
  }

  blobsDir(repo: RepoIdentity): string {
    return join(this.repoDir(repo), BLOBS_DIR_NAME);
  }

  blobPath(repo: RepoIdentity, contentKey: string): string {
    return join(this.blobsDir(repo), contentKey);
  }

  incompleteBlobPath(repo: RepoIdentity, contentKey: string): string {
    return join(this.blobsDir(repo), contentKey + INCOMPLETE_SUFFIX);
  }

  snapshotsDir(repo: RepoIdentity): string {
    return join(this.repoDir(repo), SNAPSHOTS_DIR_NAME);
  }

  snapshotDir(repo: RepoIdentity, commit: string): string {
    return join(this.snapshotsDir(repo), commit);
  }

  snapshotFilePath(repo: RepoIdentity, commit: string, filePath: string): string {
    return join(this.snapshotDir(repo, commit), filePath);
  }

  friendlyDir(repo: RepoIdentity): string {
    return join(this.cacheRoot, KIND_NAMESPACES[repo.kind], repo.owner, repo.name);
  }

  friendlyFilePath(repo: RepoIdentity, filePath: string): string {
    return join(this.friendlyDir(repo), filePath);
  }
}

/**
 * Relative symlink target from `snapshots/<commit>/<filePath>` to its blob.
 *
 * One `../` per directory level of `filePath`, plus two to climb out of
 * `<commit>/` and `snapshots/`.
 */
export function snapshotLinkTarget(filePath: string, contentKey: string): string {
  const depth = filePath.split('/').length;
  return posix.join('../'.repeat(depth + 1), BLOBS_DIR_NAME, contentKey);
}

/**
 * True for blob entries that are partial downloads or their metadata
 */
export function isIncompleteBlobName(entryName: string): boolean {
  return entryName.endsWith(INCOMPLETE_SUFFIX) || entryName.endsWith(INCOMPLETE_META_SUFFIX);
}
