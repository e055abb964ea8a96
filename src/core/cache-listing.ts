/**
 * Cache Listing
 *
 * Per-repository summary of a hub directory: kind, id, short commit of
 * refs/main, completed blob count and total blob size.
 *
 * @module core/cache-listing
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { isNotFound, toInspectionError } from '../api/errors.js';
import { compareCodeUnits } from '../utils/ordering.js';
import { classifyEntry, readDirSorted, walkTree } from './tree-walker.js';
import {
  BLOBS_DIR_NAME,
  HUB_DIR_NAME,
  REFS_DIR_NAME,
  isIncompleteBlobName,
  parseRepoDirName,
  repoIdOf,
} from './path-scheme.js';
import type { CacheListEntry, CacheListOptions } from '../types/cache.js';

/** Characters of the commit shown in listings */
export const SHORT_COMMIT_LENGTH = 7;

export function shortCommit(commit: string): string {
  return commit.length > SHORT_COMMIT_LENGTH ? commit.slice(0, SHORT_COMMIT_LENGTH) : commit;
}

/**
 * List every repository under the hub directory.
 *
 * Name order is by `owner/name`; size order is largest first with ties
 * broken by name.
 *
 * @throws {CacheInspectionError} AccessFault when hub/ exists but cannot be read
 */
export async function listCachedRepos(
  cacheRoot: string,
  options: CacheListOptions & { logger?: Logger } = {}
): Promise<CacheListEntry[]> {
  const hubDir = options.hubDir ?? path.join(cacheRoot, HUB_DIR_NAME);
  const entries = await readDirSorted(hubDir);
  if (entries === null) {
    options.logger?.debug({ hubDir }, 'No hub directory to list');
    return [];
  }

  const rows: CacheListEntry[] = [];
  for (const entry of entries) {
    const repoDir = path.join(hubDir, entry.name);
    if ((await classifyEntry(entry, repoDir)) !== 'directory') continue;

    const identity = parseRepoDirName(entry.name);
    if (identity.err) continue;
    if (options.kind !== undefined && identity.val.kind !== options.kind) continue;

    const { files, bytes } = await sumBlobs(path.join(repoDir, BLOBS_DIR_NAME));
    const commit = await readRef(path.join(repoDir, REFS_DIR_NAME, 'main'));

    rows.push({
      kind: identity.val.kind,
      repo_id: repoIdOf(identity.val),
      commit: shortCommit(commit),
      files,
      size_bytes: bytes,
      path: repoDir,
    });
  }

  const byName = (a: CacheListEntry, b: CacheListEntry): number => compareCodeUnits(a.repo_id, b.repo_id);
  return options.sort === 'size'
    ? rows.sort((a, b) => b.size_bytes - a.size_bytes || byName(a, b))
    : rows.sort(byName);
}

/**
 * Count and size completed blobs (partial downloads excluded).
 */
async function sumBlobs(blobsDir: string): Promise<{ files: number; bytes: number }> {
  let files = 0;
  let bytes = 0;

  for await (const entry of walkTree(blobsDir)) {
    if (entry.kind !== 'file' || isIncompleteBlobName(path.basename(entry.path))) continue;
    try {
      const stats = await fs.stat(entry.path);
      files++;
      bytes += stats.size;
    } catch (error) {
      if (!isNotFound(error)) {
        throw toInspectionError(error, entry.path);
      }
    }
  }

  return { files, bytes };
}

async function readRef(refPath: string): Promise<string> {
  try {
    return (await fs.readFile(refPath, 'utf8')).trim();
  } catch (error) {
    if (isNotFound(error)) {
      return '';
    }
    throw toInspectionError(error, refPath);
  }
}
