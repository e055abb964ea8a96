/**
 * Repository Inspector
 *
 * Walks one `hub/<kind>s--<owner>--<name>` subtree and reduces it to a
 * RepoFingerprint. Read-only: nothing under the repository is created,
 * modified or followed.
 *
 * Walk rules:
 * - refs/ is read recursively; nested ref names are joined with `/`
 * - blobs/ is counted, not read
 * - snapshots/<commit>/ trees are walked with an explicit stack, classifying
 *   entries without following symlinks
 *
 * @module core/repo-inspector
 */

import * as fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import {
  CacheInspectionError,
  isNotFound,
  toInspectionError,
} from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { checkAborted } from '../utils/timer-guard.js';
import { compareCodeUnits, sortByKey } from '../utils/ordering.js';
import { classifyEntry, readDirSorted, walkTree } from './tree-walker.js';
import {
  BLOBS_DIR_NAME,
  REFS_DIR_NAME,
  SNAPSHOTS_DIR_NAME,
  parseRepoDirName,
} from './path-scheme.js';
import type {
  RepoFingerprint,
  RepoInspectOptions,
  SnapshotFingerprint,
} from '../types/cache.js';

/**
 * Placeholder for a repository whose subtree could not be read.
 */
export function degradedFingerprint(name: string): RepoFingerprint {
  return {
    name,
    has_refs: false,
    refs: {},
    has_blobs: false,
    blob_count: 0,
    has_snapshots: false,
    snapshots: [],
    degraded: true,
  };
}

/**
 * Reads a single repository subtree into a RepoFingerprint.
 */
export class RepoInspector {
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Inspect one repository directory.
   *
   * @param repoDir - Path to `hub/<kind>s--<owner>--<name>`
   * @throws {CacheInspectionError} NotARepo when the directory name is outside
   *   the convention, AccessFault when the repository cannot be read, Timeout
   *   when the signal aborts
   */
  public async inspect(repoDir: string, options: RepoInspectOptions = {}): Promise<RepoFingerprint> {
    const { signal } = options;
    const name = path.basename(path.resolve(repoDir));

    const identity = parseRepoDirName(name);
    if (identity.err) {
      throw new CacheInspectionError('NotARepo', identity.val.message, {
        path: repoDir,
        details: { dirName: name },
      });
    }

    try {
      checkAborted(signal);
      const stats = await fs.stat(repoDir);
      if (!stats.isDirectory()) {
        throw new CacheInspectionError('AccessFault', `${repoDir} is not a directory`, {
          path: repoDir,
        });
      }

      const refs = await this.readRefs(path.join(repoDir, REFS_DIR_NAME), signal);
      const blobCount = await this.countEntries(path.join(repoDir, BLOBS_DIR_NAME), signal);
      const snapshots = await this.readSnapshots(path.join(repoDir, SNAPSHOTS_DIR_NAME), signal);

      const fingerprint: RepoFingerprint = {
        name,
        has_refs: refs !== null,
        refs: refs ?? {},
        has_blobs: blobCount !== null,
        blob_count: blobCount ?? 0,
        has_snapshots: snapshots !== null,
        snapshots: snapshots ?? [],
        degraded: false,
      };

      this.logger?.debug(
        {
          repo: name,
          refs: Object.keys(fingerprint.refs).length,
          blobs: fingerprint.blob_count,
          snapshots: fingerprint.snapshots.length,
        },
        'Inspected repository'
      );

      return fingerprint;
    } catch (error) {
      throw toInspectionError(error, repoDir);
    }
  }

  /**
   * Map of ref name to trimmed content, keys sorted. Null when refs/ is absent.
   */
  private async readRefs(
    refsDir: string,
    signal: AbortSignal | undefined
  ): Promise<Record<string, string> | null> {
    const rootEntries = await readDirSorted(refsDir, signal);
    if (rootEntries === null) {
      return null;
    }

    const refs: Array<[string, string]> = [];
    const stack: Array<{ dir: string; prefix: string; entries: Dirent[] }> = [
      { dir: refsDir, prefix: '', entries: rootEntries },
    ];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;

      for (const entry of frame.entries) {
        const entryPath = path.join(frame.dir, entry.name);
        const refName = frame.prefix ? `${frame.prefix}/${entry.name}` : entry.name;
        const kind = await classifyEntry(entry, entryPath, signal);

        if (kind === 'directory') {
          const children = await readDirSorted(entryPath, signal);
          if (children !== null) {
            stack.push({ dir: entryPath, prefix: refName, entries: children });
          }
        } else if (kind === 'file' || (kind === 'symlink' && (await this.linksToFile(entryPath, signal)))) {
          const content = await this.readTextOrNull(entryPath, signal);
          if (content !== null) {
            refs.push([refName, content.trim()]);
          }
        }
      }
    }

    return Object.fromEntries(sortByKey(refs, ([refName]) => refName));
  }

  /**
   * Number of entries in a directory, or null when it is absent.
   */
  private async countEntries(dir: string, signal: AbortSignal | undefined): Promise<number | null> {
    const entries = await readDirSorted(dir, signal);
    return entries === null ? null : entries.length;
  }

  /**
   * Fingerprint every immediate subdirectory of snapshots/.
   */
  private async readSnapshots(
    snapshotsDir: string,
    signal: AbortSignal | undefined
  ): Promise<SnapshotFingerprint[] | null> {
    const entries = await readDirSorted(snapshotsDir, signal);
    if (entries === null) {
      return null;
    }

    const snapshots: SnapshotFingerprint[] = [];
    for (const entry of entries) {
      const commitDir = path.join(snapshotsDir, entry.name);
      if ((await classifyEntry(entry, commitDir, signal)) !== 'directory') {
        continue;
      }
      snapshots.push(await this.walkSnapshot(entry.name, commitDir, signal));
    }

    return snapshots.sort((a, b) => compareCodeUnits(a.commit, b.commit));
  }

  /**
   * Count files and symlinks under one snapshot. Symlinks are counted as
   * leaves and never descended.
   */
  private async walkSnapshot(
    commit: string,
    commitDir: string,
    signal: AbortSignal | undefined
  ): Promise<SnapshotFingerprint> {
    let fileCount = 0;
    let symlinkCount = 0;
    let directories = 0;

    for await (const entry of walkTree(commitDir, signal)) {
      switch (entry.kind) {
        case 'symlink':
          fileCount++;
          symlinkCount++;
          break;
        case 'file':
          fileCount++;
          break;
        case 'directory':
          directories++;
          break;
        case 'other':
          break;
      }
    }

    lazyLog(
      this.logger,
      'trace',
      () => ({ commit, directories, files: fileCount, symlinks: symlinkCount }),
      'Walked snapshot'
    );

    return { commit, file_count: fileCount, symlink_count: symlinkCount };
  }

  /**
   * True when a link's target is a regular file. Dangling links and links
   * to directories are not refs.
   */
  private async linksToFile(link: string, signal: AbortSignal | undefined): Promise<boolean> {
    checkAborted(signal);
    try {
      return (await fs.stat(link)).isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw toInspectionError(error, link);
    }
  }

  private async readTextOrNull(file: string, signal: AbortSignal | undefined): Promise<string | null> {
    checkAborted(signal);
    try {
      return await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw toInspectionError(error, file);
    }
  }
}
