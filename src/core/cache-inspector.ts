/**
 * Cache Inspector
 *
 * Walks a cache root: every conventionally named directory under `hub/` is
 * fingerprinted by RepoInspector, and the friendly alias namespaces are
 * enumerated two levels deep. Repositories are inspected concurrently and
 * merged into one CacheFingerprint in sorted order.
 *
 * Failure handling:
 * - unreadable cache root: fatal AccessFault
 * - missing hub/: no repositories
 * - hub/ child outside the naming convention: skipped
 * - repository that cannot be read: degraded placeholder, walk continues
 * - deadline elapsed: unfinished repositories degraded, `complete: false`
 *
 * @module core/cache-inspector
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  CacheInspectionError,
  isAbortError,
  toInspectionError,
} from '../api/errors.js';
import { DeadlineGuard, withAbort } from '../utils/timer-guard.js';
import { INSPECTION } from '../config/defaults.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { compareCodeUnits, sortByKey } from '../utils/ordering.js';
import { RepoInspector, degradedFingerprint } from './repo-inspector.js';
import { classifyEntry, readDirSorted } from './tree-walker.js';
import {
  HUB_DIR_NAME,
  KIND_NAMESPACES,
  REPO_KINDS,
  parseRepoDirName,
  repoDirName,
  repoIdOf,
} from './path-scheme.js';
import type {
  CacheFingerprint,
  CacheInspectOptions,
  FriendlyAliasEntry,
  RepoFingerprint,
  RepoKind,
} from '../types/cache.js';

/** Repositories inspected at once unless configured otherwise */
export const DEFAULT_INSPECTION_CONCURRENCY = INSPECTION.CONCURRENCY;

/**
 * Cache inspector events
 */
export interface CacheInspectorEvents {
  /** A repository was fingerprinted */
  repo: (fingerprint: RepoFingerprint) => void;

  /** A hub/ child was ignored because its name is outside the convention */
  skipped: (dirName: string, reason: string) => void;

  /** A repository could not be read and was recorded as degraded */
  degraded: (dirName: string, error: CacheInspectionError) => void;
}

export interface CacheInspectorOptions {
  repoInspector?: RepoInspector;
  concurrency?: number;
  logger?: Logger;
}

/**
 * Discovers and fingerprints every repository under a cache root.
 *
 * @example
 * ```typescript
 * const inspector = new CacheInspector({ logger });
 * inspector.on('degraded', (dirName, error) => console.warn(dirName, error.code));
 * const fingerprint = await inspector.inspect('/data/hf', { timeoutMs: 60_000 });
 * ```
 */
export class CacheInspector extends EventEmitter<CacheInspectorEvents> {
  private readonly repoInspector: RepoInspector;
  private readonly concurrency: number;
  private readonly logger?: Logger;

  constructor(options: CacheInspectorOptions = {}) {
    super();
    this.logger = options.logger;
    this.repoInspector = options.repoInspector ?? new RepoInspector(options.logger);
    this.concurrency = options.concurrency ?? DEFAULT_INSPECTION_CONCURRENCY;
  }

  /**
   * Fingerprint a whole cache root.
   *
   * @throws {CacheInspectionError} AccessFault when the cache root or hub/
   *   cannot be read
   */
  public async inspect(cacheRoot: string, options: CacheInspectOptions = {}): Promise<CacheFingerprint> {
    await assertReadableDirectory(cacheRoot);
    const hubDir = options.hubDir ?? path.join(cacheRoot, HUB_DIR_NAME);

    const deadline = new DeadlineGuard('cache-walk');
    deadline.arm(options.timeoutMs);

    try {
      const repoDirs = await this.discoverRepos(hubDir);
      const outcomes = await mapWithConcurrency(repoDirs, this.concurrency, (dirName) =>
        this.inspectOne(path.join(hubDir, dirName), dirName, deadline.signal)
      );
      const hubRepos = outcomes.map((outcome) => outcome.value);
      const timedOut = outcomes.some((outcome) => outcome.timedOut);

      const aliases = await this.discoverAliases(cacheRoot, deadline.signal);
      const complete = !timedOut && aliases.complete;

      const fingerprint: CacheFingerprint = {
        hub_repos: hubRepos,
        friendly_repo_ids: [...new Set(aliases.entries.map(repoIdOf))].sort(compareCodeUnits),
        friendly_aliases: sortByKey(aliases.entries, (entry) => `${entry.kind}\0${repoIdOf(entry)}`),
        complete,
      };

      this.logger?.info(
        {
          cacheRoot,
          repos: hubRepos.length,
          degraded: hubRepos.filter((repo) => repo.degraded).length,
          aliases: aliases.entries.length,
          complete,
        },
        'Cache inspection finished'
      );

      return fingerprint;
    } finally {
      deadline.clear();
    }
  }

  /**
   * Sorted names of hub/ children that are repositories.
   */
  private async discoverRepos(hubDir: string): Promise<string[]> {
    const entries = await readDirSorted(hubDir);
    if (entries === null) {
      this.logger?.debug({ hubDir }, 'No hub directory');
      return [];
    }

    const repoDirs: string[] = [];
    for (const entry of entries) {
      const kind = await classifyEntry(entry, path.join(hubDir, entry.name));
      if (kind !== 'directory') {
        continue;
      }

      const parsed = parseRepoDirName(entry.name);
      if (parsed.err) {
        this.logger?.debug({ dirName: entry.name }, 'Skipping non-repository directory');
        this.emit('skipped', entry.name, parsed.val.message);
        continue;
      }
      repoDirs.push(entry.name);
    }
    return repoDirs;
  }

  private async inspectOne(
    repoDir: string,
    dirName: string,
    signal: AbortSignal
  ): Promise<{ value: RepoFingerprint; timedOut: boolean }> {
    try {
      const fingerprint = await withAbort(this.repoInspector.inspect(repoDir, { signal }), signal);
      this.emit('repo', fingerprint);
      return { value: fingerprint, timedOut: false };
    } catch (error) {
      const fault = toInspectionError(error, repoDir);
      if (fault.code === 'Timeout') {
        this.logger?.debug({ repo: dirName }, 'Deadline elapsed before repository finished');
      } else {
        this.logger?.warn({ repo: dirName, code: fault.code, err: fault }, 'Repository unreadable');
      }
      this.emit('degraded', dirName, fault);
      return { value: degradedFingerprint(dirName), timedOut: fault.code === 'Timeout' };
    }
  }

  /**
   * Enumerate `<kind>s/<owner>/<name>` directories without descending
   * further. Directory symlinks count as directories here.
   */
  private async discoverAliases(
    cacheRoot: string,
    signal: AbortSignal
  ): Promise<{ entries: FriendlyAliasEntry[]; complete: boolean }> {
    const entries: FriendlyAliasEntry[] = [];

    try {
      for (const kind of REPO_KINDS) {
        const namespaceDir = path.join(cacheRoot, KIND_NAMESPACES[kind]);
        for (const owner of await this.listSubdirectories(namespaceDir, signal)) {
          const ownerDir = path.join(namespaceDir, owner);
          for (const name of await this.listSubdirectories(ownerDir, signal)) {
            const entry = this.aliasEntry(kind, owner, name);
            if (entry) entries.push(entry);
          }
        }
      }
    } catch (error) {
      const fault = toInspectionError(error, cacheRoot);
      if (fault.code !== 'Timeout') {
        throw fault;
      }
      this.logger?.warn({ cacheRoot, aliases: entries.length }, 'Deadline elapsed during alias discovery');
      return { entries, complete: false };
    }

    return { entries, complete: true };
  }

  private aliasEntry(kind: RepoKind, owner: string, name: string): FriendlyAliasEntry | null {
    try {
      return { kind, owner, name, repo_dir_name: repoDirName(kind, owner, name) };
    } catch (error) {
      this.logger?.warn({ kind, owner, name, err: error }, 'Skipping alias with unmappable name');
      return null;
    }
  }

  /**
   * Sorted names of subdirectories (following symlinks). A missing or
   * unreadable directory yields none.
   */
  private async listSubdirectories(dir: string, signal: AbortSignal): Promise<string[]> {
    let entries;
    try {
      entries = await readDirSorted(dir, signal);
    } catch (error) {
      if (error instanceof CacheInspectionError && error.code === 'AccessFault') {
        this.logger?.warn({ dir, err: error }, 'Skipping unreadable alias directory');
        return [];
      }
      throw error;
    }
    if (entries === null) {
      return [];
    }

    const names: string[] = [];
    for (const entry of entries) {
      const isDirectory =
        entry.isDirectory() ||
        (entry.isSymbolicLink() && (await isDirectoryFollowing(path.join(dir, entry.name))));
      if (isDirectory) {
        names.push(entry.name);
      }
    }
    return names;
  }
}

/**
 * True when `target` (followed through symlinks) is a directory. Dangling
 * or unreadable targets are not.
 */
async function isDirectoryFollowing(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    return false;
  }
}

async function assertReadableDirectory(dir: string): Promise<void> {
  try {
    const stats = await fs.stat(dir);
    if (!stats.isDirectory()) {
      throw new CacheInspectionError('AccessFault', `${dir} is not a directory`, { path: dir });
    }
    await fs.access(dir, fs.constants.R_OK | fs.constants.X_OK);
  } catch (error) {
    throw toInspectionError(error, dir);
  }
}
