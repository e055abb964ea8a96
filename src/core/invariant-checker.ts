/**
 * Invariant Checker
 *
 * Evaluates repository fingerprints and live directories against the cache
 * invariants. Every check runs (no short-circuit) and yields a CheckResult;
 * structural violations are returned, never thrown.
 *
 * Fingerprint checks (pure):
 * - RefPresent, RefIsCommit, BlobsNonEmpty, SnapshotsPresent,
 *   SnapshotUsesSymlinks (errors), RefSnapshotExists (warning)
 *
 * Live checks (walk the filesystem):
 * - SymlinkResolves (error), NoIncompleteDownloads, AliasLinksOnly,
 *   AliasHasRepo (warnings)
 *
 * @module core/invariant-checker
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { CacheInspectionError } from '../api/errors.js';
import { INSPECTION } from '../config/defaults.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { CacheInspector, DEFAULT_INSPECTION_CONCURRENCY } from './cache-inspector.js';
import { RepoInspector } from './repo-inspector.js';
import { readDirSorted } from './tree-walker.js';
import { DEFAULT_MAX_SYMLINK_DEPTH, scanLinkTree } from './symlink-resolver.js';
import {
  BLOBS_DIR_NAME,
  HUB_DIR_NAME,
  PathScheme,
  SNAPSHOTS_DIR_NAME,
  isIncompleteBlobName,
  repoIdOf,
} from './path-scheme.js';
import { identityOf, matchesRepo } from './repo-matching.js';
import type { RepoFingerprint, FriendlyAliasEntry } from '../types/cache.js';
import type {
  AliasVerification,
  CheckName,
  CheckOptions,
  CheckResult,
  CheckSeverity,
  RepoVerification,
  VerificationReport,
  VerifyCacheOptions,
  Violation,
} from '../types/checks.js';

/** Ref checked when none is requested */
export const DEFAULT_REF = INSPECTION.DEFAULT_REF;

const COMMIT_HASH_PATTERN = /^[0-9a-f]{40,}$/;

/**
 * True when `value` is a resolved commit id: lowercase hex, at least 40
 * characters. Branch names, short hashes and uppercase hex are rejected.
 */
export function isCommitHash(value: string | undefined): boolean {
  return value !== undefined && COMMIT_HASH_PATTERN.test(value);
}

function result(check: CheckName, severity: CheckSeverity, violations: Violation[]): CheckResult {
  return { check, passed: violations.length === 0, severity, violations };
}

/**
 * Snapshot inspected by SnapshotUsesSymlinks: the explicit override, else
 * the one named by the ref's value, else the first in sorted order.
 */
export function targetSnapshotCommit(fingerprint: RepoFingerprint, options: CheckOptions = {}): string | null {
  if (options.snapshot !== undefined) {
    return options.snapshot;
  }

  const refValue = fingerprint.refs[options.ref ?? DEFAULT_REF];
  if (refValue !== undefined && fingerprint.snapshots.some((s) => s.commit === refValue)) {
    return refValue;
  }
  return fingerprint.snapshots[0]?.commit ?? null;
}

/**
 * Run every fingerprint check.
 */
export function checkFingerprint(fingerprint: RepoFingerprint, options: CheckOptions = {}): CheckResult[] {
  const ref = options.ref ?? DEFAULT_REF;
  const refValue = fingerprint.has_refs ? fingerprint.refs[ref] : undefined;

  const refPresent: Violation[] = refValue === undefined ? [{ reason: 'MissingRef', ref }] : [];

  const refIsCommit: Violation[] = [];
  if (refValue === undefined) {
    refIsCommit.push({ reason: 'MissingRef', ref });
  } else if (!isCommitHash(refValue)) {
    refIsCommit.push({ reason: 'RefIsBranchName', ref, value: refValue });
  }

  const blobs: Violation[] =
    fingerprint.has_blobs && fingerprint.blob_count > 0 ? [] : [{ reason: 'EmptyBlobStore' }];

  const snapshotsPresent: Violation[] =
    fingerprint.has_snapshots && fingerprint.snapshots.length > 0 ? [] : [{ reason: 'NoSnapshots' }];

  const commit = targetSnapshotCommit(fingerprint, options);
  const target = fingerprint.snapshots.find((s) => s.commit === commit);
  const usesSymlinks: Violation[] =
    target !== undefined && target.symlink_count > 0
      ? []
      : [{ reason: 'SnapshotNotSymlinked', commit }];

  const refSnapshot: Violation[] =
    refValue !== undefined && !fingerprint.snapshots.some((s) => s.commit === refValue)
      ? [{ reason: 'RefSnapshotMissing', ref, commit: refValue }]
      : [];

  return [
    result('RefPresent', 'error', refPresent),
    result('RefIsCommit', 'error', refIsCommit),
    result('BlobsNonEmpty', 'error', blobs),
    result('SnapshotsPresent', 'error', snapshotsPresent),
    result('SnapshotUsesSymlinks', 'error', usesSymlinks),
    result('RefSnapshotExists', 'warning', refSnapshot),
  ];
}

/**
 * Count failed results by severity.
 */
export function countFailures(results: readonly CheckResult[]): { errors: number; warnings: number } {
  let errors = 0;
  let warnings = 0;
  for (const r of results) {
    if (r.passed) continue;
    if (r.severity === 'error') errors++;
    else warnings++;
  }
  return { errors, warnings };
}

export interface InvariantCheckerOptions {
  repoInspector?: RepoInspector;
  cacheInspector?: CacheInspector;
  concurrency?: number;
  logger?: Logger;
}

/**
 * Runs fingerprint and live checks over repositories, aliases and whole
 * cache roots.
 */
export class InvariantChecker {
  private readonly repoInspector: RepoInspector;
  private readonly cacheInspector: CacheInspector;
  private readonly concurrency: number;
  private readonly logger?: Logger;

  constructor(options: InvariantCheckerOptions = {}) {
    this.logger = options.logger;
    this.concurrency = options.concurrency ?? DEFAULT_INSPECTION_CONCURRENCY;
    this.repoInspector = options.repoInspector ?? new RepoInspector(options.logger);
    this.cacheInspector =
      options.cacheInspector ??
      new CacheInspector({
        repoInspector: this.repoInspector,
        concurrency: this.concurrency,
        logger: options.logger,
      });
  }

  public checkFingerprint(fingerprint: RepoFingerprint, options: CheckOptions = {}): CheckResult[] {
    return checkFingerprint(fingerprint, options);
  }

  /**
   * Inspect one repository and run every check on it, live link checks
   * included.
   *
   * @throws {CacheInspectionError} NotARepo or AccessFault for the named directory
   */
  public async checkRepo(repoDir: string, options: CheckOptions = {}): Promise<RepoVerification> {
    const fingerprint = await this.repoInspector.inspect(repoDir);
    const results = [
      ...checkFingerprint(fingerprint, options),
      ...(await this.liveRepoChecks(repoDir, fingerprint, options)),
    ];
    return { repo: fingerprint.name, path: repoDir, fingerprint, results };
  }

  /**
   * SymlinkResolves and AliasLinksOnly over one friendly alias directory.
   *
   * @throws {CacheInspectionError} AccessFault when the directory cannot be read
   */
  public async checkFriendlyAlias(aliasDir: string, options: CheckOptions = {}): Promise<CheckResult[]> {
    const { broken, regularFiles } = await scanLinkTree(aliasDir, {
      maxDepth: options.maxSymlinkDepth ?? DEFAULT_MAX_SYMLINK_DEPTH,
      logger: this.logger,
    });

    if (regularFiles.length > 0) {
      this.logger?.warn({ aliasDir, files: regularFiles.length }, 'Regular files in alias tree');
    }

    return [
      result(
        'SymlinkResolves',
        'error',
        broken.map((link): Violation => ({ reason: 'BrokenSymlink', ...link }))
      ),
      result(
        'AliasLinksOnly',
        'warning',
        regularFiles.map((file): Violation => ({ reason: 'RegularFileInAlias', path: file }))
      ),
    ];
  }

  /**
   * Inspect a cache root and check every repository and alias in it.
   *
   * Degraded repositories fail the fingerprint checks and skip the live ones.
   *
   * @throws {CacheInspectionError} AccessFault when the cache root cannot be read
   */
  public async verifyCache(cacheRoot: string, options: VerifyCacheOptions = {}): Promise<VerificationReport> {
    const hubDir = options.hubDir ?? path.join(cacheRoot, HUB_DIR_NAME);
    const scheme = new PathScheme(cacheRoot, hubDir);
    const fingerprint = await this.cacheInspector.inspect(cacheRoot, {
      timeoutMs: options.timeoutMs,
      hubDir,
    });

    const selected = (repoId: string): boolean =>
      options.repoFilter === undefined || matchesRepo(repoId, options.repoFilter);

    const hubRepos = fingerprint.hub_repos.filter((repo) => {
      const identity = identityOf(repo.name);
      return identity !== null && selected(repoIdOf(identity));
    });

    const repos = await mapWithConcurrency(hubRepos, this.concurrency, async (repo) => {
      const repoDir = path.join(hubDir, repo.name);
      const results = checkFingerprint(repo, options);
      if (!repo.degraded && !options.skipLinks) {
        results.push(...(await this.liveRepoChecks(repoDir, repo, options)));
      }
      return { repo: repo.name, path: repoDir, fingerprint: repo, results };
    });

    const hubNames = new Set(fingerprint.hub_repos.map((repo) => repo.name));
    const aliases = await mapWithConcurrency(
      fingerprint.friendly_aliases.filter((alias) => selected(repoIdOf(alias))),
      this.concurrency,
      (alias) => this.verifyAlias(scheme, alias, hubNames, options)
    );

    let errorCount = 0;
    let warningCount = 0;
    for (const entry of [...repos, ...aliases]) {
      const counts = countFailures(entry.results);
      errorCount += counts.errors;
      warningCount += counts.warnings;
    }

    this.logger?.info(
      { cacheRoot, repos: repos.length, aliases: aliases.length, errorCount, warningCount },
      'Cache verification finished'
    );

    return {
      cacheRoot,
      repos,
      aliases,
      complete: fingerprint.complete,
      errorCount,
      warningCount,
    };
  }

  private async verifyAlias(
    scheme: PathScheme,
    alias: FriendlyAliasEntry,
    hubNames: ReadonlySet<string>,
    options: VerifyCacheOptions
  ): Promise<AliasVerification> {
    const aliasDir = scheme.friendlyDir(alias);
    const results: CheckResult[] = [];

    if (!options.skipLinks) {
      try {
        results.push(...(await this.checkFriendlyAlias(aliasDir, options)));
      } catch (error) {
        results.push(unreadableLinks(aliasDir, error));
      }
    }

    results.push(
      result(
        'AliasHasRepo',
        'warning',
        hubNames.has(alias.repo_dir_name)
          ? []
          : [{ reason: 'AliasWithoutRepo', aliasId: repoIdOf(alias), repoDirName: alias.repo_dir_name }]
      )
    );

    return { alias, path: aliasDir, results };
  }

  /**
   * SymlinkResolves over snapshots/ (every leaf must land in this repo's
   * blobs/) and NoIncompleteDownloads over blobs/.
   */
  private async liveRepoChecks(
    repoDir: string,
    fingerprint: RepoFingerprint,
    options: CheckOptions
  ): Promise<CheckResult[]> {
    const blobsDir = path.join(repoDir, BLOBS_DIR_NAME);
    let links: CheckResult;
    if (!fingerprint.has_snapshots) {
      links = result('SymlinkResolves', 'error', []);
    } else {
      try {
        const { broken } = await scanLinkTree(path.join(repoDir, SNAPSHOTS_DIR_NAME), {
          maxDepth: options.maxSymlinkDepth ?? DEFAULT_MAX_SYMLINK_DEPTH,
          logger: this.logger,
          blobsDir,
        });
        links = result(
          'SymlinkResolves',
          'error',
          broken.map((link): Violation => ({ reason: 'BrokenSymlink', ...link }))
        );
      } catch (error) {
        links = unreadableLinks(path.join(repoDir, SNAPSHOTS_DIR_NAME), error);
      }
    }

    const blobEntries = fingerprint.has_blobs ? ((await readDirSorted(blobsDir)) ?? []) : [];
    const incomplete = blobEntries
      .filter((entry) => isIncompleteBlobName(entry.name))
      .map((entry): Violation => ({ reason: 'IncompleteDownload', path: path.join(blobsDir, entry.name) }));

    return [links, result('NoIncompleteDownloads', 'warning', incomplete)];
  }
}

/**
 * A live walk that could not read part of its tree fails SymlinkResolves
 * with one `unreadable` entry for the unreadable location.
 */
function unreadableLinks(dir: string, error: unknown): CheckResult {
  if (!(error instanceof CacheInspectionError) || error.code !== 'AccessFault') {
    throw error;
  }
  return result('SymlinkResolves', 'error', [
    { reason: 'BrokenSymlink', path: error.path ?? dir, target: '', cause: 'unreadable' },
  ]);
}
