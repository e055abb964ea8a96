/**
 * Cross-Implementation Comparator
 *
 * Diffs the fingerprints two downloaders produced for one logical
 * repository. Only structure is compared: presence of refs/blobs/snapshots,
 * ref format and symlink use. Blob counts, content keys and literal commit
 * ids are never compared.
 *
 * Pairing order per side:
 * 1. canonical: `owner/name` mapped to the exact hub directory name
 * 2. exact: case-insensitive directory name, `owner/name` or bare name
 * 3. substring: case-insensitive substring of the directory name
 *
 * Substring pairing can pick the wrong repository when several contain the
 * key; such matches are flagged `ambiguous` and logged.
 *
 * @module core/comparator
 */

import type { Logger } from 'pino';
import { compareCodeUnits } from '../utils/ordering.js';
import { REPO_KINDS, repoDirNameForId } from './path-scheme.js';
import { isExactRepoMatch, isSubstringRepoMatch } from './repo-matching.js';
import { DEFAULT_REF, isCommitHash } from './invariant-checker.js';
import type { CacheFingerprint, RepoFingerprint } from '../types/cache.js';
import type {
  CompareOptions,
  ComparisonDimension,
  ComparisonDimensionName,
  ComparisonReport,
  MatchStrategy,
  RepoMatch,
  RepoMatchKey,
} from '../types/comparison.js';

/**
 * Pair a fingerprint with a match key.
 *
 * @returns The selected repository, or null when nothing matched
 * @throws {CacheInspectionError} MalformedIdentifier for a malformed canonicalId
 */
export function matchRepo(
  fingerprint: CacheFingerprint,
  key: string,
  options: CompareOptions = {}
): RepoMatch | null {
  const names = fingerprint.hub_repos.map((repo) => repo.name).sort(compareCodeUnits);
  const mode = options.mode ?? 'auto';

  const attempt = (strategy: MatchStrategy, predicate: (name: string) => boolean): RepoMatch | null => {
    const candidates = names.filter(predicate);
    const [first] = candidates;
    if (first === undefined) {
      return null;
    }
    return { name: first, strategy, ambiguous: candidates.length > 1, candidates };
  };

  if (options.canonicalId !== undefined) {
    const canonicalId = options.canonicalId;
    const dirNames = new Set(REPO_KINDS.map((kind) => repoDirNameForId(kind, canonicalId)));
    const canonical = attempt('canonical', (name) => dirNames.has(name));
    if (canonical) {
      return canonical;
    }
  }

  if (key.length === 0) {
    return null;
  }

  if (mode !== 'substring') {
    const exact = attempt('exact', (name) => isExactRepoMatch(name, key));
    if (exact || mode === 'exact') {
      return exact;
    }
  }

  return attempt('substring', (name) => isSubstringRepoMatch(name, key));
}

function dimension(
  name: ComparisonDimensionName,
  a: boolean | null,
  b: boolean | null,
  passed: boolean,
  detail: string
): ComparisonDimension {
  return { dimension: name, passed, a, b, detail };
}

function sideValue(value: boolean | null): string {
  return value === null ? 'n/a' : String(value);
}

/**
 * Both sides present and equal.
 */
function equalityDimension(
  name: ComparisonDimensionName,
  repoA: RepoFingerprint | undefined,
  repoB: RepoFingerprint | undefined,
  read: (repo: RepoFingerprint) => boolean
): ComparisonDimension {
  const a = repoA ? read(repoA) : null;
  const b = repoB ? read(repoB) : null;
  const passed = a !== null && b !== null && a === b;
  return dimension(name, a, b, passed, `A=${sideValue(a)} B=${sideValue(b)}`);
}

/**
 * Both sides present and true.
 */
function bothHoldDimension(
  name: ComparisonDimensionName,
  repoA: RepoFingerprint | undefined,
  repoB: RepoFingerprint | undefined,
  read: (repo: RepoFingerprint) => boolean,
  label: string
): ComparisonDimension {
  const a = repoA ? read(repoA) : null;
  const b = repoB ? read(repoB) : null;
  const passed = a === true && b === true;
  return dimension(name, a, b, passed, `${label}: A=${sideValue(a)} B=${sideValue(b)}`);
}

function usesSymlinks(repo: RepoFingerprint): boolean {
  const [first] = repo.snapshots;
  return first !== undefined && first.symlink_count > 0;
}

export interface ComparatorOptions {
  logger?: Logger;
}

/**
 * Compares cache fingerprints from two implementations.
 *
 * @example
 * ```typescript
 * const comparator = new CrossImplementationComparator({ logger });
 * const report = comparator.compare(fpA, fpB, { a: 'tiny-model', b: 'acme--tiny' });
 * const failed = report.dimensions.filter((d) => !d.passed);
 * ```
 */
export class CrossImplementationComparator {
  private readonly logger?: Logger;

  constructor(options: ComparatorOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Pair each side with the match key and compare every dimension.
   * Symmetric: swapping sides (and per-side keys) swaps `a`/`b` values but
   * leaves every `passed` flag unchanged.
   */
  public compare(
    fingerprintA: CacheFingerprint,
    fingerprintB: CacheFingerprint,
    matchKey: RepoMatchKey,
    options: CompareOptions = {}
  ): ComparisonReport {
    const keyA = typeof matchKey === 'string' ? matchKey : matchKey.a;
    const keyB = typeof matchKey === 'string' ? matchKey : matchKey.b;
    const ref = options.ref ?? DEFAULT_REF;

    const matchA = this.pair('A', fingerprintA, keyA, options);
    const matchB = this.pair('B', fingerprintB, keyB, options);
    const repoA = matchA ? fingerprintA.hub_repos.find((repo) => repo.name === matchA.name) : undefined;
    const repoB = matchB ? fingerprintB.hub_repos.find((repo) => repo.name === matchB.name) : undefined;

    const matchedA = matchA !== null;
    const matchedB = matchB !== null;

    const dimensions: ComparisonDimension[] = [
      dimension(
        'repo_matched',
        matchedA,
        matchedB,
        matchedA && matchedB,
        `A=${matchA?.name ?? 'no match'} B=${matchB?.name ?? 'no match'}`
      ),
      equalityDimension('has_refs', repoA, repoB, (repo) => repo.has_refs),
      equalityDimension('has_blobs', repoA, repoB, (repo) => repo.has_blobs),
      equalityDimension('has_snapshots', repoA, repoB, (repo) => repo.has_snapshots),
      bothHoldDimension(
        'ref_format',
        repoA,
        repoB,
        (repo) => isCommitHash(repo.refs[ref]),
        `refs/${ref} is a commit hash`
      ),
      bothHoldDimension(
        'uses_symlinks',
        repoA,
        repoB,
        usesSymlinks,
        'first snapshot uses symlinks'
      ),
    ];

    const allPassed = dimensions.every((d) => d.passed);
    this.logger?.debug(
      {
        a: matchA?.name,
        b: matchB?.name,
        failed: dimensions.filter((d) => !d.passed).map((d) => d.dimension),
      },
      'Compared fingerprints'
    );

    return { matchA, matchB, ref, dimensions, allPassed };
  }

  private pair(
    side: 'A' | 'B',
    fingerprint: CacheFingerprint,
    key: string,
    options: CompareOptions
  ): RepoMatch | null {
    const match = matchRepo(fingerprint, key, options);
    if (match === null) {
      this.logger?.warn({ side, key }, 'No repository matched');
    } else if (match.ambiguous) {
      this.logger?.warn(
        { side, key, strategy: match.strategy, selected: match.name, candidates: match.candidates },
        'Ambiguous repository match'
      );
    }
    return match;
  }
}
