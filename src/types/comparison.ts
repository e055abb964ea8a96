/**
 * Cross-Implementation Comparison Types
 *
 * @module types/comparison
 */

/**
 * How a fingerprint was paired with the match key
 */
export type MatchStrategy = 'canonical' | 'exact' | 'substring';

export type MatchMode = 'auto' | 'exact' | 'substring';

export interface RepoMatch {
  /** Hub directory name of the selected fingerprint */
  name: string;
  strategy: MatchStrategy;

  /** More than one fingerprint matched; the first in sorted order was taken */
  ambiguous: boolean;

  /** Every name that matched at the winning strategy */
  candidates: string[];
}

export type ComparisonDimensionName =
  | 'repo_matched'
  | 'has_refs'
  | 'has_blobs'
  | 'has_snapshots'
  | 'ref_format'
  | 'uses_symlinks';

export interface ComparisonDimension {
  dimension: ComparisonDimensionName;
  passed: boolean;

  /** Side A's value; null when side A had no matching repository */
  a: boolean | null;
  b: boolean | null;

  detail: string;
}

export interface ComparisonReport {
  matchA: RepoMatch | null;
  matchB: RepoMatch | null;
  ref: string;
  dimensions: ComparisonDimension[];

  /** Convenience roll-up of dimensions; callers localize failures through dimensions */
  allPassed: boolean;
}

/**
 * Match key: one query for both sides, or one per side
 */
export type RepoMatchKey = string | { a: string; b: string };

export interface CompareOptions {
  /** Explicit `owner/name`; preferred over any name matching */
  canonicalId?: string;

  /** Ref whose format is compared (default: main) */
  ref?: string;

  mode?: MatchMode;
}
