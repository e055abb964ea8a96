/**
 * Human-readable rendering for CLI output.
 */

import type { CacheListEntry } from '../types/cache.js';
import type { CheckResult, Violation } from '../types/checks.js';
import type { ComparisonReport } from '../types/comparison.js';

/**
 * Binary-unit size, e.g. `1.5 KB`. Bytes are shown without decimals.
 */
export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return unitIndex === 0 ? `${size} B` : `${size.toFixed(1)} ${units[unitIndex]}`;
}

/**
 * One-line description of a violation.
 */
export function describeViolation(violation: Violation): string {
  switch (violation.reason) {
    case 'MissingRef':
      return `refs/${violation.ref} is missing`;
    case 'RefIsBranchName':
      return `refs/${violation.ref} contains "${violation.value}", not a commit hash`;
    case 'EmptyBlobStore':
      return 'blobs/ is missing or empty';
    case 'NoSnapshots':
      return 'snapshots/ is missing or empty';
    case 'SnapshotNotSymlinked':
      return violation.commit === null
        ? 'no snapshot to check for symlinks'
        : `snapshots/${violation.commit} contains no symlinks`;
    case 'BrokenSymlink':
      if (violation.cause === 'outside-blobs') {
        return `link ${violation.path} -> ${violation.target} lands outside the repository's blobs/`;
      }
      return `broken link ${violation.path} -> ${violation.target || '?'} (${violation.cause})`;
    case 'RefSnapshotMissing':
      return `refs/${violation.ref} points at ${violation.commit}, which has no snapshot`;
    case 'IncompleteDownload':
      return `partial download ${violation.path}`;
    case 'RegularFileInAlias':
      return `regular file in alias tree ${violation.path}`;
    case 'AliasWithoutRepo':
      return `alias ${violation.aliasId} has no hub repository ${violation.repoDirName}`;
  }
}

/**
 * Failure lines for one subject, e.g.
 * `✗ [error] models--acme--tiny RefIsCommit: refs/main contains "main", not a commit hash`
 */
export function formatFailures(subject: string, results: readonly CheckResult[]): string[] {
  const lines: string[] = [];
  for (const result of results) {
    if (result.passed) continue;
    const marker = result.severity === 'error' ? '✗' : '⚠️ ';
    for (const violation of result.violations) {
      lines.push(`${marker} [${result.severity}] ${subject} ${result.check}: ${describeViolation(violation)}`);
    }
  }
  return lines;
}

/**
 * Fixed-width listing table.
 */
export function formatListTable(entries: readonly CacheListEntry[]): string[] {
  const repoWidth = Math.min(50, Math.max(4, ...entries.map((e) => e.repo_id.length)));
  const row = (kind: string, repo: string, commit: string, files: string, size: string): string =>
    `${kind.padEnd(7)}  ${repo.padEnd(repoWidth)}  ${commit.padEnd(7)}  ${files.padStart(5)}  ${size.padStart(10)}`;

  const lines = [
    row('TYPE', 'REPO', 'COMMIT', 'FILES', 'SIZE'),
    row('-------', '-'.repeat(repoWidth), '-------', '-----', '----------'),
  ];
  for (const entry of entries) {
    const repo =
      entry.repo_id.length > repoWidth ? `${entry.repo_id.slice(0, repoWidth - 3)}...` : entry.repo_id;
    lines.push(row(entry.kind, repo, entry.commit, String(entry.files), formatSize(entry.size_bytes)));
  }
  return lines;
}

/**
 * Per-dimension comparison table.
 */
export function formatComparison(report: ComparisonReport): string[] {
  const lines = [
    `A: ${report.matchA ? `${report.matchA.name} (${report.matchA.strategy})` : 'no match'}`,
    `B: ${report.matchB ? `${report.matchB.name} (${report.matchB.strategy})` : 'no match'}`,
    '',
  ];
  for (const d of report.dimensions) {
    lines.push(`${d.passed ? '✓' : '✗'} ${d.dimension.padEnd(14)} ${d.detail}`);
  }
  return lines;
}
