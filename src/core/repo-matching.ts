/**
 * Repository query matching, shared by `verify --repo` and the comparator.
 *
 * @module core/repo-matching
 */

import { parseRepoDirName, repoIdOf } from './path-scheme.js';
import type { RepoIdentity } from '../types/cache.js';

/**
 * True when `query` selects `repoId` (`owner/name`): exact id, bare name,
 * then substring, all case-insensitive.
 */
export function matchesRepo(repoId: string, query: string): boolean {
  const id = repoId.toLowerCase();
  const q = query.toLowerCase();

  if (id === q) {
    return true;
  }

  const parts = id.split('/');
  if (parts.length === 2 && parts[1] === q) {
    return true;
  }

  return id.includes(q);
}

/**
 * True when `query` names the hub directory exactly: as the directory name,
 * the `owner/name` id or the bare name (case-insensitive).
 */
export function isExactRepoMatch(dirName: string, query: string): boolean {
  const q = query.toLowerCase();
  if (dirName.toLowerCase() === q) {
    return true;
  }

  const identity = parseRepoDirName(dirName);
  if (identity.err) {
    return false;
  }
  return (
    repoIdOf(identity.val).toLowerCase() === q || identity.val.name.toLowerCase() === q
  );
}

/**
 * True when `query` occurs anywhere in the hub directory name (case-insensitive).
 */
export function isSubstringRepoMatch(dirName: string, query: string): boolean {
  return dirName.toLowerCase().includes(query.toLowerCase());
}

/**
 * Identity of a hub directory, or null when its name is outside the convention.
 */
export function identityOf(dirName: string): RepoIdentity | null {
  const parsed = parseRepoDirName(dirName);
  return parsed.ok ? parsed.val : null;
}
