/**
 * Tree Walker
 *
 * Iterative directory traversal shared by the inspectors and the link
 * checks. Entries come out in code-unit order; symlinks are reported as
 * leaves and never descended, so link cycles cannot trap a walk.
 *
 * @module core/tree-walker
 */

import * as fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import { isNotFound, toInspectionError } from '../api/errors.js';
import { checkAborted } from '../utils/timer-guard.js';
import { compareCodeUnits } from '../utils/ordering.js';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface WalkEntry {
  path: string;

  /** Path relative to the walk root, `/`-separated */
  relativePath: string;

  kind: EntryKind;
}

/**
 * Classify a directory entry without following symlinks. Falls back to
 * lstat when the filesystem does not report entry types.
 */
export async function classifyEntry(
  entry: Dirent,
  entryPath: string,
  signal?: AbortSignal
): Promise<EntryKind> {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';

  checkAborted(signal);
  try {
    const stats = await fs.lstat(entryPath);
    if (stats.isSymbolicLink()) return 'symlink';
    if (stats.isDirectory()) return 'directory';
    if (stats.isFile()) return 'file';
    return 'other';
  } catch (error) {
    if (isNotFound(error)) {
      return 'other';
    }
    throw toInspectionError(error, entryPath);
  }
}

/**
 * Sorted directory listing, or null when the directory does not exist.
 *
 * @throws {CacheInspectionError} AccessFault for any other read error
 */
export async function readDirSorted(dir: string, signal?: AbortSignal): Promise<Dirent[] | null> {
  checkAborted(signal);
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => compareCodeUnits(a.name, b.name));
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw toInspectionError(error, dir);
  }
}

/**
 * Yield every entry below `root` (the root itself excluded) using an
 * explicit stack. A directory's entries are yielded together, then its
 * subdirectories are walked in order. A missing root yields nothing.
 */
export async function* walkTree(root: string, signal?: AbortSignal): AsyncGenerator<WalkEntry> {
  const stack: Array<{ dir: string; relative: string }> = [{ dir: root, relative: '' }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;

    const entries = await readDirSorted(frame.dir, signal);
    if (entries === null) continue;

    const subdirs: Array<{ dir: string; relative: string }> = [];
    for (const entry of entries) {
      const entryPath = path.join(frame.dir, entry.name);
      const relativePath = frame.relative ? `${frame.relative}/${entry.name}` : entry.name;
      const kind = await classifyEntry(entry, entryPath, signal);

      yield { path: entryPath, relativePath, kind };
      if (kind === 'directory') {
        subdirs.push({ dir: entryPath, relative: relativePath });
      }
    }

    // Reverse so the first directory is popped first
    for (let i = subdirs.length - 1; i >= 0; i--) {
      const subdir = subdirs[i];
      if (subdir) stack.push(subdir);
    }
  }
}
