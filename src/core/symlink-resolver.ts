/**
 * Symlink Resolution
 *
 * Live checks over directory trees: every symlink's chain must end on an
 * existing regular file. Only the queried link's own chain is followed, one
 * hop at a time, up to a fixed depth. Each hop resolves against the real
 * directory holding the link, as the OS does, so trees reached through a
 * directory symlink resolve the same as their targets.
 *
 * @module core/symlink-resolver
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { Ok, Err, type Result } from '../utils/result-helpers.js';
import { isErrnoException, isNotFound, toInspectionError, CacheInspectionError } from '../api/errors.js';
import { checkAborted } from '../utils/timer-guard.js';
import { INSPECTION } from '../config/defaults.js';
import { walkTree } from './tree-walker.js';
import type { BrokenLinkCause, BrokenSymlink } from '../types/checks.js';

/** Longest chain followed before a link counts as broken */
export const DEFAULT_MAX_SYMLINK_DEPTH = INSPECTION.MAX_SYMLINK_DEPTH;

export interface SymlinkWalkOptions {
  maxDepth?: number;
  signal?: AbortSignal;
  logger?: Logger;

  /** Blob store every chain must end in; links landing elsewhere are `outside-blobs` */
  blobsDir?: string;
}

/**
 * Result of one walk over a link tree
 */
export interface LinkTreeScan {
  broken: BrokenSymlink[];

  /** Regular files met during the walk (links excluded) */
  regularFiles: string[];
}

/**
 * Follow a link chain hop by hop.
 *
 * Relative targets resolve against the real path of the directory holding
 * the link.
 *
 * @returns Ok with the final regular file, or Err with the reason the chain failed
 */
export async function resolveLinkChain(
  linkPath: string,
  maxDepth: number = DEFAULT_MAX_SYMLINK_DEPTH,
  signal?: AbortSignal
): Promise<Result<string, BrokenLinkCause>> {
  let current = linkPath;
  let hops = 0;

  for (;;) {
    checkAborted(signal);

    let stats;
    try {
      stats = await fs.lstat(current);
    } catch (error) {
      return brokenChain(causeOf(error));
    }

    if (!stats.isSymbolicLink()) {
      return stats.isFile() ? Ok(current) : brokenChain('not-a-file');
    }

    if (hops >= maxDepth) {
      return brokenChain('too-deep');
    }

    let target: string;
    try {
      target = await fs.readlink(current);
    } catch (error) {
      return brokenChain(causeOf(error));
    }

    let linkDir: string;
    try {
      linkDir = await fs.realpath(path.dirname(current));
    } catch (error) {
      return brokenChain(causeOf(error));
    }

    current = path.resolve(linkDir, target);
    hops++;
  }
}

function brokenChain(cause: BrokenLinkCause): Result<string, BrokenLinkCause> {
  return Err(cause);
}

function causeOf(error: unknown): BrokenLinkCause {
  if (isNotFound(error)) return 'missing';
  if (isErrnoException(error) && error.code === 'ELOOP') return 'too-deep';
  return 'unreadable';
}

/**
 * Walk `dir` once, checking every symlink and collecting regular files.
 *
 * Directory symlinks met during the walk are checked as links and never
 * descended.
 *
 * @throws {CacheInspectionError} AccessFault when `dir` is missing or unreadable
 */
export async function scanLinkTree(dir: string, options: SymlinkWalkOptions = {}): Promise<LinkTreeScan> {
  const { maxDepth = DEFAULT_MAX_SYMLINK_DEPTH, signal, logger } = options;
  await assertDirectory(dir);
  const blobsRoot = options.blobsDir === undefined ? undefined : await realDirectory(options.blobsDir);

  const broken: BrokenSymlink[] = [];
  const regularFiles: string[] = [];
  let checked = 0;

  for await (const entry of walkTree(dir, signal)) {
    if (entry.kind === 'file') {
      regularFiles.push(entry.path);
      continue;
    }
    if (entry.kind !== 'symlink') continue;
    checked++;

    const resolved = await resolveLinkChain(entry.path, maxDepth, signal);
    let cause: BrokenLinkCause | null;
    if (resolved.err) {
      cause = resolved.val;
    } else {
      cause = blobsRoot === undefined ? null : await containmentCause(resolved.val, blobsRoot);
    }
    if (cause === null) continue;

    let target = '';
    try {
      target = await fs.readlink(entry.path);
    } catch (error) {
      logger?.debug({ path: entry.path, err: error }, 'Link vanished during walk');
    }
    broken.push({ path: entry.path, target, cause });
  }

  logger?.debug({ dir, checked, broken: broken.length, files: regularFiles.length }, 'Checked symlinks');
  return { broken, regularFiles };
}

/**
 * Walk `dir` and report every symlink whose chain does not end on a file.
 * An empty result means every link resolves.
 *
 * @throws {CacheInspectionError} AccessFault when `dir` is missing or unreadable
 */
export async function findBrokenSymlinks(
  dir: string,
  options: SymlinkWalkOptions = {}
): Promise<BrokenSymlink[]> {
  return (await scanLinkTree(dir, options)).broken;
}

/**
 * Real path of a directory; a missing one keeps its resolved path, which no
 * existing file can sit under.
 */
async function realDirectory(dir: string): Promise<string> {
  try {
    return await fs.realpath(dir);
  } catch (error) {
    if (isNotFound(error)) {
      return path.resolve(dir);
    }
    throw toInspectionError(error, dir);
  }
}

async function containmentCause(file: string, root: string): Promise<BrokenLinkCause | null> {
  let real: string;
  try {
    real = await fs.realpath(file);
  } catch (error) {
    return causeOf(error);
  }
  const relative = path.relative(root, real);
  const inside =
    relative !== '' && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
  return inside ? null : 'outside-blobs';
}

async function assertDirectory(dir: string): Promise<void> {
  let stats;
  try {
    stats = await fs.stat(dir);
  } catch (error) {
    throw toInspectionError(error, dir);
  }
  if (!stats.isDirectory()) {
    throw new CacheInspectionError('AccessFault', `${dir} is not a directory`, { path: dir });
  }
}
