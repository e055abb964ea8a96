/**
 * Hub Cache Fixture
 *
 * Builds throwaway cache roots in the OS temp directory.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { PathScheme, snapshotLinkTarget } from '../../src/core/path-scheme.js';
import type { RepoFingerprint, RepoIdentity, RepoKind } from '../../src/types/cache.js';

/** A valid 40-character commit id */
export const COMMIT = '0123456789abcdef0123456789abcdef01234567';
export const OTHER_COMMIT = 'fedcba9876543210fedcba9876543210fedcba98';

export interface FixtureRepo {
  kind?: RepoKind;
  owner: string;
  name: string;

  /** Ref name to raw file content; omitted means no refs/ directory */
  refs?: Record<string, string>;

  /** Content key to blob content; omitted means no blobs/ directory */
  blobs?: Record<string, string>;

  /**
   * Commit to (file path to content key); every file becomes a relative
   * symlink into blobs/. Omitted means no snapshots/ directory.
   */
  snapshots?: Record<string, Record<string, string>>;
}

export class HubCacheFixture {
  readonly root: string;
  readonly scheme: PathScheme;

  private constructor(root: string) {
    this.root = root;
    this.scheme = new PathScheme(root);
  }

  static async create(prefix = 'hub-cache-test-'): Promise<HubCacheFixture> {
    return new HubCacheFixture(await fs.mkdtemp(path.join(tmpdir(), prefix)));
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.root, { recursive: true, force: true });
  }

  path(...segments: string[]): string {
    return path.join(this.root, ...segments);
  }

  /**
   * Lay out a hub repository and return its identity.
   */
  async addRepo(layout: FixtureRepo): Promise<RepoIdentity> {
    const repo: RepoIdentity = { kind: layout.kind ?? 'model', owner: layout.owner, name: layout.name };
    await fs.mkdir(this.scheme.repoDir(repo), { recursive: true });

    if (layout.refs) {
      await fs.mkdir(this.scheme.refsDir(repo), { recursive: true });
      for (const [ref, content] of Object.entries(layout.refs)) {
        await this.writeAt(this.scheme.refPath(repo, ref), content);
      }
    }

    if (layout.blobs) {
      await fs.mkdir(this.scheme.blobsDir(repo), { recursive: true });
      for (const [key, content] of Object.entries(layout.blobs)) {
        await this.writeAt(this.scheme.blobPath(repo, key), content);
      }
    }

    if (layout.snapshots) {
      await fs.mkdir(this.scheme.snapshotsDir(repo), { recursive: true });
      for (const [commit, files] of Object.entries(layout.snapshots)) {
        await fs.mkdir(this.scheme.snapshotDir(repo, commit), { recursive: true });
        for (const [filePath, key] of Object.entries(files)) {
          await this.linkAt(
            this.scheme.snapshotFilePath(repo, commit, filePath),
            snapshotLinkTarget(filePath, key)
          );
        }
      }
    }

    return repo;
  }

  /**
   * A repository that passes every check: refs/main -> COMMIT, three blobs,
   * and one snapshot linking all of them.
   */
  async addValidRepo(owner = 'acme', name = 'tiny', kind: RepoKind = 'model'): Promise<RepoIdentity> {
    return this.addRepo({
      kind,
      owner,
      name,
      refs: { main: `${COMMIT}\n` },
      blobs: { k1: 'config', k2: 'weights', k3: 'tokenizer' },
      snapshots: {
        [COMMIT]: { 'config.json': 'k1', 'model.safetensors': 'k2', 'tokenizer/vocab.json': 'k3' },
      },
    });
  }

  /**
   * Friendly alias tree whose files link into the repository's snapshot.
   */
  async addAlias(repo: RepoIdentity, commit: string, files: string[]): Promise<string> {
    const aliasDir = this.scheme.friendlyDir(repo);
    await fs.mkdir(aliasDir, { recursive: true });
    for (const file of files) {
      const linkPath = this.scheme.friendlyFilePath(repo, file);
      const target = this.scheme.snapshotFilePath(repo, commit, file);
      await this.linkAt(linkPath, path.relative(path.dirname(linkPath), target));
    }
    return aliasDir;
  }

  async writeFile(relativePath: string, content: string): Promise<string> {
    const target = this.path(relativePath);
    await this.writeAt(target, content);
    return target;
  }

  async symlink(relativePath: string, target: string): Promise<string> {
    const linkPath = this.path(relativePath);
    await this.linkAt(linkPath, target);
    return linkPath;
  }

  async mkdir(relativePath: string): Promise<string> {
    const dir = this.path(relativePath);
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }

  private async writeAt(target: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }

  private async linkAt(linkPath: string, target: string): Promise<void> {
    await fs.mkdir(path.dirname(linkPath), { recursive: true });
    await fs.symlink(target, linkPath);
  }
}

/**
 * In-memory fingerprint with every structural flag set.
 */
export function repoFingerprint(name: string, overrides: Partial<RepoFingerprint> = {}): RepoFingerprint {
  return {
    name,
    has_refs: true,
    refs: { main: COMMIT },
    has_blobs: true,
    blob_count: 3,
    has_snapshots: true,
    snapshots: [{ commit: COMMIT, file_count: 3, symlink_count: 3 }],
    degraded: false,
    ...overrides,
  };
}

/**
 * pino destination that keeps parsed log records in memory.
 */
export function captureLogs(): { records: Array<Record<string, unknown>>; write: (line: string) => void } {
  const records: Array<Record<string, unknown>> = [];
  return {
    records,
    write: (line: string) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        records.push(Object.fromEntries(Object.entries(parsed)));
      }
    },
  };
}
