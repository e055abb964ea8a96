/**
 * Invariant Checker Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import {
  InvariantChecker,
  checkFingerprint,
  countFailures,
  isCommitHash,
  targetSnapshotCommit,
} from '../../../src/core/invariant-checker.js';
import { CacheInspector } from '../../../src/core/cache-inspector.js';
import { RepoInspector, degradedFingerprint } from '../../../src/core/repo-inspector.js';
import { createAccessFault } from '../../../src/api/errors.js';
import type { RepoFingerprint } from '../../../src/types/cache.js';
import type { CheckName, CheckResult } from '../../../src/types/checks.js';
import { COMMIT, OTHER_COMMIT, HubCacheFixture, repoFingerprint } from '../../helpers/hub-cache-fixture.js';

function resultFor(results: CheckResult[], check: CheckName): CheckResult | undefined {
  return results.find((r) => r.check === check);
}

/**
 * Small deterministic PRNG (mulberry32).
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('Invariant Checker', () => {
  describe('isCommitHash', () => {
    it('should accept lowercase hex of 40 characters or more', () => {
      expect(isCommitHash('a'.repeat(40))).toBe(true);
      expect(isCommitHash(COMMIT)).toBe(true);
      expect(isCommitHash('0'.repeat(64))).toBe(true);
    });

    it.each(['main', '', 'a'.repeat(39), 'A'.repeat(40), `${'a'.repeat(40)} `, `${'a'.repeat(39)}g`])(
      'should reject %j',
      (value) => {
        expect(isCommitHash(value)).toBe(false);
      }
    );

    it('should reject a missing value', () => {
      expect(isCommitHash(undefined)).toBe(false);
    });

    it('should agree with a character-by-character check on random strings', () => {
      const random = seededRandom(1234);
      const alphabet = '0123456789abcdefABCDEFgz -\n';
      const hex = new Set('0123456789abcdef');

      for (let i = 0; i < 500; i++) {
        const length = Math.floor(random() * 70);
        // Bias towards hex so that valid hashes are generated too
        const pool = random() < 0.5 ? '0123456789abcdef' : alphabet;
        let value = '';
        for (let j = 0; j < length; j++) {
          value += pool[Math.floor(random() * pool.length)] ?? '';
        }

        const expected = value.length >= 40 && [...value].every((c) => hex.has(c));
        expect(isCommitHash(value)).toBe(expected);
      }
    });
  });

  describe('checkFingerprint', () => {
    it('should pass every check for a well-formed repository', () => {
      const results = checkFingerprint(repoFingerprint('models--acme--tiny'));

      expect(results.map((r) => [r.check, r.passed, r.severity])).toEqual([
        ['RefPresent', true, 'error'],
        ['RefIsCommit', true, 'error'],
        ['BlobsNonEmpty', true, 'error'],
        ['SnapshotsPresent', true, 'error'],
        ['SnapshotUsesSymlinks', true, 'error'],
        ['RefSnapshotExists', true, 'warning'],
      ]);
      expect(results.every((r) => r.violations.length === 0)).toBe(true);
    });

    it('should flag a branch name stored in refs/main', () => {
      const results = checkFingerprint(repoFingerprint('models--acme--tiny', { refs: { main: 'main' } }));

      expect(resultFor(results, 'RefPresent')?.passed).toBe(true);
      expect(resultFor(results, 'RefIsCommit')).toEqual({
        check: 'RefIsCommit',
        passed: false,
        severity: 'error',
        violations: [{ reason: 'RefIsBranchName', ref: 'main', value: 'main' }],
      });
    });

    it('should accept a 40-character hex ref', () => {
      const commit = 'a'.repeat(40);
      const results = checkFingerprint(
        repoFingerprint('models--acme--tiny', {
          refs: { main: commit },
          snapshots: [{ commit, file_count: 1, symlink_count: 1 }],
        })
      );

      expect(resultFor(results, 'RefIsCommit')?.passed).toBe(true);
    });

    it('should report a missing ref on both ref checks', () => {
      const results = checkFingerprint(repoFingerprint('models--acme--tiny', { refs: { dev: COMMIT } }));

      expect(resultFor(results, 'RefPresent')?.violations).toEqual([{ reason: 'MissingRef', ref: 'main' }]);
      expect(resultFor(results, 'RefIsCommit')?.violations).toEqual([{ reason: 'MissingRef', ref: 'main' }]);
      expect(resultFor(results, 'RefSnapshotExists')?.passed).toBe(true);
    });

    it('should check the requested ref', () => {
      const results = checkFingerprint(repoFingerprint('models--acme--tiny', { refs: { dev: COMMIT } }), {
        ref: 'dev',
      });

      expect(resultFor(results, 'RefPresent')?.passed).toBe(true);
      expect(resultFor(results, 'RefIsCommit')?.passed).toBe(true);
    });

    it('should ignore refs values when refs/ is absent', () => {
      const results = checkFingerprint(repoFingerprint('models--acme--tiny', { has_refs: false }));

      expect(resultFor(results, 'RefPresent')?.passed).toBe(false);
    });

    it('should fail BlobsNonEmpty for absent and empty blob stores', () => {
      const absent = checkFingerprint(repoFingerprint('r', { has_blobs: false, blob_count: 0 }));
      const empty = checkFingerprint(repoFingerprint('r', { has_blobs: true, blob_count: 0 }));

      expect(resultFor(absent, 'BlobsNonEmpty')?.violations).toEqual([{ reason: 'EmptyBlobStore' }]);
      expect(resultFor(empty, 'BlobsNonEmpty')?.violations).toEqual([{ reason: 'EmptyBlobStore' }]);
    });

    it('should fail snapshot checks when there are no snapshots', () => {
      const results = checkFingerprint(repoFingerprint('r', { has_snapshots: true, snapshots: [] }));

      expect(resultFor(results, 'SnapshotsPresent')?.violations).toEqual([{ reason: 'NoSnapshots' }]);
      expect(resultFor(results, 'SnapshotUsesSymlinks')?.violations).toEqual([
        { reason: 'SnapshotNotSymlinked', commit: null },
      ]);
      expect(resultFor(results, 'RefSnapshotExists')?.violations).toEqual([
        { reason: 'RefSnapshotMissing', ref: 'main', commit: COMMIT },
      ]);
    });

    it('should fail SnapshotUsesSymlinks for a snapshot of copied files', () => {
      const results = checkFingerprint(
        repoFingerprint('r', { snapshots: [{ commit: COMMIT, file_count: 3, symlink_count: 0 }] })
      );

      expect(resultFor(results, 'SnapshotUsesSymlinks')?.violations).toEqual([
        { reason: 'SnapshotNotSymlinked', commit: COMMIT },
      ]);
    });

    it('should fail every structural check for a degraded repository', () => {
      const counts = countFailures(checkFingerprint(degradedFingerprint('models--acme--tiny')));

      expect(counts).toEqual({ errors: 5, warnings: 0 });
    });
  });

  describe('targetSnapshotCommit', () => {
    const fingerprint = repoFingerprint('r', {
      refs: { main: OTHER_COMMIT },
      snapshots: [
        { commit: COMMIT, file_count: 1, symlink_count: 1 },
        { commit: OTHER_COMMIT, file_count: 1, symlink_count: 0 },
      ],
    });

    it('should prefer the snapshot named by the ref', () => {
      expect(targetSnapshotCommit(fingerprint)).toBe(OTHER_COMMIT);
    });

    it('should honor an explicit snapshot', () => {
      expect(targetSnapshotCommit(fingerprint, { snapshot: COMMIT })).toBe(COMMIT);
    });

    it('should fall back to the first snapshot', () => {
      expect(targetSnapshotCommit({ ...fingerprint, refs: { main: 'main' } })).toBe(COMMIT);
    });

    it('should drive SnapshotUsesSymlinks', () => {
      expect(resultFor(checkFingerprint(fingerprint), 'SnapshotUsesSymlinks')?.passed).toBe(false);
      expect(resultFor(checkFingerprint(fingerprint, { snapshot: COMMIT }), 'SnapshotUsesSymlinks')?.passed).toBe(
        true
      );
    });
  });

  describe('InvariantChecker', () => {
    let fixture: HubCacheFixture;
    let checker: InvariantChecker;

    beforeEach(async () => {
      fixture = await HubCacheFixture.create();
      checker = new InvariantChecker();
    });

    afterEach(async () => {
      await fixture.cleanup();
    });

    describe('checkRepo', () => {
      it('should pass every check for a repository with three linked blobs', async () => {
        const repo = await fixture.addValidRepo();

        const verification = await checker.checkRepo(fixture.scheme.repoDir(repo));

        expect(verification.repo).toBe('models--acme--tiny');
        expect(verification.results.map((r) => r.check)).toEqual([
          'RefPresent',
          'RefIsCommit',
          'BlobsNonEmpty',
          'SnapshotsPresent',
          'SnapshotUsesSymlinks',
          'RefSnapshotExists',
          'SymlinkResolves',
          'NoIncompleteDownloads',
        ]);
        expect(verification.results.filter((r) => !r.passed)).toEqual([]);
      });

      it('should report exactly the one dangling snapshot link', async () => {
        const repo = await fixture.addRepo({
          owner: 'acme',
          name: 'tiny',
          refs: { main: COMMIT },
          blobs: { k1: 'a', k2: 'b' },
          snapshots: { [COMMIT]: { 'a.json': 'k1', 'b.json': 'k2', 'c.json': 'deleted' } },
        });

        const verification = await checker.checkRepo(fixture.scheme.repoDir(repo));

        expect(resultFor(verification.results, 'SymlinkResolves')?.violations).toEqual([
          {
            reason: 'BrokenSymlink',
            path: fixture.scheme.snapshotFilePath(repo, COMMIT, 'c.json'),
            target: '../../blobs/deleted',
            cause: 'missing',
          },
        ]);
        expect(countFailures(verification.results)).toEqual({ errors: 1, warnings: 0 });
      });

      it('should report a snapshot link that lands outside the blob store', async () => {
        const repo = await fixture.addValidRepo();
        const outside = await fixture.writeFile('downloads/tmp-weights.bin', 'weights');
        const extra = await fixture.symlink(
          `hub/models--acme--tiny/snapshots/${COMMIT}/extra.bin`,
          outside
        );

        const verification = await checker.checkRepo(fixture.scheme.repoDir(repo));

        expect(resultFor(verification.results, 'SymlinkResolves')?.violations).toEqual([
          { reason: 'BrokenSymlink', path: extra, target: outside, cause: 'outside-blobs' },
        ]);
        expect(countFailures(verification.results)).toEqual({ errors: 1, warnings: 0 });
      });

      it('should report a snapshot link into another repository\'s blobs', async () => {
        await fixture.addValidRepo('acme', 'other');
        const repo = await fixture.addValidRepo();
        const borrowed = await fixture.symlink(
          `hub/models--acme--tiny/snapshots/${COMMIT}/borrowed.bin`,
          '../../../models--acme--other/blobs/k2'
        );

        const verification = await checker.checkRepo(fixture.scheme.repoDir(repo));

        expect(resultFor(verification.results, 'SymlinkResolves')?.violations).toEqual([
          {
            reason: 'BrokenSymlink',
            path: borrowed,
            target: '../../../models--acme--other/blobs/k2',
            cause: 'outside-blobs',
          },
        ]);
      });

      it('should warn about partial downloads', async () => {
        const repo = await fixture.addRepo({
          owner: 'acme',
          name: 'tiny',
          refs: { main: COMMIT },
          blobs: { k1: 'a', 'k2.incomplete': 'partial' },
          snapshots: { [COMMIT]: { 'a.json': 'k1' } },
        });

        const verification = await checker.checkRepo(fixture.scheme.repoDir(repo));

        expect(resultFor(verification.results, 'NoIncompleteDownloads')).toEqual({
          check: 'NoIncompleteDownloads',
          passed: false,
          severity: 'warning',
          violations: [
            { reason: 'IncompleteDownload', path: path.join(fixture.scheme.blobsDir(repo), 'k2.incomplete') },
          ],
        });
      });

      it('should pass SymlinkResolves vacuously without snapshots/', async () => {
        const repo = await fixture.addRepo({ owner: 'acme', name: 'tiny', refs: { main: COMMIT } });

        const verification = await checker.checkRepo(fixture.scheme.repoDir(repo));

        expect(resultFor(verification.results, 'SymlinkResolves')?.passed).toBe(true);
        expect(resultFor(verification.results, 'SnapshotsPresent')?.passed).toBe(false);
      });

      it('should propagate NotARepo for the named directory', async () => {
        const dir = await fixture.mkdir('hub/stray');

        await expect(checker.checkRepo(dir)).rejects.toMatchObject({ code: 'NotARepo' });
      });
    });

    describe('checkFriendlyAlias', () => {
      it('should report exactly one broken link in an alias tree', async () => {
        const repo = await fixture.addValidRepo();
        const aliasDir = await fixture.addAlias(repo, COMMIT, ['config.json', 'model.safetensors']);
        const dangling = await fixture.symlink('models/acme/tiny/extra.bin', 'nowhere.bin');

        const results = await checker.checkFriendlyAlias(aliasDir);

        expect(resultFor(results, 'SymlinkResolves')?.violations).toEqual([
          { reason: 'BrokenSymlink', path: dangling, target: 'nowhere.bin', cause: 'missing' },
        ]);
        expect(resultFor(results, 'AliasLinksOnly')?.passed).toBe(true);
      });

      it('should warn about regular files in an alias tree', async () => {
        const repo = await fixture.addValidRepo();
        const aliasDir = await fixture.addAlias(repo, COMMIT, ['config.json']);
        const copied = await fixture.writeFile('models/acme/tiny/notes.txt', 'copied');

        const results = await checker.checkFriendlyAlias(aliasDir);

        expect(resultFor(results, 'AliasLinksOnly')).toEqual({
          check: 'AliasLinksOnly',
          passed: false,
          severity: 'warning',
          violations: [{ reason: 'RegularFileInAlias', path: copied }],
        });
      });
    });

    describe('verifyCache', () => {
      it('should report a clean cache', async () => {
        const repo = await fixture.addValidRepo();
        await fixture.addAlias(repo, COMMIT, ['config.json']);

        const report = await checker.verifyCache(fixture.root);

        expect(report.repos).toHaveLength(1);
        expect(report.aliases).toHaveLength(1);
        expect(report.aliases[0]?.results.map((r) => [r.check, r.passed])).toEqual([
          ['SymlinkResolves', true],
          ['AliasLinksOnly', true],
          ['AliasHasRepo', true],
        ]);
        expect(report.complete).toBe(true);
        expect(report.errorCount).toBe(0);
        expect(report.warningCount).toBe(0);
      });

      it('should resolve alias links reached through a directory symlink', async () => {
        await fixture.addValidRepo();
        await fixture.symlink('models/acme/tiny', `../../hub/models--acme--tiny/snapshots/${COMMIT}`);

        const report = await checker.verifyCache(fixture.root);

        expect(report.aliases.map((alias) => alias.path)).toEqual([fixture.path('models', 'acme', 'tiny')]);
        expect(report.aliases[0]?.results.filter((r) => !r.passed)).toEqual([]);
        expect(report.errorCount).toBe(0);
        expect(report.warningCount).toBe(0);
      });

      it('should count errors and warnings across repositories', async () => {
        await fixture.addValidRepo('acme', 'good');
        await fixture.addRepo({
          owner: 'acme',
          name: 'branchy',
          refs: { main: 'main' },
          blobs: { k1: 'a' },
          snapshots: { [COMMIT]: { 'a.json': 'k1' } },
        });

        const report = await checker.verifyCache(fixture.root);

        expect(report.repos.map((r) => r.repo)).toEqual(['models--acme--branchy', 'models--acme--good']);
        expect(report.errorCount).toBe(1);
        expect(report.warningCount).toBe(1);
        const branchy = report.repos[0]?.results ?? [];
        expect(resultFor(branchy, 'RefIsCommit')?.passed).toBe(false);
        expect(resultFor(branchy, 'RefSnapshotExists')?.passed).toBe(false);
      });

      it('should find the dangling link in a friendly alias', async () => {
        await fixture.addValidRepo('Owner', 'Name');
        const link = await fixture.symlink('models/Owner/Name/file.bin', '../../../hub/models--Owner--Name/blobs/none');

        const report = await checker.verifyCache(fixture.root);

        expect(report.aliases).toHaveLength(1);
        expect(resultFor(report.aliases[0]?.results ?? [], 'SymlinkResolves')?.violations).toEqual([
          {
            reason: 'BrokenSymlink',
            path: link,
            target: '../../../hub/models--Owner--Name/blobs/none',
            cause: 'missing',
          },
        ]);
        expect(report.errorCount).toBe(1);
      });

      it('should warn about aliases without a hub repository', async () => {
        await fixture.mkdir('datasets/org/orphan');

        const report = await checker.verifyCache(fixture.root);

        expect(resultFor(report.aliases[0]?.results ?? [], 'AliasHasRepo')?.violations).toEqual([
          { reason: 'AliasWithoutRepo', aliasId: 'org/orphan', repoDirName: 'datasets--org--orphan' },
        ]);
        expect(report.warningCount).toBe(1);
      });

      it('should filter repositories and aliases by query', async () => {
        const tiny = await fixture.addValidRepo('acme', 'tiny');
        await fixture.addValidRepo('acme', 'large');
        await fixture.addAlias(tiny, COMMIT, ['config.json']);

        const report = await checker.verifyCache(fixture.root, { repoFilter: 'TINY' });

        expect(report.repos.map((r) => r.repo)).toEqual(['models--acme--tiny']);
        expect(report.aliases.map((a) => a.alias.name)).toEqual(['tiny']);
      });

      it('should skip live checks when asked', async () => {
        await fixture.addValidRepo();

        const report = await checker.verifyCache(fixture.root, { skipLinks: true });

        expect(report.repos[0]?.results.map((r) => r.check)).not.toContain('SymlinkResolves');
        expect(report.repos[0]?.results).toHaveLength(6);
      });

      it('should fail degraded repositories without walking them', async () => {
        await fixture.addValidRepo('acme', 'broken');

        class FailingRepoInspector extends RepoInspector {
          override async inspect(repoDir: string): Promise<RepoFingerprint> {
            throw createAccessFault(repoDir);
          }
        }
        const repoInspector = new FailingRepoInspector();
        const degradedChecker = new InvariantChecker({
          repoInspector,
          cacheInspector: new CacheInspector({ repoInspector }),
        });

        const report = await degradedChecker.verifyCache(fixture.root);

        expect(report.repos[0]?.fingerprint.degraded).toBe(true);
        expect(report.repos[0]?.results).toHaveLength(6);
        expect(report.errorCount).toBe(5);
        expect(report.warningCount).toBe(0);
      });

      it('should raise AccessFault for a missing cache root', async () => {
        await expect(checker.verifyCache(fixture.path('absent'))).rejects.toMatchObject({ code: 'AccessFault' });
      });
    });
  });
});
