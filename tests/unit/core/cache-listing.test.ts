import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { listCachedRepos, shortCommit } from '../../../src/core/cache-listing.js';
import { COMMIT, OTHER_COMMIT, HubCacheFixture } from '../../helpers/hub-cache-fixture.js';

describe('Cache Listing', () => {
  let fixture: HubCacheFixture;

  beforeEach(async () => {
    fixture = await HubCacheFixture.create();

    await fixture.addRepo({
      owner: 'acme',
      name: 'small',
      refs: { main: `${COMMIT}\n` },
      blobs: { k1: '12345', 'k2.incomplete': 'partial-download' },
    });
    await fixture.addRepo({
      owner: 'acme',
      name: 'large',
      refs: { main: OTHER_COMMIT },
      blobs: { k1: 'x'.repeat(100), k2: 'y'.repeat(50) },
    });
    await fixture.addRepo({ kind: 'dataset', owner: 'org', name: 'corpus', blobs: { k1: 'x'.repeat(20) } });
    await fixture.mkdir('hub/.locks');
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('should list repositories by id with completed blob totals', async () => {
    const entries = await listCachedRepos(fixture.root);

    expect(entries).toEqual([
      {
        kind: 'model',
        repo_id: 'acme/large',
        commit: 'fedcba9',
        files: 2,
        size_bytes: 150,
        path: fixture.path('hub', 'models--acme--large'),
      },
      {
        kind: 'model',
        repo_id: 'acme/small',
        commit: '0123456',
        files: 1,
        size_bytes: 5,
        path: fixture.path('hub', 'models--acme--small'),
      },
      {
        kind: 'dataset',
        repo_id: 'org/corpus',
        commit: '',
        files: 1,
        size_bytes: 20,
        path: fixture.path('hub', 'datasets--org--corpus'),
      },
    ]);
  });

  it('should sort by size, largest first', async () => {
    const entries = await listCachedRepos(fixture.root, { sort: 'size' });

    expect(entries.map((e) => e.repo_id)).toEqual(['acme/large', 'org/corpus', 'acme/small']);
  });

  it('should filter by kind', async () => {
    const entries = await listCachedRepos(fixture.root, { kind: 'dataset' });

    expect(entries.map((e) => e.repo_id)).toEqual(['org/corpus']);
  });

  it('should return nothing when hub/ is absent', async () => {
    expect(await listCachedRepos(fixture.path('elsewhere'))).toEqual([]);
  });

  describe('shortCommit', () => {
    it('should keep the first seven characters', () => {
      expect(shortCommit(COMMIT)).toBe('0123456');
      expect(shortCommit('abc')).toBe('abc');
      expect(shortCommit('')).toBe('');
    });
  });
});
