import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
}));

vi.mock('@robin-radio/platform-core', async importOriginal => ({
  ...(await importOriginal<typeof import('@robin-radio/platform-core')>()),
  getLogger: () => mockLogger,
}));

import { MemoryKeyValueStore, type RetryOptions } from '@robin-radio/platform-core';
import { CatalogSynchronizer, type CatalogSynchronizerOptions } from '../../application/services/CatalogSynchronizer';
import { ResolvedUrlCache, URL_CACHE_KEY } from '../../application/services/ResolvedUrlCache';
import { ProgressEventStream } from '../../application/services/ProgressEventStream';
import type { LoadingProgress } from '../../domains/catalog/value-objects/LoadingProgress';
import { CatalogError } from '../../application/errors';
import { FakeRemoteCatalogStore, buildCatalogFiles, signedUrlFor } from '../helpers/FakeRemoteCatalogStore';

const NO_RETRY: RetryOptions = { maxAttempts: 1, baseDelayMs: 1 };

function createSynchronizer(remote: FakeRemoteCatalogStore, options: CatalogSynchronizerOptions = {}) {
  const kv = new MemoryKeyValueStore();
  const progress = new ProgressEventStream();
  const urlCache = new ResolvedUrlCache(remote, kv, { retry: NO_RETRY });
  const synchronizer = new CatalogSynchronizer(remote, urlCache, progress, { retry: NO_RETRY, ...options });
  const events: LoadingProgress[] = [];
  progress.subscribe(event => events.push(event));
  return { kv, synchronizer, events };
}

describe('CatalogSynchronizer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('syncCatalog', () => {
    it('should build every album with its tracks and cover', async () => {
      const remote = new FakeRemoteCatalogStore(
        buildCatalogFiles({
          Alpha: { First: 2, Second: 2 },
          Beta: { Third: 2, Fourth: 2, Fifth: 2 },
        })
      );
      const { synchronizer } = createSynchronizer(remote);

      const albums = await synchronizer.syncCatalog();

      expect(albums.map(album => album.id)).toEqual([
        'Alpha_First',
        'Alpha_Second',
        'Beta_Third',
        'Beta_Fourth',
        'Beta_Fifth',
      ]);
      for (const album of albums) {
        expect(album.tracks).toHaveLength(2);
        expect(album.albumCover).toBe(signedUrlFor(`Artist/${album.artist}/${album.albumName}/cover.jpg`));
      }

      const [first] = albums[0].tracks;
      expect(first.id).toBe('Alpha_First_01 Track.mp3');
      expect(first.songName).toBe('01 Track.mp3');
      expect(first.artist).toBe('Alpha');
      expect(first.albumName).toBe('First');
      expect(first.songUrl).toBe(signedUrlFor('Artist/Alpha/First/01 Track.mp3'));
    });

    it('should report discovery, each batch and completion as progress', async () => {
      const remote = new FakeRemoteCatalogStore(
        buildCatalogFiles({
          Alpha: { First: 2, Second: 2 },
          Beta: { Third: 2, Fourth: 2, Fifth: 2 },
        })
      );
      const { synchronizer, events } = createSynchronizer(remote, { batchSize: 3 });

      await synchronizer.syncCatalog();

      expect(events.map(event => event.message)).toEqual([
        'Found 2 artists',
        'Discovered 5 albums from 2 artists',
        'Processed 3 of 5 albums',
        'Processed 5 of 5 albums',
        'Loaded 5 albums',
      ]);
      expect(events[0].progress).toBe(0.05);
      expect(events[1]).toMatchObject({ progress: 0.1, itemsProcessed: 0, totalItems: 5 });
      expect(events[2].itemsProcessed).toBe(3);
      expect(events[2].progress).toBeCloseTo(0.64);
      expect(events[3]).toMatchObject({ progress: 1, itemsProcessed: 5, estimatedRemainingMs: 0 });
      expect(events[4]).toMatchObject({ progress: 1, itemsProcessed: 5, totalItems: 5, estimatedRemainingMs: 0 });
    });

    it('should only advance progress once a whole batch has settled', async () => {
      const remote = new FakeRemoteCatalogStore(buildCatalogFiles({ X: { A1: 1, A2: 1, A3: 1 } }));
      const release = remote.holdListing('Artist/X/A2/');
      const { synchronizer, events } = createSynchronizer(remote, { batchSize: 2 });

      const sync = synchronizer.syncCatalog();
      await vi.waitFor(() => {
        expect(remote.urlCalls).toContain('Artist/X/A1/01 Track.mp3');
        expect(remote.listCalls).toContain('Artist/X/A2/');
      });
      await new Promise<void>(resolve => setImmediate(resolve));

      expect(events.filter(event => event.itemsProcessed > 0)).toEqual([]);
      expect(remote.listCalls).not.toContain('Artist/X/A3/');

      release();
      await sync;

      expect(events.filter(event => event.message.startsWith('Processed')).map(event => event.itemsProcessed)).toEqual([
        2, 3,
      ]);
    });

    it('should skip an artist whose listing times out', async () => {
      const remote = new FakeRemoteCatalogStore(buildCatalogFiles({ Alpha: { A1: 1 }, Beta: { B1: 1 }, Gamma: { G1: 1 } }));
      remote.failListing('Artist/Beta/', 'hang');
      const { synchronizer } = createSynchronizer(remote, { timeouts: { artistListingMs: 20 } });

      const albums = await synchronizer.syncCatalog();

      expect(albums.map(album => album.id)).toEqual(['Alpha_A1', 'Gamma_G1']);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        'Skipping artist, album listing failed',
        expect.objectContaining({ artist: 'Beta' })
      );
    });

    it('should skip an album whose listing fails', async () => {
      const remote = new FakeRemoteCatalogStore(buildCatalogFiles({ Alpha: { A1: 1, A2: 1 } }));
      remote.failListing('Artist/Alpha/A1/', new Error('connection reset'));
      const { synchronizer } = createSynchronizer(remote);

      const albums = await synchronizer.syncCatalog();

      expect(albums.map(album => album.id)).toEqual(['Alpha_A2']);
    });

    it('should never return an album without tracks', async () => {
      const remote = new FakeRemoteCatalogStore([
        'Artist/Alpha/ArtOnly/cover.jpg',
        'Artist/Alpha/Broken/01 Track.mp3',
        ...buildCatalogFiles({ Alpha: { Songs: 1 } }),
      ]);
      remote.failUrl('Artist/Alpha/Broken/01 Track.mp3', new Error('signing failed'));
      const { synchronizer } = createSynchronizer(remote);

      const albums = await synchronizer.syncCatalog();

      expect(albums.map(album => album.id)).toEqual(['Alpha_Songs']);
    });

    it('should drop songs whose URL cannot be resolved and keep the rest', async () => {
      const remote = new FakeRemoteCatalogStore(buildCatalogFiles({ Alpha: { A1: 3 } }));
      remote.failUrl('Artist/Alpha/A1/02 Track.mp3', new Error('signing failed'));
      const { synchronizer } = createSynchronizer(remote);

      const [album] = await synchronizer.syncCatalog();

      expect(album.tracks.map(track => track.songName)).toEqual(['01 Track.mp3', '03 Track.mp3']);
    });

    it('should fall through to the next image when a cover cannot be resolved', async () => {
      const remote = new FakeRemoteCatalogStore([
        'Artist/Alpha/A1/01 Track.mp3',
        'Artist/Alpha/A1/a-cover.jpg',
        'Artist/Alpha/A1/b-cover.png',
      ]);
      remote.failUrl('Artist/Alpha/A1/a-cover.jpg', new Error('denied'));
      const { synchronizer } = createSynchronizer(remote);

      const [album] = await synchronizer.syncCatalog();

      expect(album.albumCover).toBe(signedUrlFor('Artist/Alpha/A1/b-cover.png'));
    });

    it('should leave the cover unset when an album has no image', async () => {
      const remote = new FakeRemoteCatalogStore(['Artist/Alpha/A1/01 Track.mp3']);
      const { synchronizer } = createSynchronizer(remote);

      const [album] = await synchronizer.syncCatalog();

      expect(album.albumCover).toBeUndefined();
    });

    it('should fail with an empty-catalog error when no album has tracks', async () => {
      const remote = new FakeRemoteCatalogStore(['Artist/Alpha/ArtOnly/cover.jpg']);
      const { synchronizer } = createSynchronizer(remote);

      await expect(synchronizer.syncCatalog()).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'No albums found in the remote catalog',
      });
    });

    it('should classify a root listing timeout as a timeout error', async () => {
      const remote = new FakeRemoteCatalogStore();
      remote.failListing('Artist/', 'hang');
      const { synchronizer } = createSynchronizer(remote, { timeouts: { rootListingMs: 20 } });

      const failure = await synchronizer.syncCatalog().catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(CatalogError);
      expect(failure).toMatchObject({ code: 'TIMEOUT', statusCode: 504, message: 'Operation timed out: list artists' });
    });

    it('should classify an unclassified root failure as a network error', async () => {
      const remote = new FakeRemoteCatalogStore();
      remote.failListing('Artist/', new Error('ECONNRESET'));
      const { synchronizer } = createSynchronizer(remote);

      await expect(synchronizer.syncCatalog()).rejects.toMatchObject({
        code: 'NETWORK_ERROR',
        message: 'Network failure during catalog sync',
      });
      expect(mockLogger.error).toHaveBeenCalledWith('Catalog sync failed', expect.any(Object));
    });

    it('should pass through errors the store already classified', async () => {
      const denied = CatalogError.permissionDenied('Artist/');
      const remote = new FakeRemoteCatalogStore();
      remote.failListing('Artist/', denied);
      const { synchronizer } = createSynchronizer(remote);

      await expect(synchronizer.syncCatalog()).rejects.toBe(denied);
    });

    it('should retry the root listing before giving up', async () => {
      const remote = new FakeRemoteCatalogStore(buildCatalogFiles({ Alpha: { A1: 1 } }));
      const listChildren = vi.spyOn(remote, 'listChildren');
      listChildren.mockRejectedValueOnce(new Error('flaky'));
      const { synchronizer } = createSynchronizer(remote, { retry: { maxAttempts: 2, baseDelayMs: 1 } });

      const albums = await synchronizer.syncCatalog();

      expect(albums).toHaveLength(1);
      expect(listChildren.mock.calls[0]).toEqual(['Artist/']);
      expect(listChildren.mock.calls[1]).toEqual(['Artist/']);
    });

    it('should persist resolved URLs once the sync finishes', async () => {
      const remote = new FakeRemoteCatalogStore(buildCatalogFiles({ Alpha: { A1: 1 } }));
      const { synchronizer, kv } = createSynchronizer(remote);

      await synchronizer.syncCatalog();

      const table: unknown = JSON.parse((await kv.get(URL_CACHE_KEY)) ?? '{}');
      expect(table).toEqual({
        'Artist/Alpha/A1/cover.jpg': signedUrlFor('Artist/Alpha/A1/cover.jpg'),
        'Artist/Alpha/A1/01 Track.mp3': signedUrlFor('Artist/Alpha/A1/01 Track.mp3'),
      });
    });
  });

  describe('syncAlbum', () => {
    it('should re-fetch a single album by artist and name', async () => {
      const remote = new FakeRemoteCatalogStore(buildCatalogFiles({ Alpha: { A1: 1, A2: 1 } }));
      const { synchronizer } = createSynchronizer(remote);
      remote.setFiles(buildCatalogFiles({ Alpha: { A1: 3, A2: 1 } }));

      const album = await synchronizer.syncAlbum('Alpha', 'A1');

      expect(album?.id).toBe('Alpha_A1');
      expect(album?.trackCount).toBe(3);
      expect(remote.listCalls).toEqual(['Artist/Alpha/A1/']);
    });

    it('should resolve to null when the album has no tracks left', async () => {
      const remote = new FakeRemoteCatalogStore(['Artist/Alpha/A1/cover.jpg']);
      const { synchronizer } = createSynchronizer(remote);

      expect(await synchronizer.syncAlbum('Alpha', 'A1')).toBeNull();
    });

    it('should classify a listing failure', async () => {
      const remote = new FakeRemoteCatalogStore();
      remote.failListing('Artist/Alpha/A1/', new Error('socket hang up'));
      const { synchronizer } = createSynchronizer(remote);

      await expect(synchronizer.syncAlbum('Alpha', 'A1')).rejects.toMatchObject({
        code: 'NETWORK_ERROR',
        message: 'Network failure during sync album Alpha/A1',
      });
    });
  });
});
