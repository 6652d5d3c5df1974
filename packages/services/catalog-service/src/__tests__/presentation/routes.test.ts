import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import http from 'http';
import type { Express } from 'express';

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

import { MemoryKeyValueStore, SSEManager } from '@robin-radio/platform-core';
import { createServiceRegistry, type ServiceRegistry } from '../../infrastructure/ServiceFactory';
import type { CatalogServiceConfig } from '../../config/service-config';
import { createApp } from '../../presentation/app';
import { FakeRemoteCatalogStore, buildCatalogFiles, signedUrlFor } from '../helpers/FakeRemoteCatalogStore';
import { ControlledFileTransfer, MemoryOfflineFileStore } from '../helpers/fakes';

const config: CatalogServiceConfig = {
  port: 0,
  remoteStore: { provider: 'gcs', bucketName: 'test-bucket', signedUrlTtlSeconds: 3600 },
  keyValue: { kind: 'memory' },
  offlineDir: '/offline',
  downloadConcurrency: 2,
  radioIntervalMs: 180000,
  syncBatchSize: 3,
  loadBudgetMs: 30000,
};

const SONG = {
  id: 'Nina_Blue_01 Blue Line.mp3',
  songName: 'Blue Line',
  artist: 'Nina',
  albumName: 'Blue',
  songUrl: 'https://cdn.test/blue-line.mp3?sig=test',
  duration: 181,
};

interface OpenStream {
  received(): string;
  close(): Promise<void>;
}

async function openStream(app: Express, path: string): Promise<OpenStream> {
  const server = app.listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }

  let body = '';
  const req = http.get(`http://127.0.0.1:${address.port}${path}`, res => {
    res.setEncoding('utf8');
    res.on('data', (chunk: string) => {
      body += chunk;
    });
    res.on('error', () => {});
  });
  req.on('error', () => {});

  return {
    received: () => body,
    close: async () => {
      req.destroy();
      server.closeAllConnections();
      await new Promise<void>(resolve => server.close(() => resolve()));
    },
  };
}

function firstTrack(body: string): { albumId: string; song: { songName: string } } {
  const [, afterEvent = ''] = body.split('event: track\ndata: ');
  return JSON.parse(afterEvent.split('\n')[0]);
}

describe('catalog service routes', () => {
  let remote: FakeRemoteCatalogStore;
  let transfer: ControlledFileTransfer;
  let registry: ServiceRegistry;
  let sse: SSEManager;
  let app: Express;

  beforeEach(() => {
    vi.clearAllMocks();
    remote = new FakeRemoteCatalogStore(buildCatalogFiles({ Alpha: { First: 2 }, Beta: { Second: 1 } }));
    transfer = new ControlledFileTransfer();
    registry = createServiceRegistry(config, {
      kvStore: new MemoryKeyValueStore(),
      remoteStore: remote,
      fileTransfer: transfer,
      offlineFiles: new MemoryOfflineFileStore(),
    });
    sse = new SSEManager();
    app = createApp(registry, sse);
  });

  afterEach(() => {
    registry.radio.stop();
    registry.downloads.dispose();
    registry.library.dispose();
    sse.shutdown();
  });

  describe('GET /health', () => {
    it('should report the service and its remote store', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        status: 'ok',
        service: 'catalog-service',
        remoteStore: 'fake',
        activeDownloads: 0,
      });
    });
  });

  describe('/api/catalog', () => {
    it('should sync and return the catalog', async () => {
      const res = await request(app).get('/api/catalog');

      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      const albums: Array<{ id: string }> = res.body.data;
      expect(albums.map(album => album.id).sort()).toEqual(['Alpha_First', 'Beta_Second']);

      const second = res.body.data.find((album: { id: string }) => album.id === 'Beta_Second');
      expect(second).toEqual({
        id: 'Beta_Second',
        albumName: 'Second',
        artist: 'Beta',
        albumCover: signedUrlFor('Artist/Beta/Second/cover.jpg'),
        tracks: [
          {
            id: 'Beta_Second_01 Track.mp3',
            songName: '01 Track.mp3',
            artist: 'Beta',
            albumName: 'Second',
            songUrl: signedUrlFor('Artist/Beta/Second/01 Track.mp3'),
          },
        ],
      });
    });

    it('should serve the cache-only view without touching the remote store', async () => {
      const before = await request(app).get('/api/catalog/cached');
      expect(before.body.data).toEqual([]);
      expect(remote.remoteCalls).toBe(0);

      await request(app).get('/api/catalog');
      const after = await request(app).get('/api/catalog/cached');

      expect(after.body.data).toHaveLength(2);
    });

    it('should list the tracks of an album', async () => {
      const res = await request(app).get('/api/catalog/albums/Alpha_First/tracks');

      expect(res.status).toBe(200);
      expect(res.body.data.map((track: { songName: string }) => track.songName)).toEqual(['01 Track.mp3', '02 Track.mp3']);
    });

    it('should answer 404 for an unknown album', async () => {
      const res = await request(app).get('/api/catalog/albums/nope/tracks');

      expect(res.status).toBe(404);
      expect(res.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'Album not found: nope' });
    });

    it('should look up a single track', async () => {
      const found = await request(app).get(`/api/catalog/tracks/${encodeURIComponent('Alpha_First_02 Track.mp3')}`);
      const missing = await request(app).get('/api/catalog/tracks/missing');

      expect(found.status).toBe(200);
      expect(found.body.data).toMatchObject({ songName: '02 Track.mp3', artist: 'Alpha', albumName: 'First' });
      expect(missing.status).toBe(404);
      expect(missing.body.error.message).toBe('Track not found: missing');
    });

    it('should search albums and tracks', async () => {
      const albums = await request(app).get('/api/catalog/search/albums').query({ q: 'fir' });
      const tracks = await request(app).get('/api/catalog/search/tracks').query({ q: 'beta' });

      expect(albums.body.data.map((album: { id: string }) => album.id)).toEqual(['Alpha_First']);
      expect(tracks.body.data.map((track: { id: string }) => track.id)).toEqual(['Beta_Second_01 Track.mp3']);
    });

    it('should return nothing for an empty search', async () => {
      const res = await request(app).get('/api/catalog/search/albums');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([]);
      expect(remote.remoteCalls).toBe(0);
    });

    it('should refresh by running a new sync', async () => {
      await request(app).get('/api/catalog');
      remote.setFiles(buildCatalogFiles({ Alpha: { First: 2 }, Beta: { Second: 1 }, Gamma: { Third: 1 } }));

      const res = await request(app).post('/api/catalog/refresh');

      expect(res.status).toBe(200);
      expect(res.body.data).toHaveLength(3);
      expect(remote.listCalls.filter(path => path === 'Artist/')).toHaveLength(2);
    });

    it('should clear the cache', async () => {
      await request(app).get('/api/catalog');

      const res = await request(app).delete('/api/catalog/cache');
      const cached = await request(app).get('/api/catalog/cached');

      expect(res.body.data).toEqual({ cleared: true });
      expect(cached.body.data).toEqual([]);
    });
  });

  describe('GET /api/radio/next', () => {
    it('should pick a track from the catalog', async () => {
      const res = await request(app).get('/api/radio/next');

      expect(res.status).toBe(200);
      expect(['Alpha_First', 'Beta_Second']).toContain(res.body.data.albumId);
      expect(res.body.data.song.songName).toMatch(/^0[12] Track\.mp3$/);
    });

    it('should answer 404 when the catalog is empty', async () => {
      remote.setFiles([]);

      const res = await request(app).get('/api/radio/next');

      expect(res.status).toBe(404);
      expect(res.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'No albums found in the remote catalog' });
    });
  });

  describe('GET /api/radio/stream', () => {
    it('should run the station while a listener is connected', async () => {
      const stream = await openStream(app, '/api/radio/stream');

      await vi.waitFor(() => expect(stream.received()).toContain('event: track\n'));
      expect(registry.radio.isRunning).toBe(true);
      expect(['Alpha_First', 'Beta_Second']).toContain(firstTrack(stream.received()).albumId);

      await stream.close();
      await vi.waitFor(() => expect(registry.radio.isRunning).toBe(false));
    });

    it('should send the current track to a late listener and stop after the last one leaves', async () => {
      const first = await openStream(app, '/api/radio/stream');
      await vi.waitFor(() => expect(first.received()).toContain('event: track\n'));

      const second = await openStream(app, '/api/radio/stream');
      await vi.waitFor(() => expect(second.received()).toContain('event: track\n'));
      expect(firstTrack(second.received())).toEqual(firstTrack(first.received()));

      await first.close();
      await vi.waitFor(() => expect(sse.getClientCount()).toBe(1));
      expect(registry.radio.isRunning).toBe(true);

      await second.close();
      await vi.waitFor(() => expect(registry.radio.isRunning).toBe(false));
    });
  });

  describe('/api/downloads', () => {
    it('should enqueue a song and start its transfer', async () => {
      const res = await request(app).post('/api/downloads').send(SONG);

      expect(res.status).toBe(201);
      expect(res.body.data.id).toMatch(/^download-/);
      await vi.waitFor(() => expect(transfer.urls).toEqual([SONG.songUrl]));

      const list = await request(app).get('/api/downloads');
      expect(list.body.data.active).toHaveLength(1);
      expect(list.body.data.active[0]).toMatchObject({ songId: SONG.id, status: 'downloading' });
      expect(list.body.data.queued).toEqual([]);
    });

    it('should reject an invalid song URL', async () => {
      const res = await request(app)
        .post('/api/downloads')
        .send({ ...SONG, songUrl: 'not a url' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(transfer.urls).toEqual([]);
    });

    it('should reject a second download of the same song', async () => {
      await request(app).post('/api/downloads').send(SONG);

      const res = await request(app).post('/api/downloads').send(SONG);

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('DOWNLOAD_ALREADY_EXISTS');
    });

    it('should pause once and refuse to pause again', async () => {
      const created = await request(app).post('/api/downloads').send(SONG);
      const id: string = created.body.data.id;

      const first = await request(app).post(`/api/downloads/${id}/pause`);
      const second = await request(app).post(`/api/downloads/${id}/pause`);

      expect(first.status).toBe(200);
      expect(first.body.data.status).toBe('paused');
      expect(second.status).toBe(409);
      expect(second.body.error.message).toBe(`Cannot move download ${id} from paused to paused`);
    });

    it('should answer 404 for an unknown download', async () => {
      const res = await request(app).post('/api/downloads/download-missing/cancel');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('DOWNLOAD_NOT_FOUND');
    });

    it('should expose a finished download in the offline library', async () => {
      await request(app).post('/api/downloads').send(SONG);
      await vi.waitFor(() => expect(transfer.urls).toEqual([SONG.songUrl]));
      transfer.complete(SONG.songUrl);
      await vi.waitFor(() => expect(registry.downloads.isSongOffline(SONG.id)).toBe(true));

      const offline = await request(app).get('/api/offline');

      expect(offline.body.data.totalBytes).toBe(11);
      expect(offline.body.data.songs).toEqual([
        expect.objectContaining({ id: SONG.id, localPath: '/offline/blue_line_nina.mp3', fileSize: 11, duration: 181 }),
      ]);

      const history = await request(app).delete('/api/downloads/history');
      expect(history.body.data).toEqual({ removed: 1 });
    });

    it('should delete an offline song and free the song for download', async () => {
      await request(app).post('/api/downloads').send(SONG);
      await vi.waitFor(() => expect(transfer.urls).toEqual([SONG.songUrl]));
      transfer.complete(SONG.songUrl);
      await vi.waitFor(() => expect(registry.downloads.isSongOffline(SONG.id)).toBe(true));

      const res = await request(app).delete(`/api/offline/${encodeURIComponent(SONG.id)}`);
      const again = await request(app).post('/api/downloads').send(SONG);

      expect(res.body.data).toEqual({ removed: SONG.id });
      expect(again.status).toBe(201);
    });

    it('should answer 404 when deleting an unknown offline song', async () => {
      const res = await request(app).delete('/api/offline/unknown');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('OFFLINE_SONG_NOT_FOUND');
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await request(app).get('/api/nowhere');

    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe('Route GET /api/nowhere not found');
  });
});
