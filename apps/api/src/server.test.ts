import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InMemoryCloudStore } from '@seedsync/cloud/testing';
import type { TimerSource } from '@seedsync/sync';
import { pathExists } from '@seedsync/utils';
import { loadConfig } from './config/index.js';
import { createContext, stopContext, type AppContext } from './context.js';
import { createApiLogger } from './lib/logger.js';
import { createServer } from './server.js';

const TITLE = 'ShowX.S01E01';

// Periodic tasks never fire on their own; tests drive reconciliation directly
const idleTimers: TimerSource = () => () => undefined;

describe('API server', () => {
  let dir: string;
  let torrentDir: string;
  let downloadDir: string;
  let cloud: InMemoryCloudStore;
  let context: AppContext;
  let server: FastifyInstance;

  async function login(): Promise<void> {
    await context.credentials.setCredential({
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      expiresAt: Date.now() + 3_600_000,
    });
  }

  async function addMagnet(title = TITLE) {
    return server.inject({
      method: 'POST',
      url: '/downloads',
      payload: { title, download_url: 'magnet:?xt=urn:btih:abc', series_id: 12 },
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seedsync-api-'));
    torrentDir = join(dir, 'torrents');
    downloadDir = join(dir, 'downloads');
    await mkdir(torrentDir);
    await mkdir(downloadDir);

    const config = loadConfig({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      DATA_DIR: dir,
      TORRENT_DIR: torrentDir,
      DOWNLOAD_DIR: downloadDir,
    });
    cloud = new InMemoryCloudStore();
    context = await createContext(config, createApiLogger(config), { cloud, timers: idleTimers });
    server = await createServer(context);
  });

  afterEach(async () => {
    await server.close();
    await stopContext(context);
    await rm(dir, { recursive: true, force: true });
  });

  describe('health', () => {
    it('answers the liveness probe', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok' });
    });

    it('reports a logged-out cloud store as degraded', async () => {
      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'degraded',
        checks: {
          cloud: { status: 'fail', error: 'not logged in' },
          library: { status: 'skip' },
          watcher: { status: 'skip' },
        },
        transfers: { tracked: 0, fetching: 0 },
      });
    });

    it('renders unknown routes as 404', async () => {
      const response = await server.inject({ method: 'GET', url: '/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        statusCode: 404,
        error: 'Not Found',
        message: 'Route GET /nope not found',
      });
    });
  });

  describe('auth', () => {
    it('walks through a device login and logout', async () => {
      expect((await server.inject({ method: 'GET', url: '/auth/status' })).json()).toEqual({ authenticated: false });

      const started = await server.inject({ method: 'POST', url: '/auth/login' });
      expect(started.json()).toEqual({
        success: true,
        user_code: 'TEST-CODE',
        verification_uri: 'https://cloud.test/devices',
        expires_in: 600,
      });
      expect((await server.inject({ method: 'GET', url: '/auth/poll' })).json()).toEqual({
        success: true,
        status: 'pending',
      });

      await server.inject({ method: 'POST', url: '/auth/logout' });
      expect((await server.inject({ method: 'GET', url: '/auth/poll' })).json()).toEqual({
        success: false,
        status: 'cancelled',
      });
    });

    it('reports stored credentials as authenticated', async () => {
      await login();

      expect((await server.inject({ method: 'GET', url: '/auth/status' })).json()).toEqual({ authenticated: true });
      expect((await server.inject({ method: 'GET', url: '/auth/poll' })).json()).toEqual({
        success: true,
        status: 'authenticated',
        redirect: '/',
      });
    });

    it('forgets the credentials on logout', async () => {
      await login();

      expect((await server.inject({ method: 'POST', url: '/auth/logout' })).json()).toEqual({ success: true });
      expect(await pathExists(context.config.credentialsPath)).toBe(false);
      expect((await server.inject({ method: 'GET', url: '/auth/status' })).json()).toEqual({ authenticated: false });
    });
  });

  describe('user', () => {
    it('rejects the account lookup when logged out', async () => {
      const response = await server.inject({ method: 'GET', url: '/user' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        error: 'UpstreamError',
        code: 'UPSTREAM_UNAUTHENTICATED',
        message: 'cloud store: not logged in to the cloud store',
      });
    });

    it('returns the cloud account', async () => {
      await login();

      const response = await server.inject({ method: 'GET', url: '/user' });

      expect(response.json()).toEqual({
        success: true,
        username: 'tester',
        email: null,
        space_used: 0,
        space_max: 1_000_000,
        premium: false,
      });
    });
  });

  describe('downloads', () => {
    beforeEach(login);

    it('submits a magnet link and lists it', async () => {
      const created = await addMagnet();

      expect(created.statusCode).toBe(200);
      const body = created.json();
      expect(body).toMatchObject({ success: true, message: `Submitted ${TITLE}` });
      expect(body.download_id).toBe(context.tracker.findByTitle(TITLE)?.id);

      const listed = await server.inject({ method: 'GET', url: '/downloads' });
      expect(listed.json()).toMatchObject([
        {
          title: TITLE,
          status: 'queued',
          progress: 0,
          size_bytes: null,
          series_id: 12,
          error: null,
          notice: null,
          retry_count: 0,
        },
      ]);
    });

    it('rejects a title that is already tracked', async () => {
      await addMagnet();

      const response = await addMagnet();

      expect(response.statusCode).toBe(409);
      expect(response.json()).toMatchObject({ code: 'CONFLICT', message: `Transfer already exists: ${TITLE}` });
    });

    it('validates the request body', async () => {
      const missing = await server.inject({ method: 'POST', url: '/downloads', payload: { download_url: 'magnet:?x' } });
      expect(missing.statusCode).toBe(400);
      expect(missing.json()).toMatchObject({ error: 'Validation Error', code: 'VALIDATION_ERROR' });

      const ftp = await server.inject({
        method: 'POST',
        url: '/downloads',
        payload: { title: TITLE, download_url: 'ftp://example.test/a.torrent' },
      });
      expect(ftp.statusCode).toBe(400);
      expect(ftp.json()).toMatchObject({ error: 'ValidationError', details: { field: 'download_url' } });
    });

    it('answers 404 for an unknown title', async () => {
      const response = await server.inject({ method: 'GET', url: '/downloads/Nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ code: 'NOT_FOUND', message: 'Transfer not found: Nope' });
    });

    it('pauses and resumes a downloading transfer', async () => {
      await addMagnet();

      const early = await server.inject({ method: 'POST', url: `/downloads/${TITLE}/pause` });
      expect(early.statusCode).toBe(400);
      expect(early.json()).toMatchObject({ code: 'STATE_TRANSITION_ERROR' });

      cloud.setStatus('1', 'downloading', 0.4);
      await context.orchestrator.reconcile();

      const paused = await server.inject({ method: 'POST', url: `/downloads/${TITLE}/pause` });
      expect(paused.json()).toEqual({ success: true, message: `Paused ${TITLE}` });
      expect(cloud.transfers.get('1')?.status).toBe('paused');

      const resumed = await server.inject({ method: 'POST', url: `/downloads/${TITLE}/resume` });
      expect(resumed.json()).toEqual({ success: true, message: `Resumed ${TITLE}` });
      expect((await server.inject({ method: 'GET', url: `/downloads/${TITLE}` })).json()).toMatchObject({
        status: 'downloading',
        progress: 0.4,
      });
    });

    it('passes a cloud rate limit through with Retry-After', async () => {
      await addMagnet();
      cloud.setStatus('1', 'downloading', 0.4);
      await context.orchestrator.reconcile();
      cloud.failNext('pause', { kind: 'RateLimited', message: 'slow down', retryAfterMs: 1_500 });

      const response = await server.inject({ method: 'POST', url: `/downloads/${TITLE}/pause` });

      expect(response.statusCode).toBe(429);
      expect(response.headers['retry-after']).toBe('2');
      expect(response.json()).toMatchObject({ code: 'UPSTREAM_RATELIMITED', message: 'cloud store: slow down' });
    });

    it('retries a failed transfer', async () => {
      await addMagnet();
      cloud.setStatus('1', 'error', 0, 'tracker unreachable');
      await context.orchestrator.reconcile();
      expect((await server.inject({ method: 'GET', url: `/downloads/${TITLE}` })).json()).toMatchObject({
        status: 'error',
        error: 'tracker unreachable',
      });

      const response = await server.inject({ method: 'POST', url: `/downloads/${TITLE}/retry` });

      expect(response.json()).toEqual({ success: true, message: `Retrying ${TITLE}` });
      expect(context.tracker.findByTitle(TITLE)).toMatchObject({ status: 'queued', retryCount: 0 });
    });

    it('lists the cloud files of a transfer', async () => {
      await addMagnet();
      cloud.setFiles('1', [{ name: `${TITLE}.mkv`, content: 'video' }]);

      const response = await server.inject({ method: 'GET', url: `/downloads/${TITLE}/files` });

      expect(response.json()).toEqual({ success: true, files: [{ name: `${TITLE}.mkv`, size_bytes: 5 }] });
    });

    it('deletes a transfer on the cloud store and locally', async () => {
      await addMagnet();

      const response = await server.inject({ method: 'DELETE', url: `/downloads/${TITLE}` });

      expect(response.json()).toEqual({ success: true, message: `Deleted ${TITLE}` });
      expect(cloud.transfers.size).toBe(0);
      expect((await server.inject({ method: 'GET', url: '/downloads' })).json()).toEqual([]);
    });

    it('retrieves a completed transfer and archives it', async () => {
      await addMagnet();
      cloud.setStatus('1', 'completed', 1);
      cloud.setFiles('1', [{ name: `${TITLE}.mkv`, content: 'video-bytes' }]);

      await context.orchestrator.reconcile();
      await context.orchestrator.settled();

      expect(await readFile(join(downloadDir, TITLE, `${TITLE}.mkv`), 'utf8')).toBe('video-bytes');
      expect((await server.inject({ method: 'GET', url: '/downloads' })).json()).toEqual([]);
    });
  });

  describe('watcher', () => {
    it('reports the configured directories', async () => {
      const response = await server.inject({ method: 'GET', url: '/watcher/status' });

      expect(response.json()).toEqual({
        running: false,
        torrent_dir: torrentDir,
        download_dir: downloadDir,
        interval_ms: 30_000,
      });
    });

    it('starts and stops', async () => {
      const started = await server.inject({ method: 'POST', url: '/watcher/start' });
      expect(started.json()).toEqual({ success: true, message: `Watching ${torrentDir}` });
      expect((await server.inject({ method: 'GET', url: '/watcher/status' })).json()).toMatchObject({ running: true });

      const stopped = await server.inject({ method: 'POST', url: '/watcher/stop' });
      expect(stopped.json()).toEqual({ success: true, message: 'Watcher stopped' });
      expect((await server.inject({ method: 'GET', url: '/watcher/status' })).json()).toMatchObject({ running: false });
    });

    it('refuses to watch a missing directory', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/watcher/start',
        query: { torrent_dir: join(dir, 'nowhere') },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR', details: { field: 'torrent_dir' } });
    });

    it('lists waiting descriptor files', async () => {
      await writeFile(join(torrentDir, 'ShowX.S01E02.torrent'), 'd4:infoe');
      await writeFile(join(torrentDir, 'notes.txt'), 'not a torrent');

      const response = await server.inject({ method: 'GET', url: '/watcher/scan' });

      expect(response.json()).toMatchObject({
        success: true,
        torrents: [
          {
            name: 'ShowX.S01E02.torrent',
            path: join(torrentDir, 'ShowX.S01E02.torrent'),
            size_bytes: 8,
            stable: false,
          },
        ],
      });
    });

    it('submits a file on request', async () => {
      await login();
      await writeFile(join(torrentDir, 'ShowX.S01E02.torrent'), 'd4:infoe');

      const response = await server.inject({
        method: 'POST',
        url: '/watcher/upload',
        payload: { path: 'ShowX.S01E02.torrent' },
      });

      expect(response.json()).toEqual({ success: true, message: 'Submitted ShowX.S01E02.torrent' });
      expect(context.tracker.findByTitle('ShowX.S01E02')).toMatchObject({ status: 'queued', source: 'watcher' });
      expect(await readdir(join(torrentDir, 'processed'))).toEqual(['ShowX.S01E02.torrent']);
    });

    it('reports a failed submission and moves the file aside', async () => {
      await writeFile(join(torrentDir, 'ShowX.S01E02.torrent'), 'd4:infoe');

      const response = await server.inject({
        method: 'POST',
        url: '/watcher/upload',
        payload: { path: 'ShowX.S01E02.torrent' },
      });

      expect(response.json()).toEqual({
        success: false,
        message: 'Failed to submit ShowX.S01E02.torrent: cloud store: not logged in to the cloud store',
      });
      expect(await readdir(join(torrentDir, 'error'))).toEqual(['ShowX.S01E02.torrent']);
    });

    it('deletes a file from the watched directory only', async () => {
      await writeFile(join(torrentDir, 'junk.torrent'), 'x');

      const deleted = await server.inject({ method: 'POST', url: '/watcher/delete-file', payload: { path: 'junk.torrent' } });
      expect(deleted.json()).toEqual({ success: true, message: 'Deleted junk.torrent' });
      expect(await pathExists(join(torrentDir, 'junk.torrent'))).toBe(false);

      const outside = await server.inject({
        method: 'POST',
        url: '/watcher/delete-file',
        payload: { path: '../credentials.json' },
      });
      expect(outside.statusCode).toBe(400);
    });

    it('tails the activity log', async () => {
      await writeFile(
        context.config.activityLogPath,
        '{"level":30,"msg":"first"}\n{"level":30,"msg":"second"}\nplain text\n'
      );

      const response = await server.inject({ method: 'GET', url: '/watcher/logs', query: { lines: '2' } });

      expect(response.json()).toEqual({
        success: true,
        logs: [{ level: 30, msg: 'second' }, { msg: 'plain text' }],
      });
    });
  });

  describe('library', () => {
    it('returns an empty catalog when the library manager is not configured', async () => {
      const response = await server.inject({ method: 'GET', url: '/library/series' });

      expect(response.json()).toEqual({ success: true, configured: false, series: [] });
    });

    it('answers 404 for a series it cannot find', async () => {
      const response = await server.inject({ method: 'GET', url: '/library/series/5' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ code: 'NOT_FOUND', message: 'Series not found: 5' });
    });
  });
});
