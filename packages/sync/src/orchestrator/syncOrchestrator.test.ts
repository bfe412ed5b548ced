import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ConflictError, StateTransitionError, UpstreamError, ValidationError, err, ok } from '@seedsync/core';
import { CredentialManager, TokenStore } from '@seedsync/cloud';
import { InMemoryCloudStore } from '@seedsync/cloud/testing';
import type { ImportTrigger, LibraryClient } from '@seedsync/library';
import { pathExists } from '@seedsync/utils';
import { TransferTracker, type TransitionEvent } from '../tracker/transferTracker.js';
import { FolderWatcher } from '../watcher/folderWatcher.js';
import { SyncOrchestrator } from './syncOrchestrator.js';

const TITLE = 'ShowX.S01E01';

describe('SyncOrchestrator', () => {
  let dir: string;
  let torrentDir: string;
  let downloadDir: string;
  let cloud: InMemoryCloudStore;
  let tokens: TokenStore;
  let tracker: TransferTracker;
  let triggerImport: Mock<LibraryClient['triggerImport']>;
  let orchestrator: SyncOrchestrator;

  function build(maxFetchRetries = 5): SyncOrchestrator {
    const credentials = new CredentialManager({ store: tokens, cloud });
    return new SyncOrchestrator({
      cloud,
      credentials,
      library: { triggerImport },
      tracker,
      downloadDir: () => downloadDir,
      maxFetchRetries,
    });
  }

  async function addMagnet(title = TITLE): Promise<string> {
    const transfer = await orchestrator.addTransfer({ title, downloadUrl: 'magnet:?xt=urn:btih:abc' });
    return transfer.cloudId;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seedsync-orchestrator-'));
    torrentDir = join(dir, 'torrents');
    downloadDir = join(dir, 'downloads');
    await mkdir(torrentDir);

    cloud = new InMemoryCloudStore();
    tokens = new TokenStore({ path: join(dir, 'credentials.json') });
    await tokens.save({ accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt: Date.now() + 3_600_000 });
    tracker = new TransferTracker();
    triggerImport = vi
      .fn<LibraryClient['triggerImport']>()
      .mockResolvedValue(ok<ImportTrigger>({ skipped: false, commandId: 7, status: 'queued' }));
    orchestrator = build();
  });

  afterEach(async () => {
    await orchestrator.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it('takes a dropped torrent file all the way to the library', async () => {
    const statuses: string[] = [];
    tracker.on('transition', (event: TransitionEvent) => statuses.push(event.to));
    const watcher = new FolderWatcher({ torrentDir }, (descriptor) => orchestrator.submitDescriptor(descriptor));
    await writeFile(join(torrentDir, `${TITLE}.torrent`), 'd4:infoe');

    await watcher.scan();
    await watcher.scan();

    expect(cloud.submissions).toEqual([
      { kind: 'torrent', fileName: `${TITLE}.torrent`, content: Buffer.from('d4:infoe') },
    ]);
    expect(tracker.findByTitle(TITLE)).toMatchObject({ status: 'queued', cloudId: '1', source: 'watcher' });
    expect(await readdir(join(torrentDir, 'processed'))).toEqual([`${TITLE}.torrent`]);

    cloud.setStatus('1', 'downloading', 0.5);
    await orchestrator.reconcile();
    expect(tracker.findByTitle(TITLE)).toMatchObject({ status: 'downloading', progress: 0.5 });

    cloud.setStatus('1', 'completed', 1);
    cloud.setFiles('1', [{ name: `${TITLE}.mkv`, content: 'video-bytes' }]);
    await orchestrator.reconcile();
    await orchestrator.settled();

    expect(await readFile(join(downloadDir, TITLE, `${TITLE}.mkv`), 'utf8')).toBe('video-bytes');
    expect(triggerImport).toHaveBeenCalledWith(join(downloadDir, TITLE));
    expect(statuses).toEqual(['downloading', 'completed', 'imported']);
    expect(tracker.size).toBe(0);
    expect(tracker.archived()).toMatchObject([{ title: TITLE, status: 'imported' }]);
  });

  it('rejects a title that is already tracked', async () => {
    await addMagnet();

    await expect(addMagnet()).rejects.toThrow(ConflictError);
    expect(cloud.calls.submit).toBe(1);
  });

  it('rejects a title whose download directory is taken by another', async () => {
    await addMagnet('ShowX: Pilot');

    await expect(addMagnet('ShowX_ Pilot')).rejects.toThrow(ConflictError);
    expect(cloud.calls.submit).toBe(1);
  });

  it('rejects a download URL that is neither magnet nor http', async () => {
    await expect(orchestrator.addTransfer({ title: TITLE, downloadUrl: 'ftp://example.test/a.torrent' })).rejects.toThrow(
      ValidationError
    );
  });

  it('surfaces a failed submission and frees the title', async () => {
    cloud.failNext('submit', { kind: 'Permanent', message: 'invalid torrent' });

    const failure = orchestrator.addTransfer({ title: TITLE, downloadUrl: 'https://example.test/a.torrent' });

    await expect(failure).rejects.toThrow(UpstreamError);
    await expect(failure).rejects.toMatchObject({ statusCode: 502, code: 'UPSTREAM_PERMANENT' });
    expect(tracker.size).toBe(0);
    expect(() => tracker.reserveTitle(TITLE)()).not.toThrow();
  });

  it('skips the cycle when not logged in', async () => {
    await tokens.clear();
    orchestrator = build();

    expect(await orchestrator.reconcile()).toBeNull();
    expect(cloud.calls.listTransfers).toBe(0);
  });

  it('skips the cycle without changes when the cloud store is unreachable', async () => {
    await addMagnet();
    cloud.failNext('listTransfers', { kind: 'Transient', message: 'connection refused' });

    expect(await orchestrator.reconcile()).toBeNull();
    expect(tracker.findByTitle(TITLE)?.status).toBe('queued');
  });

  it('marks a transfer the cloud store lost as failed', async () => {
    const cloudId = await addMagnet();
    cloud.transfers.delete(cloudId);

    await orchestrator.reconcile();

    expect(tracker.findByTitle(TITLE)).toMatchObject({ status: 'error', error: 'not found on cloud store' });
  });

  it('gives up on a transfer after the fetch retries are spent', async () => {
    orchestrator = build(2);
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'completed', 1);
    cloud.setFiles(cloudId, [{ name: 'a.mkv', content: 'a' }]);
    cloud.failNext('fetch', { kind: 'Transient', message: 'connection reset' });
    cloud.failNext('fetch', { kind: 'Transient', message: 'connection reset' });

    await orchestrator.reconcile();
    await orchestrator.settled();
    expect(tracker.findByTitle(TITLE)).toMatchObject({ status: 'completed', retryCount: 1 });

    await orchestrator.reconcile();
    await orchestrator.settled();
    expect(tracker.findByTitle(TITLE)).toMatchObject({ status: 'error', error: 'fetch failed: connection reset' });
    expect(triggerImport).not.toHaveBeenCalled();
  });

  it('fails a transfer at once when the local disk rejects the fetch', async () => {
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'completed', 1);
    cloud.setFiles(cloudId, [{ name: 'a.mkv', content: 'a' }]);
    cloud.failNext('fetch', { kind: 'LocalIO', message: 'no space left on device' });

    await orchestrator.reconcile();
    await orchestrator.settled();
    expect(tracker.findByTitle(TITLE)).toMatchObject({
      status: 'error',
      retryCount: 0,
      error: 'fetch failed: no space left on device',
    });

    await orchestrator.reconcile();
    await orchestrator.settled();
    expect(cloud.calls.fetch).toBe(1);
    expect(tracker.findByTitle(TITLE)?.status).toBe('error');
    expect(triggerImport).not.toHaveBeenCalled();
  });

  it('fails a transfer at once when its files are gone from the cloud store', async () => {
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'completed', 1);
    cloud.setFiles(cloudId, [{ name: 'a.mkv', content: 'a' }]);
    cloud.failNext('listFiles', { kind: 'NotFound', message: 'folder not found', statusCode: 404 });

    await orchestrator.reconcile();
    await orchestrator.settled();
    await orchestrator.reconcile();
    await orchestrator.settled();

    expect(tracker.findByTitle(TITLE)).toMatchObject({ status: 'error', error: 'fetch failed: folder not found' });
    expect(cloud.calls.listFiles).toBe(1);
    expect(cloud.calls.fetch).toBe(0);
  });

  it('keeps an imported transfer with a notice when the library import fails, until notified again', async () => {
    triggerImport.mockResolvedValueOnce(err('Transient', 'library unreachable'));
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'completed', 1);
    cloud.setFiles(cloudId, [{ name: 'a.mkv', content: 'a' }]);

    await orchestrator.reconcile();
    await orchestrator.settled();

    expect(tracker.findByTitle(TITLE)).toMatchObject({
      status: 'imported',
      notice: 'library import failed: library unreachable',
    });

    await expect(orchestrator.notify(TITLE)).resolves.toEqual({ skipped: false, commandId: 7, status: 'queued' });
    expect(tracker.size).toBe(0);
    expect(tracker.archived()[0]?.notice).toBeUndefined();
  });

  it('archives straight away when the library manager is not configured', async () => {
    triggerImport.mockResolvedValue(ok<ImportTrigger>({ skipped: true }));
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'completed', 1);
    cloud.setFiles(cloudId, [{ name: 'a.mkv', content: 'a' }]);

    await orchestrator.reconcile();
    await orchestrator.settled();

    expect(tracker.size).toBe(0);
    expect(tracker.archived()).toHaveLength(1);
  });

  it('cancels an in-flight fetch on delete and leaves no partial file', async () => {
    cloud.holdFetches = true;
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'completed', 1);
    cloud.setFiles(cloudId, [{ name: 'a.mkv', content: 'abcdef' }]);
    const partial = join(downloadDir, TITLE, 'a.mkv.part');

    await orchestrator.reconcile();
    await vi.waitFor(async () => {
      expect(await pathExists(partial)).toBe(true);
    });

    const deleted = await orchestrator.delete(TITLE);

    expect(deleted.status).toBe('deleted');
    expect(await pathExists(partial)).toBe(false);
    expect(await pathExists(join(downloadDir, TITLE, 'a.mkv'))).toBe(false);
    expect(cloud.transfers.has(cloudId)).toBe(false);
    expect(tracker.size).toBe(0);
    expect(orchestrator.activeFetches).toBe(0);
  });

  it('treats a transfer already gone from the cloud store as deleted', async () => {
    const cloudId = await addMagnet();
    cloud.transfers.delete(cloudId);

    await orchestrator.delete(TITLE);

    expect(tracker.size).toBe(0);
  });

  it('pauses and resumes a downloading transfer', async () => {
    const cloudId = await addMagnet();
    await expect(orchestrator.pause(TITLE)).rejects.toThrow(StateTransitionError);

    cloud.setStatus(cloudId, 'downloading', 0.1);
    await orchestrator.reconcile();

    expect((await orchestrator.pause(TITLE)).status).toBe('paused');
    expect(cloud.transfers.get(cloudId)?.status).toBe('paused');
    expect((await orchestrator.resume(TITLE)).status).toBe('downloading');
    expect(cloud.transfers.get(cloudId)?.status).toBe('downloading');
  });

  it('maps a failed cloud action to an upstream error', async () => {
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'downloading', 0.1);
    await orchestrator.reconcile();
    cloud.failNext('pause', { kind: 'RateLimited', message: 'slow down', retryAfterMs: 1_000 });

    await expect(orchestrator.pause(TITLE)).rejects.toMatchObject({ statusCode: 429, kind: 'RateLimited' });
    expect(tracker.findByTitle(TITLE)?.status).toBe('downloading');
  });

  it('downloads the files of a completed transfer on request', async () => {
    const cloudId = await addMagnet();
    await expect(orchestrator.manualDownload(TITLE)).rejects.toThrow(StateTransitionError);

    // Completed, with the background retrieval failing so the transfer stays completed
    cloud.setStatus(cloudId, 'completed', 1);
    cloud.setFiles(cloudId, [{ name: 'a.mkv', content: 'abc' }]);
    cloud.failNext('listFiles', { kind: 'Transient', message: 'busy' });
    await orchestrator.reconcile();
    await orchestrator.settled();

    const retrieved = await orchestrator.manualDownload(TITLE);

    expect(retrieved).toEqual({
      directory: join(downloadDir, TITLE),
      files: [join(downloadDir, TITLE, 'a.mkv')],
      bytes: 3,
    });
    expect(tracker.findByTitle(TITLE)?.status).toBe('completed');
  });

  it('retries a failed transfer from the start', async () => {
    const cloudId = await addMagnet();
    cloud.setStatus(cloudId, 'error', 0, 'tracker unreachable');
    await orchestrator.reconcile();
    expect(tracker.findByTitle(TITLE)?.error).toBe('tracker unreachable');

    expect(orchestrator.retry(TITLE)).toMatchObject({ status: 'queued', retryCount: 0 });
    expect(() => orchestrator.retry(TITLE)).toThrow(StateTransitionError);
  });
});
