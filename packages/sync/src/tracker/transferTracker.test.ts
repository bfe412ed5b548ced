import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConflictError, StateTransitionError, type CloudTransfer } from '@seedsync/core';
import { titleKey } from './titles.js';
import { NOT_FOUND_ON_CLOUD, TransferTracker, type TransitionEvent } from './transferTracker.js';
import { TransferStore } from './transferStore.js';

const clock = { now: () => Date.parse('2026-03-01T10:00:00.000Z') };

function cloud(id: string, status: CloudTransfer['status'], progress: number, message?: string): CloudTransfer {
  return { id, title: `cloud-${id}`, status, progress, message };
}

describe('titleKey', () => {
  it('keeps titles as they are in exact mode', () => {
    expect(titleKey(' Show.X ', 'exact')).toBe(' Show.X ');
  });

  it('folds case, dots, underscores and whitespace in normalized mode', () => {
    expect(titleKey('  Show.X__S01E01  ', 'normalized')).toBe('show x s01e01');
    expect(titleKey('show x   s01e01', 'normalized')).toBe('show x s01e01');
  });
});

describe('TransferTracker', () => {
  let tracker: TransferTracker;

  beforeEach(() => {
    tracker = new TransferTracker({ clock });
  });

  describe('registration', () => {
    it('registers a queued transfer', () => {
      const transfer = tracker.register({ title: 'ShowX.S01E01', cloudId: '41', source: 'watcher' });

      expect(transfer).toMatchObject({
        title: 'ShowX.S01E01',
        cloudId: '41',
        status: 'queued',
        progress: 0,
        retryCount: 0,
        source: 'watcher',
      });
      expect(transfer.uploadedAt.toISOString()).toBe('2026-03-01T10:00:00.000Z');
      expect(tracker.findByTitle('ShowX.S01E01')?.id).toBe(transfer.id);
    });

    it('rejects a second transfer with the same cloud id', () => {
      tracker.register({ title: 'A', cloudId: '41', source: 'watcher' });

      expect(() => tracker.register({ title: 'B', cloudId: '41', source: 'watcher' })).toThrow(ConflictError);
    });

    it('rejects a reserved title until it is released', () => {
      const release = tracker.reserveTitle('ShowX.S01E01');

      expect(() => tracker.reserveTitle('ShowX.S01E01')).toThrow(ConflictError);

      release();
      expect(() => tracker.reserveTitle('ShowX.S01E01')).not.toThrow();
    });

    it('rejects a tracked title', () => {
      tracker.register({ title: 'ShowX.S01E01', cloudId: '41', source: 'watcher' });

      expect(() => tracker.reserveTitle('ShowX.S01E01')).toThrow(ConflictError);
    });

    it('rejects a title that would share a download directory', () => {
      tracker.register({ title: 'A:B', cloudId: '41', source: 'url' });

      expect(() => tracker.reserveTitle('A_B')).toThrow(ConflictError);
      expect(() => tracker.reserveTitle('A|C')).not.toThrow();
    });

    it('rejects a title whose download directory is reserved', () => {
      const release = tracker.reserveTitle('A?B');

      expect(() => tracker.reserveTitle('A*B')).toThrow(ConflictError);

      release();
      expect(() => tracker.reserveTitle('A*B')).not.toThrow();
    });

    it('treats near-identical titles as one in normalized mode', () => {
      const normalized = new TransferTracker({ clock, matching: 'normalized' });
      normalized.register({ title: 'Show.X.S01E01', cloudId: '41', source: 'watcher' });

      expect(() => normalized.reserveTitle('show x s01e01')).toThrow(ConflictError);
      expect(normalized.findByTitle('SHOW_X_S01E01')?.cloudId).toBe('41');
    });
  });

  describe('reconcile', () => {
    it('walks forward through every intermediate status in one cycle', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });
      const seen: string[] = [];
      tracker.on('transition', (event: TransitionEvent) => seen.push(`${event.from}->${event.to}`));

      const report = tracker.reconcile([cloud('1', 'completed', 1)]);

      expect(seen).toEqual(['queued->downloading', 'downloading->completed']);
      expect(report).toEqual({ changed: [transfer.id], failed: [] });
      expect(tracker.get(transfer.id)).toMatchObject({ status: 'completed', progress: 1 });
    });

    it('never lowers progress while downloading', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });

      tracker.reconcile([cloud('1', 'downloading', 0.5)]);
      tracker.reconcile([cloud('1', 'downloading', 0.3)]);

      expect(tracker.get(transfer.id)?.progress).toBe(0.5);
    });

    it('follows a pause reported by the cloud store', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });

      tracker.reconcile([cloud('1', 'paused', 0.2)]);

      expect(tracker.get(transfer.id)).toMatchObject({ status: 'paused', progress: 0.2 });
    });

    it('ignores a backward status report', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });
      tracker.reconcile([cloud('1', 'downloading', 0.4)]);

      const report = tracker.reconcile([cloud('1', 'queued', 0)]);

      expect(report.changed).toEqual([]);
      expect(tracker.get(transfer.id)).toMatchObject({ status: 'downloading', progress: 0.4 });
    });

    it('fails a transfer the cloud store no longer reports', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });

      const report = tracker.reconcile([]);

      expect(report.failed).toEqual([transfer.id]);
      expect(tracker.get(transfer.id)).toMatchObject({ status: 'error', error: NOT_FOUND_ON_CLOUD });

      // Out of active reconciliation from now on
      expect(tracker.reconcile([]).changed).toEqual([]);
    });

    it('carries the cloud error message', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });

      tracker.reconcile([cloud('1', 'error', 0, 'tracker unreachable')]);

      expect(tracker.get(transfer.id)?.error).toBe('tracker unreachable');
    });

    it('leaves completed transfers alone', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });
      tracker.reconcile([cloud('1', 'completed', 1)]);

      tracker.reconcile([]);

      expect(tracker.get(transfer.id)?.status).toBe('completed');
    });
  });

  describe('transitions', () => {
    it('rejects an edge outside the lifecycle graph', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });

      expect(() => tracker.transition(transfer.id, 'imported')).toThrow(StateTransitionError);
    });

    it('moves to error once fetch retries are exhausted', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });
      tracker.reconcile([cloud('1', 'completed', 1)]);

      expect(tracker.recordFetchFailure(transfer.id, 'connection reset', 2)).toMatchObject({
        status: 'completed',
        retryCount: 1,
      });
      expect(tracker.recordFetchFailure(transfer.id, 'connection reset', 2)).toMatchObject({
        status: 'error',
        retryCount: 2,
        error: 'fetch failed: connection reset',
      });
    });

    it('clears the failure on retry', () => {
      const transfer = tracker.register({ title: 'A', cloudId: '1', source: 'watcher' });
      tracker.reconcile([]);

      const retried = tracker.transition(transfer.id, 'queued', { reason: 'retried' });

      expect(retried).toMatchObject({ status: 'queued', retryCount: 0, progress: 0 });
      expect(retried.error).toBeUndefined();
    });

    it('keeps a bounded history of archived transfers', () => {
      const bounded = new TransferTracker({ clock, historyLimit: 1 });
      for (const id of ['1', '2']) {
        const transfer = bounded.register({ title: `T${id}`, cloudId: id, source: 'watcher' });
        bounded.reconcile([cloud(id, 'completed', 1)]);
        bounded.transition(transfer.id, 'imported');
        bounded.archive(transfer.id);
      }

      expect(bounded.size).toBe(0);
      expect(bounded.archived().map((transfer) => transfer.title)).toEqual(['T2']);
    });
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'seedsync-tracker-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('restores the registry written by a previous instance', async () => {
      const store = new TransferStore(join(dir, 'transfers.json'));
      const first = new TransferTracker({ clock, store });
      const transfer = first.register({ title: 'ShowX.S01E01', cloudId: '41', source: 'url', seriesId: 7 });
      first.reconcile([cloud('41', 'downloading', 0.25)]);
      await first.flush();

      const second = new TransferTracker({ clock, store });
      await second.load();

      expect(second.list()).toEqual([
        {
          id: transfer.id,
          title: 'ShowX.S01E01',
          cloudId: '41',
          status: 'downloading',
          progress: 0.25,
          seriesId: 7,
          retryCount: 0,
          source: 'url',
          uploadedAt: new Date('2026-03-01T10:00:00.000Z'),
          updatedAt: new Date('2026-03-01T10:00:00.000Z'),
        },
      ]);
    });

    it('starts empty when the file is corrupt', async () => {
      const path = join(dir, 'transfers.json');
      await writeFile(path, '{ not json');
      const tracker = new TransferTracker({ clock, store: new TransferStore(path) });

      await tracker.load();

      expect(tracker.size).toBe(0);
    });
  });
});
