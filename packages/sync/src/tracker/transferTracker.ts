/**
 * Transfer Tracker
 *
 * The in-process registry of transfers. Every status change goes through
 * the lifecycle graph, and the registry is written to disk after each change.
 *
 * Events:
 * - `transition` ({ transfer, from, to, reason })
 * - `removed` ({ transfer, archived })
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import {
  ConflictError,
  NotFoundError,
  assertTransition,
  forwardPath,
  toTransferSummary,
  type CloudTransfer,
  type Transfer,
  type TransferSource,
  type TransferStatus,
  type TransferSummary,
} from '@seedsync/core';
import { createLogger, sanitizeFilename, systemClock, type Clock, type Logger } from '@seedsync/utils';
import { titleKey, type TitleMatching } from './titles.js';
import type { TransferStore } from './transferStore.js';

export const DEFAULT_HISTORY_LIMIT = 100;

export const NOT_FOUND_ON_CLOUD = 'not found on cloud store';

/** Statuses the cloud store still drives */
const ACTIVE_STATUSES: ReadonlySet<TransferStatus> = new Set(['queued', 'downloading', 'paused']);

export interface RegisterInput {
  title: string;
  cloudId: string;
  source: TransferSource;
  seriesId?: number;
  sizeBytes?: number;
}

export interface TransitionDetails {
  reason?: string;
  /** Stored on the transfer when moving to `error` */
  error?: string;
  notice?: string;
}

export interface TransitionEvent {
  transfer: Transfer;
  from: TransferStatus;
  to: TransferStatus;
  reason?: string;
}

export interface RemovedEvent {
  transfer: Transfer;
  archived: boolean;
}

export interface ReconcileReport {
  /** Transfers whose status changed, in order */
  changed: string[];
  /** Transfers that moved to `error` this cycle */
  failed: string[];
}

export interface TransferTrackerOptions {
  store?: TransferStore;
  matching?: TitleMatching;
  historyLimit?: number;
  clock?: Clock;
  logger?: Logger;
}

export class TransferTracker extends EventEmitter {
  readonly matching: TitleMatching;
  private readonly store?: TransferStore;
  private readonly historyLimit: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly transfers = new Map<string, Transfer>();
  private readonly reserved = new Set<string>();
  /** Download directory names of reserved titles */
  private readonly reservedDirectories = new Set<string>();
  private history: Transfer[] = [];
  private saving: Promise<void> = Promise.resolve();

  constructor(options: TransferTrackerOptions = {}) {
    super();
    this.store = options.store;
    this.matching = options.matching ?? 'exact';
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger({ component: 'transfer-tracker' });
  }

  /**
   * Restore the registry from its store
   */
  async load(): Promise<void> {
    if (!this.store) {
      return;
    }
    const snapshot = await this.store.load();
    this.transfers.clear();
    for (const transfer of snapshot.transfers) {
      this.transfers.set(transfer.id, transfer);
    }
    this.history = snapshot.history.slice(-this.historyLimit);
    this.logger.info({ transfers: this.transfers.size, history: this.history.length }, 'Transfers restored');
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Claim a title for an upload about to start. Returns the release function.
   * Throws ConflictError when the title is tracked or already being uploaded,
   * or when it would share a download directory with such a title.
   */
  reserveTitle(title: string): () => void {
    const key = titleKey(title, this.matching);
    const directory = sanitizeFilename(title);
    if (
      this.reserved.has(key) ||
      this.reservedDirectories.has(directory) ||
      this.findByTitle(title) ||
      this.hasDirectory(directory)
    ) {
      throw new ConflictError('Transfer', title);
    }
    this.reserved.add(key);
    this.reservedDirectories.add(directory);
    return () => {
      this.reserved.delete(key);
      this.reservedDirectories.delete(directory);
    };
  }

  private hasDirectory(directory: string): boolean {
    for (const transfer of this.transfers.values()) {
      if (sanitizeFilename(transfer.title) === directory) {
        return true;
      }
    }
    return false;
  }

  register(input: RegisterInput): Transfer {
    if (this.findByCloudId(input.cloudId)) {
      throw new ConflictError('Cloud transfer', input.cloudId);
    }
    if (this.findByTitle(input.title)) {
      throw new ConflictError('Transfer', input.title);
    }

    const now = new Date(this.clock.now());
    const transfer: Transfer = {
      id: randomUUID(),
      title: input.title,
      cloudId: input.cloudId,
      status: 'queued',
      progress: 0,
      sizeBytes: input.sizeBytes,
      seriesId: input.seriesId,
      retryCount: 0,
      source: input.source,
      uploadedAt: now,
      updatedAt: now,
    };

    this.transfers.set(transfer.id, transfer);
    this.logger.info({ transferId: transfer.id, title: transfer.title, cloudId: transfer.cloudId }, 'Transfer registered');
    this.persist();
    return { ...transfer };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get(id: string): Transfer | undefined {
    const transfer = this.transfers.get(id);
    return transfer ? { ...transfer } : undefined;
  }

  /**
   * Like get, but throws NotFoundError
   */
  require(id: string): Transfer {
    const transfer = this.get(id);
    if (!transfer) {
      throw new NotFoundError('Transfer', id);
    }
    return transfer;
  }

  findByTitle(title: string): Transfer | undefined {
    const key = titleKey(title, this.matching);
    for (const transfer of this.transfers.values()) {
      if (titleKey(transfer.title, this.matching) === key) {
        return { ...transfer };
      }
    }
    return undefined;
  }

  findByCloudId(cloudId: string): Transfer | undefined {
    for (const transfer of this.transfers.values()) {
      if (transfer.cloudId === cloudId) {
        return { ...transfer };
      }
    }
    return undefined;
  }

  list(): Transfer[] {
    return Array.from(this.transfers.values(), (transfer) => ({ ...transfer }));
  }

  summaries(): TransferSummary[] {
    return this.list().map(toTransferSummary);
  }

  /**
   * Archived transfers, oldest first
   */
  archived(): Transfer[] {
    return this.history.map((transfer) => ({ ...transfer }));
  }

  get size(): number {
    return this.transfers.size;
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  transition(id: string, to: TransferStatus, details: TransitionDetails = {}): Transfer {
    const transfer = this.transfers.get(id);
    if (!transfer) {
      throw new NotFoundError('Transfer', id);
    }
    this.apply(transfer, to, details);
    this.persist();
    return { ...transfer };
  }

  /**
   * Count a failed retrieval. At `maxRetries` failures the transfer moves to `error`.
   */
  recordFetchFailure(id: string, reason: string, maxRetries: number): Transfer {
    const transfer = this.transfers.get(id);
    if (!transfer) {
      throw new NotFoundError('Transfer', id);
    }

    transfer.retryCount++;
    transfer.updatedAt = new Date(this.clock.now());
    this.logger.warn(
      { transferId: id, title: transfer.title, attempt: transfer.retryCount, maxRetries, reason },
      'Fetch failed'
    );

    if (transfer.retryCount >= maxRetries && transfer.status !== 'error') {
      this.apply(transfer, 'error', { reason, error: `fetch failed: ${reason}` });
    }
    this.persist();
    return { ...transfer };
  }

  /**
   * Set a note on a transfer without changing its status
   */
  annotate(id: string, notice: string | undefined): Transfer {
    const transfer = this.transfers.get(id);
    if (!transfer) {
      throw new NotFoundError('Transfer', id);
    }
    transfer.notice = notice;
    transfer.updatedAt = new Date(this.clock.now());
    this.persist();
    return { ...transfer };
  }

  remove(id: string): Transfer {
    const transfer = this.transfers.get(id);
    if (!transfer) {
      throw new NotFoundError('Transfer', id);
    }
    this.transfers.delete(id);
    this.logger.info({ transferId: id, title: transfer.title }, 'Transfer removed');
    this.emit('removed', { transfer: { ...transfer }, archived: false } satisfies RemovedEvent);
    this.persist();
    return transfer;
  }

  /**
   * Move an imported transfer from the active registry to the history
   */
  archive(id: string): Transfer {
    const transfer = this.transfers.get(id);
    if (!transfer) {
      throw new NotFoundError('Transfer', id);
    }
    this.transfers.delete(id);
    this.history.push(transfer);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-this.historyLimit);
    }
    this.logger.info({ transferId: id, title: transfer.title }, 'Transfer archived');
    this.emit('removed', { transfer: { ...transfer }, archived: true } satisfies RemovedEvent);
    this.persist();
    return { ...transfer };
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  /**
   * Bring active transfers in line with a cloud snapshot.
   * Statuses only move forward; a transfer the cloud no longer reports goes to `error`.
   */
  reconcile(snapshot: CloudTransfer[]): ReconcileReport {
    const byCloudId = new Map(snapshot.map((entry) => [entry.id, entry]));
    const report: ReconcileReport = { changed: [], failed: [] };
    let dirty = false;

    for (const transfer of this.transfers.values()) {
      if (!ACTIVE_STATUSES.has(transfer.status)) {
        continue;
      }

      const remote = byCloudId.get(transfer.cloudId);
      if (!remote) {
        this.apply(transfer, 'error', { reason: NOT_FOUND_ON_CLOUD, error: NOT_FOUND_ON_CLOUD });
        report.changed.push(transfer.id);
        report.failed.push(transfer.id);
        dirty = true;
        continue;
      }

      if (remote.status === 'error') {
        const message = remote.message ?? 'cloud store reported an error';
        this.apply(transfer, 'error', { reason: message, error: message });
        report.changed.push(transfer.id);
        report.failed.push(transfer.id);
        dirty = true;
        continue;
      }

      const before = transfer.status;
      const path = forwardPath(transfer.status, remote.status);
      if (path === null) {
        this.logger.debug(
          { transferId: transfer.id, local: transfer.status, remote: remote.status },
          'Ignoring backward status report'
        );
      } else {
        for (const step of path) {
          this.apply(transfer, step, { reason: 'cloud status' });
        }
      }

      const progressChanged = this.updateProgress(transfer, remote);
      if (remote.sizeBytes !== undefined && remote.sizeBytes !== transfer.sizeBytes) {
        transfer.sizeBytes = remote.sizeBytes;
        dirty = true;
      }
      if (transfer.status !== before) {
        report.changed.push(transfer.id);
      }
      dirty = dirty || progressChanged || transfer.status !== before;
    }

    if (dirty) {
      this.persist();
    }
    return report;
  }

  /**
   * Wait for pending writes to reach the store
   */
  async flush(): Promise<void> {
    await this.saving;
  }

  // ===========================================================================
  // Private methods
  // ===========================================================================

  private updateProgress(transfer: Transfer, remote: CloudTransfer): boolean {
    const previous = transfer.progress;
    if (transfer.status === 'completed') {
      transfer.progress = 1;
    } else if (transfer.status === 'downloading' || transfer.status === 'paused') {
      transfer.progress = Math.max(transfer.progress, Math.min(1, Math.max(0, remote.progress)));
    }
    if (transfer.progress !== previous) {
      transfer.updatedAt = new Date(this.clock.now());
      return true;
    }
    return false;
  }

  private apply(transfer: Transfer, to: TransferStatus, details: TransitionDetails): void {
    const from = transfer.status;
    assertTransition(transfer.id, from, to);

    transfer.status = to;
    transfer.updatedAt = new Date(this.clock.now());

    if (to === 'error') {
      transfer.error = details.error ?? details.reason ?? 'failed';
    } else if (to === 'queued') {
      // Retry starts over
      transfer.error = undefined;
      transfer.retryCount = 0;
      transfer.progress = 0;
    }
    if (to === 'completed') {
      transfer.progress = 1;
    }
    if (details.notice !== undefined) {
      transfer.notice = details.notice;
    }

    this.logger.info(
      { transferId: transfer.id, title: transfer.title, from, to, reason: details.reason },
      'Transfer status changed'
    );
    this.emit('transition', { transfer: { ...transfer }, from, to, reason: details.reason } satisfies TransitionEvent);
  }

  private persist(): void {
    const store = this.store;
    if (!store) {
      return;
    }
    const snapshot = { transfers: this.list(), history: this.archived() };
    this.saving = this.saving
      .then(() => store.save(snapshot))
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Cannot persist transfers');
      });
  }
}
