/**
 * Sync Orchestrator
 *
 * Drives a torrent from the watched folder to the media library:
 *
 *   descriptor → cloud submit → queued → downloading → completed
 *              → files fetched to downloadDir/<title>/ → library import
 *              → imported → archived
 *
 * Cloud and library clients return results; this layer turns the failures of
 * user actions into UpstreamError and records the failures of background work
 * on the transfer itself.
 */

import { join } from 'node:path';
import {
  NotFoundError,
  StateTransitionError,
  UpstreamError,
  ValidationError,
  err,
  ok,
  type ClientResult,
  type CloudFile,
  type TorrentDescriptor,
  type Transfer,
  type TransferSource,
} from '@seedsync/core';
import type { CloudStore, CredentialManager, Submission } from '@seedsync/cloud';
import type { ImportTrigger, LibraryClient } from '@seedsync/library';
import { createLogger, sanitizeFilename, type Logger } from '@seedsync/utils';
import { readSubmission } from '../watcher/descriptor.js';
import type { ReconcileReport, TransferTracker } from '../tracker/transferTracker.js';
import { FetchRegistry } from './fetchRegistry.js';

export const DEFAULT_MAX_FETCH_RETRIES = 5;

const CLOUD = 'cloud store';
const LIBRARY = 'library manager';

export interface SyncOrchestratorOptions {
  cloud: CloudStore;
  credentials: Pick<CredentialManager, 'withCredential' | 'isAuthenticated'>;
  library: Pick<LibraryClient, 'triggerImport'>;
  tracker: TransferTracker;
  /** Read on every retrieval, so a watcher restart can move it */
  downloadDir: () => string;
  maxFetchRetries?: number;
  fetches?: FetchRegistry;
  logger?: Logger;
}

export interface AddTransferInput {
  title: string;
  downloadUrl: string;
  seriesId?: number;
}

export interface RetrievedFiles {
  directory: string;
  files: string[];
  bytes: number;
}

export class SyncOrchestrator {
  readonly tracker: TransferTracker;
  readonly maxFetchRetries: number;
  private readonly cloud: CloudStore;
  private readonly credentials: Pick<CredentialManager, 'withCredential' | 'isAuthenticated'>;
  private readonly library: Pick<LibraryClient, 'triggerImport'>;
  private readonly downloadDir: () => string;
  private readonly fetches: FetchRegistry;
  private readonly logger: Logger;

  constructor(options: SyncOrchestratorOptions) {
    this.cloud = options.cloud;
    this.credentials = options.credentials;
    this.library = options.library;
    this.tracker = options.tracker;
    this.downloadDir = options.downloadDir;
    this.maxFetchRetries = options.maxFetchRetries ?? DEFAULT_MAX_FETCH_RETRIES;
    this.logger = options.logger ?? createLogger({ component: 'orchestrator' });
    this.fetches = options.fetches ?? new FetchRegistry(this.logger.child({ component: 'fetch-registry' }));
  }

  // ===========================================================================
  // Submission
  // ===========================================================================

  /**
   * Upload a file found by the watcher. Throws when the upload fails.
   */
  async submitDescriptor(descriptor: TorrentDescriptor): Promise<Transfer> {
    const release = this.tracker.reserveTitle(descriptor.title);
    try {
      const submission = await readSubmission(descriptor);
      return await this.submitReserved(descriptor.title, submission, 'watcher');
    } finally {
      release();
    }
  }

  /**
   * Upload a magnet URI or a torrent URL on request
   */
  async addTransfer(input: AddTransferInput): Promise<Transfer> {
    const title = input.title.trim();
    if (title.length === 0) {
      throw new ValidationError('title', 'must not be empty');
    }
    const submission = toSubmission(input.downloadUrl);

    const release = this.tracker.reserveTitle(title);
    try {
      return await this.submitReserved(title, submission, 'url', input.seriesId);
    } finally {
      release();
    }
  }

  private async submitReserved(
    title: string,
    submission: Submission,
    source: TransferSource,
    seriesId?: number
  ): Promise<Transfer> {
    const result = await this.credentials.withCredential((credential) => this.cloud.submit(submission, credential));
    if (!result.ok) {
      this.logger.warn({ title, kind: result.error.kind, reason: result.error.message }, 'Submission failed');
      throw new UpstreamError(CLOUD, result.error);
    }
    if (result.value.wishlisted) {
      this.logger.warn({ title, cloudId: result.value.cloudId }, 'Cloud store is full, torrent parked on its wishlist');
    }

    return this.tracker.register({ title, cloudId: result.value.cloudId, source, seriesId });
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  /**
   * One cycle: poll the cloud store, advance transfers, start retrievals.
   * Returns null when the cycle was skipped.
   */
  async reconcile(): Promise<ReconcileReport | null> {
    if (!(await this.credentials.isAuthenticated())) {
      this.logger.debug('Not logged in, skipping reconciliation');
      return null;
    }

    const snapshot = await this.credentials.withCredential((credential) => this.cloud.listTransfers(credential));
    if (!snapshot.ok) {
      this.logger.warn({ kind: snapshot.error.kind, reason: snapshot.error.message }, 'Cloud store unavailable, skipping cycle');
      return null;
    }

    const report = this.tracker.reconcile(snapshot.value);

    for (const transfer of this.tracker.list()) {
      if (transfer.status === 'completed' && !this.fetches.isActive(transfer.id)) {
        this.fetches.start(transfer.id, (signal) => this.retrieveAndImport(transfer.id, signal));
      }
    }

    if (report.changed.length > 0) {
      this.logger.info({ changed: report.changed.length, failed: report.failed.length }, 'Reconciled transfers');
    }
    return report;
  }

  private async retrieveAndImport(transferId: string, signal: AbortSignal): Promise<void> {
    const transfer = this.tracker.get(transferId);
    if (!transfer || transfer.status !== 'completed') {
      return;
    }

    const retrieved = await this.retrieve(transfer, signal);
    if (!retrieved.ok) {
      const { kind, message } = retrieved.error;
      if (kind === 'Cancelled' || !this.tracker.get(transferId)) {
        return;
      }
      // Not retried: local disk failures and stale cloud ids
      if (kind === 'LocalIO' || kind === 'NotFound') {
        this.tracker.transition(transferId, 'error', { reason: message, error: `fetch failed: ${message}` });
        return;
      }
      this.tracker.recordFetchFailure(transferId, message, this.maxFetchRetries);
      return;
    }

    await this.importTransfer(transferId, retrieved.value.directory);
  }

  /**
   * Fetch every file of a transfer into its own directory under the download dir
   */
  private async retrieve(transfer: Transfer, signal: AbortSignal): Promise<ClientResult<RetrievedFiles>> {
    const files = await this.credentials.withCredential((credential) =>
      this.cloud.listFiles(transfer.cloudId, credential)
    );
    if (!files.ok) {
      return files;
    }

    const directory = this.directoryFor(transfer);
    const written: string[] = [];
    let bytes = 0;

    for (const file of files.value) {
      if (signal.aborted) {
        return err('Cancelled', 'retrieval cancelled');
      }
      const destination = join(directory, sanitizeFilename(file.name));
      const result = await this.credentials.withCredential((credential) =>
        this.cloud.fetch(file.downloadUrl, destination, credential, signal)
      );
      if (!result.ok) {
        this.logger.warn(
          { transferId: transfer.id, file: file.name, kind: result.error.kind, reason: result.error.message },
          'File retrieval failed'
        );
        return result;
      }
      written.push(destination);
      bytes += result.value;
    }

    this.logger.info({ transferId: transfer.id, directory, files: written.length, bytes }, 'Files retrieved');
    return ok({ directory, files: written, bytes });
  }

  /**
   * Ask the library manager to import, then mark the transfer imported.
   * A successful or skipped import archives the transfer; a failed one leaves a notice.
   */
  private async importTransfer(transferId: string, directory: string): Promise<ClientResult<ImportTrigger>> {
    const result = await this.library.triggerImport(directory);

    const transfer = this.tracker.get(transferId);
    if (!transfer) {
      return result;
    }

    if (!result.ok) {
      const notice = `library import failed: ${result.error.message}`;
      if (transfer.status === 'completed') {
        this.tracker.transition(transferId, 'imported', { reason: 'files retrieved', notice });
      } else {
        this.tracker.annotate(transferId, notice);
      }
      return result;
    }

    if (transfer.status === 'completed') {
      this.tracker.transition(transferId, 'imported', {
        reason: result.value.skipped ? 'files retrieved' : 'import requested',
      });
    }
    this.tracker.annotate(transferId, undefined);
    this.tracker.archive(transferId);
    return result;
  }

  private directoryFor(transfer: Transfer): string {
    return join(this.downloadDir(), sanitizeFilename(transfer.title));
  }

  // ===========================================================================
  // User actions
  // ===========================================================================

  /**
   * Look up an active transfer by title
   */
  find(title: string): Transfer {
    const transfer = this.tracker.findByTitle(title);
    if (!transfer) {
      throw new NotFoundError('Transfer', title);
    }
    return transfer;
  }

  /**
   * Files the cloud store holds for a transfer
   */
  async listFiles(title: string): Promise<CloudFile[]> {
    const transfer = this.find(title);
    const result = await this.credentials.withCredential((credential) =>
      this.cloud.listFiles(transfer.cloudId, credential)
    );
    if (!result.ok) {
      throw new UpstreamError(CLOUD, result.error);
    }
    return result.value;
  }

  async pause(title: string): Promise<Transfer> {
    const transfer = this.find(title);
    if (transfer.status !== 'downloading') {
      throw new StateTransitionError(transfer.id, transfer.status, 'paused', `Cannot pause a ${transfer.status} transfer`);
    }

    const result = await this.credentials.withCredential((credential) => this.cloud.pause(transfer.cloudId, credential));
    if (!result.ok) {
      throw new UpstreamError(CLOUD, result.error);
    }
    return this.tracker.transition(transfer.id, 'paused', { reason: 'paused by user' });
  }

  async resume(title: string): Promise<Transfer> {
    const transfer = this.find(title);
    if (transfer.status !== 'paused') {
      throw new StateTransitionError(
        transfer.id,
        transfer.status,
        'downloading',
        `Cannot resume a ${transfer.status} transfer`
      );
    }

    const result = await this.credentials.withCredential((credential) => this.cloud.resume(transfer.cloudId, credential));
    if (!result.ok) {
      throw new UpstreamError(CLOUD, result.error);
    }
    return this.tracker.transition(transfer.id, 'downloading', { reason: 'resumed by user' });
  }

  /**
   * Stop any retrieval, delete on the cloud store and forget the transfer
   */
  async delete(title: string): Promise<Transfer> {
    const found = this.find(title);
    await this.fetches.cancel(found.id);
    // The retrieval may have archived it meanwhile
    const transfer = this.tracker.require(found.id);

    const result = await this.credentials.withCredential((credential) => this.cloud.delete(transfer.cloudId, credential));
    if (!result.ok && result.error.kind !== 'NotFound') {
      throw new UpstreamError(CLOUD, result.error);
    }

    const deleted = this.tracker.transition(transfer.id, 'deleted', { reason: 'deleted by user' });
    this.tracker.remove(transfer.id);
    return deleted;
  }

  /**
   * Fetch a finished transfer's files now, without touching its status
   */
  async manualDownload(title: string): Promise<RetrievedFiles> {
    const transfer = this.find(title);
    if (transfer.status !== 'completed' && transfer.status !== 'imported') {
      throw new StateTransitionError(
        transfer.id,
        transfer.status,
        'completed',
        `Transfer is ${transfer.status}, files are available once completed`
      );
    }
    return this.retrieveNow(transfer);
  }

  /**
   * Completed: fetch the files, then import. Imported: import again.
   */
  async notify(title: string): Promise<ImportTrigger> {
    const transfer = this.find(title);
    if (transfer.status !== 'completed' && transfer.status !== 'imported') {
      throw new StateTransitionError(
        transfer.id,
        transfer.status,
        'imported',
        `Transfer is ${transfer.status}, only completed or imported transfers can be imported`
      );
    }

    const directory =
      transfer.status === 'completed' ? (await this.retrieveNow(transfer)).directory : this.directoryFor(transfer);

    const result = await this.importTransfer(transfer.id, directory);
    if (!result.ok) {
      throw new UpstreamError(LIBRARY, result.error);
    }
    return result.value;
  }

  /**
   * Send a failed transfer back to the start of the lifecycle
   */
  retry(title: string): Transfer {
    const transfer = this.find(title);
    if (transfer.status !== 'error') {
      throw new StateTransitionError(transfer.id, transfer.status, 'queued', `Only failed transfers can be retried`);
    }
    return this.tracker.transition(transfer.id, 'queued', { reason: 'retried by user' });
  }

  private retrieveNow(transfer: Transfer): Promise<RetrievedFiles> {
    return this.fetches.run(transfer.id, async (signal) => {
      const result = await this.retrieve(transfer, signal);
      if (!result.ok) {
        throw new UpstreamError(CLOUD, result.error);
      }
      return result.value;
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Wait for background retrievals and pending registry writes
   */
  async settled(): Promise<void> {
    await this.fetches.settled();
    await this.tracker.flush();
  }

  /**
   * Abort every retrieval in flight
   */
  async stop(): Promise<void> {
    await this.fetches.cancelAll();
    await this.tracker.flush();
  }

  get activeFetches(): number {
    return this.fetches.size;
  }
}

function toSubmission(downloadUrl: string): Submission {
  const value = downloadUrl.trim();
  if (value.startsWith('magnet:?')) {
    return { kind: 'magnet', uri: value };
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ValidationError('download_url', 'must be a magnet URI or an http(s) URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError('download_url', 'must be a magnet URI or an http(s) URL');
  }
  return { kind: 'url', url: url.toString() };
}
