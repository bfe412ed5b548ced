/**
 * Folder Watcher
 *
 * Polls a directory for torrent descriptors and hands each one to a dispatcher.
 *
 * Features:
 * - Extension filter (.torrent, .magnet)
 * - Ignore patterns (hidden files, partial downloads)
 * - File stability detection (size and mtime unchanged between scans)
 * - Processed ledger (a name is dispatched once)
 * - Archiving to processed/ or error/ after dispatch
 */

import { EventEmitter } from 'node:events';
import { readdir, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { NotFoundError, ValidationError, type TorrentDescriptor } from '@seedsync/core';
import {
  createLogger,
  isErrnoException,
  isInsideDirectory,
  moveFile,
  removeFile,
  uniqueDestination,
  type Logger,
} from '@seedsync/utils';
import { describeFile } from './descriptor.js';
import { ProcessedLedger, type DispatchOutcome } from './processedLedger.js';

export type DescriptorDispatcher = (descriptor: TorrentDescriptor) => Promise<unknown>;

export interface FolderWatcherConfig {
  torrentDir: string;
  /** processed/, error/ and the ledger live here; defaults to torrentDir */
  archiveDir?: string;
  ignoreHidden?: boolean;
  ignorePartials?: boolean;
}

export interface PendingFile {
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAt: string;
  /** Unchanged since the previous scan */
  stable: boolean;
}

export interface DispatchResult {
  name: string;
  outcome: DispatchOutcome;
  error?: string;
  /** Where the file ended up, null when it could not be moved */
  archivedTo: string | null;
}

export interface UnreadableFile {
  name: string;
  error: string;
}

export interface ScanReport {
  seen: number;
  dispatched: DispatchResult[];
  waiting: number;
  /** Files the scan could not stat; the rest of the directory is still scanned */
  unreadable: UnreadableFile[];
}

interface Observation {
  size: number;
  mtimeMs: number;
}

interface Candidate {
  name: string;
  path: string;
  size: number;
  mtimeMs: number;
}

export class FolderWatcher extends EventEmitter {
  readonly torrentDir: string;
  readonly archiveDir: string;
  private readonly ignoreHidden: boolean;
  private readonly ignorePartials: boolean;
  private readonly dispatch: DescriptorDispatcher;
  private readonly ledger: ProcessedLedger;
  private readonly logger: Logger;
  private readonly observed = new Map<string, Observation>();
  private scanning: Promise<ScanReport> | null = null;

  // Common partial download patterns
  private static readonly PARTIAL_PATTERNS = [
    /\.part$/i,
    /\.partial$/i,
    /\.crdownload$/i,
    /\.download$/i,
    /\.tmp$/i,
    /\.temp$/i,
    /~$/,
  ];

  constructor(config: FolderWatcherConfig, dispatch: DescriptorDispatcher, logger?: Logger) {
    super();
    this.torrentDir = resolve(config.torrentDir);
    this.archiveDir = resolve(config.archiveDir ?? config.torrentDir);
    this.ignoreHidden = config.ignoreHidden ?? true;
    this.ignorePartials = config.ignorePartials ?? true;
    this.dispatch = dispatch;
    this.logger = logger ?? createLogger({ component: 'folder-watcher' });
    this.ledger = new ProcessedLedger(join(this.archiveDir, 'processed.jsonl'), this.logger);
  }

  get processedDir(): string {
    return join(this.archiveDir, 'processed');
  }

  get errorDir(): string {
    return join(this.archiveDir, 'error');
  }

  /**
   * One pass over the directory. Concurrent calls share the pass in progress.
   */
  scan(): Promise<ScanReport> {
    if (!this.scanning) {
      this.scanning = this.runScan().finally(() => {
        this.scanning = null;
      });
    }
    return this.scanning;
  }

  private async runScan(): Promise<ScanReport> {
    await this.ensureLedger();
    const { candidates, unreadable } = await this.listCandidates();
    const present = new Set(candidates.map((candidate) => candidate.name));

    // Forget files that went away
    for (const name of this.observed.keys()) {
      if (!present.has(name)) {
        this.observed.delete(name);
      }
    }

    const stable: Candidate[] = [];
    for (const candidate of candidates) {
      const previous = this.observed.get(candidate.name);
      if (previous && previous.size === candidate.size && previous.mtimeMs === candidate.mtimeMs) {
        stable.push(candidate);
      } else {
        this.observed.set(candidate.name, { size: candidate.size, mtimeMs: candidate.mtimeMs });
      }
    }

    const dispatched: DispatchResult[] = [];
    for (const candidate of stable) {
      dispatched.push(await this.dispatchCandidate(candidate));
    }

    if (dispatched.length > 0) {
      this.logger.info(
        { dispatched: dispatched.length, failed: dispatched.filter((result) => result.outcome === 'error').length },
        'Scan dispatched files'
      );
    }

    return { seen: candidates.length, dispatched, waiting: candidates.length - stable.length, unreadable };
  }

  /**
   * Files that would be dispatched once stable
   */
  async listPending(): Promise<PendingFile[]> {
    await this.ensureLedger();
    const { candidates } = await this.listCandidates();
    return candidates.map((candidate) => {
      const previous = this.observed.get(candidate.name);
      return {
        name: candidate.name,
        path: candidate.path,
        sizeBytes: candidate.size,
        modifiedAt: new Date(candidate.mtimeMs).toISOString(),
        stable: previous !== undefined && previous.size === candidate.size && previous.mtimeMs === candidate.mtimeMs,
      };
    });
  }

  /**
   * Dispatch one file right away, skipping the stability wait
   */
  async dispatchFile(path: string): Promise<DispatchResult> {
    await this.ensureLedger();
    const fullPath = this.resolveInside(path);
    const name = basename(fullPath);

    if (!describeFile(fullPath)) {
      throw new ValidationError('path', `${name} is not a .torrent or .magnet file`);
    }

    const info = await stat(fullPath).catch((error: unknown) => {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    });
    if (!info || !info.isFile()) {
      throw new NotFoundError('File', name);
    }

    return this.dispatchCandidate({ name, path: fullPath, size: info.size, mtimeMs: info.mtimeMs });
  }

  /**
   * Remove a file from the watched directory
   */
  async deleteFile(path: string): Promise<void> {
    const fullPath = this.resolveInside(path);
    const info = await stat(fullPath).catch(() => null);
    if (!info || !info.isFile()) {
      throw new NotFoundError('File', basename(fullPath));
    }
    await removeFile(fullPath);
    this.observed.delete(basename(fullPath));
    this.logger.info({ path: fullPath }, 'File deleted');
  }

  // Private methods

  private async ensureLedger(): Promise<void> {
    if (!this.ledger.isLoaded) {
      await this.ledger.load();
    }
  }

  /**
   * Accept absolute paths or names relative to the watched directory
   */
  private resolveInside(path: string): string {
    const fullPath = resolve(this.torrentDir, path);
    if (!isInsideDirectory(this.torrentDir, fullPath)) {
      throw new ValidationError('path', 'must be inside the watched directory');
    }
    return fullPath;
  }

  private async listCandidates(): Promise<{ candidates: Candidate[]; unreadable: UnreadableFile[] }> {
    const entries = await readdir(this.torrentDir, { withFileTypes: true });
    const candidates: Candidate[] = [];
    const unreadable: UnreadableFile[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || this.shouldIgnore(entry.name) || this.ledger.has(entry.name)) {
        continue;
      }

      const fullPath = join(this.torrentDir, entry.name);
      try {
        const info = await stat(fullPath);
        candidates.push({ name: entry.name, path: fullPath, size: info.size, mtimeMs: info.mtimeMs });
      } catch (error) {
        // Removed between readdir and stat
        if (isErrnoException(error) && error.code === 'ENOENT') {
          continue;
        }
        const failure: UnreadableFile = {
          name: entry.name,
          error: error instanceof Error ? error.message : String(error),
        };
        this.logger.error({ file: entry.name, error: failure.error }, 'Cannot stat file, skipping it');
        unreadable.push(failure);
        this.emit('unreadable', failure);
      }
    }

    return { candidates: candidates.sort((a, b) => a.name.localeCompare(b.name)), unreadable };
  }

  private async dispatchCandidate(candidate: Candidate): Promise<DispatchResult> {
    const descriptor = describeFile(candidate.path);
    let outcome: DispatchOutcome = 'processed';
    let error: string | undefined;

    try {
      if (!descriptor) {
        throw new ValidationError('path', `${candidate.name} is not a .torrent or .magnet file`);
      }
      await this.dispatch(descriptor);
      this.logger.info({ file: candidate.name }, 'File dispatched');
    } catch (dispatchError) {
      outcome = 'error';
      error = dispatchError instanceof Error ? dispatchError.message : String(dispatchError);
      this.logger.error({ file: candidate.name, error }, 'Dispatch failed');
    }

    this.observed.delete(candidate.name);

    try {
      await this.ledger.record(candidate.name, outcome);
    } catch (ledgerError) {
      this.logger.error({ err: ledgerError, file: candidate.name }, 'Cannot append to processed ledger');
    }

    let archivedTo: string | null = null;
    try {
      const target = await uniqueDestination(outcome === 'processed' ? this.processedDir : this.errorDir, candidate.name);
      await moveFile(candidate.path, target);
      archivedTo = target;
    } catch (moveError) {
      this.logger.error({ err: moveError, file: candidate.name }, 'Cannot archive file, leaving it in place');
    }

    const result: DispatchResult = { name: candidate.name, outcome, error, archivedTo };
    this.emit('dispatched', result);
    return result;
  }

  private shouldIgnore(filename: string): boolean {
    // Ignore hidden files
    if (this.ignoreHidden && filename.startsWith('.')) {
      return true;
    }

    // Ignore partial downloads
    if (this.ignorePartials) {
      for (const pattern of FolderWatcher.PARTIAL_PATTERNS) {
        if (pattern.test(filename)) {
          return true;
        }
      }
    }

    return describeFile(filename) === null;
  }
}
