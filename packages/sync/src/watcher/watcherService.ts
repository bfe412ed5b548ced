/**
 * Watcher Service
 *
 * Starts, stops and restores the folder watcher, and keeps its scan task
 * on the scheduler.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ValidationError } from '@seedsync/core';
import { createLogger, type Logger } from '@seedsync/utils';
import type { Scheduler } from '../scheduler/scheduler.js';
import { FolderWatcher, type DescriptorDispatcher } from './folderWatcher.js';
import type { WatcherSettings, WatcherSettingsStore } from './watcherSettingsStore.js';

export const WATCHER_TASK = 'watcher-scan';

export interface WatcherDefaults {
  torrentDir?: string;
  downloadDir: string;
  intervalMs: number;
  /** processed/, error/ and the ledger; the torrent directory when unset */
  archiveDir?: string;
}

export interface WatcherServiceOptions {
  settings: WatcherSettingsStore;
  scheduler: Scheduler;
  dispatch: DescriptorDispatcher;
  defaults: WatcherDefaults;
  logger?: Logger;
}

export interface StartWatcherInput {
  torrentDir?: string;
  downloadDir?: string;
  intervalMs?: number;
}

export interface WatcherStatus {
  running: boolean;
  torrentDir: string | null;
  downloadDir: string;
  intervalMs: number;
}

export class WatcherService {
  private readonly settings: WatcherSettingsStore;
  private readonly scheduler: Scheduler;
  private readonly dispatch: DescriptorDispatcher;
  private readonly defaults: WatcherDefaults;
  private readonly logger: Logger;

  private watcher: FolderWatcher | null = null;
  private current: { torrentDir: string | null; downloadDir: string; intervalMs: number };
  private running = false;

  constructor(options: WatcherServiceOptions) {
    this.settings = options.settings;
    this.scheduler = options.scheduler;
    this.dispatch = options.dispatch;
    this.defaults = options.defaults;
    this.logger = options.logger ?? createLogger({ component: 'watcher' });
    this.current = {
      torrentDir: options.defaults.torrentDir ? resolve(options.defaults.torrentDir) : null,
      downloadDir: resolve(options.defaults.downloadDir),
      intervalMs: options.defaults.intervalMs,
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Where retrieved files go
   */
  downloadDir(): string {
    return this.current.downloadDir;
  }

  status(): WatcherStatus {
    return { running: this.running, ...this.current };
  }

  /**
   * Start scanning. Both directories must exist; they are remembered for the next start.
   */
  async start(input: StartWatcherInput = {}): Promise<WatcherStatus> {
    const torrentDir = input.torrentDir ?? this.current.torrentDir;
    if (!torrentDir) {
      throw new ValidationError('torrent_dir', 'no directory to watch has been configured');
    }
    const settings: WatcherSettings = {
      torrentDir: resolve(torrentDir),
      downloadDir: resolve(input.downloadDir ?? this.current.downloadDir),
      intervalMs: input.intervalMs ?? this.current.intervalMs,
      autoStart: true,
    };

    await requireDirectory('torrent_dir', settings.torrentDir);
    await requireDirectory('download_dir', settings.downloadDir);

    await this.scheduler.remove(WATCHER_TASK);
    this.apply(settings);

    const watcher = this.folderWatcher();
    const task = await this.scheduler.add({
      name: WATCHER_TASK,
      intervalMs: settings.intervalMs,
      runImmediately: true,
      run: async () => {
        await watcher.scan();
      },
    });
    task.start();
    this.running = true;

    await this.settings.save(settings);
    this.logger.info(
      { torrentDir: settings.torrentDir, downloadDir: settings.downloadDir, intervalMs: settings.intervalMs },
      'Watcher started'
    );
    return this.status();
  }

  /**
   * Stop scanning; the watcher stays off across restarts until started again
   */
  async stop(): Promise<WatcherStatus> {
    await this.scheduler.remove(WATCHER_TASK);
    const wasRunning = this.running;
    this.running = false;

    if (wasRunning && this.current.torrentDir) {
      await this.settings.save({
        torrentDir: this.current.torrentDir,
        downloadDir: this.current.downloadDir,
        intervalMs: this.current.intervalMs,
        autoStart: false,
      });
      this.logger.info('Watcher stopped');
    }
    return this.status();
  }

  /**
   * Pick up stored settings at process start and start when they ask for it
   */
  async restore(): Promise<WatcherStatus> {
    const stored = await this.settings.load();
    if (!stored) {
      return this.status();
    }

    this.apply(stored);
    if (!stored.autoStart) {
      return this.status();
    }

    const missing: string[] = [];
    for (const dir of [stored.torrentDir, stored.downloadDir]) {
      if (!(await isDirectory(dir))) {
        missing.push(dir);
      }
    }
    if (missing.length > 0) {
      this.logger.warn({ missing }, 'Watcher directories are missing, not starting');
      return this.status();
    }

    return this.start();
  }

  /**
   * The watcher of the configured directory, running or not
   */
  folderWatcher(): FolderWatcher {
    const torrentDir = this.current.torrentDir;
    if (!torrentDir) {
      throw new ValidationError('torrent_dir', 'no directory to watch has been configured');
    }
    if (!this.watcher || this.watcher.torrentDir !== torrentDir) {
      this.watcher = new FolderWatcher(
        { torrentDir, archiveDir: this.defaults.archiveDir },
        this.dispatch,
        this.logger.child({ component: 'folder-watcher' })
      );
    }
    return this.watcher;
  }

  private apply(settings: WatcherSettings): void {
    this.current = {
      torrentDir: resolve(settings.torrentDir),
      downloadDir: resolve(settings.downloadDir),
      intervalMs: settings.intervalMs,
    };
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function requireDirectory(field: string, path: string): Promise<void> {
  if (!(await isDirectory(path))) {
    throw new ValidationError(field, `${path} is not a directory`);
  }
}
