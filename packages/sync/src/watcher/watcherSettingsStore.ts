/**
 * Watcher Settings Store
 *
 * Remembers which directories the watcher last ran with, so it can come
 * back on its own after a restart.
 */

import { z } from 'zod';
import { LocalIOError } from '@seedsync/core';
import { atomicWriteFile, createLogger, safeReadFile, type Logger } from '@seedsync/utils';

export const watcherSettingsSchema = z.object({
  torrentDir: z.string().min(1),
  downloadDir: z.string().min(1),
  intervalMs: z.number().int().positive(),
  autoStart: z.boolean().default(true),
});

export type WatcherSettings = z.infer<typeof watcherSettingsSchema>;

export class WatcherSettingsStore {
  readonly path: string;
  private readonly logger: Logger;

  constructor(path: string, logger?: Logger) {
    this.path = path;
    this.logger = logger ?? createLogger({ component: 'watcher-settings' });
  }

  /**
   * Stored settings, or null when there are none usable
   */
  async load(): Promise<WatcherSettings | null> {
    const content = await safeReadFile(this.path);
    if (content === null) {
      return null;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (error) {
      this.logger.warn({ path: this.path, error: String(error) }, 'Watcher settings are not JSON, ignoring them');
      return null;
    }

    const parsed = watcherSettingsSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn({ path: this.path, issues: parsed.error.errors.length }, 'Watcher settings are invalid, ignoring them');
      return null;
    }
    return parsed.data;
  }

  async save(settings: WatcherSettings): Promise<void> {
    try {
      await atomicWriteFile(this.path, JSON.stringify(settings, null, 2));
    } catch (error) {
      throw new LocalIOError('save watcher settings', this.path, error);
    }
  }
}
