/**
 * Transfer Store
 *
 * JSON file holding the active transfers and the archived history.
 */

import { z } from 'zod';
import { LocalIOError, TRANSFER_STATUSES, type Transfer } from '@seedsync/core';
import { atomicWriteFile, createLogger, safeReadFile, type Logger } from '@seedsync/utils';

const transferRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  cloudId: z.string().min(1),
  status: z.enum(TRANSFER_STATUSES),
  progress: z.number().min(0).max(1),
  sizeBytes: z.number().nonnegative().optional(),
  seriesId: z.number().int().optional(),
  error: z.string().optional(),
  notice: z.string().optional(),
  retryCount: z.number().int().nonnegative(),
  source: z.enum(['watcher', 'manual', 'url']),
  uploadedAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

const snapshotSchema = z.object({
  version: z.literal(1),
  transfers: z.array(transferRecordSchema),
  history: z.array(transferRecordSchema).default([]),
});

export interface TransferSnapshot {
  transfers: Transfer[];
  history: Transfer[];
}

export class TransferStore {
  readonly path: string;
  private readonly logger: Logger;

  constructor(path: string, logger?: Logger) {
    this.path = path;
    this.logger = logger ?? createLogger({ component: 'transfer-store' });
  }

  async load(): Promise<TransferSnapshot> {
    const content = await safeReadFile(this.path);
    if (content === null) {
      return { transfers: [], history: [] };
    }

    try {
      const parsed = snapshotSchema.parse(JSON.parse(content));
      return { transfers: parsed.transfers, history: parsed.history };
    } catch (error) {
      this.logger.error({ path: this.path, error: String(error) }, 'Transfer registry is unreadable, starting empty');
      return { transfers: [], history: [] };
    }
  }

  async save(snapshot: TransferSnapshot): Promise<void> {
    const content = JSON.stringify({ version: 1, ...snapshot }, null, 2);
    try {
      await atomicWriteFile(this.path, content);
    } catch (error) {
      throw new LocalIOError('save transfers', this.path, error);
    }
  }
}
