/**
 * Processed Ledger
 *
 * Append-only JSON-lines record of every file name the watcher has dispatched,
 * so a file is never submitted twice, even across restarts.
 */

import { z } from 'zod';
import { appendLine, createLogger, safeReadFile, type Logger } from '@seedsync/utils';

export type DispatchOutcome = 'processed' | 'error';

const entrySchema = z.object({
  name: z.string(),
  outcome: z.enum(['processed', 'error']),
  at: z.string(),
});

export type LedgerEntry = z.infer<typeof entrySchema>;

export class ProcessedLedger {
  readonly path: string;
  private readonly names = new Set<string>();
  private readonly logger: Logger;
  private loaded = false;

  constructor(path: string, logger?: Logger) {
    this.path = path;
    this.logger = logger ?? createLogger({ component: 'processed-ledger' });
  }

  async load(): Promise<void> {
    const content = await safeReadFile(this.path);
    this.loaded = true;
    if (content === null) {
      return;
    }

    let skipped = 0;
    for (const line of content.split('\n')) {
      if (line.trim() === '') {
        continue;
      }
      const parsed = entrySchema.safeParse(safeJson(line));
      if (parsed.success) {
        this.names.add(parsed.data.name);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.logger.warn({ path: this.path, skipped }, 'Ignored unreadable ledger lines');
    }
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.names.size;
  }

  /**
   * Remember a name. It is held in memory even when the append fails.
   */
  async record(name: string, outcome: DispatchOutcome, at: Date = new Date()): Promise<void> {
    this.names.add(name);
    const entry: LedgerEntry = { name, outcome, at: at.toISOString() };
    await appendLine(this.path, JSON.stringify(entry));
  }
}

function safeJson(line: string): unknown {
  try {
    const value: unknown = JSON.parse(line);
    return value;
  } catch {
    return null;
  }
}
