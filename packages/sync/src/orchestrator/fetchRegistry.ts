/**
 * Fetch Registry
 *
 * At most one retrieval per transfer, each with its own AbortController.
 */

import { ConflictError } from '@seedsync/core';
import { createLogger, type Logger } from '@seedsync/utils';

export type FetchTask<T = void> = (signal: AbortSignal) => Promise<T>;

interface ActiveFetch<T> {
  controller: AbortController;
  promise: Promise<T>;
  /** Resolves once the task has ended, however it ended */
  done: Promise<void>;
}

export class FetchRegistry {
  private readonly active = new Map<string, ActiveFetch<unknown>>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ component: 'fetch-registry' });
  }

  isActive(transferId: string): boolean {
    return this.active.has(transferId);
  }

  get size(): number {
    return this.active.size;
  }

  /**
   * Launch a retrieval in the background
   */
  start(transferId: string, task: FetchTask): void {
    this.launch(transferId, task);
  }

  /**
   * Launch a retrieval and wait for it; its error propagates
   */
  async run<T>(transferId: string, task: FetchTask<T>): Promise<T> {
    return this.launch(transferId, task).promise;
  }

  /**
   * Abort a retrieval and wait until it has stopped
   */
  async cancel(transferId: string): Promise<boolean> {
    const entry = this.active.get(transferId);
    if (!entry) {
      return false;
    }
    entry.controller.abort();
    await entry.done;
    this.logger.info({ transferId }, 'Fetch cancelled');
    return true;
  }

  async cancelAll(): Promise<void> {
    await Promise.all(Array.from(this.active.keys(), (transferId) => this.cancel(transferId)));
  }

  /**
   * Wait for every retrieval running now
   */
  async settled(): Promise<void> {
    await Promise.all(Array.from(this.active.values(), (entry) => entry.done));
  }

  private launch<T>(transferId: string, task: FetchTask<T>): ActiveFetch<T> {
    if (this.active.has(transferId)) {
      throw new ConflictError('Fetch', transferId);
    }

    const controller = new AbortController();
    const promise = task(controller.signal).finally(() => {
      this.active.delete(transferId);
    });
    const done = promise.then(
      () => undefined,
      (error: unknown) => {
        this.logger.error({ err: error, transferId }, 'Fetch ended with an error');
      }
    );

    const entry: ActiveFetch<T> = { controller, promise, done };
    this.active.set(transferId, entry);
    return entry;
  }
}
