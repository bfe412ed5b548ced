/**
 * Scheduler
 *
 * Owns the process's periodic tasks so they can be started and stopped together.
 */

import { createLogger, type Logger } from '@seedsync/utils';
import { PeriodicTask, type PeriodicTaskOptions, type TimerSource } from './periodicTask.js';

export interface SchedulerOptions {
  timers?: TimerSource;
  logger?: Logger;
}

export class Scheduler {
  private readonly tasks = new Map<string, PeriodicTask>();
  private readonly timers?: TimerSource;
  private readonly logger: Logger;

  constructor(options: SchedulerOptions = {}) {
    this.timers = options.timers;
    this.logger = options.logger ?? createLogger({ component: 'scheduler' });
  }

  /**
   * Register a task. A task of the same name is replaced once it has stopped.
   */
  async add(options: Omit<PeriodicTaskOptions, 'timers' | 'logger'>): Promise<PeriodicTask> {
    await this.remove(options.name);
    const task = new PeriodicTask({
      ...options,
      timers: this.timers,
      logger: this.logger.child({ task: options.name }),
    });
    this.tasks.set(options.name, task);
    return task;
  }

  get(name: string): PeriodicTask | undefined {
    return this.tasks.get(name);
  }

  async remove(name: string): Promise<void> {
    const task = this.tasks.get(name);
    if (task) {
      this.tasks.delete(name);
      await task.stop();
    }
  }

  startAll(): void {
    for (const task of this.tasks.values()) {
      task.start();
    }
    this.logger.info({ tasks: Array.from(this.tasks.keys()) }, 'Scheduler started');
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.tasks.values(), (task) => task.stop()));
    this.logger.info('Scheduler stopped');
  }
}
