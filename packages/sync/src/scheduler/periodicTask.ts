/**
 * Periodic Task
 *
 * Runs an async job every `intervalMs`. The next run is armed only after
 * the current one finishes, so runs never overlap. Errors are logged and
 * the task keeps going.
 */

import { createLogger, type Logger } from '@seedsync/utils';

/**
 * Arms a callback and returns its canceller
 */
export type TimerSource = (callback: () => void, ms: number) => () => void;

export const systemTimers: TimerSource = (callback, ms) => {
  const timer = setTimeout(callback, ms);
  return () => clearTimeout(timer);
};

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  /** Run as soon as started instead of after one interval */
  runImmediately?: boolean;
  timers?: TimerSource;
  logger?: Logger;
}

export class PeriodicTask {
  readonly name: string;
  private intervalMs: number;
  private readonly job: () => Promise<void>;
  private readonly runImmediately: boolean;
  private readonly timers: TimerSource;
  private readonly logger: Logger;

  private cancelTimer: (() => void) | null = null;
  private current: Promise<void> | null = null;
  private active = false;
  private runs = 0;

  constructor(options: PeriodicTaskOptions) {
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.job = options.run;
    this.runImmediately = options.runImmediately ?? false;
    this.timers = options.timers ?? systemTimers;
    this.logger = options.logger ?? createLogger({ component: 'scheduler', task: options.name });
  }

  get isRunning(): boolean {
    return this.active;
  }

  get interval(): number {
    return this.intervalMs;
  }

  get runCount(): number {
    return this.runs;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.logger.debug({ intervalMs: this.intervalMs }, 'Task started');
    this.arm(this.runImmediately ? 0 : this.intervalMs);
  }

  /**
   * Disarm the timer and wait for a run in progress
   */
  async stop(): Promise<void> {
    this.active = false;
    this.cancelTimer?.();
    this.cancelTimer = null;
    await this.current;
    this.logger.debug('Task stopped');
  }

  /**
   * Change the interval; takes effect from the next arming
   */
  setInterval(intervalMs: number): void {
    this.intervalMs = intervalMs;
  }

  /**
   * Run now, outside the schedule. Joins a run already in progress.
   */
  async runNow(): Promise<void> {
    if (!this.current) {
      this.current = this.execute();
    }
    await this.current;
  }

  private arm(delayMs: number): void {
    this.cancelTimer = this.timers(() => {
      this.cancelTimer = null;
      if (!this.current) {
        this.current = this.execute();
      }
    }, delayMs);
  }

  private async execute(): Promise<void> {
    try {
      this.runs++;
      await this.job();
    } catch (error) {
      this.logger.error({ err: error }, 'Task run failed');
    } finally {
      this.current = null;
      if (this.active && !this.cancelTimer) {
        this.arm(this.intervalMs);
      }
    }
  }
}
