import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
}

/**
 * PeriodicTask — runs `run`, waits out what is left of the interval, repeats.
 *
 * stop() is honoured between runs only: an in-flight run always completes,
 * and a pending wait is cut short.
 */
export class PeriodicTask {
  private logger: Logger;
  private active = false;
  private loop: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private completed = 0;
  private generation = 0;

  constructor(private readonly options: PeriodicTaskOptions) {
    this.logger = getLogger().child({ task: options.name });
  }

  get running(): boolean {
    return this.active;
  }

  /** Completed runs since construction */
  get runs(): number {
    return this.completed;
  }

  /**
   * Start the loop. The returned promise settles once the loop has exited
   * after stop(); calling start() again while running returns the same one.
   * A start() while a stopped loop is still finishing its run begins a new
   * loop once the old one has exited.
   */
  start(): Promise<void> {
    if (this.loop && this.active) {
      return this.loop;
    }
    this.active = true;
    const generation = ++this.generation;
    const previous = this.loop ?? Promise.resolve();
    const loop: Promise<void> = previous
      .then(() => this.runLoop(generation))
      .finally(() => {
        if (this.loop === loop) this.loop = null;
      });
    this.loop = loop;
    return loop;
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.logger.info('Stopping');
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.wake?.();
  }

  private async runLoop(generation: number): Promise<void> {
    this.logger.info({ intervalMs: this.options.intervalMs }, 'Starting periodic runs');

    while (this.isCurrent(generation)) {
      const startedAt = Date.now();
      try {
        await this.options.run();
      } catch (err) {
        this.logger.error({ error: errorMessage(err) }, 'Periodic run failed');
      }
      this.completed++;

      if (!this.isCurrent(generation)) break;

      const remaining = Math.max(0, this.options.intervalMs - (Date.now() - startedAt));
      this.logger.debug({ remainingMs: remaining }, 'Sleeping until next run');
      await this.sleep(remaining);
    }
  }

  private isCurrent(generation: number): boolean {
    return this.active && generation === this.generation;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const done = (): void => {
        this.timer = null;
        this.wake = null;
        resolve();
      };
      this.wake = done;
      this.timer = setTimeout(done, ms);
    });
  }
}
