/**
 * Periodic Task
 * @module services/cache-engine/utils/periodic-task
 *
 * Interval-driven background work owned by a single component
 * (breaker health checks, hot-key sweeps). Each owner starts and stops its
 * own task; nothing is process-global.
 */

import { withTimeout, TimeoutError } from '../../../errors/recovery.js';
import { LoggerLike } from '../../../logging/logger.js';

export interface PeriodicTaskOptions {
  /** Interval between runs */
  intervalMs: number;
  /** Upper bound `stop()` waits for an in-flight run */
  drainTimeoutMs?: number;
}

const DEFAULT_DRAIN_TIMEOUT_MS = 5000;

export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private runs = 0;

  constructor(
    public readonly name: string,
    private readonly work: () => void | Promise<void>,
    private readonly options: PeriodicTaskOptions,
    private readonly logger: LoggerLike
  ) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get completedRuns(): number {
    return this.runs;
  }

  /**
   * Start the interval. Calling start on a running task is a no-op.
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  /**
   * Cancel the interval and wait, up to the drain timeout, for a run in
   * progress to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const pending = this.inFlight;
    if (!pending) {
      return;
    }

    try {
      await withTimeout(() => pending, {
        timeoutMs: this.options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS,
        operation: `${this.name}.drain`,
      });
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      this.logger.warn({ task: this.name, timeoutMs: error.timeoutMs }, 'Periodic task did not drain before timeout');
    }
  }

  private tick(): void {
    // Skip when the previous run has not finished
    if (this.inFlight) {
      return;
    }

    this.inFlight = this.runOnce().finally(() => {
      this.inFlight = null;
    });
  }

  private async runOnce(): Promise<void> {
    try {
      await this.work();
      this.runs++;
    } catch (error) {
      this.logger.error({ task: this.name, err: error }, 'Periodic task run failed');
    }
  }
}
