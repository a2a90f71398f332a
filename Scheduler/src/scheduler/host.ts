/**
 * SchedulerHost - drives a Scheduler from a timer for the lifetime of the process.
 */

import { logger } from '@tickwork/shared/Utils/logger.js';
import { toError } from '@tickwork/shared/Types/errors.js';
import type { Scheduler } from './scheduler.js';

export interface SchedulerHostConfig {
  /** How often the clock is sampled; each wall-clock second is ticked at most once. */
  tickIntervalMs: number;
  /** How long stop() waits for in-flight runs. */
  shutdownTimeoutMs: number;
}

const SHUTDOWN_POLL_MS = 50;

// Seconds replayed after the timer fell behind; one minute covers every :00.
const MAX_CATCH_UP_SECONDS = 60;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SchedulerHost {
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private lastTickedSecond = -1;
  private log = logger.child('scheduler-host');

  constructor(
    private readonly scheduler: Scheduler,
    private readonly config: SchedulerHostConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  isStarted(): boolean {
    return this.tickTimer !== null;
  }

  start(): void {
    if (this.tickTimer) return;

    this.log.info(`Starting scheduler (events: ${this.scheduler.size}, tick: ${this.config.tickIntervalMs}ms)`);

    this.tick();
    this.tickTimer = setInterval(() => this.tick(), this.config.tickIntervalMs);

    // Don't keep the process alive just for scheduling
    this.tickTimer.unref();
  }

  /**
   * Stop ticking, cancel cancellable work and wait for in-flight runs.
   * Resolves false when runs were still active at the shutdown deadline.
   */
  async stop(): Promise<boolean> {
    if (!this.tickTimer) return true;

    clearInterval(this.tickTimer);
    this.tickTimer = null;
    this.scheduler.cancelAllCancellableTasks();

    const deadline = Date.now() + this.config.shutdownTimeoutMs;
    while (this.scheduler.isRunning() && Date.now() < deadline) {
      await sleep(SHUTDOWN_POLL_MS);
    }

    const drained = !this.scheduler.isRunning();
    if (drained) {
      this.log.info('Scheduler stopped');
    } else {
      this.log.warn(`Scheduler stopped with runs still active after ${this.config.shutdownTimeoutMs}ms`);
    }
    return drained;
  }

  /**
   * Run every wall-clock second since the previous tick. Timer drift can jump
   * over a second, and a skipped :00 would drop that minute's cron events.
   */
  private tick(): void {
    const now = this.now();
    const second = Math.floor(now.getTime() / 1000);
    if (second === this.lastTickedSecond) return;

    // first tick, or the clock went backwards
    const from =
      this.lastTickedSecond < 0 || second < this.lastTickedSecond
        ? second
        : Math.max(this.lastTickedSecond + 1, second - MAX_CATCH_UP_SECONDS + 1);
    this.lastTickedSecond = second;

    if (from < second) {
      this.log.debug(`Catching up ${second - from} missed second(s)`);
    }
    for (let missed = from; missed < second; missed++) {
      this.runTick(new Date(missed * 1000));
    }
    this.runTick(now);
  }

  private runTick(at: Date): void {
    this.scheduler.runAt(at).catch((error: unknown) => {
      this.log.error('Scheduler tick failed', { error: toError(error) });
    });
  }
}
