import { logger as rootLogger } from '@tickwork/shared/Utils/logger.js';
import { toError } from '@tickwork/shared/Types/errors.js';
import { ResolutionError, TargetExecutionError } from '../utils/errors.js';
import { InvocableRegistry } from '../invocable/registry.js';
import { ScheduledEvent, type ScheduledEventOptions } from '../schedule/scheduled-event.js';
import type {
  Invocable,
  InvocableResolver,
  InvocableType,
  ScheduleInterval,
  ScheduledEventRuntime,
  ScheduledWork,
} from '../schedule/types.js';
import { InMemoryMutex, type Mutex } from './mutex.js';

export const DEFAULT_WORKER = '_default';

/** 24 hours: a crashed run must not block its event forever. */
export const DEFAULT_OVERLAP_LOCK_TIMEOUT_MINUTES = 1440;

export type SchedulerErrorHandler = (error: Error, event: ScheduledEventRuntime) => void | Promise<void>;

export interface SchedulerOptions {
  resolver?: InvocableResolver;
  mutex?: Mutex;
  overlapLockTimeoutMinutes?: number;
  logTaskProgress?: boolean;
}

interface ScheduledTask {
  token: number;
  workerName: string;
  event: ScheduledEventRuntime;
}

/**
 * Owns the registry of scheduled events and runs the ones that are due on
 * each tick.
 *
 * Events on the same worker run one after another; workers run concurrently.
 * Failures are isolated per event and reported to the error handler.
 */
export class Scheduler {
  private readonly tasks = new Map<number, ScheduledTask>();
  private readonly resolver: InvocableResolver;
  private readonly mutex: Mutex;
  private readonly overlapLockTimeoutMinutes: number;
  private readonly logger = rootLogger.child('scheduler');

  private nextToken = 0;
  private currentWorkerName = DEFAULT_WORKER;
  private errorHandler: SchedulerErrorHandler | null = null;
  private logTaskProgress: boolean;
  private isFirstTick = true;
  private activeIterations = 0;
  private cancellation = new AbortController();

  constructor(options: SchedulerOptions = {}) {
    this.resolver = options.resolver ?? new InvocableRegistry();
    this.mutex = options.mutex ?? new InMemoryMutex();
    this.overlapLockTimeoutMinutes = options.overlapLockTimeoutMinutes ?? DEFAULT_OVERLAP_LOCK_TIMEOUT_MINUTES;
    this.logTaskProgress = options.logTaskProgress ?? false;
  }

  get size(): number {
    return this.tasks.size;
  }

  // ── Registration ────────────────────────────────────────────────

  schedule(work: ScheduledWork): ScheduleInterval {
    return this.add((options) => ScheduledEvent.withAction(work, options));
  }

  scheduleInvocable<T extends Invocable>(type: InvocableType<T>): ScheduleInterval {
    return this.add((options) => ScheduledEvent.withInvocable(type, options));
  }

  scheduleWithParams<T extends Invocable>(type: InvocableType<T>, ...parameters: unknown[]): ScheduleInterval {
    return this.add((options) => ScheduledEvent.withInvocable(type, options, parameters));
  }

  /** For types chosen at run time; throws ConfigurationError unless the type implements invoke(). */
  scheduleInvocableType(type: InvocableType, ...parameters: unknown[]): ScheduleInterval {
    return this.add((options) => ScheduledEvent.withInvocableType(type, options, parameters));
  }

  /** Events scheduled after this call belong to the named worker. */
  onWorker(workerName: string): this {
    this.currentWorkerName = workerName;
    return this;
  }

  onError(handler: SchedulerErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  logScheduledTaskProgress(): this {
    this.logTaskProgress = true;
    return this;
  }

  /**
   * Remove the first event registered under `uniqueIdentifier`.
   * Safe to call while that event is running; returns false when nothing matched.
   */
  tryUnschedule(uniqueIdentifier: string): boolean {
    for (const task of this.tasks.values()) {
      if (task.event.overlapKey() === uniqueIdentifier) {
        return this.removeTask(task.token);
      }
    }
    return false;
  }

  private add(create: (options: ScheduledEventOptions) => ScheduledEvent): ScheduledEvent {
    const token = this.nextToken++;
    const event = create({
      resolver: this.resolver,
      unschedule: () => this.removeTask(token),
    });
    this.tasks.set(token, { token, workerName: this.currentWorkerName, event });
    return event;
  }

  private removeTask(token: number): boolean {
    const task = this.tasks.get(token);
    if (!task) return false;
    this.tasks.delete(token);
    this.logger.debug('Scheduled event removed', { eventId: task.event.overlapKey() });
    return true;
  }

  // ── Ticking ─────────────────────────────────────────────────────

  runScheduler(): Promise<void> {
    return this.runAt(new Date());
  }

  /**
   * Run every event that is due at `utcNow`. Cron events are only checked
   * when the second is 0; on the very first tick, events flagged with
   * runOnceAtStart() run regardless of their schedule.
   */
  async runAt(utcNow: Date): Promise<void> {
    this.activeIterations++;
    const isFirstTick = this.isFirstTick;
    this.isFirstTick = false;

    try {
      const isSecondZero = utcNow.getUTCSeconds() === 0;
      const workers = new Map<string, ScheduledTask[]>();

      for (const task of this.tasks.values()) {
        if (!this.isTaskDue(task.event, utcNow, isSecondZero, isFirstTick)) continue;
        const queue = workers.get(task.workerName) ?? [];
        queue.push(task);
        workers.set(task.workerName, queue);
      }

      await Promise.all([...workers.values()].map((queue) => this.runWorker(queue)));
    } finally {
      this.activeIterations--;
    }
  }

  isRunning(): boolean {
    return this.activeIterations > 0;
  }

  /** Abort the signal handed to running invocations; later runs get a fresh one. */
  cancelAllCancellableTasks(): void {
    const current = this.cancellation;
    this.cancellation = new AbortController();
    current.abort();
  }

  private isTaskDue(event: ScheduledEventRuntime, utcNow: Date, isSecondZero: boolean, isFirstTick: boolean): boolean {
    if (isFirstTick && event.shouldRunOnceAtStart()) return true;
    if (event.isCronBased() && !isSecondZero) return false;
    return event.isDue(utcNow);
  }

  private async runWorker(queue: ScheduledTask[]): Promise<void> {
    for (const task of queue) {
      // an earlier event in this queue may have unscheduled this one
      if (!this.tasks.has(task.token)) continue;
      await this.invokeEvent(task.event);
    }
  }

  private async invokeEvent(event: ScheduledEventRuntime): Promise<void> {
    try {
      if (!event.shouldPreventOverlapping()) {
        await this.runEvent(event);
        return;
      }

      const key = event.overlapKey();
      if (!this.mutex.tryGetLock(key, this.overlapLockTimeoutMinutes)) {
        this.logger.debug('Skipping scheduled event, previous run still in progress', { eventId: key });
        return;
      }
      try {
        await this.runEvent(event);
      } finally {
        this.mutex.release(key);
      }
    } catch (error) {
      await this.reportFailure(error, event);
    }
  }

  private async runEvent(event: ScheduledEventRuntime): Promise<void> {
    const startedAt = Date.now();
    if (this.logTaskProgress) {
      this.logger.info('Scheduled task started', { eventId: event.overlapKey(), event: event.describe() });
    }

    await event.invoke(this.cancellation.signal);

    if (this.logTaskProgress) {
      this.logger.info('Scheduled task finished', {
        eventId: event.overlapKey(),
        durationMs: Date.now() - startedAt,
      });
    }
  }

  private async reportFailure(error: unknown, event: ScheduledEventRuntime): Promise<void> {
    const failure = error instanceof ResolutionError ? error : new TargetExecutionError(event.overlapKey(), error);
    this.logger.error('A scheduled task threw an error', { eventId: event.overlapKey(), error: failure });

    if (!this.errorHandler) return;
    try {
      await this.errorHandler(failure, event);
    } catch (handlerError) {
      this.logger.error('Scheduler error handler threw', { error: toError(handlerError) });
    }
  }
}
