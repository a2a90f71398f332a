import { logger } from '@tickwork/shared/Utils/logger.js';
import { loadConfig, type SchedulerConfig } from './config/index.js';
import { Scheduler, type SchedulerOptions } from './scheduler/scheduler.js';
import { SchedulerHost } from './scheduler/host.js';

export { Scheduler, DEFAULT_WORKER, DEFAULT_OVERLAP_LOCK_TIMEOUT_MINUTES } from './scheduler/scheduler.js';
export type { SchedulerOptions, SchedulerErrorHandler } from './scheduler/scheduler.js';
export { SchedulerHost } from './scheduler/host.js';
export type { SchedulerHostConfig } from './scheduler/host.js';
export { InMemoryMutex } from './scheduler/mutex.js';
export type { Mutex } from './scheduler/mutex.js';
export { ScheduledEvent } from './schedule/scheduled-event.js';
export type { ScheduledEventOptions } from './schedule/scheduled-event.js';
export { CronExpression, DayOfWeek } from './schedule/cron-expression.js';
export { ZonedTime, isValidTimeZone } from './schedule/zoned-time.js';
export type { ZonedDateParts } from './schedule/zoned-time.js';
export { CancellableInvocable } from './schedule/types.js';
export type {
  Invocable,
  InvocableType,
  InvocableResolver,
  ResolutionScope,
  ScheduleInterval,
  ScheduledEventConfiguration,
  ScheduledEventRuntime,
  ScheduledWork,
  SchedulePredicate,
  UnscheduleCallback,
} from './schedule/types.js';
export { InvocableRegistry } from './invocable/registry.js';
export type { InvocableFactory, InvocableFactoryContext } from './invocable/registry.js';
export {
  SchedulerError,
  ConfigurationError,
  CronFormatError,
  ResolutionError,
  TargetExecutionError,
} from './utils/errors.js';
export { loadConfig, SchedulerConfigSchema } from './config/index.js';
export type { SchedulerConfig } from './config/index.js';

export interface SchedulerRuntime {
  scheduler: Scheduler;
  host: SchedulerHost;
}

/**
 * Wire a Scheduler and its host from configuration. Register events on
 * `scheduler`, then call `host.start()`.
 */
export function createScheduler(
  config: SchedulerConfig = loadConfig(),
  options: Pick<SchedulerOptions, 'resolver' | 'mutex'> = {}
): SchedulerRuntime {
  logger.setLevel(config.logLevel);

  const scheduler = new Scheduler({
    ...options,
    overlapLockTimeoutMinutes: config.overlapLockTimeoutMinutes,
    logTaskProgress: config.logTaskProgress,
  });
  const host = new SchedulerHost(scheduler, {
    tickIntervalMs: config.tickIntervalMs,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
  });

  return { scheduler, host };
}
