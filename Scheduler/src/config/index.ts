import { loadEnvSafely } from '@tickwork/shared/Utils/env.js';
import { getEnvBoolean, getEnvNumber, getEnvString } from '@tickwork/shared/Utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { SchedulerConfigSchema, type SchedulerConfig } from './schema.js';

export { SchedulerConfigSchema, type SchedulerConfig };

/**
 * Build the scheduler configuration from the environment (and the package's
 * .env, when present).
 */
export function loadConfig(): SchedulerConfig {
  loadEnvSafely(import.meta.url, 2);

  const rawConfig = {
    overlapLockTimeoutMinutes: getEnvNumber('SCHEDULER_OVERLAP_LOCK_TIMEOUT_MINUTES'),
    shutdownTimeoutMs: getEnvNumber('SCHEDULER_SHUTDOWN_TIMEOUT_MS'),
    tickIntervalMs: getEnvNumber('SCHEDULER_TICK_INTERVAL_MS'),
    logTaskProgress: getEnvBoolean('SCHEDULER_LOG_TASK_PROGRESS'),
    logLevel: getEnvString('LOG_LEVEL'),
  };

  const result = SchedulerConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid scheduler configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
