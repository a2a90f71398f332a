import { BaseError, ConfigurationError, toError } from '@tickwork/shared/Types/errors.js';

export { ConfigurationError };

/**
 * Base error for scheduler runtime failures.
 * Extends shared BaseError for consistent error handling.
 */
export class SchedulerError extends BaseError {
  constructor(
    message: string,
    code: string,
    details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, code, details, options);
    this.name = 'SchedulerError';
  }
}

/**
 * A cron string that is not a valid five-field expression.
 * Raised while configuring an event, never during a tick.
 */
export class CronFormatError extends ConfigurationError {
  constructor(
    message: string,
    public expression: string,
    details?: unknown
  ) {
    super(message, details);
    this.code = 'CRON_FORMAT_ERROR';
    this.name = 'CronFormatError';
  }
}

export class ResolutionError extends SchedulerError {
  constructor(
    message: string,
    public typeName: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'RESOLUTION_ERROR', { typeName }, options);
    this.name = 'ResolutionError';
  }
}

/**
 * Reported to the scheduler's error handler when an event's work throws.
 * The original failure is kept as `cause`.
 */
export class TargetExecutionError extends SchedulerError {
  constructor(
    public eventId: string,
    cause: unknown
  ) {
    const reason = toError(cause).message;
    super(`Scheduled event "${eventId}" failed: ${reason}`, 'TARGET_EXECUTION_ERROR', { eventId }, { cause });
    this.name = 'TargetExecutionError';
  }
}
