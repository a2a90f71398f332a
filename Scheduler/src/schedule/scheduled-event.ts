import { randomUUID } from 'node:crypto';
import { ConfigurationError } from '../utils/errors.js';
import { CronExpression, DayOfWeek } from './cron-expression.js';
import { ZonedTime, type ZonedDateParts } from './zoned-time.js';
import {
  CancellableInvocable,
  type Invocable,
  type InvocableResolver,
  type InvocableType,
  type ScheduleInterval,
  type ScheduledEventConfiguration,
  type ScheduledEventRuntime,
  type ScheduledWork,
  type SchedulePredicate,
  type UnscheduleCallback,
} from './types.js';

const ONE_MINUTE_AS_SECONDS = 60;

type ScheduledTarget =
  | { kind: 'action'; work: ScheduledWork }
  | { kind: 'invocable'; type: InvocableType; parameters: readonly unknown[] };

type TimeSpec = { kind: 'cron' } | { kind: 'interval'; seconds: number };

export interface ScheduledEventOptions {
  /** Required for invocable targets. */
  resolver?: InvocableResolver;
  /** Called once a `once()` event has completed its run. */
  unschedule?: UnscheduleCallback;
}

function implementsInvocable(type: InvocableType): boolean {
  const prototype: unknown = type.prototype;
  return (
    typeof prototype === 'object' &&
    prototype !== null &&
    'invoke' in prototype &&
    typeof prototype.invoke === 'function'
  );
}

/**
 * A single schedule entry: its recurrence rule, the work it runs and the
 * lifecycle flags that decide whether it keeps running.
 *
 * Callers see it through {@link ScheduleInterval} and
 * {@link ScheduledEventConfiguration} while configuring, the scheduler through
 * {@link ScheduledEventRuntime}.
 */
export class ScheduledEvent implements ScheduleInterval, ScheduledEventConfiguration, ScheduledEventRuntime {
  private expression: CronExpression = new CronExpression('* * * * *');
  private timeSpec: TimeSpec = { kind: 'cron' };
  private zonedTime: ZonedTime = ZonedTime.utc();
  private whenPredicate: SchedulePredicate | null = null;
  private eventUniqueId: string = randomUUID();
  private preventOverlappingFlag = false;
  private runOnceAtStartFlag = false;
  private runOnceFlag = false;
  private wasPreviouslyRun = false;
  private executionStarted = false;
  private unscheduleRequested = false;

  private constructor(
    private readonly target: ScheduledTarget,
    private readonly options: ScheduledEventOptions
  ) {}

  static withAction(work: ScheduledWork, options: ScheduledEventOptions = {}): ScheduledEvent {
    return new ScheduledEvent({ kind: 'action', work }, options);
  }

  static withInvocable<T extends Invocable>(
    type: InvocableType<T>,
    options: ScheduledEventOptions,
    parameters: readonly unknown[] = []
  ): ScheduledEvent {
    if (!options.resolver) {
      throw new ConfigurationError(`Cannot schedule invocable ${type.name} without a resolver`, {
        type: type.name,
      });
    }
    return new ScheduledEvent({ kind: 'invocable', type, parameters }, options);
  }

  /**
   * Like {@link withInvocable} for types that are only known at run time;
   * the type must implement `invoke()`.
   */
  static withInvocableType(
    type: InvocableType,
    options: ScheduledEventOptions,
    parameters: readonly unknown[] = []
  ): ScheduledEvent {
    if (!implementsInvocable(type)) {
      throw new ConfigurationError(`${type.name} must implement invoke() to be scheduled`, {
        type: type.name,
      });
    }
    return ScheduledEvent.withInvocable(type, options, parameters);
  }

  // ── Due evaluation ──────────────────────────────────────────────

  isDue(utcNow: Date): boolean {
    const zonedNow = this.zonedTime.convert(utcNow);

    if (this.timeSpec.kind === 'interval') {
      return this.isSecondsDue(zonedNow, this.timeSpec.seconds) && this.expression.isWeekdayDue(zonedNow);
    }
    return this.expression.isDue(zonedNow);
  }

  private isSecondsDue(zonedNow: ZonedDateParts, seconds: number): boolean {
    // At second 0 only periods that divide a minute (and 0) are due.
    if (zonedNow.second === 0) {
      return seconds === 0 || ONE_MINUTE_AS_SECONDS % seconds === 0;
    }
    return seconds !== 0 && zonedNow.second % seconds === 0;
  }

  // ── Execution ───────────────────────────────────────────────────

  async invoke(cancellationSignal: AbortSignal): Promise<void> {
    this.executionStarted = true;

    if (await this.whenPredicatePasses()) {
      if (this.target.kind === 'action') {
        await this.target.work();
      } else {
        await this.invokeResolved(this.target.type, this.target.parameters, cancellationSignal);
      }
    }

    this.markAsExecutedOnce();
    this.unscheduleIfWarranted();
  }

  private async invokeResolved(
    type: InvocableType,
    parameters: readonly unknown[],
    cancellationSignal: AbortSignal
  ): Promise<void> {
    const resolver = this.options.resolver;
    if (!resolver) {
      throw new ConfigurationError(`No resolver configured for ${type.name}`);
    }

    const scope = resolver.createScope();
    try {
      const invocable = await scope.resolve(type, parameters);
      if (invocable instanceof CancellableInvocable) {
        invocable.cancellationSignal = cancellationSignal;
      }
      await invocable.invoke();
    } finally {
      await scope.dispose();
    }
  }

  private async whenPredicatePasses(): Promise<boolean> {
    return this.whenPredicate === null || (await this.whenPredicate());
  }

  private markAsExecutedOnce(): void {
    this.wasPreviouslyRun = true;
  }

  private unscheduleIfWarranted(): void {
    if (this.runOnceFlag && this.wasPreviouslyRun && !this.unscheduleRequested) {
      this.unscheduleRequested = true;
      this.options.unschedule?.();
    }
  }

  // ── Runtime queries ─────────────────────────────────────────────

  shouldPreventOverlapping(): boolean {
    return this.preventOverlappingFlag;
  }

  overlapKey(): string {
    return this.eventUniqueId;
  }

  isCronBased(): boolean {
    return this.timeSpec.kind === 'cron';
  }

  shouldRunOnceAtStart(): boolean {
    return this.runOnceAtStartFlag;
  }

  invocableType(): InvocableType | undefined {
    return this.target.kind === 'invocable' ? this.target.type : undefined;
  }

  hasRunAtLeastOnce(): boolean {
    return this.wasPreviouslyRun;
  }

  describe(): string {
    const what = this.target.kind === 'invocable' ? this.target.type.name : 'action';
    const when =
      this.timeSpec.kind === 'interval'
        ? `every ${this.timeSpec.seconds}s (${this.expression.toString()})`
        : this.expression.toString();
    return `${what} [${when}] ${this.zonedTime.timeZone}`;
  }

  // ── Interval ────────────────────────────────────────────────────

  daily(): ScheduledEventConfiguration {
    return this.cron('00 00 * * *');
  }

  dailyAtHour(hour: number): ScheduledEventConfiguration {
    return this.cron(`00 ${hour} * * *`);
  }

  dailyAt(hour: number, minute: number): ScheduledEventConfiguration {
    return this.cron(`${minute} ${hour} * * *`);
  }

  hourly(): ScheduledEventConfiguration {
    return this.cron('00 * * * *');
  }

  hourlyAt(minute: number): ScheduledEventConfiguration {
    return this.cron(`${minute} * * * *`);
  }

  everyMinute(): ScheduledEventConfiguration {
    return this.cron('* * * * *');
  }

  everyFiveMinutes(): ScheduledEventConfiguration {
    return this.cron('*/5 * * * *');
  }

  everyTenMinutes(): ScheduledEventConfiguration {
    return this.cron('*/10 * * * *');
  }

  everyFifteenMinutes(): ScheduledEventConfiguration {
    return this.cron('*/15 * * * *');
  }

  everyThirtyMinutes(): ScheduledEventConfiguration {
    return this.cron('*/30 * * * *');
  }

  weekly(): ScheduledEventConfiguration {
    return this.cron('00 00 * * 1');
  }

  monthly(): ScheduledEventConfiguration {
    return this.cron('00 00 1 * *');
  }

  cron(expression: string): ScheduledEventConfiguration {
    this.expression = new CronExpression(expression);
    this.timeSpec = { kind: 'cron' };
    return this;
  }

  everySecond(): ScheduledEventConfiguration {
    return this.everySeconds(1);
  }

  everyFiveSeconds(): ScheduledEventConfiguration {
    return this.everySeconds(5);
  }

  everyTenSeconds(): ScheduledEventConfiguration {
    return this.everySeconds(10);
  }

  everyFifteenSeconds(): ScheduledEventConfiguration {
    return this.everySeconds(15);
  }

  everyThirtySeconds(): ScheduledEventConfiguration {
    return this.everySeconds(30);
  }

  /**
   * Run every `seconds` seconds within each minute. 0 fires once at the top of
   * every minute.
   */
  everySeconds(seconds: number): ScheduledEventConfiguration {
    if (!Number.isInteger(seconds) || seconds < 0 || seconds >= ONE_MINUTE_AS_SECONDS) {
      throw new ConfigurationError(`Interval must be a whole number of seconds between 0 and 59, got ${seconds}`, {
        seconds,
      });
    }
    this.expression = new CronExpression('* * * * *');
    this.timeSpec = { kind: 'interval', seconds };
    return this;
  }

  // ── Refinements ─────────────────────────────────────────────────

  monday(): ScheduledEventConfiguration {
    this.expression.appendWeekday(DayOfWeek.Monday);
    return this;
  }

  tuesday(): ScheduledEventConfiguration {
    this.expression.appendWeekday(DayOfWeek.Tuesday);
    return this;
  }

  wednesday(): ScheduledEventConfiguration {
    this.expression.appendWeekday(DayOfWeek.Wednesday);
    return this;
  }

  thursday(): ScheduledEventConfiguration {
    this.expression.appendWeekday(DayOfWeek.Thursday);
    return this;
  }

  friday(): ScheduledEventConfiguration {
    this.expression.appendWeekday(DayOfWeek.Friday);
    return this;
  }

  saturday(): ScheduledEventConfiguration {
    this.expression.appendWeekday(DayOfWeek.Saturday);
    return this;
  }

  sunday(): ScheduledEventConfiguration {
    this.expression.appendWeekday(DayOfWeek.Sunday);
    return this;
  }

  weekday(): ScheduledEventConfiguration {
    return this.monday().tuesday().wednesday().thursday().friday();
  }

  weekend(): ScheduledEventConfiguration {
    return this.saturday().sunday();
  }

  zoned(timeZone: string): ScheduledEventConfiguration {
    this.zonedTime = new ZonedTime(timeZone);
    return this;
  }

  when(predicate: SchedulePredicate): ScheduledEventConfiguration {
    this.whenPredicate = predicate;
    return this;
  }

  preventOverlapping(uniqueIdentifier: string): ScheduledEventConfiguration {
    this.assignUniqueIdentifier(uniqueIdentifier);
    this.preventOverlappingFlag = true;
    return this;
  }

  assignUniqueIdentifier(uniqueIdentifier: string): ScheduledEventConfiguration {
    if (this.executionStarted && uniqueIdentifier !== this.eventUniqueId) {
      throw new ConfigurationError('Cannot change the identifier of an event that has already run', {
        current: this.eventUniqueId,
        requested: uniqueIdentifier,
      });
    }
    this.eventUniqueId = uniqueIdentifier;
    return this;
  }

  runOnceAtStart(): ScheduledEventConfiguration {
    this.runOnceAtStartFlag = true;
    return this;
  }

  once(): ScheduledEventConfiguration {
    this.runOnceFlag = true;
    return this;
  }
}
