/**
 * Contracts between schedule entries, the scheduler that drives them and the
 * application that provides their work.
 */

/** Inline work: a plain closure, sync or async. */
export type ScheduledWork = () => void | Promise<void>;

/** Gate evaluated before each run; resolving false skips the work. */
export type SchedulePredicate = () => Promise<boolean>;

/** Work unit resolved per run through an {@link InvocableResolver}. */
export interface Invocable {
  invoke(): void | Promise<void>;
}

/**
 * Invocables that extend this class receive the scheduler's cancellation
 * signal before `invoke()` is called. The default signal never aborts.
 */
export abstract class CancellableInvocable implements Invocable {
  cancellationSignal: AbortSignal = new AbortController().signal;

  abstract invoke(): void | Promise<void>;
}

export type InvocableType<T extends Invocable = Invocable> = abstract new (...args: never[]) => T;

/**
 * Short-lived resolution context. Acquired right before an invocable is
 * resolved and disposed once it has run, whether or not it threw.
 */
export interface ResolutionScope {
  /** Rejects with ResolutionError when the type cannot be produced. */
  resolve<T extends Invocable>(type: InvocableType<T>, parameters: readonly unknown[]): Promise<T>;
  dispose(): Promise<void>;
}

export interface InvocableResolver {
  createScope(): ResolutionScope;
}

/** Asks the owner of the registry to drop the calling entry. */
export type UnscheduleCallback = () => boolean;

/**
 * Configuration view: choose when the event recurs.
 */
export interface ScheduleInterval {
  daily(): ScheduledEventConfiguration;
  dailyAtHour(hour: number): ScheduledEventConfiguration;
  dailyAt(hour: number, minute: number): ScheduledEventConfiguration;
  hourly(): ScheduledEventConfiguration;
  hourlyAt(minute: number): ScheduledEventConfiguration;
  everyMinute(): ScheduledEventConfiguration;
  everyFiveMinutes(): ScheduledEventConfiguration;
  everyTenMinutes(): ScheduledEventConfiguration;
  everyFifteenMinutes(): ScheduledEventConfiguration;
  everyThirtyMinutes(): ScheduledEventConfiguration;
  weekly(): ScheduledEventConfiguration;
  monthly(): ScheduledEventConfiguration;
  cron(expression: string): ScheduledEventConfiguration;
  everySecond(): ScheduledEventConfiguration;
  everyFiveSeconds(): ScheduledEventConfiguration;
  everyTenSeconds(): ScheduledEventConfiguration;
  everyFifteenSeconds(): ScheduledEventConfiguration;
  everyThirtySeconds(): ScheduledEventConfiguration;
  everySeconds(seconds: number): ScheduledEventConfiguration;
}

/**
 * Configuration view: refine an event once its interval is chosen.
 */
export interface ScheduledEventConfiguration {
  monday(): ScheduledEventConfiguration;
  tuesday(): ScheduledEventConfiguration;
  wednesday(): ScheduledEventConfiguration;
  thursday(): ScheduledEventConfiguration;
  friday(): ScheduledEventConfiguration;
  saturday(): ScheduledEventConfiguration;
  sunday(): ScheduledEventConfiguration;
  weekday(): ScheduledEventConfiguration;
  weekend(): ScheduledEventConfiguration;
  /** IANA zone name, e.g. "Europe/Warsaw". Defaults to UTC. */
  zoned(timeZone: string): ScheduledEventConfiguration;
  when(predicate: SchedulePredicate): ScheduledEventConfiguration;
  preventOverlapping(uniqueIdentifier: string): ScheduledEventConfiguration;
  assignUniqueIdentifier(uniqueIdentifier: string): ScheduledEventConfiguration;
  runOnceAtStart(): ScheduledEventConfiguration;
  once(): ScheduledEventConfiguration;
}

/**
 * Runtime view used by the scheduler on every tick.
 */
export interface ScheduledEventRuntime {
  isDue(utcNow: Date): boolean;
  invoke(cancellationSignal: AbortSignal): Promise<void>;
  shouldPreventOverlapping(): boolean;
  overlapKey(): string;
  isCronBased(): boolean;
  shouldRunOnceAtStart(): boolean;
  invocableType(): InvocableType | undefined;
  hasRunAtLeastOnce(): boolean;
  describe(): string;
}
