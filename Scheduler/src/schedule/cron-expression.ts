import { Cron } from 'croner';
import { CronFormatError } from '../utils/errors.js';
import type { ZonedDateParts } from './zoned-time.js';

export const DayOfWeek = {
  Sunday: 0,
  Monday: 1,
  Tuesday: 2,
  Wednesday: 3,
  Thursday: 4,
  Friday: 5,
  Saturday: 6,
} as const;

export type DayOfWeek = (typeof DayOfWeek)[keyof typeof DayOfWeek];

type CronPart =
  | { kind: 'any' }
  | { kind: 'step'; step: number }
  | { kind: 'value'; value: number }
  | { kind: 'range'; from: number; to: number; step: number };

interface FieldBounds {
  name: string;
  min: number;
  max: number;
}

const MINUTE: FieldBounds = { name: 'minute', min: 0, max: 59 };
const HOUR: FieldBounds = { name: 'hour', min: 0, max: 23 };
const DAY_OF_MONTH: FieldBounds = { name: 'day of month', min: 1, max: 31 };
const MONTH: FieldBounds = { name: 'month', min: 1, max: 12 };
// 0 and 7 are both Sunday
const WEEKDAY: FieldBounds = { name: 'weekday', min: 0, max: 7 };

const INTEGER = /^\d+$/;

function partMatches(part: CronPart, value: number): boolean {
  switch (part.kind) {
    case 'any':
      return true;
    case 'step':
      return value % part.step === 0;
    case 'value':
      return value === part.value;
    case 'range':
      return value >= part.from && value <= part.to && (value - part.from) % part.step === 0;
  }
}

function partToString(part: CronPart): string {
  switch (part.kind) {
    case 'any':
      return '*';
    case 'step':
      return `*/${part.step}`;
    case 'value':
      return String(part.value);
    case 'range':
      return part.step === 1 ? `${part.from}-${part.to}` : `${part.from}-${part.to}/${part.step}`;
  }
}

/**
 * One field of a cron expression: a comma separated list of selectors.
 * The field matches a value when any of its selectors does.
 */
class CronField {
  private constructor(private parts: CronPart[]) {}

  static parse(source: string, bounds: FieldBounds, expression: string): CronField {
    const fail = (reason: string): never => {
      throw new CronFormatError(
        `Invalid cron expression "${expression}": ${bounds.name} field "${source}" ${reason}`,
        expression,
        { field: bounds.name, value: source }
      );
    };

    const readNumber = (text: string, min: number, max: number): number => {
      if (!INTEGER.test(text)) fail('is not a number');
      const value = parseInt(text, 10);
      if (value < min || value > max) fail(`is outside ${min}-${max}`);
      return value;
    };

    const parts = source.split(',').map((piece): CronPart => {
      if (piece === '*') return { kind: 'any' };

      const [base, stepText, ...rest] = piece.split('/');
      if (rest.length > 0) return fail('has more than one step');
      const step = stepText === undefined ? undefined : readNumber(stepText, 1, bounds.max);

      if (base === '*') {
        return step === undefined ? { kind: 'any' } : { kind: 'step', step };
      }

      const bounded = base.split('-');
      if (bounded.length === 2) {
        const [fromText = '', toText = ''] = bounded;
        const from = readNumber(fromText, bounds.min, bounds.max);
        const to = readNumber(toText, bounds.min, bounds.max);
        if (from > to) fail(`has a reversed range ${from}-${to}`);
        return { kind: 'range', from, to, step: step ?? 1 };
      }
      if (bounded.length > 2) return fail('is not a valid range');

      const value = readNumber(base, bounds.min, bounds.max);
      // "5/15" means "from 5 to the end of the field, every 15"
      return step === undefined ? { kind: 'value', value } : { kind: 'range', from: value, to: bounds.max, step };
    });

    return new CronField(parts);
  }

  matches(value: number): boolean {
    return this.parts.some((part) => partMatches(part, value));
  }

  isUnrestricted(): boolean {
    return this.parts.every((part) => part.kind === 'any');
  }

  /**
   * Union a literal value into the field. An unrestricted field is replaced by it.
   */
  append(value: number): void {
    if (this.isUnrestricted()) {
      this.parts = [{ kind: 'value', value }];
      return;
    }
    if (!this.parts.some((part) => part.kind === 'value' && part.value === value)) {
      this.parts.push({ kind: 'value', value });
    }
  }

  toString(): string {
    return this.parts.map(partToString).join(',');
  }
}

function assertCronSyntax(expression: string): [string, string, string, string, string] {
  const fields = expression.trim().split(/\s+/);
  const [minute, hour, day, month, weekday] = fields;
  if (
    fields.length !== 5 ||
    minute === undefined ||
    hour === undefined ||
    day === undefined ||
    month === undefined ||
    weekday === undefined
  ) {
    throw new CronFormatError(
      `Invalid cron expression "${expression}": expected 5 fields, got ${expression.trim() ? fields.length : 0}`,
      expression
    );
  }
  try {
    new Cron(expression);
  } catch (error) {
    throw new CronFormatError(
      `Invalid cron expression "${expression}": ${error instanceof Error ? error.message : String(error)}`,
      expression
    );
  }
  return [minute, hour, day, month, weekday];
}

/**
 * Five-field cron rule (minute hour day-of-month month weekday).
 *
 * All fields must match for an instant to be due. Steps on a wildcard (`*\/n`)
 * select values divisible by n within the field's range, so `*\/10` on minutes
 * is 0, 10, 20, 30, 40, 50.
 */
export class CronExpression {
  private readonly minutes: CronField;
  private readonly hours: CronField;
  private readonly days: CronField;
  private readonly months: CronField;
  private readonly weekdays: CronField;

  constructor(expression: string) {
    const [minute, hour, day, month, weekday] = assertCronSyntax(expression);
    this.minutes = CronField.parse(minute, MINUTE, expression);
    this.hours = CronField.parse(hour, HOUR, expression);
    this.days = CronField.parse(day, DAY_OF_MONTH, expression);
    this.months = CronField.parse(month, MONTH, expression);
    this.weekdays = CronField.parse(weekday, WEEKDAY, expression);
  }

  isDue(time: ZonedDateParts): boolean {
    return (
      this.minutes.matches(time.minute) &&
      this.hours.matches(time.hour) &&
      this.days.matches(time.day) &&
      this.months.matches(time.month) &&
      this.isWeekdayDue(time)
    );
  }

  /**
   * Match the weekday field only; minute, hour, day and month are ignored.
   */
  isWeekdayDue(time: ZonedDateParts): boolean {
    return this.weekdays.matches(time.weekday) || (time.weekday === DayOfWeek.Sunday && this.weekdays.matches(7));
  }

  appendWeekday(day: DayOfWeek): this {
    this.weekdays.append(day);
    return this;
  }

  toString(): string {
    return [this.minutes, this.hours, this.days, this.months, this.weekdays].map(String).join(' ');
  }
}
