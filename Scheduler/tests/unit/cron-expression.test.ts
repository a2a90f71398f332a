import { describe, it, expect } from 'vitest';
import { CronExpression, DayOfWeek } from '../../src/schedule/cron-expression.js';
import { ZonedTime, type ZonedDateParts } from '../../src/schedule/zoned-time.js';
import { ConfigurationError, CronFormatError } from '../../src/utils/errors.js';

const utc = ZonedTime.utc();

function at(iso: string): ZonedDateParts {
  return utc.convert(new Date(iso));
}

describe('CronExpression parsing', () => {
  it('should accept the common selector forms', () => {
    const valid = [
      '* * * * *',
      '00 00 * * *',
      '*/5 * * * *',
      '0 0 * * 1',
      '0 */2 * * *',
      '30 8 1 * *',
      '0 9,18 * * 1-5',
      '5/20 * * * *',
      '0 0 * * 7',
    ];
    for (const expression of valid) {
      expect(() => new CronExpression(expression)).not.toThrow();
    }
  });

  it.each([
    [''],
    ['not-a-cron'],
    ['60 * * * *'],
    ['* 25 * * *'],
    ['* * 32 * *'],
    ['* * * 13 *'],
    ['* * * *'],
    ['0 * * * * *'],
    ['5-1 * * * *'],
    ['*/0 * * * *'],
  ])('should reject %j with CronFormatError', (expression) => {
    expect(() => new CronExpression(expression)).toThrow(CronFormatError);
  });

  it('should report the expression and a configuration error code', () => {
    try {
      new CronExpression('61 * * * *');
      expect.unreachable('expected CronFormatError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toBeInstanceOf(CronFormatError);
      if (error instanceof CronFormatError) {
        expect(error.code).toBe('CRON_FORMAT_ERROR');
        expect(error.expression).toBe('61 * * * *');
      }
    }
  });

  it('should normalize leading zeros when printed', () => {
    expect(new CronExpression('00 00 * * *').toString()).toBe('0 0 * * *');
    expect(new CronExpression('*/15 9-17 * * 1-5').toString()).toBe('*/15 9-17 * * 1-5');
  });
});

describe('CronExpression matching', () => {
  it('should match every instant for a fully unconstrained rule', () => {
    const cron = new CronExpression('* * * * *');
    expect(cron.isDue(at('2026-02-05T10:30:15Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-08T23:59:59Z'))).toBe(true);
  });

  it('should match literal minute and hour', () => {
    const cron = new CronExpression('00 00 * * *');
    expect(cron.isDue(at('2026-02-05T00:00:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T00:01:00Z'))).toBe(false);
    expect(cron.isDue(at('2026-02-05T01:00:00Z'))).toBe(false);
  });

  it('should treat wildcard steps as divisibility within the field', () => {
    const cron = new CronExpression('*/15 * * * *');
    expect(cron.isDue(at('2026-02-05T10:00:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T10:15:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T10:45:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T10:10:00Z'))).toBe(false);
  });

  it('should apply wildcard steps to day of month the same way', () => {
    const cron = new CronExpression('0 0 */5 * *');
    expect(cron.isDue(at('2026-02-05T00:00:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-06T00:00:00Z'))).toBe(false);
    expect(cron.isDue(at('2026-02-01T00:00:00Z'))).toBe(false);
  });

  it('should combine steps across fields', () => {
    const cron = new CronExpression('*/10 */6 * * *');
    expect(cron.isDue(at('2026-02-05T12:20:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T13:20:00Z'))).toBe(false);
  });

  it('should match lists and ranges', () => {
    const cron = new CronExpression('0 9,18 * * 1-5');
    expect(cron.isDue(at('2026-02-02T09:00:00Z'))).toBe(true); // Monday
    expect(cron.isDue(at('2026-02-06T18:00:00Z'))).toBe(true); // Friday
    expect(cron.isDue(at('2026-02-05T12:00:00Z'))).toBe(false);
    expect(cron.isDue(at('2026-02-07T09:00:00Z'))).toBe(false); // Saturday
  });

  it('should read "n/step" as a range from n to the end of the field', () => {
    const cron = new CronExpression('5/20 * * * *');
    expect(cron.isDue(at('2026-02-05T10:25:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T10:45:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T10:20:00Z'))).toBe(false);
  });

  it('should match day of month and month', () => {
    const cron = new CronExpression('30 8 1 * *');
    expect(cron.isDue(at('2026-03-01T08:30:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-05T08:30:00Z'))).toBe(false);
  });

  it('should require both day of month and weekday when both are restricted', () => {
    const cron = new CronExpression('0 0 1 * 1');
    expect(cron.isDue(at('2026-03-01T00:00:00Z'))).toBe(false); // the 1st, but a Sunday
    expect(cron.isDue(at('2026-02-02T00:00:00Z'))).toBe(false); // a Monday, but the 2nd
  });

  it('should accept both 0 and 7 as Sunday', () => {
    expect(new CronExpression('0 0 * * 0').isDue(at('2026-02-08T00:00:00Z'))).toBe(true);
    expect(new CronExpression('0 0 * * 7').isDue(at('2026-02-08T00:00:00Z'))).toBe(true);
    expect(new CronExpression('0 0 * * 7').isDue(at('2026-02-07T00:00:00Z'))).toBe(false);
  });
});

describe('CronExpression weekdays', () => {
  it('should replace an unrestricted weekday field with the first appended day', () => {
    const cron = new CronExpression('0 0 * * *').appendWeekday(DayOfWeek.Monday);
    expect(cron.toString()).toBe('0 0 * * 1');
    expect(cron.isDue(at('2026-02-02T00:00:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-03T00:00:00Z'))).toBe(false);
  });

  it('should union later appended days', () => {
    const cron = new CronExpression('0 0 * * *')
      .appendWeekday(DayOfWeek.Monday)
      .appendWeekday(DayOfWeek.Friday)
      .appendWeekday(DayOfWeek.Monday);
    expect(cron.toString()).toBe('0 0 * * 1,5');
    expect(cron.isDue(at('2026-02-02T00:00:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-06T00:00:00Z'))).toBe(true);
    expect(cron.isDue(at('2026-02-04T00:00:00Z'))).toBe(false);
  });

  it('should add to an explicit weekday field', () => {
    const cron = new CronExpression('00 00 * * 1').appendWeekday(DayOfWeek.Friday);
    expect(cron.toString()).toBe('0 0 * * 1,5');
  });

  it('should evaluate only the weekday field in isWeekdayDue', () => {
    const cron = new CronExpression('30 8 1 1 1');
    expect(cron.isWeekdayDue(at('2026-02-02T12:17:43Z'))).toBe(true);
    expect(cron.isWeekdayDue(at('2026-02-03T08:30:00Z'))).toBe(false);
  });
});
