import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { Logger } from '../Utils/logger.js';

describe('Logger', () => {
  let spy: MockInstance<typeof console.error>;

  beforeEach(() => {
    spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    spy.mockRestore();
  });

  function lastLine(): string {
    const call = spy.mock.calls[spy.mock.calls.length - 1];
    return String(call?.[0]);
  }

  describe('level filtering', () => {
    it('should log at or above the configured level', () => {
      const log = new Logger('test');
      log.setLevel('warn');

      log.debug('skip');
      log.info('skip');
      log.warn('show');
      log.error('show');

      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('should only log errors at error level', () => {
      const log = new Logger('test');
      log.setLevel('error');

      log.debug('skip');
      log.info('skip');
      log.warn('skip');
      log.error('show');

      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe('text format', () => {
    it('should include timestamp, level, context, and message', () => {
      const log = new Logger('scheduler');
      log.setLevel('info');
      log.setFormat('text');
      log.info('tick finished');

      expect(lastLine()).toMatch(/^\[.+\] \[INFO\] \[scheduler\] tick finished$/);
    });

    it('should append JSON data when provided', () => {
      const log = new Logger('svc');
      log.setLevel('info');
      log.setFormat('text');
      log.info('with data', { eventId: 'nightly' });

      expect(lastLine()).toMatch(/ with data \{"eventId":"nightly"\}$/);
    });

    it('should serialize Error objects with message, name and code', () => {
      const log = new Logger('svc');
      log.setLevel('error');
      log.setFormat('text');
      log.error('failed', Object.assign(new Error('boom'), { code: 'EBOOM' }));

      const output = lastLine();
      expect(output).toContain('"message":"boom"');
      expect(output).toContain('"name":"Error"');
      expect(output).toContain('"code":"EBOOM"');
      expect(output).toContain('"stack"');
    });
  });

  describe('json format', () => {
    it('should emit one JSON object per line', () => {
      const log = new Logger('svc');
      log.setLevel('info');
      log.setFormat('json');
      log.warn('lock held', { key: 'reports' });

      const parsed: unknown = JSON.parse(lastLine());
      expect(parsed).toMatchObject({
        level: 'warn',
        context: 'svc',
        message: 'lock held',
        data: { key: 'reports' },
      });
    });
  });

  describe('child logger', () => {
    it('should create a child with compound context', () => {
      const parent = new Logger('parent');
      parent.setLevel('info');
      parent.setFormat('text');
      parent.child('child').info('from child');

      expect(lastLine()).toContain('[parent:child]');
    });

    it('should inherit parent level and format', () => {
      const parent = new Logger('p');
      parent.setLevel('warn');
      parent.setFormat('json');
      const child = parent.child('c');

      child.info('skip');
      child.warn('show');

      expect(spy).toHaveBeenCalledTimes(1);
      expect(child.getFormat()).toBe('json');
    });
  });

  describe('environment', () => {
    const originalLevel = process.env.LOG_LEVEL;
    const originalFormat = process.env.LOG_FORMAT;

    afterEach(() => {
      if (originalLevel === undefined) delete process.env.LOG_LEVEL;
      else process.env.LOG_LEVEL = originalLevel;
      if (originalFormat === undefined) delete process.env.LOG_FORMAT;
      else process.env.LOG_FORMAT = originalFormat;
    });

    it('should read initial level from LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'debug';
      expect(new Logger('test').getLevel()).toBe('debug');
    });

    it('should default to info for invalid LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(new Logger('test').getLevel()).toBe('info');
    });

    it('should read json format from LOG_FORMAT', () => {
      process.env.LOG_FORMAT = 'json';
      expect(new Logger('test').getFormat()).toBe('json');
    });

    it('should default to text format', () => {
      delete process.env.LOG_FORMAT;
      expect(new Logger('test').getFormat()).toBe('text');
    });
  });
});
