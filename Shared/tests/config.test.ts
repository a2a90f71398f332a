import { describe, it, expect, afterEach } from 'vitest';
import { getEnvString, getEnvNumber, getEnvBoolean } from '../Utils/config.js';

const TEST_KEY = '__TICKWORK_TEST_VAR__';

describe('getEnvString', () => {
  afterEach(() => { delete process.env[TEST_KEY]; });

  it('should return value when set', () => {
    process.env[TEST_KEY] = 'hello';
    expect(getEnvString(TEST_KEY)).toBe('hello');
  });

  it('should return default when not set', () => {
    expect(getEnvString(TEST_KEY, 'fallback')).toBe('fallback');
  });

  it('should return undefined when not set and no default', () => {
    expect(getEnvString(TEST_KEY)).toBeUndefined();
  });

  it('should return empty string if env var is empty', () => {
    process.env[TEST_KEY] = '';
    expect(getEnvString(TEST_KEY, 'fallback')).toBe('');
  });
});

describe('getEnvNumber', () => {
  afterEach(() => { delete process.env[TEST_KEY]; });

  it('should parse integer values', () => {
    process.env[TEST_KEY] = '1440';
    expect(getEnvNumber(TEST_KEY)).toBe(1440);
  });

  it('should return default for non-numeric', () => {
    process.env[TEST_KEY] = 'abc';
    expect(getEnvNumber(TEST_KEY, 3000)).toBe(3000);
  });

  it('should return default when not set', () => {
    expect(getEnvNumber(TEST_KEY, 42)).toBe(42);
  });

  it('should truncate floats (parseInt behavior)', () => {
    process.env[TEST_KEY] = '3.14';
    expect(getEnvNumber(TEST_KEY)).toBe(3);
  });
});

describe('getEnvBoolean', () => {
  afterEach(() => { delete process.env[TEST_KEY]; });

  it.each(['true', 'TRUE', '1', 'yes', ' on '])('should read %j as true', (value) => {
    process.env[TEST_KEY] = value;
    expect(getEnvBoolean(TEST_KEY)).toBe(true);
  });

  it.each(['false', '0', 'no', 'OFF'])('should read %j as false', (value) => {
    process.env[TEST_KEY] = value;
    expect(getEnvBoolean(TEST_KEY, true)).toBe(false);
  });

  it('should return default for unrecognized values', () => {
    process.env[TEST_KEY] = 'maybe';
    expect(getEnvBoolean(TEST_KEY, true)).toBe(true);
  });

  it('should return default when not set', () => {
    expect(getEnvBoolean(TEST_KEY, false)).toBe(false);
  });
});
