/**
 * Typed readers for environment variables.
 * Unparseable values fall back to the default instead of throwing; schema
 * validation happens in each package's config loader.
 */

export function getEnvString(key: string): string | undefined;
export function getEnvString(key: string, defaultValue: string): string;
export function getEnvString(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined ? defaultValue : value;
}

export function getEnvNumber(key: string): number | undefined;
export function getEnvNumber(key: string, defaultValue: number): number;
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

export function getEnvBoolean(key: string): boolean | undefined;
export function getEnvBoolean(key: string, defaultValue: boolean): boolean;
export function getEnvBoolean(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key]?.trim().toLowerCase();
  if (value === undefined) return defaultValue;
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return defaultValue;
}
