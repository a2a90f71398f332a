/**
 * Base error for all tickwork packages.
 * Provides a consistent error pattern with code, details and an optional cause.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BaseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Configuration-related errors (invalid env vars, invalid schedule setup, etc.)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
