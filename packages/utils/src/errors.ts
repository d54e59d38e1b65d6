/**
 * Base error for every paircast package.
 */
export class PaircastError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PaircastError";
  }
}

/**
 * Invalid configuration value passed to a constructor.
 */
export class ConfigError extends PaircastError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`);
    this.name = "ConfigError";
    this.field = field;
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
