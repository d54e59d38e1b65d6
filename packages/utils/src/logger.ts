/**
 * Injected logging contract.
 *
 * Components take an optional logger instead of consulting global debug
 * flags. Every method is optional so callers can wire only the levels
 * they care about.
 */
export interface Logger {
  debug?: (...args: unknown[]) => void;
  info?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logger that discards everything.
 */
export const noopLogger: Logger = {};

/**
 * Console-backed logger with a fixed prefix and a minimum level.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("initiator", "debug");
 * logger.info?.("offer sent");   // "[initiator] offer sent"
 * ```
 */
export function createConsoleLogger(prefix: string, level: LogLevel = "info"): Logger {
  const min = LEVEL_ORDER[level];
  const tag = `[${prefix}]`;
  const enabled = (l: Exclude<LogLevel, "silent">) => LEVEL_ORDER[l] >= min;
  return {
    debug: enabled("debug") ? (...args) => console.debug(tag, ...args) : undefined,
    info: enabled("info") ? (...args) => console.info(tag, ...args) : undefined,
    warn: enabled("warn") ? (...args) => console.warn(tag, ...args) : undefined,
    error: enabled("error") ? (...args) => console.error(tag, ...args) : undefined,
  };
}

/**
 * Structured record of something a component dropped, rejected or
 * recovered from. Emitted on the component's `diagnostic` event.
 */
export interface Diagnostic<C extends string = string> {
  code: C;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Write a diagnostic to the logger at the given level.
 */
export function logDiagnostic(
  logger: Logger,
  diagnostic: Diagnostic,
  level: Exclude<LogLevel, "silent"> = "warn",
): void {
  const write = logger[level];
  if (!write) return;
  if (diagnostic.details) {
    write(`${diagnostic.code}: ${diagnostic.message}`, diagnostic.details);
  } else {
    write(`${diagnostic.code}: ${diagnostic.message}`);
  }
}
