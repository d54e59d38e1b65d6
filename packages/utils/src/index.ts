/**
 * @paircast/utils
 *
 * Primitives shared by the paircast packages: a typed event emitter,
 * an ordered queue with atomic drain, a single-writer task queue and the
 * injected logger contract.
 *
 * @packageDocumentation
 */

export { Emitter, type EventMap, type Listener, type ListenerErrorHandler } from "./emitter.js";
export { ConfigError, PaircastError, toError } from "./errors.js";
export {
  createConsoleLogger,
  type Diagnostic,
  type Logger,
  type LogLevel,
  logDiagnostic,
  noopLogger,
} from "./logger.js";
export { OrderedQueue } from "./ordered-queue.js";
export { SerialQueue } from "./serial-queue.js";
