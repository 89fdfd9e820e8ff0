/**
 * Structured Logging
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, ConsoleTransport } from "@signal-scheduler/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "debug",
 *   component: "engine",
 *   transports: [new ConsoleTransport({ colors: true })]
 * });
 *
 * const loopLog = logger.child({ component: "engine.executor", loopId: "a1b2" });
 * loopLog.debug("Drain loop started");
 * loopLog.error("Drain loop failed", new Error("boom"), { cycles: 3 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  type LogSink
} from "./logger.js";

export {
  ConsoleTransport,
  type ConsoleTransportOptions
} from "./transports/index.js";
