/**
 * Logging Setup for the Engine
 *
 * Initializes the shared logging system with the transports the engine
 * configuration asks for.
 */

import {
  initLogger,
  Logger,
  ConsoleTransport,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@signal-scheduler/shared/logging";
import { loadEngineConfig } from "./config.js";

export interface LoggingOptions {
  /** Minimum level to log (default: from SCHEDULER_LOG_LEVEL) */
  minLevel?: LogLevel;
  /** Enable console output (default: from SCHEDULER_LOG_CONSOLE) */
  console?: boolean;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
  /** Extra transports, e.g. an in-memory capture in tests */
  transports?: LogTransport[];
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

/**
 * Initialize the logging system for the engine.
 */
export function initEngineLogging(options: LoggingOptions = {}): Logger {
  const config = loadEngineConfig();
  const minLevel = options.minLevel ?? config.logLevel;

  const transports: LogTransport[] = [...(options.transports ?? [])];

  if (options.console ?? config.logToConsole) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
    }));
  }

  logger = initLogger({
    minLevel,
    component: "engine",
    transports,
    ringBufferSize: 500
  });

  return logger;
}

/**
 * Get the engine logger. Auto-initializes from the environment if needed.
 */
export function getEngineLogger(): Logger {
  return logger ?? initEngineLogging();
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return getEngineLogger().child({ component: `engine.${component}` });
}
