/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transport support. A logger and all of
 * its children write into one sink: the same transports, the same ring buffer.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LoggerConfig,
  type ILogger
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  getAll(): T[] {
    if (this.count === 0) return [];
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined);
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }

  get size(): number {
    return this.count;
  }
}

// ============================================
// SINK
// ============================================

export interface LogSink {
  readonly minLevel: LogLevel;
  readonly transports: LoggerConfig["transports"];
  readonly redactPatterns: RegExp[];
  readonly buffer: RingBuffer<LogEntry>;
}

function createSink(config: LoggerConfig): LogSink {
  return {
    minLevel: config.minLevel,
    transports: config.transports,
    redactPatterns: config.redactPatterns ?? DEFAULT_REDACT_PATTERNS,
    buffer: new RingBuffer<LogEntry>(config.ringBufferSize ?? 1000),
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly sink: LogSink;
  private readonly context: LogContext & { component: string };

  constructor(config: LoggerConfig, context: LogContext = {}, sink?: LogSink) {
    this.sink = sink ?? createSink(config);
    this.context = { ...context, component: context.component ?? config.component };
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private write(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.sink.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.context.component,
      message,
    };
    if (this.context.loopId) entry.loopId = this.context.loopId;
    if (this.context.entryId) entry.entryId = this.context.entryId;

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    this.sink.buffer.push(entry);

    for (const transport of this.sink.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // Transport error - console is the last resort
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.sink.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (value instanceof Error) {
        result[key] = { name: value.name, message: value.message };
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context
  // ----------------------------------------

  child(context: LogContext): ILogger {
    return new Logger(
      { minLevel: this.sink.minLevel, component: this.context.component, transports: this.sink.transports },
      { ...this.context, ...context },
      this.sink
    );
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.sink.buffer.getLast(count);
  }

  async flush(): Promise<void> {
    await Promise.all(this.sink.transports.map(t => t.flush?.()));
  }
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}
