import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, RingBuffer, initLogger, getLogger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogEntry, LogTransport } from "./types.js";

function captureTransport(minLevel: LogTransport["minLevel"] = "trace") {
  const entries: LogEntry[] = [];
  const transport: LogTransport = {
    name: "capture",
    minLevel,
    log: (entry) => { entries.push(entry); },
  };
  return { transport, entries };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RingBuffer", () => {
  it("returns items oldest-first once it wraps", () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach(n => buffer.push(n));
    expect(buffer.getAll()).toEqual([3, 4, 5]);
    expect(buffer.getLast(2)).toEqual([4, 5]);
    expect(buffer.size).toBe(3);
  });
});

describe("Logger", () => {
  it("drops entries below the minimum level", () => {
    const { transport, entries } = captureTransport();
    const logger = new Logger({ minLevel: "info", component: "engine", transports: [transport] });

    logger.debug("hidden");
    logger.info("shown");

    expect(entries.map(e => e.message)).toEqual(["shown"]);
  });

  it("respects each transport's own minimum level", () => {
    const all = captureTransport("trace");
    const errorsOnly = captureTransport("error");
    const logger = new Logger({ minLevel: "trace", component: "engine", transports: [all.transport, errorsOnly.transport] });

    logger.warn("careful");
    logger.error("broken", new Error("boom"));

    expect(all.entries).toHaveLength(2);
    expect(errorsOnly.entries).toHaveLength(1);
    expect(errorsOnly.entries[0].error).toMatchObject({ name: "Error", message: "boom" });
  });

  it("records non-Error failures as Unknown", () => {
    const logger = new Logger({ minLevel: "trace", component: "engine", transports: [] });
    logger.error("odd failure", "plain string");
    expect(logger.getRecentLogs(1)[0].error).toEqual({ name: "Unknown", message: "plain string" });
  });

  it("redacts sensitive keys, including nested ones", () => {
    const { transport, entries } = captureTransport();
    const logger = new Logger({ minLevel: "trace", component: "engine", transports: [transport] });

    logger.info("configured", { apiKey: "test-secret", nested: { password: "test-secret", port: 3 } });

    expect(entries[0].data).toEqual({ apiKey: "[REDACTED]", nested: { password: "[REDACTED]", port: 3 } });
  });

  it("shares transports and ring buffer with children", () => {
    const { transport, entries } = captureTransport();
    const root = new Logger({ minLevel: "trace", component: "engine", transports: [transport] });
    const child = root.child({ component: "engine.executor", loopId: "loop-1" });

    child.info("Drain loop started");

    expect(entries[0]).toMatchObject({ component: "engine.executor", loopId: "loop-1", message: "Drain loop started" });
    expect(root.getRecentLogs().map(e => e.message)).toEqual(["Drain loop started"]);
  });

  it("keeps logging when a transport throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const broken: LogTransport = { name: "broken", minLevel: "trace", log: () => { throw new Error("disk full"); } };
    const { transport, entries } = captureTransport();
    const logger = new Logger({ minLevel: "trace", component: "engine", transports: [broken, transport] });

    logger.info("still here");

    expect(entries).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("flushes transports that support it", async () => {
    const flush = vi.fn().mockResolvedValue(undefined);
    const logger = new Logger({ minLevel: "trace", component: "engine", transports: [{ name: "f", minLevel: "trace", log: () => {}, flush }] });
    await logger.flush();
    expect(flush).toHaveBeenCalledTimes(1);
  });
});

describe("global logger", () => {
  it("returns the logger created by initLogger", () => {
    const logger = initLogger({ minLevel: "silent", component: "engine", transports: [] });
    expect(getLogger()).toBe(logger);
  });
});

describe("ConsoleTransport", () => {
  const entry: LogEntry = {
    timestamp: "2026-01-02T03:04:05.678Z",
    level: "info",
    component: "engine.executor",
    message: "Drain loop started",
    loopId: "L1",
    data: { cycles: 2 },
  };

  it("formats a single plain line without colors", () => {
    const transport = new ConsoleTransport({ colors: false, timestamps: false });
    expect(transport.format(entry)).toBe('INF [engine.executor] (loop L1) Drain loop started {"cycles":2}');
  });

  it("prefixes the time of day when timestamps are on", () => {
    const transport = new ConsoleTransport({ colors: false });
    expect(transport.format({ ...entry, data: undefined, loopId: undefined })).toBe("03:04:05 INF [engine.executor] Drain loop started");
  });

  it("routes warnings to console.warn", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const transport = new ConsoleTransport({ colors: false, timestamps: false });
    transport.log({ ...entry, level: "warn", data: undefined, loopId: undefined });
    expect(warn).toHaveBeenCalledWith("WRN [engine.executor] Drain loop started");
  });
});
