/**
 * End-to-end scheduling scenarios: mixed modes driven cycle by cycle, and a
 * periodic task that never succeeds.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "@signal-scheduler/shared/logging";
import { TaskScheduler } from "./queue-manager.js";
import { TaskExecutor } from "./executor.js";
import { TaskExecutorSignal } from "./signal.js";
import { ScheduleMode } from "./schedule-mode.js";
import { defineTask } from "./types.js";

const silent = () => new Logger({ minLevel: "silent", component: "test", transports: [] });

afterEach(() => {
  vi.useRealTimers();
});

describe("mixed schedule modes", () => {
  it("runs immediate, delayed and periodic work at the right cycles", async () => {
    let clock = 0;
    const ran: string[] = [];
    const scheduler = new TaskScheduler({ now: () => clock, logger: silent() });
    const record = (name: string) => defineTask(name, () => {
      ran.push(`${name}@${clock}`);
    });

    scheduler.enqueue(record("A"), ScheduleMode.immediate());
    scheduler.enqueue(record("B"), ScheduleMode.delayed(2000));
    scheduler.enqueue(record("C"), ScheduleMode.periodic(1000));

    for (const t of [0, 1000, 2000, 3000]) {
      clock = t;
      while (await scheduler.runNext()) { /* drain everything due */ }
    }

    expect(ran).toEqual(["A@0", "C@1000", "B@2000", "C@2000", "C@3000"]);
    expect(scheduler.getStatus()).toEqual({ ready: 0, delayed: 0, periodic: 1, executing: null });
  });
});

describe("always-failing periodic task", () => {
  it("is executed and fails at every interval", async () => {
    vi.useFakeTimers();
    const start = Date.now();
    const scheduler = new TaskScheduler({ logger: silent() });
    const signal = TaskExecutorSignal.manualTrigger();
    const executor = new TaskExecutor(scheduler, signal, { logger: silent() });

    const failedAt: number[] = [];
    scheduler.onEvent(event => {
      if (event.type === "task_failed") failedAt.push(event.timestamp - start);
    });

    scheduler.enqueue(defineTask("broken", () => {
      throw new Error("always fails");
    }), ScheduleMode.periodic(1000));
    await executor.resume();

    await vi.advanceTimersByTimeAsync(3000);

    expect(failedAt).toEqual([1000, 2000, 3000]);
    expect(executor.getState()).toBe("running");
    expect(scheduler.getStatus().periodic).toBe(1);

    await executor.close();
    signal.close();
  });
});
