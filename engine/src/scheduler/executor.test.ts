/**
 * Task Executor Tests
 *
 * Covers:
 * - Lifecycle: idle → running → paused → running, resumeAndWait
 * - Drain loop: backlog drained after one trigger, failures do not stop it
 * - Cooperative pause: in-flight task finishes, nothing else runs
 * - justNext: independent of the lifecycle
 * - Loop termination: missing state, stream end
 * - Re-arming: future work wakes the loop through a single timer
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Logger } from "@signal-scheduler/shared/logging";
import { TaskExecutor } from "./executor.js";
import { TaskScheduler } from "./queue-manager.js";
import { TaskExecutorSignal } from "./signal.js";
import { SharedCell } from "./shared-cell.js";
import { ScheduleMode } from "./schedule-mode.js";
import { defineTask, type ExecutorState } from "./types.js";

// ============================================
// SETUP
// ============================================

let logger: Logger;
let scheduler: TaskScheduler;
let signal: TaskExecutorSignal;
let executor: TaskExecutor;
let ran: string[];

beforeEach(() => {
  logger = new Logger({ minLevel: "debug", component: "test", transports: [] });
  scheduler = new TaskScheduler({ logger });
  signal = TaskExecutorSignal.manualTrigger();
  executor = new TaskExecutor(scheduler, signal, { logger });
  ran = [];
});

afterEach(async () => {
  await executor.close();
  signal.close();
  vi.useRealTimers();
});

function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>(resolve => { release = resolve; });
  return { promise, release: () => release() };
}

function recording(name: string, done?: () => void) {
  return defineTask(name, () => {
    ran.push(name);
    done?.();
  });
}

/** Let every pending promise callback run. */
function settle(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}

// ============================================
// LIFECYCLE
// ============================================

describe("lifecycle", () => {
  it("starts idle and moves to running on resume", async () => {
    expect(executor.getState()).toBe("idle");

    const loop = await executor.resume();

    expect(executor.getState()).toBe("running");
    expect(loop.id).toHaveLength(10);
  });

  it("reuses the live loop when resumed twice", async () => {
    const first = await executor.resume();
    const second = await executor.resume();
    expect(second).toBe(first);
  });

  it("ignores pause while idle", async () => {
    await executor.pause();
    expect(executor.getState()).toBe("idle");
    expect(signal.pendingEvents).toBe(0);
  });

  it("resumeAndWait returns once a pause ends the loop", async () => {
    const waiting = executor.resumeAndWait();
    await settle();

    await executor.pause();
    await waiting;

    expect(executor.getState()).toBe("paused");
  });
});

// ============================================
// DRAIN LOOP
// ============================================

describe("drain loop", () => {
  it("drains a backlog after a single wakeup", async () => {
    const done = deferred();
    scheduler.enqueue(recording("A"));
    scheduler.enqueue(recording("B"));
    scheduler.enqueue(recording("C", done.release));

    await executor.resume();
    await done.promise;

    expect(ran).toEqual(["A", "B", "C"]);
    expect(scheduler.hasPendingWork()).toBe(false);
  });

  it("wakes for work enqueued while it is waiting", async () => {
    await executor.resume();
    await settle();

    const done = deferred();
    scheduler.enqueue(recording("late", done.release));
    await done.promise;

    expect(ran).toEqual(["late"]);
  });

  it("keeps going after a task fails", async () => {
    const done = deferred();
    scheduler.enqueue(defineTask("bad", () => { throw new Error("nope"); }));
    scheduler.enqueue(recording("good", done.release));

    const loop = await executor.resume();
    await done.promise;

    expect(ran).toEqual(["good"]);
    expect(executor.getState()).toBe("running");
    expect(await executor.resume()).toBe(loop);
  });

  it("coalesces wakeups for work enqueued in a burst", async () => {
    const runNext = vi.spyOn(scheduler, "runNext");
    await executor.resume();
    await settle();

    scheduler.enqueue(recording("A"));
    scheduler.enqueue(recording("B"));
    scheduler.enqueue(recording("C"));
    expect(signal.pendingEvents).toBe(1);
    await settle();

    expect(ran).toEqual(["A", "B", "C"]);
    expect(runNext).toHaveBeenCalledTimes(3);
    expect(signal.pendingEvents).toBe(0);
  });

  it("does not spin on an empty queue", async () => {
    const runNext = vi.spyOn(scheduler, "runNext");

    await executor.resume();
    signal.trigger();
    await settle();
    await settle();

    expect(runNext).toHaveBeenCalledTimes(1);
    expect(signal.pendingEvents).toBe(0);
  });
});

// ============================================
// PAUSE & RESUME
// ============================================

describe("pause and resume", () => {
  it("lets the in-flight task finish, then runs nothing until resumed", async () => {
    const started = deferred();
    const gate = deferred();
    const nextRan = deferred();
    scheduler.enqueue(defineTask("slow", async () => {
      started.release();
      await gate.promise;
      ran.push("slow");
    }));
    scheduler.enqueue(recording("next", nextRan.release));

    const loop = await executor.resume();
    await started.promise;

    const pausing = executor.pause();
    gate.release();
    await pausing;
    await loop.finished;
    await settle();

    expect(ran).toEqual(["slow"]);
    expect(executor.getState()).toBe("paused");
    expect(scheduler.getStatus().ready).toBe(1);

    const resumed = await executor.resume();
    await nextRan.promise;

    expect(resumed.id).not.toBe(loop.id);
    expect(ran).toEqual(["slow", "next"]);
  });

  it("cancels the armed wakeup while paused", async () => {
    vi.useFakeTimers();
    scheduler = new TaskScheduler({ logger });
    executor = new TaskExecutor(scheduler, signal, { logger });

    await executor.resume();
    scheduler.enqueue(recording("later"), ScheduleMode.delayed(1000));
    await executor.pause();

    await vi.advanceTimersByTimeAsync(2000);
    expect(ran).toEqual([]);

    await executor.resume();
    await vi.advanceTimersByTimeAsync(0);
    expect(ran).toEqual(["later"]);
  });
});

// ============================================
// JUST NEXT
// ============================================

describe("justNext", () => {
  it("runs one due entry in any lifecycle state", async () => {
    scheduler.enqueue(recording("A"));

    expect(await executor.justNext()).toBe(true);
    expect(ran).toEqual(["A"]);
    expect(executor.getState()).toBe("idle");

    await executor.resume();
    await executor.pause();
    await settle();

    scheduler.enqueue(recording("B"));
    scheduler.enqueue(recording("C"));
    expect(await executor.justNext()).toBe(true);
    expect(ran).toEqual(["A", "B"]);
    expect(executor.getState()).toBe("paused");
  });

  it("returns false when nothing is due", async () => {
    expect(await executor.justNext()).toBe(false);
  });

  it("surfaces task failures to its caller", async () => {
    scheduler.enqueue(defineTask("bad", () => { throw new Error("nope"); }));
    await expect(executor.justNext()).rejects.toThrow('failed: nope');
  });
});

// ============================================
// LOOP TERMINATION
// ============================================

describe("loop termination", () => {
  it("logs and exits when the state cell is emptied, and can be resumed afresh", async () => {
    const state = new SharedCell<ExecutorState>("executor-state", "idle");
    executor = new TaskExecutor(scheduler, signal, { state, logger });

    const loop = await executor.resume();
    await state.clear();
    signal.trigger();
    await loop.finished;

    const errors = logger.getRecentLogs().filter(entry => entry.level === "error");
    expect(errors.map(entry => entry.message)).toEqual(["Executor state missing, drain loop exiting"]);
    expect(errors[0].error?.name).toBe("StateNotFoundError");
    expect(errors[0].loopId).toBe(loop.id);
    expect(executor.getState()).toBeUndefined();

    const done = deferred();
    scheduler.enqueue(recording("after", done.release));
    const fresh = await executor.resume();
    await done.promise;

    expect(fresh.id).not.toBe(loop.id);
    expect(ran).toEqual(["after"]);
  });

  it("exits cleanly when the stream ends", async () => {
    const loop = await executor.resume();

    signal.close();
    await loop.finished;

    const messages = logger.getRecentLogs().map(entry => entry.message);
    expect(messages).toContain("Wakeup stream ended");
    expect(logger.getRecentLogs().filter(entry => entry.level === "error")).toEqual([]);
  });
});

// ============================================
// RE-ARMING
// ============================================

describe("re-arming", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new TaskScheduler({ logger });
    executor = new TaskExecutor(scheduler, signal, { logger });
  });

  it("wakes exactly when a delayed entry becomes due", async () => {
    await executor.resume();
    scheduler.enqueue(recording("later"), ScheduleMode.delayed(5000));

    await vi.advanceTimersByTimeAsync(4999);
    expect(ran).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(ran).toEqual(["later"]);
  });

  it("keeps a periodic entry firing without outside triggers", async () => {
    scheduler.enqueue(recording("tick"), ScheduleMode.periodic(1000));
    await executor.resume();

    await vi.advanceTimersByTimeAsync(1000);
    expect(ran).toEqual(["tick"]);

    await vi.advanceTimersByTimeAsync(4000);
    expect(ran).toHaveLength(5);
  });
});
