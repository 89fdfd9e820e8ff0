/**
 * Queue Manager
 *
 * Owns every scheduled entry and decides what is due. Entries live in one of
 * three collections:
 *
 * - ready:    immediate entries, FIFO
 * - delayed:  single-shot entries waiting for dueAt
 * - periodic: repeating entries waiting for dueAt
 *
 * runNext() cycles are serialized against each other; enqueue() and cancel()
 * are synchronous and may be called from inside a running task.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@signal-scheduler/shared/logging";
import { createComponentLogger } from "../logging.js";
import { TaskExecutionError } from "../errors.js";
import { ScheduleMode, assertValidMode, initialDueAt, describeMode } from "./schedule-mode.js";
import { createSerializer } from "./serial.js";
import type {
  Task,
  TaskScheduleMode,
  ScheduleKind,
  ScheduledEntry,
  SchedulerEvent,
  SchedulerEventCallback,
  SchedulerEventType,
  SchedulerStatus,
} from "./types.js";

export interface TaskSchedulerOptions {
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  logger?: ILogger;
}

function taskName(entry: ScheduledEntry): string {
  return entry.task.name ?? "anonymous";
}

/** Earlier dueAt wins; equal due times fall back to enqueue order. */
function isEarlier(a: ScheduledEntry, b: ScheduledEntry): boolean {
  const aDue = a.dueAt ?? 0;
  const bDue = b.dueAt ?? 0;
  return aDue < bDue || (aDue === bDue && a.sequence < b.sequence);
}

export class TaskScheduler {
  private readonly ready: ScheduledEntry[] = [];
  private readonly delayed: ScheduledEntry[] = [];
  private readonly periodic: ScheduledEntry[] = [];
  private readonly serial = createSerializer();
  private readonly listeners: SchedulerEventCallback[] = [];
  private readonly now: () => number;
  private readonly log: ILogger;
  private sequence = 0;
  private executing: ScheduledEntry | null = null;
  private cancelledWhileExecuting = false;

  constructor(options: TaskSchedulerOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.log = options.logger ?? createComponentLogger("scheduler");
  }

  // ============================================
  // SCHEDULING
  // ============================================

  /**
   * Add a task to the queue and return the new entry's id.
   * Throws InvalidScheduleModeError for a negative delay or a non-positive interval.
   */
  enqueue(task: Task, mode: TaskScheduleMode = ScheduleMode.immediate()): string {
    assertValidMode(mode);

    const now = this.now();
    const entry: ScheduledEntry = {
      id: nanoid(),
      task,
      mode,
      dueAt: initialDueAt(mode, now),
      sequence: this.sequence++,
      enqueuedAt: now,
    };
    this.collectionFor(mode.kind).push(entry);

    this.log.debug("Task scheduled", {
      entryId: entry.id,
      task: taskName(entry),
      mode: describeMode(mode),
    });
    this.emit("task_scheduled", entry, { dueAt: entry.dueAt });

    return entry.id;
  }

  /**
   * Remove an entry that has not run yet. Cancelling the periodic entry that
   * is currently running keeps it from being re-inserted.
   */
  cancel(entryId: string): boolean {
    for (const collection of [this.ready, this.delayed, this.periodic]) {
      const index = collection.findIndex(entry => entry.id === entryId);
      if (index === -1) continue;

      const [entry] = collection.splice(index, 1);
      this.log.debug("Task cancelled", { entryId, task: taskName(entry) });
      this.emit("task_cancelled", entry);
      return true;
    }

    const running = this.executing;
    if (running?.id === entryId && running.mode.kind === "periodic" && !this.cancelledWhileExecuting) {
      this.cancelledWhileExecuting = true;
      this.log.debug("Running periodic task cancelled", { entryId, task: taskName(running) });
      this.emit("task_cancelled", running, { whileRunning: true });
      return true;
    }

    return false;
  }

  // ============================================
  // EXECUTION
  // ============================================

  /**
   * Run at most one due entry. Resolves true if an entry ran, false if
   * nothing was due. A task failure rejects with TaskExecutionError once the
   * queue is consistent again.
   */
  runNext(): Promise<boolean> {
    return this.serial.run(() => this.runCycle());
  }

  private async runCycle(): Promise<boolean> {
    const entry = this.takeNextDue(this.now());
    if (!entry) return false;

    this.executing = entry;
    this.cancelledWhileExecuting = false;
    this.emit("task_executing", entry);

    const startedAt = this.now();
    try {
      await entry.task.execute();
    } catch (error) {
      const rescheduled = this.finish(entry);
      const reason = error instanceof Error ? error.message : String(error);

      this.log.warn("Task failed", {
        entryId: entry.id,
        task: taskName(entry),
        mode: describeMode(entry.mode),
        error: reason,
      });
      this.emit("task_failed", entry, { error: reason });
      if (rescheduled) this.emit("task_rescheduled", entry, { dueAt: entry.dueAt });

      throw new TaskExecutionError(entry.id, taskName(entry), entry.mode, error);
    }

    const rescheduled = this.finish(entry);
    this.emit("task_completed", entry, { durationMs: this.now() - startedAt });
    if (rescheduled) this.emit("task_rescheduled", entry, { dueAt: entry.dueAt });

    return true;
  }

  /**
   * Close out the executing entry. Periodic entries go back into rotation,
   * due one interval after now (not after the missed dueAt).
   */
  private finish(entry: ScheduledEntry): boolean {
    const cancelled = this.cancelledWhileExecuting;
    this.executing = null;
    this.cancelledWhileExecuting = false;

    if (entry.mode.kind !== "periodic" || cancelled) return false;

    entry.dueAt = this.now() + entry.mode.intervalMs;
    this.periodic.push(entry);
    return true;
  }

  private takeNextDue(now: number): ScheduledEntry | null {
    const next = this.ready.shift();
    if (next) return next;

    return this.takeEarliestDue(this.delayed, now) ?? this.takeEarliestDue(this.periodic, now);
  }

  private takeEarliestDue(collection: ScheduledEntry[], now: number): ScheduledEntry | null {
    let bestIndex = -1;
    for (let i = 0; i < collection.length; i++) {
      const entry = collection[i];
      if (entry.dueAt === null || entry.dueAt > now) continue;
      if (bestIndex === -1 || isEarlier(entry, collection[bestIndex])) {
        bestIndex = i;
      }
    }
    if (bestIndex === -1) return null;

    const [entry] = collection.splice(bestIndex, 1);
    return entry;
  }

  // ============================================
  // QUERIES
  // ============================================

  /** True when any collection holds an entry, due or not. */
  hasPendingWork(): boolean {
    return this.ready.length > 0 || this.delayed.length > 0 || this.periodic.length > 0;
  }

  /**
   * Milliseconds until the earliest entry is due: 0 if something is due now,
   * null if the queue is empty.
   */
  msUntilNextDue(): number | null {
    if (this.ready.length > 0) return 0;

    let earliest: number | null = null;
    for (const entry of [...this.delayed, ...this.periodic]) {
      if (entry.dueAt !== null && (earliest === null || entry.dueAt < earliest)) {
        earliest = entry.dueAt;
      }
    }
    if (earliest === null) return null;

    return Math.max(0, earliest - this.now());
  }

  getStatus(): SchedulerStatus {
    return {
      ready: this.ready.length,
      delayed: this.delayed.length,
      periodic: this.periodic.length,
      executing: this.executing?.id ?? null,
    };
  }

  // ============================================
  // EVENTS
  // ============================================

  /** Register a listener; returns a function that removes it. */
  onEvent(callback: SchedulerEventCallback): () => void {
    this.listeners.push(callback);
    return () => {
      const index = this.listeners.indexOf(callback);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  private emit(type: SchedulerEventType, entry: ScheduledEntry, details?: Record<string, unknown>): void {
    const event: SchedulerEvent = {
      type,
      entryId: entry.id,
      taskName: taskName(entry),
      mode: entry.mode.kind,
      timestamp: this.now(),
      details,
    };

    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.log.error("Event listener error", error, { event: type });
      }
    }
  }

  private collectionFor(kind: ScheduleKind): ScheduledEntry[] {
    switch (kind) {
      case "immediate":
        return this.ready;
      case "delayed":
        return this.delayed;
      case "periodic":
        return this.periodic;
    }
  }
}
