/**
 * Task Executor
 *
 * Turns wakeup events into queue drains. Lifecycle:
 *
 *   idle ──resume()──▶ running ──pause()──▶ paused
 *                        ▲                    │
 *                        └──────resume()──────┘
 *
 * Pausing is cooperative: the cycle in flight finishes, then the drain loop
 * exits before asking the stream for another event.
 *
 * After every cycle the loop re-arms itself: due work triggers the signal
 * right away (unless an event is already waiting), future work arms one
 * timer for the earliest due time, an empty queue leaves the loop waiting
 * for an outside trigger.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@signal-scheduler/shared/logging";
import { createComponentLogger } from "../logging.js";
import { StateNotFoundError, TaskExecutionError } from "../errors.js";
import { SharedCell } from "./shared-cell.js";
import { MAX_TIMEOUT_MS } from "./timers.js";
import type { TaskScheduler } from "./queue-manager.js";
import type {
  DrainLoop,
  ExecutorState,
  TaskExecutorInterface,
  TaskExecutorSignalInterface,
} from "./types.js";

export type SignalSource =
  | TaskExecutorSignalInterface
  | ((executor: TaskExecutorInterface) => TaskExecutorSignalInterface);

export interface TaskExecutorOptions {
  /** Cell holding the lifecycle state (default: a fresh cell starting at "idle") */
  state?: SharedCell<ExecutorState>;
  logger?: ILogger;
}

export class TaskExecutor implements TaskExecutorInterface {
  readonly signal: TaskExecutorSignalInterface;
  private readonly state: SharedCell<ExecutorState>;
  private readonly log: ILogger;
  private readonly events: AsyncIterator<void>;
  private readonly unsubscribe: () => void;
  private activeLoop: DrainLoop | null = null;
  private activeLoopId: string | null = null;
  private rearmTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly scheduler: TaskScheduler,
    signal: SignalSource,
    options: TaskExecutorOptions = {}
  ) {
    this.signal = typeof signal === "function" ? signal(this) : signal;
    this.state = options.state ?? new SharedCell<ExecutorState>("executor-state", "idle");
    this.log = options.logger ?? createComponentLogger("executor");
    this.events = this.signal.stream()[Symbol.asyncIterator]();

    // New or re-inserted work may be due sooner than the armed timer
    this.unsubscribe = scheduler.onEvent(event => {
      if (event.type === "task_scheduled" || event.type === "task_rescheduled") {
        this.rearm();
      }
    });
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Move to running and make sure a drain loop is alive. Returns the loop.
   */
  async resume(): Promise<DrainLoop> {
    const previous = await this.state.access(slot => {
      const before = slot.value;
      slot.value = "running";
      return before;
    });

    const loop = this.ensureLoop();
    if (previous !== "running") {
      this.log.info("Executor resumed", { from: previous ?? "unset", loopId: loop.id });
    }
    this.rearm();
    return loop;
  }

  /**
   * Move to paused. The running cycle completes; no new cycle starts until
   * resume(). No-op unless currently running.
   */
  async pause(): Promise<void> {
    const paused = await this.state.access(slot => {
      if (slot.value !== "running") return false;
      slot.value = "paused";
      return true;
    });
    if (!paused) return;

    this.cancelRearm();
    // Wake a loop parked on the stream so it sees the new state and exits
    this.signal.trigger();
    this.log.info("Executor paused");
  }

  /** Resume, then wait until the drain loop exits (after a later pause). */
  async resumeAndWait(): Promise<void> {
    const loop = await this.resume();
    await loop.finished;
  }

  /** Run at most one due entry directly, whatever the lifecycle state. */
  justNext(): Promise<boolean> {
    return this.scheduler.runNext();
  }

  getState(): ExecutorState | undefined {
    return this.state.isEmpty() ? undefined : this.state.read();
  }

  /** Pause and stop listening to the scheduler. */
  async close(): Promise<void> {
    await this.pause();
    this.unsubscribe();
    this.cancelRearm();
  }

  // ============================================
  // DRAIN LOOP
  // ============================================

  private ensureLoop(): DrainLoop {
    if (this.activeLoop) return this.activeLoop;

    const id = nanoid(10);
    this.activeLoopId = id;
    const finished = this.drain(id);
    const loop: DrainLoop = { id, finished };
    // The loop can exit before its first await; only track it if it did not
    if (this.activeLoopId === id) this.activeLoop = loop;
    return loop;
  }

  private async drain(loopId: string): Promise<void> {
    const log = this.log.child({ loopId });
    let cycles = 0;
    log.debug("Drain loop started");

    try {
      while (this.state.read() === "running") {
        const event = await this.events.next();
        if (event.done) {
          log.debug("Wakeup stream ended");
          break;
        }
        if (this.state.read() !== "running") break;

        try {
          if (await this.scheduler.runNext()) cycles++;
        } catch (error) {
          if (!(error instanceof TaskExecutionError)) throw error;
          cycles++;
          log.debug("Task failed during drain", { entryId: error.entryId, task: error.taskName });
        }

        this.rearm();
      }
    } catch (error) {
      if (error instanceof StateNotFoundError) {
        log.error("Executor state missing, drain loop exiting", error);
      } else {
        log.error("Drain loop failed", error);
      }
    } finally {
      if (this.activeLoopId === loopId) {
        this.activeLoopId = null;
        this.activeLoop = null;
      }
      log.debug("Drain loop exited", { cycles });
    }
  }

  // ============================================
  // RE-ARMING
  // ============================================

  /**
   * Wake the loop when the queue next has due work. Only while running.
   */
  private rearm(): void {
    this.cancelRearm();
    if (this.state.read("paused") !== "running") return;
    if (!this.scheduler.hasPendingWork()) return;

    const waitMs = this.scheduler.msUntilNextDue();
    if (waitMs === null) return;

    if (waitMs === 0) {
      // One unconsumed event already covers due work
      if (this.signal.pendingEvents === 0) this.signal.trigger();
      return;
    }

    const delayMs = Math.min(waitMs, MAX_TIMEOUT_MS);
    this.rearmTimer = setTimeout(() => {
      this.rearmTimer = null;
      this.signal.trigger();
    }, delayMs);
    this.log.debug("Wakeup armed", { delayMs });
  }

  private cancelRearm(): void {
    if (this.rearmTimer) {
      clearTimeout(this.rearmTimer);
      this.rearmTimer = null;
    }
  }
}
