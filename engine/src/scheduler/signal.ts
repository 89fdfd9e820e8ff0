/**
 * Wakeup Signal
 *
 * An unbounded stream of wakeup events. The executor waits on the stream
 * instead of polling; anything that wants work to happen calls trigger().
 *
 * Events fired while nobody is waiting are buffered, so none are lost.
 * The stream is shared and not restartable: once close() is called it ends
 * for every consumer.
 */

import { createComponentLogger } from "../logging.js";
import { assertTimerCadence } from "./timers.js";
import type { Backend, TaskExecutorInterface, TaskExecutorSignalInterface } from "./types.js";

export interface TimerTriggerOptions {
  /** Fire on every tick (default) or only once */
  repeats?: boolean;
}

type Waiter = (result: IteratorResult<void>) => void;

export class TaskExecutorSignal implements TaskExecutorSignalInterface {
  private buffered = 0;
  private closed = false;
  private readonly waiters: Waiter[] = [];
  private stopTimer: (() => void) | null = null;
  private backend: Backend | null = null;

  private readonly events: AsyncIterable<void> = {
    [Symbol.asyncIterator]: () => ({
      next: () => this.next(),
    }),
  };

  // ============================================
  // FACTORIES
  // ============================================

  /** A signal fired only by explicit trigger() calls. */
  static manualTrigger(): TaskExecutorSignal {
    return new TaskExecutorSignal();
  }

  /** A signal that triggers itself every `everyMs` (or once, with repeats: false). */
  static timerTrigger(everyMs: number, options: TimerTriggerOptions = {}): TaskExecutorSignal {
    assertTimerCadence("Timer interval", everyMs);

    const signal = new TaskExecutorSignal();
    if (options.repeats ?? true) {
      const interval = setInterval(() => signal.trigger(), everyMs);
      signal.stopTimer = () => clearInterval(interval);
    } else {
      const timeout = setTimeout(() => {
        signal.stopTimer = null;
        signal.trigger();
      }, everyMs);
      signal.stopTimer = () => clearTimeout(timeout);
    }
    return signal;
  }

  /**
   * A manual signal whose executor is also registered with an external
   * backend. The backend calls executor.justNext() on its own schedule;
   * close() unregisters it.
   */
  static customDrivenTrigger(backend: Backend, executor: TaskExecutorInterface): TaskExecutorSignal {
    backend.register(executor);
    const signal = new TaskExecutorSignal();
    signal.backend = backend;
    return signal;
  }

  // ============================================
  // STREAM
  // ============================================

  stream(): AsyncIterable<void> {
    return this.events;
  }

  trigger(): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: undefined, done: false });
    } else {
      this.buffered++;
    }
  }

  /**
   * End the stream. Buffered events are still delivered, then every
   * consumer sees the end.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.stopTimer?.();
    this.stopTimer = null;
    this.backend?.unregister();
    this.backend = null;

    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    createComponentLogger("signal").debug("Signal closed", { bufferedEvents: this.buffered });
  }

  get pendingEvents(): number {
    return this.buffered;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private next(): Promise<IteratorResult<void>> {
    if (this.buffered > 0) {
      this.buffered--;
      return Promise.resolve({ value: undefined, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<void>>(resolve => {
      this.waiters.push(resolve);
    });
  }
}
