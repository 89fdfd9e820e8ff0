/**
 * Interval Backend
 *
 * Calls executor.justNext() on a fixed cadence, independent of the
 * executor's own lifecycle. A tick that lands while the previous call is
 * still running is skipped.
 */

import type { ILogger } from "@signal-scheduler/shared/logging";
import { createComponentLogger } from "../../logging.js";
import { assertTimerCadence } from "../timers.js";
import type { Backend, TaskExecutorInterface } from "../types.js";

export interface IntervalBackendOptions {
  logger?: ILogger;
}

export class IntervalBackend implements Backend {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private readonly log: ILogger;

  constructor(private readonly everyMs: number, options: IntervalBackendOptions = {}) {
    assertTimerCadence("Backend interval", everyMs);
    this.log = options.logger ?? createComponentLogger("backend.interval");
  }

  register(executor: TaskExecutorInterface): void {
    this.unregister();
    this.timer = setInterval(() => {
      void this.tick(executor);
    }, this.everyMs);
    this.log.debug("Interval backend registered", { everyMs: this.everyMs });
  }

  unregister(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.debug("Interval backend unregistered");
  }

  get isRegistered(): boolean {
    return this.timer !== null;
  }

  private async tick(executor: TaskExecutorInterface): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    try {
      await executor.justNext();
    } catch (error) {
      this.log.warn("Backend run failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.inFlight = false;
    }
  }
}
