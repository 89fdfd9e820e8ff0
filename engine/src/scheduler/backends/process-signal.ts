/**
 * Process Signal Backend
 *
 * Runs one due entry each time the process receives an OS signal, e.g.
 * `kill -USR2 <pid>` from a cron job or a supervisor.
 */

import type { ILogger } from "@signal-scheduler/shared/logging";
import { createComponentLogger } from "../../logging.js";
import type { Backend, TaskExecutorInterface } from "../types.js";

export interface ProcessSignalBackendOptions {
  logger?: ILogger;
}

export class ProcessSignalBackend implements Backend {
  private handler: (() => void) | null = null;
  private readonly log: ILogger;

  constructor(
    private readonly signal: NodeJS.Signals = "SIGUSR2",
    options: ProcessSignalBackendOptions = {}
  ) {
    this.log = options.logger ?? createComponentLogger("backend.process-signal");
  }

  register(executor: TaskExecutorInterface): void {
    this.unregister();

    const handler = () => {
      this.log.debug("Process signal received", { signal: this.signal });
      executor.justNext().catch((error: unknown) => {
        this.log.warn("Backend run failed", {
          signal: this.signal,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    };
    process.on(this.signal, handler);
    this.handler = handler;
  }

  unregister(): void {
    if (!this.handler) return;
    process.off(this.signal, this.handler);
    this.handler = null;
  }

  get isRegistered(): boolean {
    return this.handler !== null;
  }
}
