/**
 * Default Scheduler Instance
 *
 * A process-wide scheduler, signal and executor, built from the environment
 * on first use. Library code should take a TaskScheduler explicitly; this is
 * for applications that want one shared queue without wiring it themselves.
 */

import { loadEngineConfig } from "../config.js";
import { createComponentLogger } from "../logging.js";
import { TaskScheduler } from "./queue-manager.js";
import { TaskExecutorSignal } from "./signal.js";
import { TaskExecutor } from "./executor.js";

export interface DefaultScheduler {
  scheduler: TaskScheduler;
  signal: TaskExecutorSignal;
  executor: TaskExecutor;
}

let instance: DefaultScheduler | null = null;

/**
 * Get the shared instance, creating it on first call. The signal is a timer
 * when SCHEDULER_WAKE_INTERVAL_MS is set, manual otherwise. The executor
 * starts idle; call executor.resume() to start draining.
 */
export function getDefaultScheduler(): DefaultScheduler {
  if (instance) return instance;

  const config = loadEngineConfig();
  const scheduler = new TaskScheduler();
  const signal = config.wakeIntervalMs > 0
    ? TaskExecutorSignal.timerTrigger(config.wakeIntervalMs)
    : TaskExecutorSignal.manualTrigger();
  const executor = new TaskExecutor(scheduler, signal);

  instance = { scheduler, signal, executor };
  createComponentLogger("default").info("Default scheduler created", { wakeIntervalMs: config.wakeIntervalMs });
  return instance;
}

/**
 * Tear down the shared instance: pause the executor, end its signal and
 * forget it. The next getDefaultScheduler() builds a fresh one.
 */
export async function resetDefaultScheduler(): Promise<void> {
  const current = instance;
  if (!current) return;
  instance = null;

  await current.executor.close();
  current.signal.close();
  createComponentLogger("default").debug("Default scheduler reset");
}
