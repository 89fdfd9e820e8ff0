/**
 * Scheduler Module
 *
 * Queue manager, wakeup signal and executor, plus the pieces they share.
 */

export * from "./types.js";
export * from "./schedule-mode.js";
export * from "./queue-manager.js";
export * from "./signal.js";
export * from "./executor.js";
export * from "./shared-cell.js";
export * from "./serial.js";

// Node.js wakeup sources
export * from "./backends/index.js";

// Process-wide instance
export { getDefaultScheduler, resetDefaultScheduler } from "./default-instance.js";
export type { DefaultScheduler } from "./default-instance.js";
