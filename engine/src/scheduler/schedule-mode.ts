/**
 * Schedule Mode Helpers
 *
 * Constructors and due-time arithmetic for TaskScheduleMode.
 */

import { InvalidScheduleModeError } from "../errors.js";
import type { TaskScheduleMode } from "./types.js";

export const ScheduleMode = {
  /** Run on the next cycle */
  immediate(): TaskScheduleMode {
    return { kind: "immediate" };
  },

  /** Run once, no earlier than `delayMs` after enqueue */
  delayed(delayMs: number): TaskScheduleMode {
    return assertValidMode({ kind: "delayed", delayMs });
  },

  /** Run every `intervalMs`, measured from the end of the previous run */
  periodic(intervalMs: number): TaskScheduleMode {
    return assertValidMode({ kind: "periodic", intervalMs });
  },
} as const;

export function assertValidMode(mode: TaskScheduleMode): TaskScheduleMode {
  switch (mode.kind) {
    case "immediate":
      return mode;
    case "delayed":
      if (!Number.isFinite(mode.delayMs) || mode.delayMs < 0) {
        throw new InvalidScheduleModeError(`Delay must be a finite number >= 0, got ${mode.delayMs}`, mode);
      }
      return mode;
    case "periodic":
      if (!Number.isFinite(mode.intervalMs) || mode.intervalMs <= 0) {
        throw new InvalidScheduleModeError(`Interval must be a finite number > 0, got ${mode.intervalMs}`, mode);
      }
      return mode;
  }
}

/**
 * First due time for a freshly enqueued entry.
 */
export function initialDueAt(mode: TaskScheduleMode, now: number): number | null {
  switch (mode.kind) {
    case "immediate":
      return null;
    case "delayed":
      return now + mode.delayMs;
    case "periodic":
      return now + mode.intervalMs;
  }
}

export function describeMode(mode: TaskScheduleMode): string {
  switch (mode.kind) {
    case "immediate":
      return "immediate";
    case "delayed":
      return `delayed(${mode.delayMs}ms)`;
    case "periodic":
      return `periodic(${mode.intervalMs}ms)`;
  }
}
