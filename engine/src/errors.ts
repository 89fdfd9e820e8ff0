/**
 * Engine Errors
 *
 * Each failure the engine can surface has its own class so callers can
 * branch with `instanceof` instead of matching messages.
 */

import type { TaskScheduleMode } from "./scheduler/types.js";

/**
 * A task failed while the queue manager was running it. The queue is already
 * consistent when this is thrown: the entry was removed, or re-inserted if it
 * is periodic.
 */
export class TaskExecutionError extends Error {
  public readonly entryId: string;
  public readonly taskName: string;
  public readonly mode: TaskScheduleMode;

  constructor(entryId: string, taskName: string, mode: TaskScheduleMode, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Task "${taskName}" (${entryId}) failed: ${reason}`, { cause });
    this.name = "TaskExecutionError";
    this.entryId = entryId;
    this.taskName = taskName;
    this.mode = mode;
  }
}

/** Read of an empty shared cell without a default. */
export class StateNotFoundError extends Error {
  public readonly cellName: string;

  constructor(cellName: string) {
    super(`No value in shared cell "${cellName}" and no default supplied`);
    this.name = "StateNotFoundError";
    this.cellName = cellName;
  }
}

export class InvalidScheduleModeError extends Error {
  public readonly mode: unknown;

  constructor(message: string, mode: unknown) {
    super(message);
    this.name = "InvalidScheduleModeError";
    this.mode = mode;
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid engine configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
