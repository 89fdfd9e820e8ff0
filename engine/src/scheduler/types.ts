/**
 * Scheduler Types
 *
 * Task capability, schedule modes, queue entries, executor lifecycle and the
 * capabilities exchanged with wakeup backends.
 */

// ============================================
// TASK CAPABILITY
// ============================================

/**
 * A fallible unit of work. Throwing (or rejecting) is a failure; the
 * scheduler knows nothing else about the task.
 */
export interface Task<T = unknown> {
  /** Name used in logs and events */
  readonly name?: string;
  execute(): T | Promise<T>;
}

/** Build a task from a plain function. */
export function defineTask<T>(name: string, fn: () => T | Promise<T>): Task<T> {
  return { name, execute: fn };
}

// ============================================
// SCHEDULE MODE
// ============================================

export type TaskScheduleMode =
  | { readonly kind: "immediate" }
  | { readonly kind: "delayed"; readonly delayMs: number }
  | { readonly kind: "periodic"; readonly intervalMs: number };

export type ScheduleKind = TaskScheduleMode["kind"];

// ============================================
// QUEUE ENTRY
// ============================================

export interface ScheduledEntry {
  /** Assigned at enqueue, stable for the entry's lifetime */
  readonly id: string;
  readonly task: Task;
  readonly mode: TaskScheduleMode;
  /** Epoch ms the entry becomes due; null for immediate entries */
  dueAt: number | null;
  /** Monotonic enqueue counter, the stable tie-break between equal due times */
  readonly sequence: number;
  readonly enqueuedAt: number;
}

export interface SchedulerStatus {
  ready: number;
  delayed: number;
  periodic: number;
  /** Entry currently inside runNext, if any */
  executing: string | null;
}

// ============================================
// SCHEDULER EVENTS
// ============================================

export type SchedulerEventType =
  | "task_scheduled"
  | "task_executing"
  | "task_completed"
  | "task_failed"
  | "task_rescheduled"
  | "task_cancelled";

export interface SchedulerEvent {
  type: SchedulerEventType;
  entryId: string;
  taskName: string;
  mode: ScheduleKind;
  timestamp: number;
  details?: Record<string, unknown>;
}

export type SchedulerEventCallback = (event: SchedulerEvent) => void;

// ============================================
// EXECUTOR
// ============================================

export type ExecutorState = "idle" | "running" | "paused";

/** Handle to one background drain loop. */
export interface DrainLoop {
  readonly id: string;
  /** Settles when the loop exits (pause, stream end, or a fatal loop error) */
  readonly finished: Promise<void>;
}

/**
 * The only executor surface backends and integrations may depend on.
 */
export interface TaskExecutorInterface {
  /** Run at most one due entry, bypassing the signal and lifecycle */
  justNext(): Promise<boolean>;
}

// ============================================
// SIGNAL & BACKEND
// ============================================

export interface TaskExecutorSignalInterface {
  /** The wakeup event stream consumed by the executor */
  stream(): AsyncIterable<void>;
  /** Fire a single wakeup event */
  trigger(): void;
  /** End the stream and release timers or backend registrations */
  close(): void;
  /** Events fired but not yet consumed */
  readonly pendingEvents: number;
}

/**
 * An external trigger source that calls the executor on its own schedule.
 */
export interface Backend {
  register(executor: TaskExecutorInterface): void;
  unregister(): void;
}
