/**
 * Timer limits shared by the signal, the executor and the backends.
 */

/** Maximum delay for setTimeout/setInterval (Node.js limit: ~24.8 days) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Throws RangeError unless `ms` is a cadence Node.js timers honor.
 * Larger values are silently clamped to 1ms by Node.
 */
export function assertTimerCadence(label: string, ms: number): void {
  if (!Number.isFinite(ms) || ms <= 0 || ms > MAX_TIMEOUT_MS) {
    throw new RangeError(`${label} must be a finite number in (0, ${MAX_TIMEOUT_MS}], got ${ms}`);
  }
}
