import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

/** A pending callback registered with a {@link Scheduler}. */
export interface ScheduledTask {
  /** Prevents the callback from firing. No-op once it has fired or been cancelled. */
  cancel(): void
}

export interface Scheduler {
  /**
   * Run `callback` once, after `delayMs` has elapsed.
   *
   * @remarks
   * A delay of 0 or less still defers to a later turn; the callback never
   * runs on the caller's stack.
   */
  schedule(callback: () => void, delayMs: Milliseconds): ScheduledTask
}

export type Clock = TimeSource & Scheduler
