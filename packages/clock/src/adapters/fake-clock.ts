import type { Clock, ScheduledTask } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingTimer = {
  id: number
  dueAt: UnixMs
  callback: () => void
}

/**
 * Deterministic clock for tests.
 *
 * Time only moves through `advance()` / `set()`. Scheduled callbacks fire
 * synchronously from those calls, in due-time order (registration order on
 * ties), with `nowMs()` reporting each timer's due time while it runs.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private nextId = 0
  private timers: PendingTimer[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  schedule(callback: () => void, delayMs: Milliseconds): ScheduledTask {
    const timer: PendingTimer = {
      id: this.nextId++,
      dueAt: this.time + Math.max(0, delayMs),
      callback,
    }
    this.timers.push(timer)

    return {
      cancel: () => {
        this.timers = this.timers.filter((t) => t.id !== timer.id)
      },
    }
  }

  /** Number of timers that have not fired or been cancelled. */
  get pendingTimers(): number {
    return this.timers.length
  }

  /** Due time of the earliest pending timer, or null if none. */
  nextDueAt(): UnixMs | null {
    const next = this.peek()
    return next ? next.dueAt : null
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: UnixMs): void {
    let next = this.peek()

    while (next && next.dueAt <= ms) {
      const due = next
      this.timers = this.timers.filter((t) => t.id !== due.id)
      this.time = Math.max(this.time, due.dueAt)
      due.callback()
      next = this.peek()
    }

    this.time = ms
  }

  /** Advances straight to the next pending timer and fires it. */
  runNext(): boolean {
    const next = this.peek()
    if (!next) return false

    this.set(Math.max(this.time, next.dueAt))
    return true
  }

  private peek(): PendingTimer | undefined {
    let earliest: PendingTimer | undefined

    for (const timer of this.timers) {
      if (
        !earliest ||
        timer.dueAt < earliest.dueAt ||
        (timer.dueAt === earliest.dueAt && timer.id < earliest.id)
      ) {
        earliest = timer
      }
    }

    return earliest
  }
}
