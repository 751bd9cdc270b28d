import type { Clock, ScheduledTask } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  schedule(callback: () => void, delayMs: Milliseconds): ScheduledTask {
    const timer = setTimeout(callback, Math.max(0, delayMs))

    return {
      cancel() {
        clearTimeout(timer)
      },
    }
  }
}
