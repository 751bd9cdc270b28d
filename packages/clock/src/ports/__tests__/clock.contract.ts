import { describe, expect, it } from "vitest"
import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
  /** Lets scheduled callbacks become due; real clocks wait, fake clocks advance. */
  elapse: (clock: Clock, ms: number) => Promise<void>
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    describe("TimeSource", () => {
      it("now() returns a Date", () => {
        const clock = h.make()

        expect(clock.now()).toBeInstanceOf(Date)
      })

      it("nowMs() returns a number", () => {
        const clock = h.make()

        expect(typeof clock.nowMs()).toBe("number")
      })

      it("now() and nowMs() are consistent", () => {
        const clock = h.make()
        const date = clock.now()
        const ms = clock.nowMs()

        expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
      })
    })

    describe("Scheduler", () => {
      it("does not run the callback on the caller's stack", () => {
        const clock = h.make()
        const callback = vi.fn()

        clock.schedule(callback, 0)

        expect(callback).not.toHaveBeenCalled()
      })

      it("runs the callback once the delay elapses", async () => {
        const clock = h.make()
        const callback = vi.fn()

        clock.schedule(callback, 10)
        await h.elapse(clock, 30)

        expect(callback).toHaveBeenCalledTimes(1)
      })

      it("cancel() prevents the callback from running", async () => {
        const clock = h.make()
        const callback = vi.fn()

        const task = clock.schedule(callback, 10)
        task.cancel()
        await h.elapse(clock, 30)

        expect(callback).not.toHaveBeenCalled()
      })

      it("cancel() after firing is a no-op", async () => {
        const clock = h.make()
        const callback = vi.fn()

        const task = clock.schedule(callback, 0)
        await h.elapse(clock, 10)

        expect(() => task.cancel()).not.toThrow()
        expect(callback).toHaveBeenCalledTimes(1)
      })
    })
  })
}
