import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  describe("time control", () => {
    it("starts at the provided initial time", () => {
      const clock = new FakeClock(1000)

      expect(clock.nowMs()).toBe(1000)
    })

    it("defaults to 0 if no initial time provided", () => {
      const clock = new FakeClock()

      expect(clock.nowMs()).toBe(0)
    })

    it("advance() moves time forward", () => {
      const clock = new FakeClock(0)
      clock.advance(100)

      expect(clock.nowMs()).toBe(100)

      clock.advance(50)

      expect(clock.nowMs()).toBe(150)
    })

    it("set() moves time to exact value", () => {
      const clock = new FakeClock(0)

      clock.set(500)

      expect(clock.nowMs()).toBe(500)
    })
  })

  describe("timers", () => {
    it("fires only the timers that are due", () => {
      const clock = new FakeClock(0)
      const early = vi.fn()
      const late = vi.fn()

      clock.schedule(early, 100)
      clock.schedule(late, 300)
      clock.advance(200)

      expect(early).toHaveBeenCalledTimes(1)
      expect(late).not.toHaveBeenCalled()
      expect(clock.pendingTimers).toBe(1)
    })

    it("fires due timers in due-time order, registration order on ties", () => {
      const clock = new FakeClock(0)
      const order: string[] = []

      clock.schedule(() => order.push("c"), 300)
      clock.schedule(() => order.push("a"), 100)
      clock.schedule(() => order.push("b"), 100)
      clock.advance(300)

      expect(order).toEqual(["a", "b", "c"])
    })

    it("reports the due time as now while a timer runs", () => {
      const clock = new FakeClock(1000)
      let observed: number | undefined

      clock.schedule(() => {
        observed = clock.nowMs()
      }, 250)
      clock.advance(1000)

      expect(observed).toBe(1250)
      expect(clock.nowMs()).toBe(2000)
    })

    it("fires timers scheduled by a firing timer when they fall inside the window", () => {
      const clock = new FakeClock(0)
      const inner = vi.fn()

      clock.schedule(() => {
        clock.schedule(inner, 50)
      }, 100)
      clock.advance(200)

      expect(inner).toHaveBeenCalledTimes(1)
    })

    it("runNext() jumps to the earliest timer", () => {
      const clock = new FakeClock(0)
      const callback = vi.fn()

      clock.schedule(callback, 400)

      expect(clock.nextDueAt()).toBe(400)
      expect(clock.runNext()).toBe(true)
      expect(callback).toHaveBeenCalledTimes(1)
      expect(clock.nowMs()).toBe(400)
      expect(clock.runNext()).toBe(false)
      expect(clock.nextDueAt()).toBeNull()
    })
  })
})
