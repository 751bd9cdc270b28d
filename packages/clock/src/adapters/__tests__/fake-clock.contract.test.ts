import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { FakeClock } from "../fake-clock"

describeClockContract({
  name: "FakeClock",
  make: () => new FakeClock(Date.now()),
  elapse: async (clock, ms) => {
    if (clock instanceof FakeClock) clock.advance(ms)
  },
})
