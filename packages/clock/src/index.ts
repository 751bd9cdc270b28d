export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock, ScheduledTask, Scheduler, TimeSource } from "./ports/clock"
export type * from "./ports/time"
