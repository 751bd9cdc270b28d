export type Milliseconds = number

export type Delay = { milliseconds: Milliseconds }

/**
 * Maps a retry index to the wait before it. `retry` counts from 0, so the
 * wait after the first failed attempt is `getDelay(0)`.
 */
export interface DelayPolicy {
  getDelay(retry: number): Delay
}
