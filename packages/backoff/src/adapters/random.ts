import type { RandomSource } from "../ports/random-source"

/** Backed by `Math.random`; the default when no source is injected. */
export const systemRandom: RandomSource = {
  next: () => Math.random(),
}

/** Replays `values` in order, wrapping around at the end. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError("sequenceRandom needs at least one value")
  }

  let index = 0

  return {
    next() {
      const value = values[index % values.length] ?? 0
      index++
      return value
    },
  }
}
