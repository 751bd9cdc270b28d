/**
 * Uniform draws in [0, 1) used by jitter.
 *
 * Tests pass a fixed source to make retry delays exact.
 */
export interface RandomSource {
  next(): number
}
