/**
 * Source of randomness. `next()` returns a float in [0, 1).
 */
export interface RandomSource {
  next(): number
}
