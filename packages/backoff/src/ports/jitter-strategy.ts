import type { Delay } from "./delay-policy"

/**
 * Randomizes a computed delay so that many callers backing off at once do
 * not wake up together. Output is sanitized by `createBackoff`.
 */
export interface JitterStrategy {
  apply(delay: Delay): Delay
}
