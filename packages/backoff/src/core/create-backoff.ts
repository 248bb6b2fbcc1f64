import type { Delay, DelayPolicy } from "../ports/delay-policy"
import type { JitterStrategy } from "../ports/jitter-strategy"

export type CreateBackoffOptions = {
  delay: DelayPolicy
  jitter?: JitterStrategy

  /** Lower bound. Finite, >= 0. */
  min: Delay

  /** Upper bound. Finite, >= min. */
  max: Delay
}

function assertBound(name: string, ms: number): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${name}.milliseconds must be finite and >= 0 (got ${ms})`)
  }
}

/**
 * Wraps a delay strategy with optional jitter, then sanitizes and clamps the
 * result into [min, max] and floors it to an integer.
 *
 * Non-finite or negative intermediate values fall back to `min`.
 */
export function createBackoff(options: CreateBackoffOptions): DelayPolicy {
  const { delay, jitter } = options
  const minMs = options.min.milliseconds
  const maxMs = options.max.milliseconds

  assertBound("min", minMs)
  assertBound("max", maxMs)

  if (maxMs < minMs) {
    throw new RangeError(`max (${maxMs}ms) must be >= min (${minMs}ms)`)
  }

  return {
    getDelay(attempt) {
      const raw = delay.getDelay(attempt)
      const ms = (jitter ? jitter.apply(raw) : raw).milliseconds
      const sane = Number.isFinite(ms) && ms >= 0 ? ms : minMs

      return { milliseconds: Math.floor(Math.min(maxMs, Math.max(minMs, sane))) }
    },
  }
}
