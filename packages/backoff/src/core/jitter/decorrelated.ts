import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

export interface DecorrelatedJitterOptions {
  min: Delay
}

/** Uniform in [min, delay * 3). Stateless: each call is independent. */
export function decorrelatedJitter(
  options: DecorrelatedJitterOptions,
  random: RandomSource = systemRandom,
): JitterStrategy {
  const minMs = options.min.milliseconds

  return {
    apply(delay) {
      const ceiling = delay.milliseconds * 3

      return { milliseconds: Math.floor(minMs + random.next() * (ceiling - minMs)) }
    },
  }
}
