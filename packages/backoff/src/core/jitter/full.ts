import { systemRandom } from "../../adapters/random"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

/** Uniform in [0, delay]. */
export function fullJitter(random: RandomSource = systemRandom): JitterStrategy {
  return {
    apply: (delay) => ({
      milliseconds: Math.floor(random.next() * (delay.milliseconds + 1)),
    }),
  }
}
