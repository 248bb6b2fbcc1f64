import { systemRandom } from "../../adapters/random"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

/**
 * Half of the delay is kept, the other half is randomized.
 *
 * Range (integer ms): [floor(delay / 2), floor(delay / 2) * 2]
 */
export function equalJitter(random: RandomSource = systemRandom): JitterStrategy {
  return {
    apply(delay) {
      const half = Math.floor(delay.milliseconds / 2)

      return { milliseconds: half + Math.floor(random.next() * (half + 1)) }
    },
  }
}
