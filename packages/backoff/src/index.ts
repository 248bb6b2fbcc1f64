export { systemRandom } from "./adapters/random"
export { type CreateBackoffOptions, createBackoff } from "./core/create-backoff"
export {
  type DecorrelatedJitterOptions,
  decorrelatedJitter,
} from "./core/jitter/decorrelated"
export { equalJitter } from "./core/jitter/equal"
export { fullJitter } from "./core/jitter/full"
export { type ExponentialOptions, exponential } from "./core/strategies/exponential"
export type { Delay, DelayPolicy, Milliseconds } from "./ports/delay-policy"
export type { JitterStrategy } from "./ports/jitter-strategy"
export type { RandomSource } from "./ports/random-source"
