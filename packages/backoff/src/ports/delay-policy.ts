export type Milliseconds = number

export type Delay = { milliseconds: Milliseconds }

/**
 * Delay to wait before the next attempt.
 *
 * `attempt` is 0-indexed: `getDelay(0)` is the wait after the first attempt.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
