export type InFlightKey = string

export interface FlightResult<T> {
  value: T

  /** Whether this caller executed the function */
  isLeader: boolean

  /** Callers that joined the leader's flight (leader excluded) */
  sharedWith: number
}

/**
 * Deduplicates concurrent work by key.
 *
 * Calls to `run()` with a key that is already in flight join that flight and
 * settle with its outcome, including the same rejection.
 *
 * @example
 * ```ts
 * const flights = new MemorySingleflight()
 *
 * // one poll loop, three awaiting callers
 * const [a, b] = await Promise.all([
 *   flights.run("batch_1", () => trackLoop("batch_1")),
 *   flights.run("batch_1", () => trackLoop("batch_1")),
 * ])
 * a.isLeader // true
 * ```
 */
export interface Singleflight<T = unknown> {
  /** A failed flight is not cached: the next call starts fresh. */
  run<R = T>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>>

  /** Like `run()`, but returns undefined when `key` is already in flight. */
  tryRun<R = T>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> | undefined

  /**
   * Detaches the current flight for `key`. Its callers still get its result;
   * the next caller starts a new one.
   */
  forget(key: InFlightKey): void

  has(key: InFlightKey): boolean

  readonly size: number
}
