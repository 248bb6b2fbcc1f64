import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Persisted timestamps use this; elapsed-time arithmetic should use `nowMs()`.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Suspend for `ms` milliseconds.
   *
   * Resolves early (never rejects) when `signal` aborts, so callers check
   * `signal.aborted` after waking up.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
