import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export type RecordedSleep = {
  ms: Milliseconds
  startedAt: UnixMs
}

/**
 * Deterministic clock for tests.
 *
 * `sleep()` never waits on a timer: it records the request and moves virtual
 * time forward by `ms`, so loops driven by this clock run to completion
 * immediately while still observing elapsed time.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private readonly sleeps: RecordedSleep[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.sleeps.push({ ms, startedAt: this.time })
    if (ms > 0) this.advance(ms)
  }

  /** Durations passed to `sleep()`, oldest first. */
  sleepDurations(): Milliseconds[] {
    return this.sleeps.map((s) => s.ms)
  }

  recordedSleeps(): readonly RecordedSleep[] {
    return [...this.sleeps]
  }
}
