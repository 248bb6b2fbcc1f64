import { describe, expect, it } from "vitest"
import { PollSchedule } from "../poll-schedule"

describe("PollSchedule", () => {
  const base = {
    baseMs: 1_000,
    factor: 2,
    maxMs: 8_000,
    maxAttempts: 100,
    maxWaitMs: 1_000_000,
  }

  const delays = (schedule: PollSchedule, count: number): number[] => {
    const run = schedule.start(0)
    return Array.from({ length: count }, (_, i) => run.nextDelay(i + 1, 0))
  }

  it("grows exponentially up to maxMs", () => {
    const schedule = new PollSchedule({ ...base, jitter: "none" })

    expect(delays(schedule, 6)).toEqual([1_000, 2_000, 4_000, 8_000, 8_000, 8_000])
  })

  it.each(["full", "equal", "decorrelated"] as const)(
    "never decreases and stays within bounds with %s jitter",
    (jitter) => {
      let n = 0
      const values = [0.9, 0.1, 0.5, 0.99, 0, 0.3, 0.7, 0.2]
      const random = { next: () => values[n++ % values.length] ?? 0 }

      const sequence = delays(new PollSchedule({ ...base, jitter, random }), 40)

      for (const [i, delay] of sequence.entries()) {
        expect(delay).toBeGreaterThanOrEqual(base.baseMs)
        expect(delay).toBeLessThanOrEqual(base.maxMs)
        if (i > 0) expect(delay).toBeGreaterThanOrEqual(sequence[i - 1] ?? 0)
      }
    },
  )

  it("clips a wait to what is left of maxWaitMs", () => {
    const run = new PollSchedule({ ...base, jitter: "none", maxWaitMs: 5_000 }).start(0)

    expect(run.nextDelay(1, 0)).toBe(1_000)
    expect(run.nextDelay(2, 1_000)).toBe(2_000)
    expect(run.nextDelay(3, 3_000)).toBe(2_000)
  })

  it("gives up on attempts or elapsed time, whichever comes first", () => {
    const run = new PollSchedule({ ...base, maxAttempts: 3, maxWaitMs: 10_000 }).start(500)

    expect(run.giveUpReason(2, 5_000)).toBeNull()
    expect(run.giveUpReason(3, 5_000)).toBe("max_attempts")
    expect(run.giveUpReason(1, 10_500)).toBe("max_wait")
    expect(run.elapsed(10_500)).toBe(10_000)
  })

  it("gives each run its own backoff state", () => {
    const schedule = new PollSchedule({ ...base, jitter: "none" })
    const first = schedule.start(0)

    first.nextDelay(1, 0)
    first.nextDelay(2, 0)
    first.nextDelay(3, 0)

    expect(schedule.start(0).nextDelay(1, 0)).toBe(1_000)
  })

  it("rejects invalid options", () => {
    expect(() => new PollSchedule({ ...base, maxAttempts: 0 })).toThrow(RangeError)
    expect(() => new PollSchedule({ ...base, baseMs: 0 })).toThrow(RangeError)
    expect(() => new PollSchedule({ ...base, maxMs: 500 })).toThrow(RangeError)
  })
})
