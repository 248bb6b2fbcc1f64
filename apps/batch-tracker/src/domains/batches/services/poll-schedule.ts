import {
  createBackoff,
  type DelayPolicy,
  decorrelatedJitter,
  equalJitter,
  exponential,
  fullJitter,
  type JitterStrategy,
  type RandomSource,
  systemRandom,
} from "@batchkit/backoff"
import type { Milliseconds, UnixMs } from "@batchkit/clock"

export const jitterNames = ["none", "full", "equal", "decorrelated"] as const
export type JitterName = (typeof jitterNames)[number]

export type PollScheduleOptions = {
  /** First delay, and the floor for every later one */
  baseMs: Milliseconds

  /** Growth per attempt. Default: 2 */
  factor?: number

  maxMs: Milliseconds

  /** Default: "equal" */
  jitter?: JitterName

  /** Give up after this many poll attempts */
  maxAttempts: number

  /** Give up once this much time has passed since tracking started */
  maxWaitMs: Milliseconds

  random?: RandomSource
}

export type GiveUpReason = "max_attempts" | "max_wait"

/**
 * Poll timing shared by all tracked jobs. Each `track()` call takes its own
 * `PollRun` from `start()`, so jobs never share backoff state.
 */
export class PollSchedule {
  private readonly policy: DelayPolicy

  constructor(private readonly opts: PollScheduleOptions) {
    assertPositiveInteger("maxAttempts", opts.maxAttempts)

    if (!(opts.baseMs > 0)) throw new RangeError(`baseMs must be > 0 (got ${opts.baseMs})`)
    if (!(opts.maxWaitMs >= 0)) {
      throw new RangeError(`maxWaitMs must be >= 0 (got ${opts.maxWaitMs})`)
    }

    this.policy = createBackoff({
      delay: exponential({ base: { milliseconds: opts.baseMs }, factor: opts.factor ?? 2 }),
      min: { milliseconds: opts.baseMs },
      max: { milliseconds: opts.maxMs },
      ...withJitter(opts.jitter ?? "equal", opts.baseMs, opts.random ?? systemRandom),
    })
  }

  start(startedAt: UnixMs): PollRun {
    return new PollRun(this.policy, this.opts, startedAt)
  }
}

export class PollRun {
  private previousDelay: Milliseconds = 0

  constructor(
    private readonly policy: DelayPolicy,
    private readonly limits: Pick<PollScheduleOptions, "maxAttempts" | "maxWaitMs">,
    readonly startedAt: UnixMs,
  ) {}

  elapsed(now: UnixMs): Milliseconds {
    return now - this.startedAt
  }

  /** Why polling should stop after `attempts` polls, or null to keep going. */
  giveUpReason(attempts: number, now: UnixMs): GiveUpReason | null {
    if (attempts >= this.limits.maxAttempts) return "max_attempts"
    if (this.elapsed(now) >= this.limits.maxWaitMs) return "max_wait"

    return null
  }

  /**
   * Wait before poll number `attempts + 1`. Never shorter than the previous
   * wait, and clipped to what is left of `maxWaitMs`.
   */
  nextDelay(attempts: number, now: UnixMs): Milliseconds {
    const proposed = this.policy.getDelay(Math.max(0, attempts - 1)).milliseconds
    this.previousDelay = Math.max(this.previousDelay, proposed)

    const remaining = this.limits.maxWaitMs - this.elapsed(now)

    return Math.max(0, Math.min(this.previousDelay, remaining))
  }
}

function withJitter(
  name: JitterName,
  baseMs: Milliseconds,
  random: RandomSource,
): { jitter?: JitterStrategy } {
  switch (name) {
    case "none":
      return {}
    case "full":
      return { jitter: fullJitter(random) }
    case "equal":
      return { jitter: equalJitter(random) }
    case "decorrelated":
      return { jitter: decorrelatedJitter({ min: { milliseconds: baseMs } }, random) }
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be an integer >= 1 (got ${value})`)
  }
}
