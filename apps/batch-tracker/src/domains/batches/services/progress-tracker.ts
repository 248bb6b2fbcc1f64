import type { Clock, Milliseconds } from "@batchkit/clock"
import { serializeError } from "@batchkit/errors"
import type { Logger } from "@batchkit/logger"
import type { Singleflight } from "@batchkit/singleflight"
import type { ProgressStore } from "../infra/progress-store"
import {
  PermanentError,
  ProtocolError,
  RetrievalError,
  TransientError,
} from "../model/batch.errors"
import type { RawStatus } from "../model/batch-service-client.model"
import type { JobId, JobRecord } from "../model/job.model"
import {
  isTerminal,
  type LifecycleState,
  lookupRawStatus,
  type RetrievableState,
  type TerminalState,
} from "../model/lifecycle.model"
import type { TrackingErrorReason, TrackOutcome } from "../model/outcome.model"
import type { GiveUpReason, PollRun, PollSchedule } from "./poll-schedule"
import { reconcile } from "./reconcile"
import type { ResultRetriever } from "./result-retriever"
import type { StatusPoller } from "./status-poller"

export type ProgressTrackerDeps = {
  clock: Clock
  logger: Logger
  poller: StatusPoller
  retriever: ResultRetriever
  progressStore: ProgressStore
  schedule: PollSchedule
  singleflight: Singleflight<TrackOutcome>
}

export type ProgressTrackerOptions = {
  /** Status observations kept per record */
  historyLimit: number
}

export type TrackOptions = {
  /**
   * Stops polling and records the job as cancelled locally. The remote job
   * is left alone. Only the caller that starts a flight gets to abort it.
   */
  signal?: AbortSignal
}

type PollStep =
  | { kind: "observed"; record: JobRecord }
  | { kind: "transient"; record: JobRecord }
  | { kind: "stop"; outcome: TrackOutcome }

/**
 * Drives one job from its current state to a terminal outcome:
 * poll, reconcile, persist, then either sleep and repeat or hand off to the
 * retriever.
 *
 * @remarks
 * Every tracking failure comes back as a `tracking_error` outcome. The
 * promise only rejects when the progress store itself fails.
 */
export class ProgressTracker {
  private readonly logger: Logger
  private readonly active = new Set<JobId>()

  public constructor(
    private readonly deps: ProgressTrackerDeps,
    private readonly opts: ProgressTrackerOptions,
  ) {
    if (!Number.isInteger(opts.historyLimit) || opts.historyLimit < 1) {
      throw new RangeError(`historyLimit must be an integer >= 1 (got ${opts.historyLimit})`)
    }

    this.logger = deps.logger.child({ module: "progress-tracker" })
  }

  /** Concurrent calls for the same job share one run. */
  async track(jobId: JobId, options: TrackOptions = {}): Promise<TrackOutcome> {
    const flight = await this.deps.singleflight.run(jobId, async () => {
      this.active.add(jobId)

      try {
        return await this.run(jobId, options.signal)
      } finally {
        this.active.delete(jobId)
      }
    })

    return flight.value
  }

  /** Jobs this instance is polling right now. */
  activeJobs(): JobId[] {
    return [...this.active]
  }

  /**
   * Drops the persisted record, and its stored result, so the job can be
   * tracked afresh. Returns false when there was nothing to drop.
   */
  async forget(jobId: JobId): Promise<boolean> {
    if (this.active.has(jobId)) {
      throw new PermanentError(`Job ${jobId} is being tracked; abort tracking first`, {
        context: { jobId },
      })
    }

    const removed = await this.deps.progressStore.remove(jobId)
    if (removed === null) return false

    if (removed.resultRef) await this.deps.retriever.forget(removed.resultRef)
    this.logger.info("Job forgotten", { jobId, state: removed.state })

    return true
  }

  private async run(jobId: JobId, signal: AbortSignal | undefined): Promise<TrackOutcome> {
    const logger = this.logger.child({ jobId })
    const existing = await this.deps.progressStore.get(jobId)

    if (existing && isTerminal(existing.state)) {
      logger.debug("Job already terminal", { state: existing.state })
      return this.settled(existing, logger)
    }

    if (existing?.abandonedAt) {
      logger.info("Retrying abandoned job", { abandonedAt: existing.abandonedAt })
    }

    let record = existing ? withoutAbandoned(existing) : await this.create(jobId)
    const pollRun = this.deps.schedule.start(this.deps.clock.nowMs())
    let attempts = 0

    logger.info("Tracking started", { state: record.state, resumed: existing !== null })

    for (;;) {
      if (signal?.aborted) return this.cancelLocally(record, signal.reason, logger)

      attempts++
      const step = await this.pollOnce(record, logger)

      if (step.kind === "stop") return step.outcome

      record = step.record
      if (isTerminal(record.state)) return this.finish(record, record.state, logger)

      const now = this.deps.clock.nowMs()
      const giveUp = pollRun.giveUpReason(attempts, now)

      if (giveUp !== null) {
        return this.timeOut(record, pollRun, attempts, logger, giveUp)
      }

      await this.deps.clock.sleep(pollRun.nextDelay(attempts, now), signal)
    }
  }

  private async pollOnce(record: JobRecord, logger: Logger): Promise<PollStep> {
    const at = this.deps.clock.now()
    const counted: JobRecord = { ...record, attempts: record.attempts + 1, updatedAt: at }

    let raw: RawStatus
    let next: LifecycleState

    try {
      raw = await this.deps.poller.poll(record.jobId)
      next = reconcile(record.state, raw.status)
    } catch (err) {
      if (err instanceof TransientError) {
        const failed: JobRecord = { ...counted, lastError: serializeError(err) }
        await this.deps.progressStore.save(failed)

        logger.warn("Status poll failed, backing off", { attempt: failed.attempts, err })
        return { kind: "transient", record: failed }
      }

      if (err instanceof PermanentError || err instanceof ProtocolError) {
        return { kind: "stop", outcome: await this.abort(counted, err, logger) }
      }

      throw err
    }

    const observed: JobRecord = {
      ...withoutLastError(counted),
      state: next,
      rawStatus: raw.status,
      lastPolledAt: at,
      ...(raw.requestCounts && { progress: raw.requestCounts }),
      history: [
        ...counted.history,
        {
          at,
          rawStatus: raw.status,
          state: next,
          ...(raw.requestCounts && { progress: raw.requestCounts }),
        },
      ].slice(-this.opts.historyLimit),
    }

    await this.deps.progressStore.save(observed)

    if (next !== record.state) {
      logger.info("Job state changed", {
        from: record.state,
        to: next,
        rawStatus: raw.status,
        progress: raw.requestCounts,
      })
    } else {
      logger.debug("Job state unchanged", { state: next, rawStatus: raw.status })
    }

    return { kind: "observed", record: observed }
  }

  /** Outcome of a record that was already terminal when tracking began. */
  private async settled(record: JobRecord, logger: Logger): Promise<TrackOutcome> {
    switch (record.state) {
      case "succeeded": {
        if (record.resultRef) {
          const stored = await this.deps.retriever.load(record.resultRef)

          if (stored) {
            return {
              kind: "succeeded",
              jobId: record.jobId,
              resultRef: record.resultRef,
              payload: stored.body,
            }
          }

          logger.warn("Stored result is missing, fetching it again", {
            resultRef: record.resultRef,
          })
        }

        return this.retrieve(record, "succeeded", logger)
      }
      case "failed":
        return record.errorDetail
          ? { kind: "failed", jobId: record.jobId, detail: record.errorDetail }
          : this.retrieve(record, "failed", logger)
      case "cancelled":
        return {
          kind: "cancelled",
          jobId: record.jobId,
          origin: lookupRawStatus(record.rawStatus ?? "") === "cancelled" ? "remote" : "local",
        }
      case "timed_out":
        return {
          kind: "timed_out",
          jobId: record.jobId,
          lastState: lastObservedState(record),
          attempts: record.attempts,
          elapsedMs: record.updatedAt.getTime() - record.createdAt.getTime(),
        }
      case "submitted":
      case "validating":
      case "running":
        throw new Error(`Job ${record.jobId} is not terminal (${record.state})`)
    }
  }

  /** Outcome of a terminal state the service just reported. */
  private async finish(
    record: JobRecord,
    state: TerminalState,
    logger: Logger,
  ): Promise<TrackOutcome> {
    switch (state) {
      case "succeeded":
      case "failed":
        return this.retrieve(record, state, logger)
      case "cancelled":
        logger.info("Job cancelled by the service")
        return { kind: "cancelled", jobId: record.jobId, origin: "remote" }
      case "timed_out":
        throw new Error(`Job ${record.jobId} cannot be reported as timed out by the service`)
    }
  }

  private async retrieve(
    record: JobRecord,
    state: RetrievableState,
    logger: Logger,
  ): Promise<TrackOutcome> {
    try {
      const outcome = await this.deps.retriever.retrieve(record.jobId, state)
      const at = this.deps.clock.now()

      switch (outcome.kind) {
        case "succeeded":
          await this.deps.progressStore.save({
            ...withoutLastError(record),
            resultRef: outcome.resultRef,
            updatedAt: at,
          })

          return { ...outcome, jobId: record.jobId }
        case "failed":
          await this.deps.progressStore.save({
            ...withoutLastError(record),
            errorDetail: outcome.detail,
            updatedAt: at,
          })

          return { kind: "failed", jobId: record.jobId, detail: outcome.detail }
      }
    } catch (err) {
      if (err instanceof RetrievalError) return this.abort(record, err, logger)
      throw err
    }
  }

  private async create(jobId: JobId): Promise<JobRecord> {
    const now = this.deps.clock.now()
    const record: JobRecord = {
      jobId,
      state: "submitted",
      createdAt: now,
      updatedAt: now,
      attempts: 0,
      history: [],
    }

    await this.deps.progressStore.save(record)
    return record
  }

  private async abort(
    record: JobRecord,
    err: PermanentError | ProtocolError | RetrievalError,
    logger: Logger,
  ): Promise<TrackOutcome> {
    const error = serializeError(err)
    const now = this.deps.clock.now()

    await this.deps.progressStore.save({
      ...record,
      lastError: error,
      updatedAt: now,
      ...(!isTerminal(record.state) && { abandonedAt: now }),
    })

    logger.error("Tracking aborted", { state: record.state, err })

    return { kind: "tracking_error", jobId: record.jobId, reason: reasonOf(err), error }
  }

  private async timeOut(
    record: JobRecord,
    pollRun: PollRun,
    attempts: number,
    logger: Logger,
    reason: GiveUpReason,
  ): Promise<TrackOutcome> {
    const elapsedMs: Milliseconds = pollRun.elapsed(this.deps.clock.nowMs())

    await this.deps.progressStore.save({
      ...record,
      state: "timed_out",
      updatedAt: this.deps.clock.now(),
    })

    logger.warn("Gave up waiting for job", { lastState: record.state, attempts, elapsedMs, reason })

    return { kind: "timed_out", jobId: record.jobId, lastState: record.state, attempts, elapsedMs }
  }

  private async cancelLocally(
    record: JobRecord,
    reason: unknown,
    logger: Logger,
  ): Promise<TrackOutcome> {
    await this.deps.progressStore.save({
      ...record,
      state: "cancelled",
      lastError: serializeError(reason),
      updatedAt: this.deps.clock.now(),
    })

    logger.info("Tracking cancelled locally", { lastState: record.state })

    return { kind: "cancelled", jobId: record.jobId, origin: "local" }
  }
}

function reasonOf(err: PermanentError | ProtocolError | RetrievalError): TrackingErrorReason {
  return err.code
}

function withoutLastError(record: JobRecord): JobRecord {
  const { lastError: _lastError, ...rest } = record
  return rest
}

function withoutAbandoned(record: JobRecord): JobRecord {
  const { abandonedAt: _abandonedAt, ...rest } = record
  return rest
}

/** State the job was in before the tracker gave up on it. */
function lastObservedState(record: JobRecord): LifecycleState {
  return record.history.at(-1)?.state ?? "submitted"
}
