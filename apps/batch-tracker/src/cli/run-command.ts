import type { Logger } from "@batchkit/logger"
import type { BatchService } from "../domains/batches/services/batch-service"
import { ExitCode, exitCodeForOutcome, exitCodeForOutcomes } from "./exit-codes"
import type { Command } from "./parse-command"
import { parseWorkItems } from "./read-work-items"
import { UsageError, usage } from "./usage-error"

export type CommandContext = {
  batchService: BatchService
  logger: Logger
  signal: AbortSignal

  /** Receives one JSON document per call */
  print: (line: string) => void
  readFile: (path: string) => Promise<string>
}

export async function runCommand(command: Command, ctx: CommandContext): Promise<ExitCode> {
  const { batchService, signal } = ctx
  const emit = (value: unknown) => ctx.print(JSON.stringify(value))

  switch (command.name) {
    case "help":
      ctx.print(usage)
      return ExitCode.Ok

    case "submit": {
      const items = parseWorkItems(await ctx.readFile(command.input), command.input)
      if (items.length === 0) throw new UsageError(`${command.input} has no work items`)

      const key = command.submissionKey !== undefined && { submissionKey: command.submissionKey }

      if (command.chunkSize !== undefined) {
        const submitted = await batchService.submitChunked({
          items,
          chunkSize: command.chunkSize,
          ...key,
        })

        for (const result of submitted) emit(result)
        if (!command.track) return ExitCode.Ok

        const outcomes = await batchService.trackMany(
          submitted.map((result) => result.jobId),
          { signal },
        )
        for (const outcome of outcomes) emit(outcome)

        return exitCodeForOutcomes(outcomes)
      }

      const submitted = await batchService.submit({ items, ...key })

      emit(submitted)
      if (!command.track) return ExitCode.Ok

      const outcome = await batchService.track(submitted.jobId, { signal })
      emit(outcome)

      return exitCodeForOutcome(outcome)
    }

    case "track": {
      const outcomes = await batchService.trackMany(command.jobIds, { signal })
      for (const outcome of outcomes) emit(outcome)

      return exitCodeForOutcomes(outcomes)
    }

    case "resume": {
      const outcomes = await batchService.resumeInFlight({ signal })
      for (const outcome of outcomes) emit(outcome)

      if (outcomes.length === 0) ctx.logger.info("No jobs in flight")
      return exitCodeForOutcomes(outcomes)
    }

    case "status": {
      const record = await batchService.status(command.jobId)

      if (record === null) {
        emit({ kind: "not_found", jobId: command.jobId })
        return ExitCode.Fatal
      }

      emit(record)
      return ExitCode.Ok
    }

    case "cancel":
      await batchService.cancel(command.jobId)
      emit({ kind: "cancel_requested", jobId: command.jobId })
      return ExitCode.Ok

    case "forget": {
      const forgotten = await batchService.forget(command.jobId)
      emit({ kind: forgotten ? "forgotten" : "not_found", jobId: command.jobId })

      return ExitCode.Ok
    }
  }
}
