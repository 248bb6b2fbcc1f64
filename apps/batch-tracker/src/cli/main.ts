import fs from "node:fs/promises"
import { loadAppConfig } from "../app/config"
import {
  createDefaultServices,
  type ServiceOverrides,
  startServices,
  stopServices,
} from "../app/services"
import { ExitCode, exitCodeForError } from "./exit-codes"
import { type Command, parseCommand } from "./parse-command"
import { runCommand } from "./run-command"
import { UsageError, usage } from "./usage-error"

export type MainOptions = {
  argv: readonly string[]
  env: NodeJS.ProcessEnv
  signal: AbortSignal

  stdout: (line: string) => void
  stderr: (line: string) => void

  /** Where `.env.<NODE_ENV>` is looked up. Default: process.cwd() */
  cwd?: string

  services?: ServiceOverrides
}

export async function main(opts: MainOptions): Promise<ExitCode> {
  let command: Command

  try {
    command = parseCommand(opts.argv)
  } catch (err) {
    opts.stderr(`${messageOf(err)}\n\n${usage}`)
    return exitCodeForError(err)
  }

  if (command.name === "help") {
    opts.stdout(usage)
    return ExitCode.Ok
  }

  let services: ReturnType<typeof createDefaultServices>

  try {
    const config = await loadAppConfig(opts.env, undefined, opts.cwd)
    services = createDefaultServices(config, opts.services)
  } catch (err) {
    opts.stderr(messageOf(err))
    return exitCodeForError(err)
  }

  const logger = services.logger.child({ command: command.name })

  try {
    await startServices(services)

    return await runCommand(command, {
      batchService: services.batches.batchService,
      logger,
      signal: opts.signal,
      print: opts.stdout,
      readFile: readInput,
    })
  } catch (err) {
    const code = exitCodeForError(err)

    if (code === ExitCode.Fatal) logger.fatal("Command failed", { err })
    else logger.error("Command failed", { err })

    opts.stderr(messageOf(err))
    return code
  } finally {
    await stopServices(services)
  }
}

async function readInput(path: string): Promise<string> {
  try {
    return await fs.readFile(path, "utf8")
  } catch (err) {
    throw new UsageError(`Cannot read ${path}: ${messageOf(err)}`, err)
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
