import pino, {
  type DestinationStream,
  type Logger as PinoBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerOptions = Partial<LoggerOptions> & {
  /**
   * Where JSON lines are written. Defaults to stdout.
   * Ignored when `prettify` is set, since pino-pretty owns the output then.
   */
  destination?: DestinationStream

  /** Write to stderr instead of stdout, leaving stdout to program output. */
  stderr?: boolean
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly logger: PinoBase

  constructor(
    private readonly opts: PinoLoggerOptions = {},
    bindings: LogContextPatch = {},
    base?: PinoBase,
  ) {
    this.logger = base ? base.child(bindings) : this.createRoot().child(bindings)
  }

  private createRoot(): PinoBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) {
      return pino({
        ...pinoOpts,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname,pid",
            destination: this.opts.stderr ? 2 : 1,
          },
        },
      })
    }

    if (this.opts.destination) return pino(pinoOpts, this.opts.destination)

    return this.opts.stderr ? pino(pinoOpts, pino.destination(2)) : pino(pinoOpts)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.opts, context, this.logger)
  }
}

export function createPinoLogger(
  bindings: LogContextPatch = {},
  opts: PinoLoggerOptions = {},
): Logger {
  return new PinoLogger(opts, bindings)
}
