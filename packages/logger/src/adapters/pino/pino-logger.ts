import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Sink for JSON lines. Takes precedence over the pretty transport. */
  destination?: DestinationStream
  /** Existing pino logger to derive from; set by child(). */
  base?: PinoLoggerBase
}

/**
 * Translates adapter options to pino's. The pino-pretty transport is only
 * selected when output goes to stdout, never alongside a destination.
 */
export function toPinoOptions(
  opts: Partial<LoggerOptions>,
  deps: Pick<PinoLoggerDeps, "destination"> = {},
): PinoOptions {
  return {
    ...(opts.level ? { level: opts.level } : {}),
    serializers: { err: errWithCause },
    ...(opts.prettify && !deps.destination
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  }
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase
  protected readonly opts: Partial<LoggerOptions>

  constructor(
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
  ) {
    this.opts = opts
    this.logger = this.init(deps, bindings)
  }

  private init(deps: PinoLoggerDeps, bindings: LogContextPatch): PinoLoggerBase {
    if (deps.base) return deps.base.child(bindings)

    const pinoOpts = toPinoOptions(this.opts, deps)
    const root = deps.destination ? pino(pinoOpts, deps.destination) : pino(pinoOpts)

    return root.child(bindings)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    this.logger[level](meta ?? {}, message)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  opts: Partial<LoggerOptions> = {},
  deps: Omit<PinoLoggerDeps, "base"> = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts)
}
