import pino, {
  type DestinationStream,
  type Logger as Pino,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Pino instance to derive from. Its level, serializers and sink are kept. */
  parent?: Pino

  /** Sink for JSON lines. Defaults to stdout; ignored when prettifying. */
  destination?: DestinationStream
}

const prettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "HH:MM:ss.l",
    ignore: "hostname,pid",
  },
}

function createRoot(opts: Partial<LoggerOptions>, destination?: DestinationStream): Pino {
  const options: PinoOptions = {
    level: opts.level ?? "info",
    serializers: { err: errWithCause },
  }

  if (opts.prettify) return pino({ ...options, transport: prettyTransport })

  return destination ? pino(options, destination) : pino(options)
}

/**
 * Structured JSON logging on pino. `err` entries keep their `cause` chain and
 * `BaseError` fields such as `code`.
 */
export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly pino: Pino

  constructor(
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    const parent = deps.parent ?? createRoot(opts, deps.destination)
    this.pino = parent.child(context)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.emit("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.emit("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.emit("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.emit("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.emit("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.emit("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ parent: this.pino }, {}, context)
  }

  private emit(level: LogLevelName, message: string, meta: LogMeta<TContext> = {}): void {
    this.pino[level](meta, message)
  }
}
