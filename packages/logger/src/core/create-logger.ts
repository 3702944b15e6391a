import type { DestinationStream } from "pino"
import { NullLogger } from "../adapters/null/null-logger"
import { PinoLogger } from "../adapters/pino/pino-logger"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"
import type { LoggerConfig } from "./config"

export type CreateLoggerDeps = {
  /** Destination for the pino adapter. Defaults to stdout. */
  destination?: DestinationStream
}

/**
 * Build the configured adapter, bound to `{ service }`.
 *
 * @example
 * ```ts
 * const logger = createLogger(loadLoggerConfig(process.env))
 * const search = new Query(fetchResults, { name: "search" }, { logger })
 * ```
 */
export function createLogger(config: LoggerConfig, deps: CreateLoggerDeps = {}): Logger {
  const opts: LoggerOptions = { level: config.level, prettify: config.prettify }
  const context = { service: config.service }

  switch (config.adapter) {
    case "pino":
      return new PinoLogger({ destination: deps.destination }, opts, context)
    case "null":
      return new NullLogger()
  }
}
