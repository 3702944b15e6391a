export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { PinoLogger } from "./adapters/pino/pino-logger"
export type { PinoLoggerDeps } from "./adapters/pino/pino-logger"
export {
  ConfigError,
  type LoggerAdapterName,
  type LoggerConfig,
  type LoggerEnv,
  loadLoggerConfig,
  loggerEnvSchema,
} from "./core/config"
export { createLogger, type CreateLoggerDeps } from "./core/create-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { isLogLevelName, type LogLevelName, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
