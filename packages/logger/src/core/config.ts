import { BaseError } from "@supersede/errors"
import { z } from "zod/mini"
import { type LogLevelName, logLevelNames } from "../ports/log-level"

export const loggerAdapterNames = ["pino", "null"] as const

export type LoggerAdapterName = (typeof loggerAdapterNames)[number]

const loggerEnvKeys = ["LOG_LEVEL", "LOG_PRETTY", "LOG_ADAPTER", "SERVICE_NAME"] as const

export const loggerEnvSchema = z.object({
  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.enum(["true", "false", "1", "0"]), "false"),
  LOG_ADAPTER: z._default(z.enum(loggerAdapterNames), "pino"),
  SERVICE_NAME: z._default(z.string(), "supersede"),
})

export type LoggerEnv = z.infer<typeof loggerEnvSchema>

export type LoggerConfig = {
  adapter: LoggerAdapterName
  level: LogLevelName
  prettify: boolean
  service: string
}

export class ConfigError extends BaseError<"invalid_config"> {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join("\n")}`, {
      code: "invalid_config",
      context: { issues },
      isOperational: false,
    })
    this.issues = issues
  }
}

export function mapEnvToLoggerConfig(env: LoggerEnv): LoggerConfig {
  return {
    adapter: env.LOG_ADAPTER,
    level: env.LOG_LEVEL,
    prettify: env.LOG_PRETTY === "true" || env.LOG_PRETTY === "1",
    service: env.SERVICE_NAME,
  }
}

/**
 * Read logging settings from an environment map.
 *
 * Blank variables count as unset. Throws {@link ConfigError} listing every
 * invalid key.
 */
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const raw: Record<string, string> = {}

  for (const key of loggerEnvKeys) {
    const value = env[key]?.trim()
    if (value) raw[key] = value
  }

  const result = loggerEnvSchema.safeParse(raw)

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    )
  }

  return mapEnvToLoggerConfig(result.data)
}
