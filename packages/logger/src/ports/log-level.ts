/** Level names in increasing severity. Adapters map them onto their own scales. */
export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

export function isLogLevelName(value: unknown): value is LogLevelName {
  return logLevelNames.some((name) => name === value)
}
