/** Machine-readable error code, lower snake case by convention (`cancelled`, `invalid_retry`). */
export type ErrorCode = Lowercase<string>

/** Structured details about where an error happened, e.g. `{ machine, runId }`. */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Shape shared by every error this workspace raises.
 *
 * `isOperational` separates conditions a caller should expect and recover
 * from (a superseded task, a disposed state machine) from programming
 * mistakes (retrying a mutation that never ran, invalid configuration).
 */
export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe form of an error, for logs and diagnostics. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
