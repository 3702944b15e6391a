import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  /** @default true */
  isOperational?: boolean
}>

/**
 * Root of the workspace's error hierarchy. Subclasses fix the code:
 *
 * ```ts
 * class DisposedError extends BaseError<"disposed"> {
 *   constructor(context: ErrorContext = {}) {
 *     super("State machine was disposed", { code: "disposed", context })
 *   }
 * }
 * ```
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Convert any thrown value to a {@link SerializedError}.
 *
 * Plain `Error`s get code `unknown` and count as non-operational. Thrown
 * non-errors become `NonErrorThrown`, with the raw value kept in `context`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: typeof err === "string" ? {} : { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const app = err instanceof BaseError ? err : undefined

  return {
    name: err.name,
    code: app?.code ?? "unknown",
    message: err.message,
    context: { ...app?.context },
    isOperational: app?.isOperational ?? false,
    timestamp: (app?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack !== undefined && { stack: err.stack }),
  }
}
