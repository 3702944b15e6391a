import { type AppError, BaseError, type ErrorContext, hasErrorCode } from "@supersede/errors"

export class DisposedError extends BaseError<"disposed"> {
  constructor(context: ErrorContext = {}) {
    super("State machine was disposed", { code: "disposed", context })
  }
}

/** Thrown when retrying a mutation that has never run. A caller bug, not a runtime condition. */
export class InvalidRetryError extends BaseError<"invalid_retry"> {
  constructor(context: ErrorContext = {}) {
    super("Unable to retry a mutation that has not been run yet", {
      code: "invalid_retry",
      context,
      isOperational: false,
    })
  }
}

export function isDisposedError(e: unknown): e is AppError & { readonly code: "disposed" } {
  return hasErrorCode(e, "disposed")
}

export function isInvalidRetryError(
  e: unknown,
): e is AppError & { readonly code: "invalid_retry" } {
  return hasErrorCode(e, "invalid_retry")
}
