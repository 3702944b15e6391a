import { type AppError, BaseError, type ErrorContext, hasErrorCode } from "@supersede/errors"

export class CancelledError extends BaseError<"cancelled"> {
  constructor(context: ErrorContext = {}) {
    super("Task was cancelled", { code: "cancelled", context })
  }
}

export function isCancelledError(e: unknown): e is AppError & { readonly code: "cancelled" } {
  return hasErrorCode(e, "cancelled")
}
