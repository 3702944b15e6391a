import type { AppError, ErrorCode } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check for {@link AppError}. Works across package copies where
 * `instanceof BaseError` would not.
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}

/**
 * Narrow an unknown thrown value to an {@link AppError} carrying `code`.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (hasErrorCode(err, "cancelled")) return
 *   throw err
 * }
 * ```
 */
export function hasErrorCode<C extends ErrorCode>(
  e: unknown,
  code: C,
): e is AppError & { readonly code: C } {
  return isAppError(e) && e.code === code
}
