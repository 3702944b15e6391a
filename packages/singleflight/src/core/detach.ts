/**
 * Fire-and-forget a promise on purpose.
 *
 * A rejection is handed to `onRejected` (which must not throw) and otherwise
 * dropped, so it never surfaces as an unhandled rejection. Only the given
 * promise is affected.
 */
export function detach(promise: PromiseLike<unknown>, onRejected?: (reason: unknown) => void): void {
  Promise.resolve(promise).catch((reason: unknown) => {
    onRejected?.(reason)
  })
}
