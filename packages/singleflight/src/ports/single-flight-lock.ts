import type { CancellationToken } from "./cancellation-token"

export type TaskBody<R> = (token: CancellationToken) => Promise<R>

export type SingleFlightLockOptions = {
  /**
   * Name used in log context.
   * @default "anonymous"
   */
  name?: string
}

/**
 * Serializes task bodies so only one runs at a time, and cancels the
 * previous task whenever a new one is submitted.
 *
 * Useful for search-as-you-type, file watching and auto-save: only the most
 * recent submission's outcome matters.
 *
 * @example
 * ```ts
 * const lock = createSingleFlightLock({ name: "search" })
 *
 * function search(term: string) {
 *   return lock.submit(async (token) => {
 *     const res = await token.wait(() => fetch(`/search?q=${term}`, { signal: token.signal }))
 *     return token.wait(() => res.json())
 *   })
 * }
 *
 * search("ty")   // starts
 * search("typ")  // cancels "ty", runs once "ty" has unwound
 * ```
 */
export interface ISingleFlightLock {
  /**
   * Cancel the active task (synchronously, running its cleanup callbacks),
   * then queue `body` behind every earlier submission.
   *
   * The body starts right away when nothing holds the lock. Otherwise it
   * starts once all earlier bodies have settled; if it was itself superseded
   * meanwhile it never starts and the returned promise rejects with
   * `CancelledError`.
   *
   * Once the task is cancelled, its promise is detached: a later rejection
   * is not reported as unhandled.
   */
  submit<R>(body: TaskBody<R>): Promise<R>

  /** Cancel the active task without submitting a replacement. Safe to call when idle. */
  cancel(): void

  /** Token of the most recent submission while its body has not settled, else `null`. */
  readonly activeToken: CancellationToken | null
}
