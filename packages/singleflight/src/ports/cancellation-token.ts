export type CancelCallback = () => void

/**
 * Per-submission handle a task body uses to cooperate with cancellation.
 *
 * Cancellation is cooperative: flipping the flag never interrupts the body.
 * A body notices it only at checkpoints ({@link guard}, {@link wait}) or
 * through {@link onCancel} / {@link signal}.
 */
export interface CancellationToken {
  /** Per-lock submission sequence number, starting at 1. */
  readonly id: number

  /** `true` once a newer submission (or an explicit cancel) superseded this task. Never reverts. */
  readonly isCancelled: boolean

  /**
   * Aborted together with the token, for APIs that accept an {@link AbortSignal}.
   *
   * Aborts after every {@link onCancel} callback ran. Abort listeners are not
   * isolated like those callbacks: Node reports an error thrown by one as an
   * uncaught exception, so register cleanup through {@link onCancel}.
   */
  readonly signal: AbortSignal

  /** Checkpoint. Throws `CancelledError` if the token is cancelled, otherwise does nothing. */
  guard(): void

  /**
   * Run `op` between two checkpoints.
   *
   * `op` itself is not interrupted; when the token is cancelled while it is
   * pending, its result is discarded and `CancelledError` is thrown instead.
   */
  wait<T>(op: () => Promise<T>): Promise<T>

  /**
   * Register cleanup to run when the token is cancelled, in registration order.
   *
   * If the token is already cancelled the callback runs immediately. Each
   * callback runs at most once; a throwing callback does not stop the others.
   *
   * @returns a function that unregisters the callback if it has not run yet
   */
  onCancel(callback: CancelCallback): () => void
}
