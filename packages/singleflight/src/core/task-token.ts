import type { CancelCallback, CancellationToken } from "../ports/cancellation-token"
import { CancelledError } from "./cancelled-error"

type Registration = { callback: CancelCallback }

/**
 * Token handed out by the lock. Only the lock calls {@link cancel}; bodies
 * see the read-only {@link CancellationToken} surface.
 */
export class TaskToken implements CancellationToken {
  private cancelled = false
  private registrations: Registration[] = []
  private readonly controller = new AbortController()

  constructor(
    readonly id: number,
    private readonly reportCallbackError: (error: unknown) => void = () => {},
  ) {}

  get isCancelled(): boolean {
    return this.cancelled
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  guard(): void {
    if (this.cancelled) {
      throw new CancelledError({ taskId: this.id })
    }
  }

  async wait<T>(op: () => Promise<T>): Promise<T> {
    this.guard()
    const result = await op()
    this.guard()
    return result
  }

  onCancel(callback: CancelCallback): () => void {
    if (this.cancelled) {
      this.runIsolated(callback)
      return () => {}
    }

    const registration: Registration = { callback }
    this.registrations.push(registration)

    return () => {
      this.registrations = this.registrations.filter((r) => r !== registration)
    }
  }

  /** Idempotent. Runs callbacks in registration order, then aborts {@link signal}. */
  cancel(): void {
    if (this.cancelled) return
    this.cancelled = true

    const registrations = this.registrations
    this.registrations = []

    for (const { callback } of registrations) {
      this.runIsolated(callback)
    }

    this.controller.abort(new CancelledError({ taskId: this.id }))
  }

  private runIsolated(callback: CancelCallback): void {
    try {
      callback()
    } catch (error) {
      this.reportCallbackError(error)
    }
  }
}
