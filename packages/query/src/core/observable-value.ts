import type { Listener, Observable } from "../ports/observable"

/**
 * Holds a value and notifies listeners, in registration order, whenever a
 * different value (by identity) is written.
 *
 * Listeners added during a notification wait for the next one. Listeners
 * removed during a notification are skipped if they have not run yet. A
 * throwing listener does not stop the rest; the first error is rethrown to
 * the writer once every listener ran.
 */
export class ObservableValue<T> implements Observable<T> {
  private listeners: Listener<T>[] = []
  private disposed = false

  constructor(private current: T) {}

  get value(): T {
    return this.current
  }

  set value(next: T) {
    if (this.disposed || Object.is(next, this.current)) return

    this.current = next
    this.notify(next)
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  addListener(listener: Listener<T>): () => void {
    if (this.disposed) return () => {}

    this.listeners = [...this.listeners, listener]
    return () => this.removeListener(listener)
  }

  removeListener(listener: Listener<T>): void {
    const index = this.listeners.indexOf(listener)
    if (index === -1) return

    this.listeners = this.listeners.filter((_, i) => i !== index)
  }

  /** Idempotent. Drops every listener; later writes are ignored. */
  dispose(): void {
    if (this.disposed) return

    this.disposed = true
    this.listeners = []
  }

  private notify(value: T): void {
    const snapshot = this.listeners
    let failure: { error: unknown } | undefined

    for (const listener of snapshot) {
      if (!this.listeners.includes(listener)) continue

      try {
        listener(value)
      } catch (error) {
        failure ??= { error }
      }
    }

    if (failure) throw failure.error
  }
}
