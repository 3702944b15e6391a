export type Listener<T> = (value: T) => void

/** A readable value that notifies listeners synchronously when it changes. */
export interface Observable<T> {
  readonly value: T

  /** @returns a function that removes the listener again */
  addListener(listener: Listener<T>): () => void

  removeListener(listener: Listener<T>): void
}
