import { createDeferred } from "./deferred"

function invoke<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return Promise.resolve(fn())
  } catch (error) {
    return Promise.reject(error)
  }
}

/**
 * FIFO mutual exclusion for async closures.
 *
 * When free, the closure is invoked synchronously in the caller's turn.
 * Otherwise it starts after every earlier closure has settled, whether it
 * resolved or rejected.
 */
export class Mutex {
  private tail: Promise<void> | null = null

  /** `true` while a closure is running or queued. */
  get isLocked(): boolean {
    return this.tail !== null
  }

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail
    const released = createDeferred<void>()

    this.tail = released.promise

    const release = () => {
      if (this.tail === released.promise) this.tail = null
      released.resolve()
    }

    const result = previous === null ? invoke(fn) : previous.then(() => invoke(fn))

    void result.then(release, release)

    return result
  }
}
