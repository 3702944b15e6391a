export { CancelledError, isCancelledError } from "./core/cancelled-error"
export { createDeferred, type Deferred } from "./core/deferred"
export { detach } from "./core/detach"
export { Mutex } from "./core/mutex"
export {
  createSingleFlightLock,
  SingleFlightLock,
  type SingleFlightLockDeps,
} from "./core/single-flight-lock"
export { TaskToken } from "./core/task-token"
export type { CancelCallback, CancellationToken } from "./ports/cancellation-token"
export type {
  ISingleFlightLock,
  SingleFlightLockOptions,
  TaskBody,
} from "./ports/single-flight-lock"
