export {
  DisposedError,
  InvalidRetryError,
  isDisposedError,
  isInvalidRetryError,
} from "./core/errors"
export { Mutation, type MutationFn } from "./core/mutation"
export { ObservableStateMachine } from "./core/observable-state-machine"
export { ObservableValue } from "./core/observable-value"
export { Query, type QueryFn } from "./core/query"
export {
  captureTrace,
  completedState,
  defaultVisibility,
  errorOf,
  failedState,
  hasFailed,
  hasValue,
  idleState,
  isIdle,
  isRunning,
  matchMutationState,
  matchQueryState,
  runningState,
  valueOf,
  whenQueryState,
} from "./core/state"
export type { Listener, Observable } from "./ports/observable"
export type {
  QueryOptions,
  StateMachineDeps,
  StateMachineOptions,
  VisibilityPolicy,
} from "./ports/options"
export type {
  CompletedMutationState,
  CompletedQueryState,
  CompletedState,
  FailedMutationState,
  FailedQueryState,
  FailedState,
  IdleMutationState,
  IdleState,
  MutationState,
  MutationStateHandlers,
  ObservedState,
  QueryState,
  QueryStateHandlers,
  RunningMutationState,
  RunningQueryState,
  RunningState,
  StateStatus,
} from "./ports/state"
