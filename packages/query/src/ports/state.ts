/*
 * Observed states form a closed union discriminated by `status`. Every state
 * keeps one mutable link to the state it replaced; the machine cuts the link
 * of the outgoing state on each write, so history never grows past one level.
 */

export interface IdleState<P> {
  readonly status: "idle"
  previousState: P | null
}

export interface RunningState<P> {
  readonly status: "running"
  previousState: P | null
}

export interface CompletedState<T, P> {
  readonly status: "completed"
  readonly value: T
  previousState: P | null
}

export interface FailedState<P> {
  readonly status: "failed"
  /** The thrown value, never wrapped. */
  readonly error: unknown
  readonly trace: string
  previousState: P | null
}

export type RunningQueryState<T> = RunningState<QueryState<T>>
export type CompletedQueryState<T> = CompletedState<T, QueryState<T>>
export type FailedQueryState<T> = FailedState<QueryState<T>>

export type QueryState<T> = RunningQueryState<T> | CompletedQueryState<T> | FailedQueryState<T>

export type IdleMutationState<T> = IdleState<MutationState<T>>
export type RunningMutationState<T> = RunningState<MutationState<T>>
export type CompletedMutationState<T> = CompletedState<T, MutationState<T>>
export type FailedMutationState<T> = FailedState<MutationState<T>>

export type MutationState<T> =
  | IdleMutationState<T>
  | RunningMutationState<T>
  | CompletedMutationState<T>
  | FailedMutationState<T>

export type ObservedState<T> = QueryState<T> | MutationState<T>

export type StateStatus = ObservedState<unknown>["status"]

export type QueryStateHandlers<T, R> = {
  running: () => R
  completed: (value: T) => R
  failed: (error: unknown, trace: string) => R
}

export type MutationStateHandlers<T, R> = QueryStateHandlers<T, R> & {
  idle: () => R
}
