import type {
  CompletedState,
  FailedState,
  IdleState,
  MutationState,
  MutationStateHandlers,
  ObservedState,
  QueryState,
  QueryStateHandlers,
  RunningState,
} from "../ports/state"
import type { VisibilityPolicy } from "../ports/options"

export const defaultVisibility: Required<VisibilityPolicy> = {
  skipRunningAfterSuccess: false,
  skipRunningAfterFailure: true,
}

export function idleState<P>(): IdleState<P> {
  return { status: "idle", previousState: null }
}

export function runningState<P>(previous: P | null): RunningState<P> {
  return { status: "running", previousState: previous }
}

export function completedState<T, P>(value: T, previous: P | null): CompletedState<T, P> {
  return { status: "completed", value, previousState: previous }
}

export function failedState<P>(error: unknown, trace: string, previous: P | null): FailedState<P> {
  return { status: "failed", error, trace, previousState: previous }
}

/**
 * The state a new `running` state should link back to.
 *
 * A run that replaces another `running` state keeps that state's link, so the
 * last outcome stays reachable across back-to-back restarts.
 */
export function lastSettled<S extends { readonly status: string; previousState: S | null }>(
  state: S,
): S | null {
  return state.status === "running" ? state.previousState : state
}

export function clearPreviousState(state: { previousState: unknown }): void {
  state.previousState = null
}

function unhandled(state: never): never {
  throw new Error(`Unhandled state: ${JSON.stringify(state)}`)
}

export function matchQueryState<T, R>(state: QueryState<T>, handlers: QueryStateHandlers<T, R>): R {
  switch (state.status) {
    case "running":
      return handlers.running()
    case "completed":
      return handlers.completed(state.value)
    case "failed":
      return handlers.failed(state.error, state.trace)
    default:
      return unhandled(state)
  }
}

export function matchMutationState<T, R>(
  state: MutationState<T>,
  handlers: MutationStateHandlers<T, R>,
): R {
  switch (state.status) {
    case "idle":
      return handlers.idle()
    case "running":
      return handlers.running()
    case "completed":
      return handlers.completed(state.value)
    case "failed":
      return handlers.failed(state.error, state.trace)
    default:
      return unhandled(state)
  }
}

/**
 * Like {@link matchQueryState}, but while `running` it may show the previous
 * outcome instead, per `policy`.
 */
export function whenQueryState<T, R>(
  state: QueryState<T>,
  handlers: QueryStateHandlers<T, R>,
  policy: VisibilityPolicy = {},
): R {
  const {
    skipRunningAfterSuccess = defaultVisibility.skipRunningAfterSuccess,
    skipRunningAfterFailure = defaultVisibility.skipRunningAfterFailure,
  } = policy

  let visible = state
  const previous = state.status === "running" ? state.previousState : null

  if (previous?.status === "failed" && skipRunningAfterFailure) {
    visible = previous
  } else if (previous?.status === "completed" && skipRunningAfterSuccess) {
    visible = previous
  }

  return matchQueryState(visible, handlers)
}

export function isIdle<T>(state: ObservedState<T>): boolean {
  return state.status === "idle"
}

export function isRunning<T>(state: ObservedState<T>): boolean {
  return state.status === "running"
}

export function hasValue<S extends ObservedState<unknown>>(
  state: S,
): state is Extract<S, { status: "completed" }> {
  return state.status === "completed"
}

export function hasFailed<S extends ObservedState<unknown>>(
  state: S,
): state is Extract<S, { status: "failed" }> {
  return state.status === "failed"
}

export function valueOf<T>(state: ObservedState<T>): T | undefined {
  return state.status === "completed" ? state.value : undefined
}

export function errorOf<T>(state: ObservedState<T>): unknown {
  return state.status === "failed" ? state.error : undefined
}

/** The error's own stack when it has one, otherwise a stack captured here. */
export function captureTrace(error: unknown): string {
  if (error instanceof Error && error.stack) return error.stack

  return new Error("Trace captured at failure site").stack ?? ""
}
