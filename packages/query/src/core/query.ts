import { type CancellationToken, detach } from "@supersede/single-flight"

import type { QueryOptions, StateMachineDeps, VisibilityPolicy } from "../ports/options"
import type { QueryState, QueryStateHandlers } from "../ports/state"
import { ObservableStateMachine } from "./observable-state-machine"
import {
  completedState,
  defaultVisibility,
  failedState,
  lastSettled,
  runningState,
  whenQueryState,
} from "./state"

export type QueryFn<Result> = (token: CancellationToken) => Promise<Result>

/**
 * Loads a value as soon as it is created, and again on every
 * {@link restart}. Starts out `running`; never `idle`.
 *
 * @example
 * ```ts
 * const profile = new Query((token) => api.getProfile({ signal: token.signal }))
 *
 * profile.addListener(() => {
 *   render(profile.when({
 *     running: () => "Loading...",
 *     completed: (p) => p.name,
 *     failed: (err) => `Failed: ${String(err)}`,
 *   }))
 * })
 * ```
 */
export class Query<Result> extends ObservableStateMachine<Result, void, QueryState<Result>> {
  private readonly visibility: Required<VisibilityPolicy>

  constructor(
    private readonly fn: QueryFn<Result>,
    options: QueryOptions = {},
    deps: StateMachineDeps = {},
  ) {
    super(runningState<QueryState<Result>>(null), options, deps)
    this.visibility = { ...defaultVisibility, ...options.visibility }
    this.restart()
  }

  /** Fire-and-forget re-run, superseding any run in flight. */
  restart(): void {
    detach(this.internalRun())
  }

  restartAndAwait(): Promise<Result> {
    return this.internalRun()
  }

  /**
   * Match the current state, showing the previous outcome while `running`
   * when the visibility policy says so. `policy` overrides the query's defaults.
   */
  when<R>(handlers: QueryStateHandlers<Result, R>, policy?: VisibilityPolicy): R {
    return whenQueryState(this.state, handlers, { ...this.visibility, ...policy })
  }

  protected execute(_args: void, token: CancellationToken): Promise<Result> {
    return this.fn(token)
  }

  protected buildRunning(outgoing: QueryState<Result>): QueryState<Result> {
    return runningState(lastSettled(outgoing))
  }

  protected buildCompleted(outgoing: QueryState<Result>, value: Result): QueryState<Result> {
    return completedState(value, outgoing)
  }

  protected buildFailed(
    outgoing: QueryState<Result>,
    error: unknown,
    trace: string,
  ): QueryState<Result> {
    return failedState(error, trace, outgoing)
  }
}
