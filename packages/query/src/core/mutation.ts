import { type CancellationToken, detach } from "@supersede/single-flight"

import type { StateMachineDeps, StateMachineOptions } from "../ports/options"
import type { MutationState, MutationStateHandlers } from "../ports/state"
import { InvalidRetryError } from "./errors"
import { ObservableStateMachine } from "./observable-state-machine"
import {
  completedState,
  failedState,
  idleState,
  lastSettled,
  matchMutationState,
  runningState,
} from "./state"

export type MutationFn<Result, Args> = (args: Args, token: CancellationToken) => Promise<Result>

/**
 * Runs a user-triggered action. Starts `idle` and only runs on {@link run}.
 * The last arguments are kept for {@link retry}.
 */
export class Mutation<Result, Args = void> extends ObservableStateMachine<
  Result,
  Args,
  MutationState<Result>
> {
  private lastArgs: { args: Args } | null = null

  constructor(
    private readonly fn: MutationFn<Result, Args>,
    options: StateMachineOptions = {},
    deps: StateMachineDeps = {},
  ) {
    super(idleState<MutationState<Result>>(), options, deps)
  }

  /** `true` once {@link run} or {@link runAndAwait} was called, even with `undefined` args. */
  get hasRun(): boolean {
    return this.lastArgs !== null
  }

  /** Fire-and-forget run, superseding any run in flight. */
  run(args: Args): void {
    this.lastArgs = { args }
    detach(this.internalRun(args))
  }

  /**
   * Run again with the last arguments.
   * @throws {InvalidRetryError} when the mutation has never run
   */
  retry(): void {
    if (this.lastArgs === null) {
      throw new InvalidRetryError({ machine: this.name })
    }
    detach(this.internalRun(this.lastArgs.args))
  }

  runAndAwait(args: Args): Promise<Result> {
    this.lastArgs = { args }
    return this.internalRun(args)
  }

  /** Rejects with {@link InvalidRetryError} when the mutation has never run. */
  retryAndAwait(): Promise<Result> {
    if (this.lastArgs === null) {
      return Promise.reject(new InvalidRetryError({ machine: this.name }))
    }
    return this.internalRun(this.lastArgs.args)
  }

  match<R>(handlers: MutationStateHandlers<Result, R>): R {
    return matchMutationState(this.state, handlers)
  }

  protected execute(args: Args, token: CancellationToken): Promise<Result> {
    return this.fn(args, token)
  }

  protected buildRunning(outgoing: MutationState<Result>): MutationState<Result> {
    return runningState(lastSettled(outgoing))
  }

  protected buildCompleted(outgoing: MutationState<Result>, value: Result): MutationState<Result> {
    return completedState(value, outgoing)
  }

  protected buildFailed(
    outgoing: MutationState<Result>,
    error: unknown,
    trace: string,
  ): MutationState<Result> {
    return failedState(error, trace, outgoing)
  }
}
