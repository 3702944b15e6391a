import { createNullLogger, type Logger } from "@supersede/logger"
import {
  CancelledError,
  type CancellationToken,
  createDeferred,
  isCancelledError,
  SingleFlightLock,
} from "@supersede/single-flight"

import type { Listener } from "../ports/observable"
import type { StateMachineDeps, StateMachineOptions } from "../ports/options"
import type { ObservedState } from "../ports/state"
import { DisposedError } from "./errors"
import { ObservableValue } from "./observable-value"
import { captureTrace, clearPreviousState } from "./state"

type PendingRun = { reject: (error: unknown) => void }

/**
 * Runs an async function through a single-flight lock and publishes its
 * progress as an observable state.
 *
 * Only the latest run may write: a superseded run's writes are dropped, and
 * so is every write after {@link dispose}. Subclasses decide how states are
 * built and what a run executes.
 */
export abstract class ObservableStateMachine<
  Result,
  Args,
  State extends ObservedState<Result>,
> {
  readonly name: string

  protected readonly logger: Logger

  private readonly observable: ObservableValue<State>
  private readonly lock: SingleFlightLock
  private readonly pendingRuns = new Set<PendingRun>()
  /** Token of the run that wrote each published state. */
  private readonly writers = new WeakMap<ObservedState<Result>, CancellationToken>()
  private disposed = false
  private nextRunId = 1

  protected constructor(
    initialState: State,
    options: StateMachineOptions = {},
    deps: StateMachineDeps = {},
  ) {
    this.name = options.name ?? "anonymous"
    this.logger = (deps.logger ?? createNullLogger()).child({ machine: this.name })
    this.observable = new ObservableValue(initialState)
    this.lock = new SingleFlightLock({ name: this.name }, deps)
  }

  protected abstract buildRunning(outgoing: State): State
  protected abstract buildCompleted(outgoing: State, value: Result): State
  protected abstract buildFailed(outgoing: State, error: unknown, trace: string): State
  protected abstract execute(args: Args, token: CancellationToken): Promise<Result>

  get state(): State {
    return this.observable.value
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  addListener(listener: Listener<State>): () => void {
    return this.observable.addListener(listener)
  }

  removeListener(listener: Listener<State>): void {
    this.observable.removeListener(listener)
  }

  /**
   * Idempotent. Rejects every pending run with {@link DisposedError} and stops
   * notifying listeners. A body already executing keeps running; its writes
   * are dropped.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true

    const pending = [...this.pendingRuns]
    this.pendingRuns.clear()

    for (const run of pending) {
      run.reject(new DisposedError({ machine: this.name }))
    }

    this.observable.dispose()
    this.logger.info("State machine disposed", { pendingRuns: pending.length })
  }

  /**
   * Submit a run, superseding the one in flight.
   *
   * The returned promise settles once: with the value or the original error
   * this run published, with `CancelledError` when a newer run superseded it,
   * or with `DisposedError` when the machine was disposed first.
   */
  protected internalRun(args: Args): Promise<Result> {
    if (this.disposed) {
      this.logger.debug("Run ignored, state machine disposed")
      return Promise.reject(new DisposedError({ machine: this.name }))
    }

    const runId = this.nextRunId++
    const logger = this.logger.child({ runId })
    const result = createDeferred<Result>()
    const tokens: CancellationToken[] = []
    let settled = false

    const settle = (finish: () => void) => {
      if (settled) return
      settled = true
      stopObserving()
      this.pendingRuns.delete(pending)
      finish()
    }

    const pending: PendingRun = {
      reject: (error) => settle(() => result.reject(error)),
    }

    // Ownership is fixed at write time: a listener notified earlier may
    // already have superseded this run by the time this one sees the state.
    const stopObserving = this.observable.addListener((state) => {
      const token = tokens[0]
      if (token === undefined || this.writers.get(state) !== token) return

      const observed: ObservedState<Result> = state
      if (observed.status === "completed") {
        settle(() => result.resolve(observed.value))
      } else if (observed.status === "failed") {
        pending.reject(observed.error)
      }
    })

    this.pendingRuns.add(pending)

    const unobserved = () => {
      pending.reject(
        this.disposed
          ? new DisposedError({ machine: this.name })
          : new CancelledError({ machine: this.name, runId }),
      )
    }

    void this.lock
      .submit((token) => {
        tokens.push(token)
        return this.runBody(args, token, logger)
      })
      .then(unobserved, unobserved)

    return result.promise
  }

  private async runBody(args: Args, token: CancellationToken, logger: Logger): Promise<Result> {
    token.guard()
    this.write(token, logger, (outgoing) => this.buildRunning(outgoing))

    let value: Result
    try {
      value = await token.wait(() => this.execute(args, token))
    } catch (error) {
      if (isCancelledError(error) && token.isCancelled) throw error

      logger.warn("Run failed", { err: error })
      this.write(token, logger, (outgoing) =>
        this.buildFailed(outgoing, error, captureTrace(error)),
      )
      throw error
    }

    this.write(token, logger, (outgoing) => this.buildCompleted(outgoing, value))
    return value
  }

  /**
   * Publish a state built from the current one, unless the run was superseded
   * or the machine disposed. The outgoing state loses its own history link.
   */
  private write(token: CancellationToken, logger: Logger, build: (outgoing: State) => State): void {
    if (this.disposed || token.isCancelled) {
      logger.debug("State write dropped", { reason: this.disposed ? "disposed" : "cancelled" })
      return
    }

    const outgoing = this.observable.value
    const next = build(outgoing)
    clearPreviousState(outgoing)

    this.writers.set(next, token)
    logger.debug("State transition", { status: next.status })

    try {
      this.observable.value = next
    } catch (err) {
      logger.error("State listener failed", { err })
    }
  }
}
