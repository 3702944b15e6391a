import type { Logger } from "@supersede/logger"

export type StateMachineOptions = {
  /**
   * Name used in log context and error context.
   * @default "anonymous"
   */
  name?: string
}

export type StateMachineDeps = {
  logger?: Logger
}

/**
 * Controls whether a `running` state shows the previous outcome instead,
 * so a restart does not flash a loading indicator.
 */
export type VisibilityPolicy = {
  /** @default false */
  skipRunningAfterSuccess?: boolean
  /** @default true */
  skipRunningAfterFailure?: boolean
}

export type QueryOptions = StateMachineOptions & {
  /** Default policy for `Query.when()`. */
  visibility?: VisibilityPolicy
}
