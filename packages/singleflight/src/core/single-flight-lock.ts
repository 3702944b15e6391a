import { createNullLogger, type Logger } from "@supersede/logger"

import type { CancellationToken } from "../ports/cancellation-token"
import type {
  ISingleFlightLock,
  SingleFlightLockOptions,
  TaskBody,
} from "../ports/single-flight-lock"
import { detach } from "./detach"
import { Mutex } from "./mutex"
import { TaskToken } from "./task-token"

export type SingleFlightLockDeps = {
  logger?: Logger
}

export class SingleFlightLock implements ISingleFlightLock {
  private readonly mutex = new Mutex()
  private readonly logger: Logger
  private active: TaskToken | null = null
  private nextTaskId = 1

  constructor(options: SingleFlightLockOptions = {}, deps: SingleFlightLockDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ lock: options.name ?? "anonymous" })
  }

  get activeToken(): CancellationToken | null {
    return this.active
  }

  submit<R>(body: TaskBody<R>): Promise<R> {
    this.supersede()

    const taskId = this.nextTaskId++
    const token = new TaskToken(taskId, (err) => {
      this.logger.warn("Cancel callback failed", { taskId, err })
    })
    this.active = token

    this.logger.debug("Task submitted", { taskId, queued: this.mutex.isLocked })

    const result = this.mutex.runExclusive(async () => {
      try {
        token.guard()
        return await body(token)
      } finally {
        if (this.active === token) this.active = null
      }
    })

    token.onCancel(() => {
      detach(result, (err) => {
        this.logger.debug("Superseded task rejected", { taskId, err })
      })
    })

    return result
  }

  cancel(): void {
    this.supersede()
  }

  private supersede(): void {
    const previous = this.active
    if (previous === null) return

    this.active = null
    this.logger.debug("Cancelling active task", { taskId: previous.id })
    previous.cancel()
  }
}

export function createSingleFlightLock(
  options?: SingleFlightLockOptions,
  deps?: SingleFlightLockDeps,
): ISingleFlightLock {
  return new SingleFlightLock(options, deps)
}
