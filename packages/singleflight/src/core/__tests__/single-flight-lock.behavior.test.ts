import type { Logger } from "@supersede/logger"
import { createDeferred } from "../deferred"
import { SingleFlightLock } from "../single-flight-lock"
import { type Mock, mockLogger } from "../../tests/mock"
import { flush } from "../../tests/utils/sleep"

describe("SingleFlightLock behavior", () => {
  let logger: Mock<Logger>

  beforeEach(() => {
    logger = mockLogger()
  })

  it("scopes its logger to the lock name", () => {
    new SingleFlightLock({ name: "search" }, { logger })

    expect(logger.child).toHaveBeenCalledWith({ lock: "search" })
  })

  it("falls back to an anonymous lock name", () => {
    new SingleFlightLock({}, { logger })

    expect(logger.child).toHaveBeenCalledWith({ lock: "anonymous" })
  })

  it("numbers tokens per lock, starting at 1", async () => {
    const lock = new SingleFlightLock()
    const ids: number[] = []

    await lock.submit(async (token) => ids.push(token.id))
    await lock.submit(async (token) => ids.push(token.id))
    await lock.submit(async (token) => ids.push(token.id))

    expect(ids).toEqual([1, 2, 3])
  })

  it("logs submissions and supersessions at debug", async () => {
    const lock = new SingleFlightLock({ name: "search" }, { logger })
    const gate = createDeferred<void>()

    const first = lock.submit(() => gate.promise)
    const second = lock.submit(async () => {})

    expect(logger.debug).toHaveBeenCalledWith("Task submitted", { taskId: 1, queued: false })
    expect(logger.debug).toHaveBeenCalledWith("Cancelling active task", { taskId: 1 })
    expect(logger.debug).toHaveBeenCalledWith("Task submitted", { taskId: 2, queued: true })

    gate.resolve()
    await Promise.all([first, second])
  })

  it("logs a failing cleanup callback at warn and keeps going", async () => {
    const lock = new SingleFlightLock({}, { logger })
    const gate = createDeferred<void>()
    const failure = new Error("cleanup failed")
    const later = vi.fn()

    const first = lock.submit(async (token) => {
      token.onCancel(() => {
        throw failure
      })
      token.onCancel(later)
      await gate.promise
    })
    const second = lock.submit(async () => {})

    expect(logger.warn).toHaveBeenCalledWith("Cancel callback failed", { taskId: 1, err: failure })
    expect(later).toHaveBeenCalledOnce()

    gate.resolve()
    await Promise.all([first, second])
  })

  it("detaches a superseded task so its late rejection is only logged", async () => {
    const lock = new SingleFlightLock({}, { logger })
    const gate = createDeferred<void>()
    const failure = new Error("stale failure")

    lock.submit(async () => {
      await gate.promise
      throw failure
    })
    const second = lock.submit(async () => "fresh")

    gate.resolve()
    await expect(second).resolves.toBe("fresh")
    await flush()

    expect(logger.debug).toHaveBeenCalledWith("Superseded task rejected", {
      taskId: 1,
      err: failure,
    })
  })
})
