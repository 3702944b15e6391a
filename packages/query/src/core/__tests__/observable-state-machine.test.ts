import type { Logger } from "@supersede/logger"
import { createDeferred } from "@supersede/single-flight"
import type { MutationState } from "../../ports/state"
import { DisposedError } from "../errors"
import { Mutation } from "../mutation"
import { type Mock, mockLogger } from "../../tests/mock"
import { flush } from "../../tests/utils/sleep"

describe("ObservableStateMachine", () => {
  describe("history", () => {
    it("keeps at most one level of previous state", async () => {
      const mutation = new Mutation(async (n: number) => {
        if (n < 0) throw new Error("negative")
        return n
      })
      const seen: MutationState<number>[] = []
      mutation.addListener((state) => seen.push(state))

      await mutation.runAndAwait(1)
      await mutation.runAndAwait(2)
      await mutation.runAndAwait(-1).catch(() => {})
      await mutation.runAndAwait(3)

      expect(seen.map((s) => s.status)).toEqual([
        "running",
        "completed",
        "running",
        "completed",
        "running",
        "failed",
        "running",
        "completed",
      ])
      for (const state of seen) {
        expect(state.previousState?.previousState ?? null).toBeNull()
      }
    })

    it("links running to the last outcome and the outcome to running", async () => {
      const mutation = new Mutation(async (n: number) => n)
      await mutation.runAndAwait(1)
      await flush()
      const first = mutation.state

      const second = mutation.runAndAwait(2)
      const running = mutation.state

      expect(running.status).toBe("running")
      expect(running.previousState).toBe(first)

      await second

      expect(mutation.state.previousState).toBe(running)
      expect(running.previousState).toBeNull()
    })
  })

  describe("listeners", () => {
    it("notifies on every transition until unsubscribed", async () => {
      const mutation = new Mutation(async (n: number) => n)
      const listener = vi.fn()
      const unsubscribe = mutation.addListener(listener)

      await mutation.runAndAwait(1)
      expect(listener).toHaveBeenCalledTimes(2)

      unsubscribe()
      await mutation.runAndAwait(2)
      expect(listener).toHaveBeenCalledTimes(2)
    })

    it("stops notifying after removeListener", async () => {
      const mutation = new Mutation(async (n: number) => n)
      const listener = vi.fn()
      mutation.addListener(listener)
      mutation.removeListener(listener)

      await mutation.runAndAwait(1)

      expect(listener).not.toHaveBeenCalled()
    })

    it("logs a throwing listener without failing the run", async () => {
      const logger = mockLogger()
      const mutation = new Mutation(async (n: number) => n, {}, { logger })
      const failure = new Error("render failed")
      mutation.addListener(() => {
        throw failure
      })

      await expect(mutation.runAndAwait(4)).resolves.toBe(4)
      expect(mutation.state).toMatchObject({ status: "completed", value: 4 })
      expect(logger.error).toHaveBeenCalledWith("State listener failed", { err: failure })
    })
  })

  describe("dispose", () => {
    it("rejects pending runs immediately and drops the late result", async () => {
      const gate = createDeferred<number>()
      const mutation = new Mutation(() => gate.promise)
      const listener = vi.fn()
      mutation.addListener(listener)

      const pending = mutation.runAndAwait()
      expect(mutation.state.status).toBe("running")

      mutation.dispose()
      await expect(pending).rejects.toBeInstanceOf(DisposedError)

      gate.resolve(7)
      await flush()

      expect(mutation.state.status).toBe("running")
      expect(listener).toHaveBeenCalledOnce()
    })

    it("is idempotent", () => {
      const mutation = new Mutation(async () => 1)

      mutation.dispose()

      expect(() => mutation.dispose()).not.toThrow()
      expect(mutation.isDisposed).toBe(true)
    })

    it("does not cancel the body already running", async () => {
      const gate = createDeferred<void>()
      const finished = vi.fn()
      const mutation = new Mutation(async () => {
        await gate.promise
        finished()
        return 1
      })

      mutation.run()
      mutation.dispose()
      gate.resolve()
      await flush()

      expect(finished).toHaveBeenCalledOnce()
    })
  })

  describe("logging", () => {
    let logger: Mock<Logger>

    beforeEach(() => {
      logger = mockLogger()
    })

    it("scopes entries to the machine and the run", async () => {
      const mutation = new Mutation(async (n: number) => n * 2, { name: "double" }, { logger })

      await mutation.runAndAwait(2)

      expect(logger.child).toHaveBeenCalledWith({ machine: "double" })
      expect(logger.child).toHaveBeenCalledWith({ lock: "double" })
      expect(logger.child).toHaveBeenCalledWith({ runId: 1 })
    })

    it("logs each transition at debug", async () => {
      const mutation = new Mutation(async (n: number) => n, {}, { logger })

      await mutation.runAndAwait(2)

      expect(logger.debug).toHaveBeenCalledWith("State transition", { status: "running" })
      expect(logger.debug).toHaveBeenCalledWith("State transition", { status: "completed" })
    })

    it("logs a failed run at warn", async () => {
      const failure = new Error("rejected by server")
      const mutation = new Mutation<number, number>(
        async () => {
          throw failure
        },
        {},
        { logger },
      )

      await expect(mutation.runAndAwait(1)).rejects.toBe(failure)

      expect(logger.warn).toHaveBeenCalledWith("Run failed", { err: failure })
      expect(logger.debug).toHaveBeenCalledWith("State transition", { status: "failed" })
    })

    it("logs disposal at info and writes dropped afterwards at debug", async () => {
      const gate = createDeferred<number>()
      const mutation = new Mutation(() => gate.promise, {}, { logger })

      const pending = mutation.runAndAwait()
      mutation.dispose()
      await expect(pending).rejects.toBeInstanceOf(DisposedError)

      gate.resolve(1)
      await flush()

      expect(logger.info).toHaveBeenCalledWith("State machine disposed", { pendingRuns: 1 })
      expect(logger.debug).toHaveBeenCalledWith("State write dropped", { reason: "disposed" })
    })

    it("logs runs refused after disposal", async () => {
      const mutation = new Mutation(async () => 1, {}, { logger })
      mutation.dispose()

      mutation.run()
      await flush()

      expect(logger.debug).toHaveBeenCalledWith("Run ignored, state machine disposed")
    })
  })
})
