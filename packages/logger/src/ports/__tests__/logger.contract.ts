import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const machine = logger.child({ machine: "profile" })
      const run = machine.child({ runId: 3 })

      run.info("transition")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ machine: "profile", runId: 3 })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ machine: "profile" }).child({ machine: "settings" })

      child.info("transition")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.machine).toBe("settings")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ lock: "search" })
      const child = parent.child({ taskId: 1 })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ lock: "search" })
      expect(logs[0]?.payload).not.toHaveProperty("taskId")
      expect(logs[1]?.payload).toMatchObject({ lock: "search", taskId: 1 })

      clear()
      expect(read()).toHaveLength(0)
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ status: "running" })
      scoped.info("transition", { status: "completed" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.status).toBe("completed")
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
