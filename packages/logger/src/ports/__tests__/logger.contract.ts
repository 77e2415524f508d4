import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, entries } = h.create()

      const child = logger.child({ module: "lazy-loader" }).child({ locale: "es" })

      child.info("activated")

      const logs = entries()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.msg).toBe("activated")
      expect(logs[0]?.fields).toMatchObject({ module: "lazy-loader", locale: "es" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, entries } = h.create()

      logger.child({ locale: "es" }).child({ locale: "es-AR" }).info("activated")

      expect(entries()[0]?.fields.locale).toBe("es-AR")
    })

    it("child() does not mutate the parent", () => {
      const { logger, entries } = h.create()

      const parent = logger.child({ module: "cache" })
      const child = parent.child({ source: "/locales/es.json" })

      parent.info("parent")
      child.info("child")

      const logs = entries()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.fields).not.toHaveProperty("source")
      expect(logs[1]?.fields).toMatchObject({ module: "cache", source: "/locales/es.json" })
    })

    it("per-call meta overrides context", () => {
      const { logger, entries } = h.create()

      logger.child({ locale: "es" }).info("hello", { locale: "fr" })

      expect(entries()[0]?.fields.locale).toBe("fr")
    })

    it("suppresses entries below the configured level", () => {
      const { logger, entries } = h.create("warn")

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(entries().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
