import { logLevelNames } from "../../../ports/log-level"
import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it.each(logLevelNames)("%s() accepts entries and discards them", (level) => {
    const logger = new NullLogger()

    expect(() => logger[level]("Locale activated", { locale: "es", err: new Error("x") })).not.toThrow()
  })

  it("stays silent through child loggers", () => {
    const child = createNullLogger().child({ module: "lazy-loader" }).child({ activation: 1 })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
