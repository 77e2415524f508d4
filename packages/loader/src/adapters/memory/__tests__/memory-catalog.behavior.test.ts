import { MemoryCatalog } from "../memory-catalog"

describe("MemoryCatalog", () => {
  it("starts empty", () => {
    const catalog = new MemoryCatalog()

    expect(catalog.activeLocale).toBeUndefined()
    expect(catalog.active).toBeUndefined()
    expect(catalog.installed()).toEqual([])
  })

  it("makes the last installed locale active", () => {
    const catalog = new MemoryCatalog()
    const es = { greeting: "Hola" }
    const en = { greeting: "Hello" }

    catalog.install("es", es)
    catalog.install("en", en)

    expect(catalog.activeLocale).toBe("en")
    expect(catalog.active).toBe(en)
    expect(catalog.catalog("es")).toBe(es)
    expect(catalog.installed()).toEqual(["es", "en"])
  })

  it("replaces a locale's catalog on reinstall", () => {
    const catalog = new MemoryCatalog()
    const first = { greeting: "Hola" }
    const second = { greeting: "Buenas" }

    catalog.install("es", first)
    catalog.install("en", { greeting: "Hello" })
    catalog.install("es", second)

    expect(catalog.activeLocale).toBe("es")
    expect(catalog.active).toBe(second)
    expect(catalog.installed()).toEqual(["es", "en"])
  })
})
