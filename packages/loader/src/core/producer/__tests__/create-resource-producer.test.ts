import {
  MalformedResourceError,
  ProducerRejectionError,
} from "@lazyglot/errors"
import { mock } from "vitest-mock-extended"
import type { FileResolver } from "../../../ports/file-resolver"
import { fileRef, inlineRef } from "../../../ports/resource-ref"
import { createResourceProducerFactory } from "../create-resource-producer"

describe("createResourceProducerFactory", () => {
  function setup() {
    const files = mock<FileResolver>()
    const context = { tenant: "acme" }
    const producers = createResourceProducerFactory({ files, context })

    return { files, context, producers }
  }

  describe("inline sources", () => {
    it("yields a static object as-is", async () => {
      const { producers } = setup()
      const messages = { hello: "Hola" }

      const producer = producers(inlineRef(messages))

      expect(producer.key).toBe(messages)
      expect(producer.label).toBe("inline:object")
      expect(producer.cacheable).toBe(true)
      await expect(producer.produce("es")).resolves.toBe(messages)
    })

    it("calls a sync function with the context and locale", async () => {
      const { producers, context } = setup()
      const fn = vi.fn(() => ({ hello: "Hola" }))

      const producer = producers(inlineRef(fn))

      expect(fn).not.toHaveBeenCalled()
      await expect(producer.produce("es")).resolves.toEqual({ hello: "Hola" })
      expect(fn).toHaveBeenCalledWith(context, "es")
      expect(producer.key).toBe(fn)
    })

    it("awaits an async function", async () => {
      const { producers } = setup()
      const remote = async () => ({ nav: { home: "Inicio" } })

      const producer = producers(inlineRef(remote))

      expect(producer.label).toBe("inline:remote")
      await expect(producer.produce("es")).resolves.toEqual({ nav: { home: "Inicio" } })
    })

    it("defaults the context to an empty object", async () => {
      const producers = createResourceProducerFactory({ files: mock<FileResolver>() })
      const fn = vi.fn(() => ({}))

      await producers(inlineRef(fn)).produce("en")

      expect(fn).toHaveBeenCalledWith({}, "en")
    })

    it.each([
      ["string", () => JSON.parse('"just text"')],
      ["null", async () => JSON.parse("null")],
      ["array", () => JSON.parse('["a", "b"]')],
      ["number", async () => JSON.parse("42")],
    ])("rejects a producer that yields %s", async (received, fn) => {
      const { producers } = setup()

      const promise = producers(inlineRef(fn)).produce("es")

      await expect(promise).rejects.toBeInstanceOf(MalformedResourceError)
      await expect(promise).rejects.toMatchObject({
        code: "malformed_resource",
        context: { locale: "es", received },
      })
    })

    it("propagates an Error thrown synchronously as a rejection", async () => {
      const { producers } = setup()
      const failure = new Error("boom")
      const producer = producers(
        inlineRef(() => {
          throw failure
        }),
      )

      await expect(producer.produce("es")).rejects.toBe(failure)
    })

    it("propagates an Error rejection unchanged", async () => {
      const { producers } = setup()
      const failure = new TypeError("fetch failed")

      const producer = producers(inlineRef(() => Promise.reject(failure)))

      await expect(producer.produce("es")).rejects.toBe(failure)
    })

    it("wraps a non-Error rejection value", async () => {
      const { producers } = setup()

      const producer = producers(inlineRef(() => Promise.reject("offline")))

      const promise = producer.produce("es")

      await expect(promise).rejects.toBeInstanceOf(ProducerRejectionError)
      await expect(promise).rejects.toMatchObject({
        context: { locale: "es", reason: "offline", source: "inline:anonymous" },
      })
    })
  })

  describe("file sources", () => {
    it("reads the file through the resolver", async () => {
      const { producers, files } = setup()
      files.load.mockResolvedValue({ hello: "Hola" })

      const producer = producers(fileRef("/app/locales/es.json"))

      expect(producer.key).toBe("/app/locales/es.json")
      expect(producer.label).toBe("/app/locales/es.json")
      await expect(producer.produce("es")).resolves.toEqual({ hello: "Hola" })
      expect(files.load).toHaveBeenCalledWith("/app/locales/es.json")
    })

    it("carries the cache flag", () => {
      const { producers } = setup()

      expect(producers(fileRef("/app/locales/live.json", { cache: false })).cacheable).toBe(false)
    })

    it("wraps read failures in ProducerRejectionError", async () => {
      const { producers, files } = setup()
      const cause = Object.assign(new Error("no such file"), { code: "ENOENT" })
      files.load.mockRejectedValue(cause)

      const promise = producers(fileRef("/app/locales/es.json")).produce("es")

      await expect(promise).rejects.toBeInstanceOf(ProducerRejectionError)
      await expect(promise).rejects.toMatchObject({
        cause,
        context: { locale: "es", source: "/app/locales/es.json" },
      })
    })

    it("calls a function exported by the file", async () => {
      const { producers, files, context } = setup()
      const exported = vi.fn(async (_ctx: unknown, locale: string) => ({ lang: locale }))
      files.load.mockResolvedValue(exported)

      const result = await producers(fileRef("/app/locales/en.mjs")).produce("en")

      expect(result).toEqual({ lang: "en" })
      expect(exported).toHaveBeenCalledWith(context, "en")
    })

    it("rejects file content that is not an object", async () => {
      const { producers, files } = setup()
      files.load.mockResolvedValue("plain text")

      await expect(producers(fileRef("/app/locales/es.json")).produce("es")).rejects.toThrow(
        "Resource '/app/locales/es.json' resolved to string, expected an object",
      )
    })
  })
})
