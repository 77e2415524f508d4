import { BaseError } from "../base-error"
import {
  ConfigValidationError,
  describeValue,
  isLoaderError,
  MalformedResourceError,
  ProducerRejectionError,
  UnknownLocaleError,
} from "../loader-errors"

describe("loader errors", () => {
  it("UnknownLocaleError carries the requested and known locales", () => {
    const err = new UnknownLocaleError("xx", ["en", "es"])

    expect(err.code).toBe("unknown_locale")
    expect(err.locale).toBe("xx")
    expect(err.message).toBe("No locale descriptor is declared for 'xx'")
    expect(err.context).toEqual({ locale: "xx", known: ["en", "es"] })
    expect(err.name).toBe("UnknownLocaleError")
  })

  it("MalformedResourceError names the source and received type", () => {
    const err = new MalformedResourceError("inline#1", "string", {
      context: { locale: "es" },
    })

    expect(err.code).toBe("malformed_resource")
    expect(err.message).toBe("Resource 'inline#1' resolved to string, expected an object")
    expect(err.context).toEqual({ locale: "es", source: "inline#1", received: "string" })
    expect(err.isRetryable).toBe(false)
  })

  it("ProducerRejectionError is retryable and keeps its cause", () => {
    const cause = new Error("socket hang up")
    const err = new ProducerRejectionError("remote", { cause })

    expect(err.code).toBe("producer_rejection")
    expect(err.isRetryable).toBe(true)
    expect(err.cause).toBe(cause)
  })

  it("ConfigValidationError prefixes the details", () => {
    const err = new ConfigValidationError("✖ Invalid input\n  → at locales")

    expect(err.code).toBe("config_validation")
    expect(err.message).toBe("Configuration validation failed:\n✖ Invalid input\n  → at locales")
  })

  describe("isLoaderError", () => {
    it("accepts every loader error kind", () => {
      expect(isLoaderError(new UnknownLocaleError("xx"))).toBe(true)
      expect(isLoaderError(new MalformedResourceError("a", "number"))).toBe(true)
      expect(isLoaderError(new ProducerRejectionError("a"))).toBe(true)
      expect(isLoaderError(new ConfigValidationError("bad"))).toBe(true)
    })

    it("rejects other errors", () => {
      expect(isLoaderError(new BaseError("x", { code: "other" }))).toBe(false)
      expect(isLoaderError(new Error("x"))).toBe(false)
      expect(isLoaderError("unknown_locale")).toBe(false)
    })
  })

  it("describeValue distinguishes null and arrays from objects", () => {
    expect(describeValue(null)).toBe("null")
    expect(describeValue([1])).toBe("array")
    expect(describeValue("x")).toBe("string")
    expect(describeValue(() => ({}))).toBe("function")
    expect(describeValue(undefined)).toBe("undefined")
  })
})
