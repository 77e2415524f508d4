import type { ErrorContext, LoaderErrorCode } from "../ports/error"
import { BaseError } from "./base-error"

type LoaderErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

export class UnknownLocaleError extends BaseError<"unknown_locale"> {
  readonly locale: string

  constructor(locale: string, known: readonly string[] = []) {
    super(`No locale descriptor is declared for '${locale}'`, {
      code: "unknown_locale",
      context: { locale, known: [...known] },
    })
    this.locale = locale
  }
}

/**
 * A producer resolved to something other than a key/value mapping.
 */
export class MalformedResourceError extends BaseError<"malformed_resource"> {
  constructor(source: string, received: string, options: LoaderErrorOptions = {}) {
    super(`Resource '${source}' resolved to ${received}, expected an object`, {
      code: "malformed_resource",
      context: { ...options.context, source, received },
      cause: options.cause,
    })
  }
}

export class ProducerRejectionError extends BaseError<"producer_rejection"> {
  constructor(source: string, options: LoaderErrorOptions = {}) {
    super(`Resource '${source}' could not be produced`, {
      code: "producer_rejection",
      context: { ...options.context, source },
      cause: options.cause,
      isRetryable: true,
    })
  }
}

export class ConfigValidationError extends BaseError<"config_validation"> {
  constructor(details: string, options: LoaderErrorOptions = {}) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_validation",
      context: options.context,
      cause: options.cause,
    })
  }
}

export type LoaderError =
  | UnknownLocaleError
  | MalformedResourceError
  | ProducerRejectionError
  | ConfigValidationError

const LOADER_CODES: ReadonlySet<string> = new Set<LoaderErrorCode>([
  "unknown_locale",
  "malformed_resource",
  "producer_rejection",
  "config_validation",
])

export function isLoaderError(err: unknown): err is LoaderError {
  return err instanceof BaseError && LOADER_CODES.has(err.code)
}

/**
 * Short, log-friendly description of a value's runtime shape.
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}
