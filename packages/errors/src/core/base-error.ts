import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Root of every error raised by the loader packages. Branch on `code`;
 * `message` is meant for people.
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(
    message: string,
    { code, context = {}, cause, isRetryable = false, isOperational = true }: BaseErrorOptions<C>,
  ) {
    super(message, cause === undefined ? undefined : { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isRetryable = isRetryable
    this.isOperational = isOperational
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
