export type ErrorCode = Lowercase<string>

/**
 * Codes raised by the locale loading engine.
 */
export type LoaderErrorCode =
  | "unknown_locale"
  | "malformed_resource"
  | "producer_rejection"
  | "config_validation"

/**
 * Structured metadata attached to errors (locale codes, source keys, received types).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the activation might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing locale, bad resource file),
   * `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON.stringify-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
