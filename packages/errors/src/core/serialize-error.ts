import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean

  /**
   * Causes nested deeper than this are left out, which also ends cyclic
   * cause chains.
   * @default 5
   */
  maxCauseDepth?: number
}>

export function isAppError(err: unknown): err is AppError {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    "context" in err &&
    "timestamp" in err &&
    err.timestamp instanceof Date
  )
}

/**
 * Serialize any thrown value to one JSON-safe shape.
 *
 * Errors carrying a code keep it with their context; other errors get code
 * "unknown"; anything that is not an Error becomes "NonErrorThrown" with the
 * value in context.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  return serialize(err, options, options.maxCauseDepth ?? 5)
}

function serialize(err: unknown, options: SerializeOptions, depth: number): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const known = isAppError(err) ? err : undefined
  const cause =
    depth > 0 && err.cause !== undefined ? serialize(err.cause, options, depth - 1) : undefined

  return {
    name: err.name,
    code: known?.code ?? "unknown",
    message: err.message,
    context: { ...known?.context },
    isOperational: known?.isOperational ?? false,
    timestamp: (known?.timestamp ?? new Date()).toISOString(),
    ...(cause && { cause }),
    ...(options.includeStack && err.stack && { stack: err.stack }),
  }
}
