export type LogContext = {
  service: string
  module: string
  env: string

  /** Locale code an activation or preload is working on */
  locale: string

  /** Cache key of the resource source (absolute path or inline label) */
  source: string

  /** Monotonic activation sequence number */
  activation: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
