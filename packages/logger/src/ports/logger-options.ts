import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Entries below this level are dropped: "info" hides "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Emitted as `name` on every entry, e.g. the application embedding the loader.
   */
  name?: string

  /** Human-readable output for local development instead of JSON lines. */
  prettify?: boolean
}
