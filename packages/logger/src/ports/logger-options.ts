import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Structured JSON otherwise.
   */
  prettify?: boolean
}
