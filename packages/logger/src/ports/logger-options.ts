import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every Logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off where logs are shipped
   * as JSON lines.
   */
  prettify?: boolean
}
