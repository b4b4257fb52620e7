import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One entry as written by the logger under test. */
export type CapturedLog = {
  level: LogLevelName
  message: string
  payload: Record<string, unknown>
}

export type LoggerHarness = {
  name: string
  /** Build a logger whose output can be read back. `level` defaults to "trace". */
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => CapturedLog[]
    clear: () => void
  }
}
