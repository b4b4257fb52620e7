export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels, pino's numbering. Higher is more severe.
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

const namesByLevel = new Map<number, LogLevelName>(
  Object.values(LogLevels).map((level, i) => [level, logLevelNames[i] ?? "info"]),
)

/**
 * Name of the numeric `level` found in a JSON log line, if it is a known one.
 */
export function logLevelName(level: number): LogLevelName | undefined {
  return namesByLevel.get(level)
}
