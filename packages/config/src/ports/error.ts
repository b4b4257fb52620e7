export type ConfigErrorCode = "invalid_options" | "unknown_key" | "parse_failed"

/** Offending key, file, format and similar details. */
export type ErrorContext = Readonly<Record<string, unknown>>
