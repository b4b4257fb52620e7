import type { ConfigErrorCode, ErrorContext } from "../ports/error"

export type ConfigErrorOptions<C extends ConfigErrorCode = ConfigErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Raised for every fatal outcome of configuration resolution.
 *
 * - `invalid_options`: construction options rejected (eager)
 * - `unknown_key`: strict defaults violated while merging
 * - `parse_failed`: a file exists but does not hold a mapping
 *
 * `code` and `context` are own enumerable fields, so pino's `err` serializer
 * writes them next to the message.
 */
export class ConfigError<C extends ConfigErrorCode = ConfigErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  constructor(message: string, options: ConfigErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = "ConfigError"
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
  }
}

/**
 * Type guard for ConfigError, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * try {
 *   await locale.config()
 * } catch (err) {
 *   if (isConfigError(err, "unknown_key")) {
 *     logger.error("undeclared config key", { key: err.context.key })
 *   }
 * }
 * ```
 */
export function isConfigError<C extends ConfigErrorCode>(
  value: unknown,
  code?: C,
): value is ConfigError<C> {
  return value instanceof ConfigError && (code === undefined || value.code === code)
}
