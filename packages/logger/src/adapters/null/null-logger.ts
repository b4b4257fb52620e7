import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const discard = (): void => {}

/**
 * Drops every entry. The default logger of `LocaleConfig`.
 */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly trace: Logger<TContext>["trace"] = discard
  readonly debug: Logger<TContext>["debug"] = discard
  readonly info: Logger<TContext>["info"] = discard
  readonly warn: Logger<TContext>["warn"] = discard
  readonly error: Logger<TContext>["error"] = discard
  readonly fatal: Logger<TContext>["fatal"] = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

export function createNullLogger<
  TContext extends LogContext = LogContext,
>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
