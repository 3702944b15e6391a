import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

function discard(..._args: unknown[]): void {}

/** Drops every entry. Components fall back to it when no logger is injected. */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly trace = discard
  readonly debug = discard
  readonly info = discard
  readonly warn = discard
  readonly error = discard
  readonly fatal = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

export function createNullLogger<
  TContext extends LogContext = LogContext,
>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
