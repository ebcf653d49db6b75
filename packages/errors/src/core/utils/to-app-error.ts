import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

export type ToAppErrorOptions = Readonly<{
  /** Code given to anything that is not already a {@link BaseError}. */
  fallbackCode?: ErrorCode

  /** Merged into the context of a wrapped value. */
  context?: ErrorContext
}>

/**
 * Normalises a caught value for logging.
 *
 * A {@link BaseError} is returned as is. An `Error` becomes the `cause` of a
 * non-operational wrapper; any other value lands in `context.value`.
 */
export function toAppError(err: unknown, options: ToAppErrorOptions = {}): AppError {
  if (err instanceof BaseError) return err

  const code = options.fallbackCode ?? "unknown"
  const context = options.context ?? {}

  if (err instanceof Error) {
    return new BaseError(err.message, { code, context, cause: err, isOperational: false })
  }

  if (typeof err === "string") {
    return new BaseError(err, { code, context, isOperational: false })
  }

  return new BaseError("Unknown error", {
    code,
    context: { ...context, value: err },
    isOperational: false,
  })
}
