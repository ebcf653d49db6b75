import { BaseError } from "@cachet/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(`Configuration validation failed:\n${message}`, {
      code: "config_invalid",
      context,
      isOperational: false,
    })
  }
}
