export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (keys, limits, offending values).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call later might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures the caller can handle (a backend
   * timeout, an expiry that cannot be represented), `false` for misuse of an
   * API or a broken invariant.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by log serializers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
