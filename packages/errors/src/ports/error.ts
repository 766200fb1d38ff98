export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error, such as the file or cloud name
 * involved, kept apart from the message text.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable code for programmatic handling, e.g. `clouds_parse_failed`. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call could succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (missing file, bad input, unknown
   * name); `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause.
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
