export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to a failure (status codes, syscall names, etc.).
 * Frozen at construction.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (a refused connection, a missing
   * credential, a malformed payload), `false` for programmer errors.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying failure, absent when the error is a leaf.
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe shape produced by `serializeError`.
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
