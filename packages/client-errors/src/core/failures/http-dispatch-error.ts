import { BaseError, type BaseErrorOptions } from "@wirecall/errors"

export type HttpDispatchErrorOptions = Omit<BaseErrorOptions<"http_dispatch_failed">, "code">

/**
 * The transport could not complete the exchange: connection refused, reset,
 * timed out, or failed while reading the response.
 */
export class HttpDispatchError extends BaseError<"http_dispatch_failed"> {
  constructor(message: string, options: HttpDispatchErrorOptions = {}) {
    super(message, { ...options, code: "http_dispatch_failed" })
  }

  /**
   * Coerces a raw I/O fault (a socket or stream error from Node) into a
   * dispatch failure. The fault stays reachable as `cause`.
   */
  static fromIoError(err: NodeJS.ErrnoException): HttpDispatchError {
    return new HttpDispatchError(err.message, {
      cause: err,
      context: {
        ...(err.syscall !== undefined && { syscall: err.syscall }),
        ...(err.code !== undefined && { code: err.code }),
        ...(err.errno !== undefined && { errno: err.errno }),
      },
    })
  }
}

/**
 * Matches the errors Node raises for failed system calls (`ECONNRESET`,
 * `EPIPE`, `ETIMEDOUT`, ...).
 */
export function isIoError(value: unknown): value is NodeJS.ErrnoException {
  if (!(value instanceof Error)) return false
  if (!("code" in value) || typeof value.code !== "string") return false

  return (
    ("syscall" in value && typeof value.syscall === "string") ||
    ("errno" in value && typeof value.errno === "number")
  )
}
