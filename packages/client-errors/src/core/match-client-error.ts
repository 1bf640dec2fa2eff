import { ClientError } from "./client-error"
import type { ClientErrorKind, DetailOf } from "./client-error-detail"

export type ClientErrorHandlers<E extends Error, R> = {
  [K in ClientErrorKind]: (detail: DetailOf<E, K>) => R
}

/**
 * Calls the handler for the active case. Every case needs a handler, so adding
 * a case is a compile error at each call site.
 *
 * @example
 * ```ts
 * const action = matchClientError(err, {
 *   service: ({ error }) => `show ${error.name}`,
 *   service_common: () => "show message",
 *   http_dispatch: () => "retry",
 *   credentials: () => "re-authenticate",
 *   validation: () => "fix input",
 *   parse_error: () => "report",
 *   unknown: ({ response }) => `inspect ${response.status}`,
 * })
 * ```
 */
export function matchClientError<E extends Error, R>(
  err: ClientError<E>,
  handlers: ClientErrorHandlers<E, R>,
): R {
  const detail = err.detail

  switch (detail.kind) {
    case "service":
      return handlers.service(detail)
    case "service_common":
      return handlers.service_common(detail)
    case "http_dispatch":
      return handlers.http_dispatch(detail)
    case "credentials":
      return handlers.credentials(detail)
    case "validation":
      return handlers.validation(detail)
    case "parse_error":
      return handlers.parse_error(detail)
    case "unknown":
      return handlers.unknown(detail)
  }
}

export type ClientErrorOf<E extends Error, K extends ClientErrorKind> = ClientError<E> & {
  readonly detail: DetailOf<E, K>
}

export function hasKind<E extends Error, K extends ClientErrorKind>(
  err: ClientError<E>,
  kind: K,
): err is ClientErrorOf<E, K> {
  return err.detail.kind === kind
}

export function isClientError(value: unknown): value is ClientError {
  return value instanceof ClientError
}
