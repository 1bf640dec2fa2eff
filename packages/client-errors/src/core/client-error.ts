import { BaseError, type ErrorContext } from "@wirecall/errors"
import type { BufferedHttpResponse } from "../ports/buffered-http-response"
import type { ClientErrorDetail, ClientErrorKind } from "./client-error-detail"
import type { CredentialsError } from "./failures/credentials-error"
import { HttpDispatchError } from "./failures/http-dispatch-error"
import type { JsonParseError, XmlParseError } from "./failures/parse-errors"

/**
 * The single error type a service client rejects with.
 *
 * Whatever layer failed (transport, credential resolution, body decoding or
 * the service itself), the caller receives a `ClientError` and branches on
 * `detail.kind`:
 *
 * ```ts
 * try {
 *   await queue.sendMessage(input)
 * } catch (err) {
 *   if (isClientError(err) && hasKind(err, "http_dispatch")) {
 *     // transport failure; err.detail.error is the HttpDispatchError
 *   }
 *   throw err
 * }
 * ```
 *
 * Instances are frozen. `code` always equals `detail.kind`.
 *
 * The factories for failures that cannot carry a service error return
 * `ClientError<never>`, which is assignable to `ClientError<E>` for any `E`.
 *
 * @typeParam E - the service's own error type, carried by the `service` case
 */
export class ClientError<E extends Error = Error> extends BaseError<ClientErrorKind> {
  readonly detail: ClientErrorDetail<E>

  private constructor(detail: ClientErrorDetail<E>) {
    super(displayText(detail), {
      code: detail.kind,
      cause: sourceOf(detail),
      context: contextOf(detail),
    })

    this.detail = Object.freeze(detail)
    Object.freeze(this)
  }

  get kind(): ClientErrorKind {
    return this.detail.kind
  }

  /**
   * The structured failure underneath, when there is one.
   *
   * Only `service`, `credentials` and `http_dispatch` have a source. The text
   * cases and `unknown` are leaves even if the original failure had a cause.
   */
  source(): E | CredentialsError | HttpDispatchError | undefined {
    return sourceOf(this.detail)
  }

  static service<E extends Error>(error: E): ClientError<E> {
    return new ClientError<E>({ kind: "service", error })
  }

  static serviceCommon(message: string): ClientError<never> {
    return new ClientError<never>({ kind: "service_common", message })
  }

  static validation(message: string): ClientError<never> {
    return new ClientError<never>({ kind: "validation", message })
  }

  static unknown(response: BufferedHttpResponse): ClientError<never> {
    return new ClientError<never>({ kind: "unknown", response })
  }

  static fromHttpDispatchError(err: HttpDispatchError): ClientError<never> {
    return new ClientError<never>({ kind: "http_dispatch", error: err })
  }

  /** I/O faults become dispatch failures; the two are not told apart downstream. */
  static fromIoError(err: NodeJS.ErrnoException): ClientError<never> {
    return ClientError.fromHttpDispatchError(HttpDispatchError.fromIoError(err))
  }

  static fromCredentialsError(err: CredentialsError): ClientError<never> {
    return new ClientError<never>({ kind: "credentials", error: err })
  }

  static fromXmlParseError(err: XmlParseError): ClientError<never> {
    return new ClientError<never>({ kind: "parse_error", message: err.message })
  }

  static fromJsonParseError(err: JsonParseError): ClientError<never> {
    return new ClientError<never>({ kind: "parse_error", message: err.message })
  }
}

function displayText<E extends Error>(detail: ClientErrorDetail<E>): string {
  switch (detail.kind) {
    case "service":
    case "http_dispatch":
    case "credentials":
      return detail.error.message
    case "service_common":
    case "validation":
    case "parse_error":
      return detail.message
    case "unknown":
      return detail.response.bodyAsString()
  }
}

function sourceOf<E extends Error>(
  detail: ClientErrorDetail<E>,
): E | CredentialsError | HttpDispatchError | undefined {
  switch (detail.kind) {
    case "service":
    case "http_dispatch":
    case "credentials":
      return detail.error
    default:
      return undefined
  }
}

function contextOf<E extends Error>(detail: ClientErrorDetail<E>): ErrorContext {
  switch (detail.kind) {
    case "service":
      return { errorName: detail.error.name }
    case "unknown":
      return { status: detail.response.status }
    default:
      return {}
  }
}
