import type { BufferedHttpResponse } from "../ports/buffered-http-response"
import type { CredentialsError } from "./failures/credentials-error"
import type { HttpDispatchError } from "./failures/http-dispatch-error"

export type ServiceDetail<E extends Error> = {
  readonly kind: "service"
  readonly error: E
}

export type ServiceCommonDetail = {
  readonly kind: "service_common"
  readonly message: string
}

export type HttpDispatchDetail = {
  readonly kind: "http_dispatch"
  readonly error: HttpDispatchError
}

export type CredentialsDetail = {
  readonly kind: "credentials"
  readonly error: CredentialsError
}

export type ValidationDetail = {
  readonly kind: "validation"
  readonly message: string
}

export type ParseErrorDetail = {
  readonly kind: "parse_error"
  readonly message: string
}

export type UnknownDetail = {
  readonly kind: "unknown"
  readonly response: BufferedHttpResponse
}

export type ClientErrorDetailMap<E extends Error> = {
  service: ServiceDetail<E>
  service_common: ServiceCommonDetail
  http_dispatch: HttpDispatchDetail
  credentials: CredentialsDetail
  validation: ValidationDetail
  parse_error: ParseErrorDetail
  unknown: UnknownDetail
}

export type ClientErrorKind = keyof ClientErrorDetailMap<Error>

/**
 * What went wrong with a client call. Exactly one case applies.
 *
 * @typeParam E - the service's own error type, carried by `service`
 */
export type ClientErrorDetail<E extends Error> =
  | ServiceDetail<E>
  | ServiceCommonDetail
  | HttpDispatchDetail
  | CredentialsDetail
  | ValidationDetail
  | ParseErrorDetail
  | UnknownDetail

export type DetailOf<E extends Error, K extends ClientErrorKind> = ClientErrorDetailMap<E>[K]

export const clientErrorKinds = [
  "service",
  "service_common",
  "http_dispatch",
  "credentials",
  "validation",
  "parse_error",
  "unknown",
] as const satisfies readonly ClientErrorKind[]
