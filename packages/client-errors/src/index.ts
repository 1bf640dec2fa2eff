export { BufferedResponse, type BufferedResponseInit, UNDECODABLE_BODY } from "./core/buffered-response"
export {
  ERROR_TYPE_HEADER,
  type ErrorResponseClassifier,
  classifyErrorResponse,
  normalizeErrorType,
} from "./core/classify-error-response"
export { ClientError } from "./core/client-error"
export {
  type ClientErrorDetail,
  type ClientErrorDetailMap,
  type ClientErrorKind,
  clientErrorKinds,
  type CredentialsDetail,
  type DetailOf,
  type HttpDispatchDetail,
  type ParseErrorDetail,
  type ServiceCommonDetail,
  type ServiceDetail,
  type UnknownDetail,
  type ValidationDetail,
} from "./core/client-error-detail"
export { decodeJsonBody } from "./core/decode-json-body"
export { CredentialsError, type CredentialsErrorOptions } from "./core/failures/credentials-error"
export {
  HttpDispatchError,
  type HttpDispatchErrorOptions,
  isIoError,
} from "./core/failures/http-dispatch-error"
export { JsonParseError, type ParseErrorOptions, XmlParseError } from "./core/failures/parse-errors"
export { liftClientError, withClientErrors } from "./core/lift-client-error"
export { logClientError } from "./core/log-client-error"
export {
  type ClientErrorHandlers,
  type ClientErrorOf,
  hasKind,
  isClientError,
  matchClientError,
} from "./core/match-client-error"
export type { BufferedHttpResponse } from "./ports/buffered-http-response"
