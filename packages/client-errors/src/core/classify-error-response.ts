import { z } from "zod"
import type { BufferedHttpResponse } from "../ports/buffered-http-response"
import { ClientError } from "./client-error"
import { decodeJsonBody } from "./decode-json-body"
import { JsonParseError } from "./failures/parse-errors"

export const ERROR_TYPE_HEADER = "x-amzn-errortype"

const errorBodySchema = z.object({
  __type: z.string().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
  Message: z.string().optional(),
})

type ErrorBody = z.infer<typeof errorBodySchema>

export type ErrorResponseClassifier<E extends Error> = {
  /**
   * Builds the service's own error for an error type it defines; returns
   * `undefined` for types it does not know.
   */
  parseServiceError?: (type: string, message: string) => E | undefined

  /** Error types shared by every operation of the service. */
  commonErrorTypes?: readonly string[]
}

/**
 * Turns a non-success response into the matching `ClientError`.
 *
 * The error type comes from the `x-amzn-errortype` header, else from the
 * body's `__type` or `code`. Namespaces (`ns#Type`) and trailing URIs
 * (`Type:http://...`) are stripped. The message comes from `message` or
 * `Message`.
 *
 * Precedence: service-defined type, then `ValidationException`, then a common
 * type. Anything else, including a body that is not a JSON error document,
 * is kept whole as `unknown`.
 */
export function classifyErrorResponse<E extends Error = never>(
  response: BufferedHttpResponse,
  classifier: ErrorResponseClassifier<E> = {},
): ClientError<E> {
  const body = readErrorBody(response)
  const type = normalizeErrorType(
    response.header(ERROR_TYPE_HEADER) ?? body?.__type ?? body?.code,
  )

  if (!type) return ClientError.unknown(response)

  const message = body?.message ?? body?.Message ?? ""

  const serviceError = classifier.parseServiceError?.(type, message)
  if (serviceError !== undefined) return ClientError.service(serviceError)

  if (type === "ValidationException") return ClientError.validation(message)

  if (classifier.commonErrorTypes?.includes(type)) {
    return ClientError.serviceCommon(message)
  }

  return ClientError.unknown(response)
}

function readErrorBody(response: BufferedHttpResponse): ErrorBody | undefined {
  try {
    return decodeJsonBody(response, errorBodySchema)
  } catch (err) {
    if (err instanceof JsonParseError) return undefined
    throw err
  }
}

export function normalizeErrorType(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined

  const afterNamespace = raw.slice(raw.lastIndexOf("#") + 1)
  const colon = afterNamespace.indexOf(":")
  const type = colon === -1 ? afterNamespace : afterNamespace.slice(0, colon)

  return type.trim() || undefined
}
