import { ClientError } from "./client-error"
import { CredentialsError } from "./failures/credentials-error"
import { HttpDispatchError, isIoError } from "./failures/http-dispatch-error"
import { JsonParseError, XmlParseError } from "./failures/parse-errors"

/**
 * Bridges a caught value to the typed factories on `ClientError`.
 *
 * - `ClientError` passes through unchanged (its service payload type is taken on trust)
 * - `HttpDispatchError`, `CredentialsError`, `XmlParseError`, `JsonParseError`
 *   and Node I/O faults are converted
 * - anything else yields `undefined`; it is not a client failure and should
 *   keep propagating as-is
 */
export function liftClientError<E extends Error = never>(
  value: unknown,
): ClientError<E> | undefined {
  if (value instanceof ClientError) return value
  if (value instanceof HttpDispatchError) return ClientError.fromHttpDispatchError(value)
  if (value instanceof CredentialsError) return ClientError.fromCredentialsError(value)
  if (value instanceof XmlParseError) return ClientError.fromXmlParseError(value)
  if (value instanceof JsonParseError) return ClientError.fromJsonParseError(value)
  if (isIoError(value)) return ClientError.fromIoError(value)

  return undefined
}

/**
 * Runs `op`, converting a recognized rejection into a `ClientError`.
 * Unrecognized rejections are rethrown as the same value.
 *
 * @example
 * ```ts
 * const body = await withClientErrors(async () => {
 *   const credentials = await provider.resolve()
 *   return transport.send(sign(request, credentials))
 * })
 * ```
 */
export async function withClientErrors<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op()
  } catch (err) {
    throw liftClientError(err) ?? err
  }
}
