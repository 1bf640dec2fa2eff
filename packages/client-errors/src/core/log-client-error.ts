import type { LogMeta, Logger } from "@wirecall/logger"
import type { ClientError } from "./client-error"

/**
 * Logs a failed call with one policy for every client:
 * - the service answered (`service`, `service_common`, `validation`) => warn
 *   without `err`, debug with `err`
 * - anything else (transport, credentials, undecodable or unrecognized
 *   response) => error with `err`
 */
export function logClientError<E extends Error>(
  logger: Logger,
  err: ClientError<E>,
  meta: LogMeta = {},
): void {
  const detail = err.detail
  const base: LogMeta = {
    ...meta,
    code: err.code,
    ...(detail.kind === "unknown" && { status: detail.response.status }),
  }

  switch (detail.kind) {
    case "service":
    case "service_common":
    case "validation":
      logger.warn("Service call failed", base)
      logger.debug("Service call failed details", { ...base, err })
      return
    default:
      logger.error("Service call failed", { ...base, err })
  }
}
