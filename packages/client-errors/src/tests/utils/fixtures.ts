import { BufferedResponse } from "../../core/buffered-response"

/** A service-defined error, as a generated client would declare it. */
export class QueueDoesNotExist extends Error {
  override readonly name = "QueueDoesNotExist"
}

export class ReceiptHandleIsInvalid extends Error {
  override readonly name = "ReceiptHandleIsInvalid"
}

export type QueueServiceError = QueueDoesNotExist | ReceiptHandleIsInvalid

export function parseQueueServiceError(
  type: string,
  message: string,
): QueueServiceError | undefined {
  switch (type) {
    case "QueueDoesNotExist":
      return new QueueDoesNotExist(message)
    case "ReceiptHandleIsInvalid":
      return new ReceiptHandleIsInvalid(message)
    default:
      return undefined
  }
}

/** The shape Node gives a failed system call. */
export function makeIoFault(
  message: string,
  fields: { code: string; syscall?: string; errno?: number },
): NodeJS.ErrnoException {
  return Object.assign(new Error(message), fields)
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): BufferedResponse {
  return BufferedResponse.fromText(status, JSON.stringify(body), {
    "content-type": "application/x-amz-json-1.0",
    ...headers,
  })
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("expected function to throw")
}
