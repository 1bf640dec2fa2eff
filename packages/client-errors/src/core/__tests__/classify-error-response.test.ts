import {
  jsonResponse,
  parseQueueServiceError,
  QueueDoesNotExist,
  type QueueServiceError,
} from "../../tests/utils/fixtures"
import { BufferedResponse } from "../buffered-response"
import {
  classifyErrorResponse,
  type ErrorResponseClassifier,
  normalizeErrorType,
} from "../classify-error-response"

const classifier: ErrorResponseClassifier<QueueServiceError> = {
  parseServiceError: parseQueueServiceError,
  commonErrorTypes: ["ThrottlingException", "InternalFailure"],
}

describe("classifyErrorResponse", () => {
  it("builds the service error for a type the service defines", () => {
    const response = jsonResponse(400, {
      __type: "com.amazonaws.queue#QueueDoesNotExist",
      message: "The specified queue does not exist.",
    })

    const err = classifyErrorResponse(response, classifier)

    expect(err.kind).toBe("service")
    expect(err.source()).toBeInstanceOf(QueueDoesNotExist)
    expect(err.message).toBe("The specified queue does not exist.")
  })

  it("maps ValidationException to validation", () => {
    const response = jsonResponse(
      400,
      { message: "1 validation error detected: Value null at 'QueueName' failed" },
      { "X-Amzn-ErrorType": "ValidationException:http://internal.queue.test/doc/" },
    )

    const err = classifyErrorResponse(response, classifier)

    expect(err.detail).toEqual({
      kind: "validation",
      message: "1 validation error detected: Value null at 'QueueName' failed",
    })
  })

  it("maps a common type to service_common, reading Message", () => {
    const response = jsonResponse(400, { __type: "ThrottlingException", Message: "Rate exceeded" })

    expect(classifyErrorResponse(response, classifier).detail).toEqual({
      kind: "service_common",
      message: "Rate exceeded",
    })
  })

  it("reads the type from a code field", () => {
    const response = jsonResponse(400, { code: "ValidationException", message: "bad param" })

    expect(classifyErrorResponse(response).detail).toEqual({
      kind: "validation",
      message: "bad param",
    })
  })

  it("uses an empty message when the body has none", () => {
    const response = jsonResponse(400, { __type: "ValidationException" })

    expect(classifyErrorResponse(response).message).toBe("")
  })

  it("prefers the header over the body", () => {
    const response = jsonResponse(
      400,
      { __type: "ValidationException", message: "receipt handle expired" },
      { "x-amzn-errortype": "ReceiptHandleIsInvalid" },
    )

    const err = classifyErrorResponse(response, classifier)

    expect(err.kind).toBe("service")
    expect(err.source()?.name).toBe("ReceiptHandleIsInvalid")
  })

  it("lets a service-defined type win over ValidationException", () => {
    const response = jsonResponse(400, { __type: "ValidationException", message: "m" })

    const err = classifyErrorResponse(response, {
      parseServiceError: (type, message) =>
        type === "ValidationException" ? new QueueDoesNotExist(message) : undefined,
    })

    expect(err.kind).toBe("service")
  })

  it("keeps an unrecognized type as unknown", () => {
    const response = jsonResponse(500, { __type: "SomethingNew", message: "?" })

    const err = classifyErrorResponse(response, classifier)

    expect(err.detail).toEqual({ kind: "unknown", response })
  })

  it("keeps a common type as unknown when the service does not list it", () => {
    const response = jsonResponse(400, { __type: "ThrottlingException", message: "slow down" })

    expect(classifyErrorResponse(response).kind).toBe("unknown")
  })

  it("keeps a body without a type as unknown", () => {
    const response = jsonResponse(500, { message: "internal" })

    expect(classifyErrorResponse(response, classifier).kind).toBe("unknown")
  })

  it("keeps a non-JSON body as unknown and displays it", () => {
    const response = BufferedResponse.fromText(502, "<html>Bad Gateway</html>")

    const err = classifyErrorResponse(response, classifier)

    expect(err.kind).toBe("unknown")
    expect(err.message).toBe("<html>Bad Gateway</html>")
  })

  it("still uses the header when the body is not JSON", () => {
    const response = BufferedResponse.fromText(400, "", {
      "x-amzn-errortype": "ValidationException",
    })

    expect(classifyErrorResponse(response).detail).toEqual({ kind: "validation", message: "" })
  })
})

describe("normalizeErrorType", () => {
  it.each([
    ["QueueDoesNotExist", "QueueDoesNotExist"],
    ["com.amazonaws.queue#QueueDoesNotExist", "QueueDoesNotExist"],
    ["ValidationException:http://internal.queue.test/doc/", "ValidationException"],
    ["aws.protocols#ns#Throttling:uri", "Throttling"],
  ])("normalizes %s to %s", (raw, expected) => {
    expect(normalizeErrorType(raw)).toBe(expected)
  })

  it.each([[""], ["#"], ["ns#"], [":uri"]])("returns undefined for %j", (raw) => {
    expect(normalizeErrorType(raw)).toBeUndefined()
  })

  it("returns undefined for no input", () => {
    expect(normalizeErrorType(undefined)).toBeUndefined()
  })
})
