import type { ZodType } from "zod"
import type { BufferedHttpResponse } from "../ports/buffered-http-response"
import { JsonParseError } from "./failures/parse-errors"

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Decodes a response body as JSON and checks it against `schema`.
 *
 * @throws JsonParseError when the body is not JSON, or when it does not match.
 * The message of a mismatch is the first issue, prefixed with its path.
 */
export function decodeJsonBody<T>(response: BufferedHttpResponse, schema: ZodType<T>): T {
  let raw: unknown

  try {
    raw = JSON.parse(response.bodyAsString())
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new JsonParseError(err.message, { cause: err })
    }
    throw err
  }

  const result = schema.safeParse(raw)

  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))
    const first = issues[0]
    const message = first
      ? first.path
        ? `${first.path}: ${first.message}`
        : first.message
      : "Invalid response body"

    throw new JsonParseError(message, { context: { issues } })
  }

  return result.data
}
