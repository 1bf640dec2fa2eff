import type { BufferedHttpResponse } from "../ports/buffered-http-response"

export const UNDECODABLE_BODY = "unknown error"

export type BufferedResponseInit = {
  status: number
  headers?: Record<string, string>
  body?: Uint8Array
}

export class BufferedResponse implements BufferedHttpResponse {
  readonly status: number
  readonly headers: Readonly<Record<string, string>>
  readonly body: Uint8Array

  constructor(init: BufferedResponseInit) {
    this.status = init.status
    this.headers = Object.freeze(lowercaseKeys(init.headers ?? {}))
    this.body = init.body ? init.body.slice() : new Uint8Array()
  }

  header(name: string): string | undefined {
    const key = name.toLowerCase()
    return Object.hasOwn(this.headers, key) ? this.headers[key] : undefined
  }

  bodyAsString(): string {
    try {
      return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(this.body)
    } catch (err) {
      if (err instanceof TypeError) return UNDECODABLE_BODY
      throw err
    }
  }

  static fromText(
    status: number,
    text: string,
    headers: Record<string, string> = {},
  ): BufferedResponse {
    return new BufferedResponse({
      status,
      headers,
      body: new TextEncoder().encode(text),
    })
  }

  /** Reads the whole body of a fetch `Response`. */
  static async fromFetchResponse(res: Response): Promise<BufferedResponse> {
    const headers: [string, string][] = []
    res.headers.forEach((value, key) => {
      headers.push([key, value])
    })

    return new BufferedResponse({
      status: res.status,
      headers: Object.fromEntries(headers),
      body: new Uint8Array(await res.arrayBuffer()),
    })
  }
}

function lowercaseKeys(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]),
  )
}
