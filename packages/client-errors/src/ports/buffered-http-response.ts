/**
 * A response that has been read into memory in full.
 *
 * Kept on `unknown` client errors so callers can inspect what the service
 * actually sent.
 */
export interface BufferedHttpResponse {
  readonly status: number

  /** Header names are lowercase. */
  readonly headers: Readonly<Record<string, string>>

  readonly body: Uint8Array

  /** Case-insensitive header lookup. */
  header(name: string): string | undefined

  /**
   * The body decoded as UTF-8. Empty for an empty body. A body that is not
   * valid UTF-8 renders as "unknown error".
   */
  bodyAsString(): string
}
