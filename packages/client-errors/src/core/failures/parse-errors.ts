import { BaseError, type BaseErrorOptions } from "@wirecall/errors"

export type ParseErrorOptions = Omit<BaseErrorOptions, "code">

/** An XML response body did not have the expected structure. */
export class XmlParseError extends BaseError<"xml_parse_failed"> {
  constructor(message: string, options: ParseErrorOptions = {}) {
    super(message, { ...options, code: "xml_parse_failed" })
  }
}

/** A JSON response body was malformed or did not match its schema. */
export class JsonParseError extends BaseError<"json_parse_failed"> {
  constructor(message: string, options: ParseErrorOptions = {}) {
    super(message, { ...options, code: "json_parse_failed" })
  }
}
