import { BaseError, type BaseErrorOptions } from "@wirecall/errors"

export type CredentialsErrorOptions = Omit<
  BaseErrorOptions<"credentials_unavailable">,
  "code"
>

/** No usable credentials could be resolved for the call. */
export class CredentialsError extends BaseError<"credentials_unavailable"> {
  constructor(message: string, options: CredentialsErrorOptions = {}) {
    super(message, { ...options, code: "credentials_unavailable" })
  }
}
