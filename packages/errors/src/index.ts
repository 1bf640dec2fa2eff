export { BaseError, type BaseErrorOptions, serializeError, type SerializeOptions } from "./core/base-error"
export { errorChain } from "./core/utils/error-chain"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
