export { BaseError, type BaseErrorOptions } from "./core/base-error"
export {
  ConfigValidationError,
  describeValue,
  isLoaderError,
  type LoaderError,
  MalformedResourceError,
  ProducerRejectionError,
  UnknownLocaleError,
} from "./core/loader-errors"
export { isAppError, type SerializeOptions, serializeError } from "./core/serialize-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  LoaderErrorCode,
  SerializedError,
} from "./ports/error"
