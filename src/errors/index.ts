export {
  ArgumentaError,
  ErrorCode,
  wrapError,
  isArgumentaError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./ArgumentaError";

export { ArgumentaNetworkError } from "./NetworkError";
export { ArgumentaValidationError } from "./ValidationError";
export { MisalignedSequenceError, InvalidLabelSequenceError } from "./SequenceError";
