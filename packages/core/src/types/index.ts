export {
  Expectation,
  expectation,
  type ExpectationData,
  type ExpectationInit,
  type SerializedExpectation,
} from './expectation.js';
export {
  type NonEmptyExpectations,
  Result,
  type SerializedResult,
} from './result.js';
export {
  AsyncValidatorError,
  BuilderError,
  ConfigError,
  type ErrorContext,
  EskemaError,
  type EskemaErrorParams,
  isEskemaError,
  type SerializedError,
  ValidatorFailedError,
} from './errors.js';
export {
  DEFAULT_FORMAT_OPTIONS,
  type FormatOptions,
  type ResolvedFormatOptions,
  resolveFormatOptions,
} from './options.js';
