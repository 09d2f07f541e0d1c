// @eskema/core entry point
//
// Public API:
// - Result / Expectation value types and the thrown error hierarchy.
// - The validator engine (value and contextual validators, combinators).
// - Ready-made validators, transformers and the fluent builder (`v()`).
// - Presentation helpers that render a Result for humans.

export * from './types/index.js';
export * from './validator/index.js';
export * from './validators/index.js';
export * from './transformers/index.js';
export * from './builder/index.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  ExpectationCodes,
  type ExpectationCode,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  buildValidationFailureMessage,
  buildValidationMessage,
  formatExpectationLine,
} from './errors/presenter.js';

// Utilities
export { isPromise, mapMaybe, type MaybePromise } from './util/maybe-async.js';
export { describeType, isPlainObject, prettifyValue } from './util/pretty.js';
export { safeStringify } from './util/json-safe.js';
