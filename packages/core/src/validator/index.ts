/**
 * Validator engine exports
 */

export {
  AllValidator,
  AnyValidator,
  BaseValidator,
  ContextualValidator,
  ExpectationValidator,
  type Fold,
  type IValidator,
  MultiValidator,
  NoneValidator,
  NotValidator,
  SingleChildValidator,
  ThrowInsteadValidator,
  type ValidateOptions,
  Validator,
  type ValidatorFlags,
  type ValidatorFn,
  ValueValidator,
  withExpectation,
} from './base.js';
export {
  type Resolver,
  ResolveValidator,
  type WhenBranches,
  WhenValidator,
} from './contextual.js';
