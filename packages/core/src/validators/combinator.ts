/**
 * Factory functions for the logical combinators. Operator sugar
 * (`a.and(b)`, `a.or(b)`, `a.expecting(...)`) builds the same classes.
 */

import {
  AllValidator,
  AnyValidator,
  type IValidator,
  NoneValidator,
  NotValidator,
  ThrowInsteadValidator,
  withExpectation,
} from '../validator/base.js';

export { withExpectation };

export interface AllOptions {
  message?: string;
  /** Run every child on the original value and merge all failures. */
  collecting?: boolean;
}

export function all(
  validators: readonly IValidator[],
  options: AllOptions = {}
): AllValidator {
  return new AllValidator(validators, options);
}

export function any(
  validators: readonly IValidator[],
  options: { message?: string } = {}
): AnyValidator {
  return new AnyValidator(validators, options);
}

export function none(
  validators: readonly IValidator[],
  options: { message?: string } = {}
): NoneValidator {
  return new NoneValidator(validators, options);
}

export function not(
  validator: IValidator,
  options: { message?: string } = {}
): NotValidator {
  return new NotValidator(validator, options);
}

/**
 * Turns a failure into a thrown `ValidatorFailedError`.
 *
 * @example
 * ```ts
 * const strictAge = throwInstead(isInt().and(isGte(0)));
 * strictAge.validate(-1); // throws
 * ```
 */
export function throwInstead(validator: IValidator): ThrowInsteadValidator {
  return new ThrowInsteadValidator(validator);
}
