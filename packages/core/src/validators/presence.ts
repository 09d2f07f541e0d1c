/**
 * Presence helpers
 *
 * `nullable` accepts a present `null`; `optional` accepts a missing key. Both
 * only differ inside `eskema`, where the key may be absent. `required` rejects
 * `null` and `undefined` before running the wrapped validator.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import type {
  AllValidator,
  ContextualValidator,
  IValidator,
  ValueValidator,
} from '../validator/base.js';
import { validator } from './predicate.js';
import type { MessageOption } from './type.js';

export function nullable(v: ValueValidator): ValueValidator;
export function nullable(v: ContextualValidator): ContextualValidator;
export function nullable(v: IValidator): IValidator;
export function nullable(v: IValidator): IValidator {
  return v.nullable();
}

export function optional(v: ValueValidator): ValueValidator;
export function optional(v: ContextualValidator): ContextualValidator;
export function optional(v: IValidator): IValidator;
export function optional(v: IValidator): IValidator {
  return v.optional();
}

export function isPresent(options: MessageOption = {}): ValueValidator {
  return validator(
    (value) => value !== null && value !== undefined,
    (value) =>
      new Expectation({
        message: options.message ?? 'is required',
        value,
        code: ExpectationCodes.logicRequired,
      })
  );
}

export function required(
  v: IValidator,
  options: MessageOption = {}
): AllValidator {
  return isPresent(options).and(v);
}
