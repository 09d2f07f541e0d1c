/**
 * Building blocks for value-changing validators
 *
 * A transformer hands a converted value to its child validator; the child's
 * Result (and therefore the converted value) becomes the transformer's
 * Result. Children are evaluated with their nullable/optional flags, so a
 * nullable child accepts a conversion that produced nothing.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import {
  type IValidator,
  Validator,
  type ValueValidator,
} from '../validator/base.js';
import { mapMaybe } from '../util/maybe-async.js';

export interface TransformOptions {
  /** Replaces any failure message while keeping the converted value and code. */
  message?: string;
}

/** Pass `fn(value)` to `child`. */
export function transform(
  fn: (value: unknown) => unknown,
  child: IValidator
): Validator {
  return new Validator((value) => child.evaluate(fn(value)));
}

/**
 * Like {@link transform}, but a conversion returning `undefined` fails with
 * `errorMessage`, and a valid child yields the converted value.
 */
export function pivotValue(
  fn: (value: unknown) => unknown,
  options: { child: IValidator; errorMessage: string }
): Validator {
  const { child, errorMessage } = options;
  return new Validator((value) => {
    const pivoted = fn(value);
    if (pivoted === undefined) {
      return Result.invalid(
        value,
        new Expectation({
          message: errorMessage,
          value,
          code: ExpectationCodes.valueCoercionFailed,
        })
      );
    }
    return mapMaybe(child.evaluate(pivoted), (result) =>
      result.isValid ? Result.valid(pivoted, value) : result
    );
  });
}

/**
 * Replace failures with `expectation` but keep the value the inner validator
 * produced, so later steps still see the converted value.
 */
export function expectPreserveValue(
  validator: IValidator,
  expectation: Expectation
): Validator {
  return new Validator((value) =>
    mapMaybe(validator.run(value), (inner) => {
      if (inner.isValid) return Result.valid(inner.value, value);
      return Result.invalid(
        inner.value,
        expectation.copyWith({
          code: inner.firstExpectation?.code ?? expectation.code,
          value: inner.value,
        }),
        value
      );
    })
  );
}

export function withMessage(
  validator: ValueValidator,
  message: string | undefined
): ValueValidator {
  return message === undefined
    ? validator
    : expectPreserveValue(validator, new Expectation({ message }));
}
