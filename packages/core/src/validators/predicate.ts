import { ExpectationCodes } from '../errors/codes.js';
import { Expectation, expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import { Validator } from '../validator/base.js';

/**
 * Lift a boolean predicate into a validator. `toExpectation` is only called
 * when the predicate fails.
 */
export function validator(
  predicate: (value: unknown) => boolean,
  toExpectation: (value: unknown) => Expectation
): Validator {
  return new Validator((value) =>
    predicate(value)
      ? Result.valid(value)
      : Result.invalid(value, toExpectation(value))
  );
}

/**
 * Same as {@link validator} for predicates that must suspend, e.g. a
 * uniqueness lookup.
 */
export function asyncValidator(
  test: (value: unknown) => Promise<boolean>,
  message: string,
  options: { code?: string } = {}
): Validator {
  return new Validator(async (value) =>
    (await test(value))
      ? Result.valid(value)
      : Result.invalid(
          value,
          expectation(message, value, {
            code: options.code ?? ExpectationCodes.logicPredicateFailed,
          })
        )
  );
}
