import fc from 'fast-check';

import {
  all,
  any,
  eskema,
  type IValidator,
  isBool,
  isGte,
  isInt,
  isLte,
  isNull,
  isNumber,
  isOneOf,
  isString,
  listEach,
  none,
  not,
  toInt,
} from '../../src/index.js';

export const PROPERTY_SEED = 424_242;

/** Decoded-JSON-like input, the shape validators usually receive. */
export const inputArbitrary = fc.oneof(
  fc.jsonValue(),
  fc.constantFrom<unknown>('42', 'abc', -1, 0, 7, 10.5, null, [], {})
);

/** Validators that never change the value they check. */
export const checkingValidators: readonly IValidator[] = [
  isString(),
  isInt(),
  isGte(0),
  isNull(),
  isBool(),
  eskema({ a: isInt() }),
  listEach(isString()),
  isString().or(isInt()),
  not(isBool()),
  none([isString(), isNull()]),
  all([isNumber(), isLte(10)], { collecting: true }),
  isOneOf([1, 'a', null]),
  any([]),
  all([]),
];

export const checkingValidatorArbitrary = fc.constantFrom(...checkingValidators);

/** Checks plus a coercion; none of them carries a nullable/optional flag. */
export const validatorArbitrary = fc.constantFrom(
  ...checkingValidators,
  toInt(isGte(0))
);

/** Flags only apply at the top of `validate`, so they are kept apart. */
export const flaggedValidatorArbitrary = fc.constantFrom(
  isString().optional(),
  isInt().nullable(),
  eskema({ a: isInt() }).nullable()
);

export const anyValidatorArbitrary = fc.oneof(
  validatorArbitrary,
  flaggedValidatorArbitrary
);

export const fieldNameArbitrary = fc.stringMatching(/^[a-z][a-z0-9]{0,7}$/);
