/**
 * Numeric coercions. Each one accepts a small set of input shapes (checked
 * first, so an unconvertible value fails on the input's own terms) and hands
 * the converted number to `child`.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import {
  type IValidator,
  Validator,
  type ValueValidator,
} from '../validator/base.js';
import {
  $isBigInt,
  $isDoubleString,
  $isInt,
  $isIntString,
  $isNumber,
  $isNumString,
} from '../validators/cached.js';
import { isType } from '../validators/type.js';
import { parseBigIntString, parseDoubleString, parseIntString } from '../util/parse.js';
import { transform, type TransformOptions, withMessage } from './core.js';

// Finite numbers only; `Math.trunc(Infinity)` is not an int.
const finiteNumber = isType((value) => Number.isFinite(value), 'number');

/**
 * Hands the integer form of `value` to `child`. Integer strings that a
 * number cannot hold exactly fail instead of being rounded; {@link toBigInt}
 * takes those.
 */
function intTransform(child: IValidator, truncate: boolean): Validator {
  return new Validator((value) => {
    if (typeof value === 'number') {
      return child.evaluate(truncate ? Math.trunc(value) : value);
    }
    if (typeof value !== 'string') return child.evaluate(undefined);
    const parsed = parseIntString(value);
    if (parsed !== undefined && !Number.isSafeInteger(parsed)) {
      return Result.invalid(
        value,
        new Expectation({
          message: 'an int String within safe 53-bit range',
          value,
          code: ExpectationCodes.valueCoercionFailed,
          data: { min: Number.MIN_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER },
        })
      );
    }
    return child.evaluate(parsed);
  });
}

/** Integers, finite numbers (truncated) and integer strings. */
export function toInt(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isInt
    .or(finiteNumber)
    .or($isIntString)
    .and(intTransform(child, true));
  return withMessage(base, options.message);
}

/**
 * Integers and base-10 integer strings only: `12.5`, `"12.0"` and `"1e3"`
 * are rejected.
 */
export function toIntStrict(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isInt.or($isIntString).and(intTransform(child, false));
  return withMessage(base, options.message);
}

/** {@link toIntStrict} limited to `Number.MIN_SAFE_INTEGER..Number.MAX_SAFE_INTEGER`. */
export function toIntSafe(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = toIntStrict(
    new Validator((value) =>
      Number.isSafeInteger(value)
        ? child.evaluate(value)
        : Result.invalid(
            value,
            new Expectation({
              message:
                'a value strictly convertible to an int within safe 53-bit range',
              value,
            })
          )
    )
  );
  return withMessage(base, options.message);
}

export function toDouble(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isNumber.or($isDoubleString).and(
    transform((value) => {
      if (typeof value === 'number') return value;
      if (typeof value === 'string') return parseDoubleString(value);
      return undefined;
    }, child)
  );
  return withMessage(base, options.message);
}

export function toNum(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isNumber.or($isNumString).and(
    transform((value) => {
      if (typeof value === 'number') return value;
      if (typeof value === 'string') return parseDoubleString(value);
      return undefined;
    }, child)
  );
  return withMessage(base, options.message);
}

export function toBigInt(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isBigInt
    .or($isInt)
    .or($isIntString)
    .and(
      transform((value) => {
        if (typeof value === 'bigint') return value;
        if (typeof value === 'number') return BigInt(value);
        if (typeof value === 'string') return parseBigIntString(value);
        return undefined;
      }, child)
    );
  return withMessage(base, options.message);
}
