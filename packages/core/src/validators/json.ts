/**
 * Shape checks for decoded JSON (plain objects and arrays).
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import {
  type IValidator,
  Validator,
  type ValueValidator,
} from '../validator/base.js';
import { BuilderError } from '../types/errors.js';
import { eachMaybe, mapMaybe } from '../util/maybe-async.js';
import { describeType, hasOwn, isPlainObject } from '../util/pretty.js';
import { validator } from './predicate.js';

function shapeMismatch(message: string, expected: string) {
  return (value: unknown): Expectation =>
    new Expectation({
      message,
      value,
      code: ExpectationCodes.valueTypeMismatch,
      data: { expected, found: describeType(value) },
    });
}

export function isJsonContainer(): ValueValidator {
  return validator(
    (value) => isPlainObject(value) || Array.isArray(value),
    shapeMismatch('a JSON object or array', 'object|array')
  );
}

export function isJsonObject(): ValueValidator {
  return validator(isPlainObject, shapeMismatch('a JSON object', 'object'));
}

export function isJsonArray(): ValueValidator {
  return validator(
    (value) => Array.isArray(value),
    shapeMismatch('a JSON array', 'array')
  );
}

export function jsonHasKeys(keys: readonly string[]): ValueValidator {
  return validator(
    (value) => isPlainObject(value) && keys.every((k) => hasOwn(value, k)),
    (value) =>
      new Expectation({
        message: `JSON object has keys: ${keys.join(', ')}`,
        value,
        code: ExpectationCodes.valueContainsMissing,
        data: { keys: [...keys] },
      })
  );
}

export interface LengthBounds {
  min?: number;
  max?: number;
}

/**
 * @throws {BuilderError} When both bounds are given and `min > max`
 */
export function jsonArrayLength(bounds: LengthBounds = {}): ValueValidator {
  const { min, max } = bounds;
  if (min !== undefined && max !== undefined && min > max) {
    throw new BuilderError({
      message: 'min must be <= max',
      context: { min, max },
    });
  }
  const label = `array length${min !== undefined ? ` >= ${min}` : ''}${max !== undefined ? ` <= ${max}` : ''}`;
  return validator(
    (value) =>
      Array.isArray(value) &&
      (min === undefined || value.length >= min) &&
      (max === undefined || value.length <= max),
    (value) =>
      new Expectation({
        message: label,
        value,
        code: ExpectationCodes.valueLengthOutOfRange,
        data: {
          min: min ?? null,
          max: max ?? null,
          length: Array.isArray(value) ? value.length : null,
        },
      })
  );
}

/**
 * Every element satisfies `element`. Stops at the first failing element and
 * reports its expectations under `[index]`.
 */
export function jsonArrayEvery(element: IValidator): ValueValidator {
  const notArray = shapeMismatch('a JSON array', 'array');
  return new Validator((value) => {
    if (!Array.isArray(value)) return Result.invalid(value, notArray(value));
    const items: readonly unknown[] = value;
    let failure: Result | undefined;
    const done = eachMaybe(items, (item, index) =>
      mapMaybe(element.evaluate(item), (result) => {
        if (result.isValid) return false;
        failure = Result.fromExpectations(
          value,
          result.expectations.map((e) => e.withPathPrefix(`[${index}]`)),
          value
        );
        return true;
      })
    );
    return mapMaybe(done, () => failure ?? Result.valid(value));
  });
}
