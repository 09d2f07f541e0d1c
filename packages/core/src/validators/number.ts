/**
 * Numeric range checks. Values must be numbers (or bigints) before the
 * comparison runs; range failures carry `value.range_out_of_bounds` with the
 * operator and limit in `data`.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation, type ExpectationData } from '../types/expectation.js';
import { BuilderError } from '../types/errors.js';
import type { ValueValidator } from '../validator/base.js';
import { validator } from './predicate.js';
import { isType, type MessageOption } from './type.js';

type Numeric = number | bigint;

function isNumeric(value: unknown): value is Numeric {
  return (
    (typeof value === 'number' && !Number.isNaN(value)) ||
    typeof value === 'bigint'
  );
}

function assertBound(name: string, bound: number): void {
  if (Number.isNaN(bound)) {
    throw new BuilderError({
      message: `${name} must be a valid number`,
      context: { value: bound },
    });
  }
}

function rangeCheck(
  test: (value: Numeric) => boolean,
  message: string,
  data: ExpectationData
): ValueValidator {
  const numeric = isType(isNumeric, 'number');
  return numeric.and(
    validator(
      (value) => isNumeric(value) && test(value),
      (value) =>
        new Expectation({
          message,
          value,
          code: ExpectationCodes.valueRangeOutOfBounds,
          data,
        })
    )
  );
}

export function isLt(max: number, options: MessageOption = {}): ValueValidator {
  assertBound('max', max);
  return rangeCheck((v) => v < max, options.message ?? `less than ${max}`, {
    operator: '<',
    limit: max,
  });
}

export function isLte(max: number, options: MessageOption = {}): ValueValidator {
  assertBound('max', max);
  return rangeCheck(
    (v) => v <= max,
    options.message ?? `less than or equal to ${max}`,
    { operator: '<=', limit: max }
  );
}

export function isGt(min: number, options: MessageOption = {}): ValueValidator {
  assertBound('min', min);
  return rangeCheck((v) => v > min, options.message ?? `greater than ${min}`, {
    operator: '>',
    limit: min,
  });
}

export function isGte(min: number, options: MessageOption = {}): ValueValidator {
  assertBound('min', min);
  return rangeCheck(
    (v) => v >= min,
    options.message ?? `greater than or equal to ${min}`,
    { operator: '>=', limit: min }
  );
}

export function isInRange(
  min: number,
  max: number,
  options: MessageOption = {}
): ValueValidator {
  assertBound('min', min);
  assertBound('max', max);
  if (min > max) {
    throw new BuilderError({
      message: 'min must be <= max',
      context: { min, max },
    });
  }
  return rangeCheck(
    (v) => v >= min && v <= max,
    options.message ?? `between ${min} and ${max} inclusive`,
    { operator: 'between_inclusive', min, max }
  );
}
