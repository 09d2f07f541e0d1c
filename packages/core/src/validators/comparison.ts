import { isDeepStrictEqual } from 'node:util';

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import {
  AllValidator,
  type IValidator,
  Validator,
} from '../validator/base.js';
import { mapMaybe } from '../util/maybe-async.js';
import { describeType, isPlainObject, prettifyValue } from '../util/pretty.js';
import { validator } from './predicate.js';
import type { MessageOption } from './type.js';

/** Strict (`===`) equality. */
export function isEq(expected: unknown, options: MessageOption = {}): Validator {
  return validator(
    (value) => value === expected,
    (value) =>
      new Expectation({
        message: options.message ?? `equal to ${prettifyValue(expected)}`,
        value,
        code: ExpectationCodes.valueEqualMismatch,
        data: {
          expected: prettifyValue(expected),
          found: prettifyValue(value),
          mode: 'shallow',
        },
      })
  );
}

/** Structural equality of arrays, plain objects, dates and primitives. */
export function isDeepEq(
  expected: unknown,
  options: MessageOption = {}
): Validator {
  return validator(
    (value) => isDeepStrictEqual(value, expected),
    (value) =>
      new Expectation({
        message: options.message ?? `equal to ${prettifyValue(expected)}`,
        value,
        code: ExpectationCodes.valueDeepEqualMismatch,
        data: {
          expected: prettifyValue(expected),
          found: prettifyValue(value),
          mode: 'deep',
        },
      })
  );
}

export function isOneOf(
  options: readonly unknown[],
  messageOption: MessageOption = {}
): Validator {
  return validator(
    (value) => options.includes(value),
    (value) =>
      new Expectation({
        message: messageOption.message ?? `one of: ${prettifyValue(options)}`,
        value,
        code: ExpectationCodes.valueMembershipMismatch,
        data: { options: options.map((o) => String(o)) },
      })
  );
}

/** Length of strings and arrays, size of sets and maps, key count of plain objects. */
export function lengthOf(value: unknown): number | undefined {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (value instanceof Set || value instanceof Map) return value.size;
  if (isPlainObject(value)) return Object.keys(value).length;
  return undefined;
}

/**
 * Runs `validators` against the value's length. Failures are folded into a
 * single `length [<child messages>]` expectation.
 */
export function length(
  validators: readonly IValidator[],
  options: MessageOption = {}
): Validator {
  const check = new AllValidator(validators);
  return new Validator((value) => {
    const len = lengthOf(value);
    if (len === undefined) {
      return Result.invalid(
        value,
        new Expectation({
          message:
            options.message ??
            `${describeType(value)} does not have a length property`,
          value,
          code: ExpectationCodes.logicPredicateFailed,
        })
      );
    }
    return mapMaybe(check.run(len), (result) => {
      if (result.isValid) return Result.valid(value);
      const joined = result.expectations.map((e) => e.message).join(' & ');
      return Result.invalid(
        value,
        new Expectation({
          message: options.message ?? `length [${joined}]`,
          value,
          code: ExpectationCodes.valueLengthOutOfRange,
          data: { length: len },
        })
      );
    });
  });
}

function containsItem(value: unknown, item: unknown): boolean | undefined {
  if (typeof value === 'string') {
    return typeof item === 'string' && value.includes(item);
  }
  if (Array.isArray(value)) return value.includes(item);
  if (value instanceof Set) return value.has(item);
  return undefined;
}

/** Substring for strings, membership for arrays and sets. */
export function contains(item: unknown, options: MessageOption = {}): Validator {
  return new Validator((value) => {
    const found = containsItem(value, item);
    if (found === undefined) {
      return Result.invalid(
        value,
        new Expectation({
          message: `${describeType(value)} does not have a contains property`,
          value,
          code: ExpectationCodes.valueContainsMissing,
        })
      );
    }
    return Result.of(
      found,
      value,
      new Expectation({
        message: options.message ?? `contains ${prettifyValue(item)}`,
        value,
        code: ExpectationCodes.valueContainsMissing,
        data: { needle: prettifyValue(item) },
      })
    );
  });
}
