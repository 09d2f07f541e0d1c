/**
 * Nominal type checks
 *
 * Each check fails with `type.mismatch` and `data: { expected, found }`,
 * where `found` is the runtime type label of the value.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import type { ValueValidator } from '../validator/base.js';
import { describeType, isPlainObject } from '../util/pretty.js';
import { validator } from './predicate.js';

export interface MessageOption {
  message?: string;
}

export function isType(
  guard: (value: unknown) => boolean,
  name: string,
  options: MessageOption = {}
): ValueValidator {
  return validator(
    guard,
    (value) =>
      new Expectation({
        message: options.message ?? name,
        value,
        code: ExpectationCodes.typeMismatch,
        data: { expected: name, found: describeType(value) },
      })
  );
}

export function isTypeOrNull(
  guard: (value: unknown) => boolean,
  name: string,
  options: MessageOption = {}
): ValueValidator {
  return isType(guard, name, options).nullable();
}

export const isNull = (options?: MessageOption): ValueValidator =>
  isType((v) => v === null || v === undefined, 'null', options);

export const isString = (options?: MessageOption): ValueValidator =>
  isType((v) => typeof v === 'string', 'string', options);

export const isNumber = (options?: MessageOption): ValueValidator =>
  isType((v) => typeof v === 'number' && !Number.isNaN(v), 'number', options);

export const isInt = (options?: MessageOption): ValueValidator =>
  isType((v) => Number.isInteger(v), 'int', options);

/** Any finite number; integral values such as `42` are doubles too. */
export const isDouble = (options?: MessageOption): ValueValidator =>
  isType((v) => Number.isFinite(v), 'double', options);

export const isBool = (options?: MessageOption): ValueValidator =>
  isType((v) => typeof v === 'boolean', 'boolean', options);

export const isBigInt = (options?: MessageOption): ValueValidator =>
  isType((v) => typeof v === 'bigint', 'bigint', options);

export const isFunction = (options?: MessageOption): ValueValidator =>
  isType((v) => typeof v === 'function', 'function', options);

export const isList = (options?: MessageOption): ValueValidator =>
  isType((v) => Array.isArray(v), 'array', options);

export const isArray = isList;

/** Plain objects only: arrays, dates and class instances are rejected. */
export const isMap = (options?: MessageOption): ValueValidator =>
  isType(isPlainObject, 'object', options);

export const isSet = (options?: MessageOption): ValueValidator =>
  isType((v) => v instanceof Set, 'Set', options);

/** A `Date` holding a valid time. */
export const isDate = (options?: MessageOption): ValueValidator =>
  isType(
    (v) => v instanceof Date && !Number.isNaN(v.getTime()),
    'Date',
    options
  );
