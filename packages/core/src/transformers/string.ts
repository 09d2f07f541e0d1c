/**
 * String transformers
 *
 * `trim`, `toLowerCase`, `toUpperCase`, `collapseWhitespace` and `split`
 * require a string. The `*String` normalizers pass non-strings through
 * untouched, which suits builder steps that may run before a type check.
 */

import type { IValidator, ValueValidator } from '../validator/base.js';
import { $isString } from '../validators/cached.js';
import { transform, type TransformOptions, withMessage } from './core.js';

const WHITESPACE_RUNS = /\s+/g;

function stringOnly(
  fn: (text: string) => unknown,
  child: IValidator,
  options: TransformOptions
): ValueValidator {
  return withMessage(
    $isString.and(
      transform((value) => (typeof value === 'string' ? fn(value) : value), child)
    ),
    options.message
  );
}

function passThrough(
  fn: (text: string) => unknown,
  child: IValidator,
  options: TransformOptions
): ValueValidator {
  return withMessage(
    transform((value) => (typeof value === 'string' ? fn(value) : value), child),
    options.message
  );
}

/** `Date` becomes ISO-8601, everything else goes through `String()`. */
export function toStr(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return withMessage(
    transform(
      (value) => (value instanceof Date ? value.toISOString() : String(value)),
      child
    ),
    options.message
  );
}

export function trim(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return stringOnly((text) => text.trim(), child, options);
}

export function toLowerCase(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return stringOnly((text) => text.toLowerCase(), child, options);
}

export function toUpperCase(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return stringOnly((text) => text.toUpperCase(), child, options);
}

/** Collapse whitespace runs to one space and trim both ends. */
export function collapseWhitespace(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return stringOnly(
    (text) => text.replace(WHITESPACE_RUNS, ' ').trim(),
    child,
    options
  );
}

/**
 * @example
 * ```ts
 * split(',', listEach(toInt(isGte(0)))).validate('1,2,3').value; // ['1', '2', '3']
 * ```
 */
export function split(
  separator: string,
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return stringOnly((text) => text.split(separator), child, options);
}

export function trimString(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return passThrough((text) => text.trim(), child, options);
}

export function collapseWhitespaceString(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return passThrough(
    (text) => text.replace(WHITESPACE_RUNS, ' ').trim(),
    child,
    options
  );
}

export function toLowerCaseString(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return passThrough((text) => text.toLowerCase(), child, options);
}

export function toUpperCaseString(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return passThrough((text) => text.toUpperCase(), child, options);
}
