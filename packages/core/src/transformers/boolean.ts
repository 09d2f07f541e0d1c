/**
 * Boolean coercions, from strictest to most permissive:
 *
 * - `toBoolStrict`: booleans and `"true"` / `"false"`
 * - `toBool`: also the numbers `1` / `0`
 * - `toBoolLenient`: also `t/f`, `yes/no`, `y/n`, `on/off` and `"1"/"0"`
 *
 * String forms are case-insensitive.
 */

import type { IValidator, ValueValidator } from '../validator/base.js';
import { $isBool, $isString } from '../validators/cached.js';
import { isOneOf } from '../validators/comparison.js';
import { transform, type TransformOptions, withMessage } from './core.js';
import { toLowerCase } from './string.js';

const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', 'off', '0']);

function lowerCaseOneOf(words: readonly string[]): ValueValidator {
  return toLowerCase($isString.and(isOneOf(words)));
}

export function toBool(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isBool
    .or(isOneOf([0, 1]))
    .or(lowerCaseOneOf(['true', 'false']))
    .and(
      transform((value) => {
        if (typeof value === 'boolean') return value;
        if (typeof value === 'number') return value === 1;
        if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
        return undefined;
      }, child)
    );
  return withMessage(base, options.message);
}

export function toBoolStrict(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isBool.or(lowerCaseOneOf(['true', 'false'])).and(
    transform((value) => {
      if (typeof value === 'boolean') return value;
      if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
      return undefined;
    }, child)
  );
  return withMessage(base, options.message);
}

export function toBoolLenient(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isBool
    .or(isOneOf([0, 1]))
    .or(lowerCaseOneOf([...TRUE_WORDS, ...FALSE_WORDS]))
    .and(
      transform((value) => {
        if (typeof value === 'boolean') return value;
        if (typeof value === 'number') return value === 1;
        if (typeof value === 'string') {
          const word = value.trim().toLowerCase();
          if (TRUE_WORDS.has(word)) return true;
          if (FALSE_WORDS.has(word)) return false;
        }
        return undefined;
      }, child)
    );
  return withMessage(base, options.message);
}
