/**
 * Object reshaping: pick a subset of keys, pluck one value, flatten nesting,
 * or validate a single field.
 */

import { Result } from '../types/result.js';
import {
  type AllValidator,
  type IValidator,
  Validator,
} from '../validator/base.js';
import { containsKey } from '../validators/map.js';
import { isMap } from '../validators/type.js';
import { mapMaybe } from '../util/maybe-async.js';
import { hasOwn, isPlainObject, type PlainObject } from '../util/pretty.js';
import { pivotValue } from './core.js';

/** A new object with only the listed keys that are present. */
export function pickKeys(
  keys: readonly string[],
  child: IValidator
): Validator {
  return pivotValue(
    (value) => {
      if (!isPlainObject(value)) return undefined;
      const picked: PlainObject = {};
      for (const key of keys) {
        if (hasOwn(value, key)) picked[key] = value[key];
      }
      return picked;
    },
    { child, errorMessage: `a Map containing keys: ${keys.join(', ')}` }
  );
}

/** The value under `key`; a missing key fails. */
export function pluckKey(key: string, child: IValidator): Validator {
  return pivotValue(
    (value) =>
      isPlainObject(value) && hasOwn(value, key) ? value[key] : undefined,
    { child, errorMessage: `a Map containing key: ${key}` }
  );
}

/**
 * `{ a: { b: 1 } }` becomes `{ 'a.b': 1 }` (with `.` as delimiter). Arrays
 * are leaves; empty nested objects disappear.
 */
export function flattenMapKeys(delimiter: string, child: IValidator): Validator {
  return pivotValue(
    (value) => {
      if (!isPlainObject(value)) return undefined;
      const flat: PlainObject = {};
      const walk = (node: PlainObject, prefix: string): void => {
        for (const [key, nested] of Object.entries(node)) {
          const path = prefix === '' ? key : `${prefix}${delimiter}${key}`;
          if (isPlainObject(nested)) walk(nested, path);
          else flat[path] = nested;
        }
      };
      walk(value, '');
      return flat;
    },
    { child, errorMessage: 'a Map flattable by keys' }
  );
}

/**
 * Validates `value[key]` with `inner`; failures are reported under `.key`.
 * On success the Result carries the field's value.
 */
export function getField(key: string, inner: IValidator): AllValidator {
  return isMap()
    .and(containsKey(key))
    .and(
      new Validator((value) => {
        const field = isPlainObject(value) ? value[key] : undefined;
        return mapMaybe(inner.evaluate(field), (result) => {
          if (result.isValid) return result;
          return Result.fromExpectations(
            value,
            result.expectations.map((e) => e.withPathPrefix(`.${key}`))
          );
        });
      })
    );
}
