import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import { Validator, type ValueValidator } from '../validator/base.js';
import { hasOwn, isPlainObject, prettifyValue } from '../util/pretty.js';
import { isMap, type MessageOption } from './type.js';

function membership(
  test: (value: Record<string, unknown>) => boolean,
  message: string,
  data?: Record<string, unknown>
): ValueValidator {
  return isMap().and(
    new Validator((value) =>
      Result.of(
        isPlainObject(value) && test(value),
        value,
        new Expectation({
          message,
          value,
          code: ExpectationCodes.valueContainsMissing,
          data,
        })
      )
    )
  );
}

export function containsKey(
  key: string,
  options: MessageOption = {}
): ValueValidator {
  return membership(
    (value) => hasOwn(value, key),
    options.message ?? `contains key "${key}"`,
    { key }
  );
}

export function containsKeys(
  keys: readonly string[],
  options: MessageOption = {}
): ValueValidator {
  return membership(
    (value) => keys.every((key) => hasOwn(value, key)),
    options.message ?? `contains keys: ${prettifyValue(keys)}`,
    { keys: [...keys] }
  );
}

/** Values are compared with `===`. */
export function containsValues(
  values: readonly unknown[],
  options: MessageOption = {}
): ValueValidator {
  return membership(
    (value) => {
      const present = Object.values(value);
      return values.every((v) => present.includes(v));
    },
    options.message ?? `contains values: ${prettifyValue(values)}`
  );
}
