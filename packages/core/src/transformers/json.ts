import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import {
  type IValidator,
  Validator,
  type ValueValidator,
} from '../validator/base.js';
import { isPlainObject } from '../util/pretty.js';
import type { TransformOptions } from './core.js';

function decodeContainer(text: string): unknown {
  try {
    const decoded: unknown = JSON.parse(text);
    return isPlainObject(decoded) || Array.isArray(decoded) ? decoded : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Decodes a JSON string into an object or array; objects and arrays pass
 * through. Decoded scalars (`"42"`) are rejected.
 */
export function toJsonDecoded(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return new Validator((value) => {
    const decoded =
      isPlainObject(value) || Array.isArray(value)
        ? value
        : typeof value === 'string'
          ? decodeContainer(value)
          : undefined;
    if (decoded === undefined) {
      return Result.invalid(
        value,
        new Expectation({
          message: options.message ?? 'a JSON decodable value (object/array)',
          value,
          code: ExpectationCodes.valueCoercionFailed,
        })
      );
    }
    return child.evaluate(decoded);
  });
}
