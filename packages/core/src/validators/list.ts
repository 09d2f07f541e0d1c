import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import type { IValidator, ValueValidator } from '../validator/base.js';
import { prettifyValue } from '../util/pretty.js';
import { contains, isEq, length } from './comparison.js';
import { isLte } from './number.js';
import { isList, type MessageOption } from './type.js';

/** The array's length satisfies every validator in `validators`. */
export function listLength(
  validators: readonly IValidator[],
  options: MessageOption = {}
): ValueValidator {
  return isList().and(length(validators, options));
}

export function listIsOfLength(
  size: number,
  options: MessageOption = {}
): ValueValidator {
  return listLength([isEq(size)], options);
}

export function listContains(
  item: unknown,
  options: MessageOption = {}
): ValueValidator {
  return isList().and(
    contains(item).expecting(
      new Expectation({
        message: options.message ?? `List to contain ${prettifyValue(item)}`,
        code: ExpectationCodes.valueContainsMissing,
        data: { needle: prettifyValue(item) },
      })
    )
  );
}

export function listEmpty(options: MessageOption = {}): ValueValidator {
  return listLength([isLte(0)]).expecting(
    new Expectation({
      message: options.message ?? 'List to be empty',
      code: ExpectationCodes.valueLengthOutOfRange,
      data: { expected: 0 },
    })
  );
}
