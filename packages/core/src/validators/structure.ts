/**
 * Structural validators
 *
 * `eskema` walks a plain object field by field, `eskemaList` an array
 * position by position and `listEach` every element of an array. Failures of
 * nested validators are collected (not short-circuited) and re-rooted under
 * `.key` / `[index]` path segments.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import {
  type AllValidator,
  type IValidator,
  Validator,
} from '../validator/base.js';
import {
  eachMaybe,
  mapMaybe,
  type MaybePromise,
} from '../util/maybe-async.js';
import { hasOwn, isPlainObject, type PlainObject } from '../util/pretty.js';
import { listIsOfLength } from './list.js';
import { isList, isMap, type MessageOption } from './type.js';

export type Shape = Readonly<Record<string, IValidator>>;

/**
 * A plain object whose declared fields satisfy their validators. Keys not in
 * `shape` are ignored; see {@link eskemaStrict}.
 *
 * @example
 * ```ts
 * const user = eskema({
 *   name: isString(),
 *   age: isInt().and(isGte(0)),
 *   nickname: isString().optional(),
 * });
 * user.validate({ name: 'Ada', age: -1 }).description; // '.age: greater than or equal to 0'
 * ```
 */
export function eskema(shape: Shape, options: MessageOption = {}): AllValidator {
  const fields = Object.entries(shape);
  return isMap().and(
    new Validator((value) => {
      if (!isPlainObject(value)) return Result.valid(value);
      const parent = value;
      const collected: Expectation[] = [];
      const done = eachMaybe(fields, ([key, validator]) =>
        mapMaybe(checkField(validator, parent, key), (result) => {
          if (result?.isNotValid) {
            collectUnder(`.${key}`, result, collected, {
              code: ExpectationCodes.structureMapFieldFailed,
              message: options.message,
            });
          }
          return false;
        })
      );
      return mapMaybe(done, () => Result.fromExpectations(value, collected));
    })
  );
}

function checkField(
  validator: IValidator,
  parent: PlainObject,
  key: string
): MaybePromise<Result | undefined> {
  const exists = hasOwn(parent, key);
  const fieldValue = exists ? parent[key] : undefined;
  if (!exists && validator.isOptional) return undefined;
  const isNull = fieldValue === null || fieldValue === undefined;
  if (exists && isNull && validator.isNullable) return undefined;
  if (validator.kind === 'contextual') {
    return validator.runWithParent(fieldValue, parent, exists);
  }
  return validator.run(fieldValue);
}

/**
 * {@link eskema} that also rejects keys missing from `shape`
 * (`structure.unknown_key`, offending keys in `data.keys`).
 */
export function eskemaStrict(
  shape: Shape,
  options: MessageOption = {}
): AllValidator {
  return eskema(shape).and(
    new Validator((value) => {
      const unknown = isPlainObject(value)
        ? Object.keys(value).filter((key) => !hasOwn(shape, key))
        : [];
      return Result.of(
        unknown.length === 0,
        value,
        new Expectation({
          message: options.message ?? `has unknown keys: ${unknown.join(', ')}`,
          value,
          code: ExpectationCodes.structureUnknownKey,
          data: { keys: unknown },
        })
      );
    })
  );
}

/** An array of exactly `items.length` elements, each checked by the validator at its position. */
export function eskemaList(items: readonly IValidator[]): AllValidator {
  const positional = [...items];
  return isList()
    .and(listIsOfLength(positional.length))
    .and(
      new Validator((value) =>
        Array.isArray(value)
          ? checkElements(value, (index) => positional[index])
          : Result.valid(value)
      )
    );
}

/** An array whose every element satisfies `item`. */
export function listEach(
  item: IValidator,
  options: MessageOption = {}
): AllValidator {
  return isList().and(
    new Validator((value) =>
      Array.isArray(value)
        ? checkElements(value, () => item, options.message)
        : Result.valid(value)
    )
  );
}

function checkElements(
  list: readonly unknown[],
  validatorAt: (index: number) => IValidator,
  message?: string
): MaybePromise<Result> {
  const collected: Expectation[] = [];
  const done = eachMaybe(list, (element, index) => {
    const validator = validatorAt(index);
    if ((element === null || element === undefined) && validator.isNullable) {
      return false;
    }
    return mapMaybe(validator.run(element), (result) => {
      if (result.isNotValid) {
        collectUnder(`[${index}]`, result, collected, {
          code: ExpectationCodes.structureListItemFailed,
          message,
        });
      }
      return false;
    });
  });
  return mapMaybe(done, () => Result.fromExpectations(list, collected));
}

function collectUnder(
  segment: string,
  result: Result,
  into: Expectation[],
  fallback: { code: string; message?: string }
): void {
  for (const e of result.expectations) {
    into.push(
      e.copyWith({
        message: fallback.message ?? e.message,
        path: `${segment}${e.path ?? ''}`,
        code: e.code ?? fallback.code,
      })
    );
  }
}
