/**
 * Validators that look at the enclosing object. They only take effect as
 * fields of an `eskema` map (except `switchBy`, which validates the map it
 * is given).
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
  ResolveValidator,
  type Resolver,
  WhenValidator,
} from '../validator/contextual.js';
import { mapMaybe } from '../util/maybe-async.js';
import { hasOwn, isPlainObject, prettifyValue } from '../util/pretty.js';
import { containsKeys } from './map.js';
import { optional, required } from './presence.js';
import { isMap } from './type.js';

export interface WhenOptions {
  then: IValidator;
  otherwise: IValidator;
  message?: string;
}

/**
 * `condition` runs against the parent object; the field is validated by
 * `then` or `otherwise`.
 *
 * @example
 * ```ts
 * eskema({
 *   kind: isString(),
 *   permissions: when(eskema({ kind: isEq('admin') }), {
 *     then: isList(),
 *     otherwise: isNull(),
 *   }),
 * });
 * ```
 */
export function when(
  condition: IValidator,
  options: WhenOptions
): WhenValidator {
  return new WhenValidator(condition, options);
}

/** Required (non-null) when `condition` holds on the parent, optional otherwise. */
export function requiredWhen(
  condition: IValidator,
  options: { validator: IValidator; message?: string }
): WhenValidator {
  return when(condition, {
    then: required(options.validator),
    otherwise: optional(options.validator),
    message: options.message,
  });
}

export function resolve(resolver: Resolver): ResolveValidator {
  return new ResolveValidator(resolver);
}

/**
 * Dispatch on `value[key]`: the matching validator validates the whole map.
 * An unmapped discriminator fails with `logic.unknown_variant`.
 */
export function switchBy(
  key: string,
  variants: Readonly<Record<string, IValidator>>
): AllValidator {
  return isMap()
    .and(containsKeys([key], { message: `Missing key: "${key}"` }))
    .and(
      new Validator((value) => {
        const discriminator = isPlainObject(value) ? value[key] : undefined;
        const variant =
          typeof discriminator === 'string' && hasOwn(variants, discriminator)
            ? variants[discriminator]
            : undefined;
        if (!variant) {
          return Result.invalid(
            value,
            new Expectation({
              message: 'unknown type',
              value,
              code: ExpectationCodes.logicUnknownVariant,
              data: {
                key,
                found: prettifyValue(discriminator),
                variants: Object.keys(variants),
              },
            })
          );
        }
        return mapMaybe(variant.evaluate(value), (result) =>
          result.isValid ? Result.valid(value) : result
        );
      })
    );
}
