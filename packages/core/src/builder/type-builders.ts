/**
 * Typed builders
 *
 * Every builder can coerce (`toInt()`, `toStr()`, `use(pivot)`, ...), which
 * returns the builder for the new type over the same chain. Type-specific
 * steps only exist on the builder where they make sense.
 */

import { type IValidator, Validator } from '../validator/base.js';
import {
  eskema,
  eskemaStrict,
  listEach,
  type Shape,
} from '../validators/structure.js';
import {
  contains as containsItem,
  isEq,
  length as lengthIs,
} from '../validators/comparison.js';
import {
  isDateAfter,
  isDateBefore,
  isDateBetween,
  isDateInFuture,
  isDateInPast,
  isDateSameDay,
  type BetweenOptions,
  type InclusiveOption,
  type NowOptions,
} from '../validators/date.js';
import {
  isJsonArray,
  isJsonContainer,
  isJsonObject,
  jsonArrayEvery,
  jsonArrayLength,
  jsonHasKeys,
  type LengthBounds,
} from '../validators/json.js';
import { listEmpty, listLength } from '../validators/list.js';
import { containsKey as mapContainsKey } from '../validators/map.js';
import { isGt, isGte, isInRange, isLt, isLte } from '../validators/number.js';
import {
  isBoolString,
  isDateString,
  isDoubleString,
  isEmail,
  isIntString,
  isLowerCase,
  isNotEmpty,
  isNumString,
  isStrictUrl,
  isUpperCase,
  isUrl,
  isUuidV4,
  stringEmpty,
  stringMatchesPattern,
} from '../validators/string.js';
import {
  isBool,
  isDate,
  isDouble,
  isInt,
  isList,
  isMap,
  isNumber,
  isString,
  isType,
  type MessageOption,
} from '../validators/type.js';
import * as tr from '../transformers/index.js';
import { BaseBuilder, type BuilderState } from './base-builder.js';
import type { CoercionKind, Pivot } from './chain.js';

export interface CoerceOptions extends MessageOption {
  /** Keep the validators added before the coercion (default: discard them). */
  keepPre?: boolean;
}

/** A user-defined coercion for {@link CoercibleBuilder.use}. */
export interface CustomPivot {
  transformer: Pivot;
  keepPre?: boolean;
  /** Label for debugging; not used in validation. */
  name?: string;
}

type Transformer = (
  child: IValidator,
  options: tr.TransformOptions
) => IValidator;

export class CoercibleBuilder extends BaseBuilder {
  toInt(options: CoerceOptions = {}): IntBuilder {
    return this.coerce('int', ['int'], tr.toInt, options, IntBuilder);
  }

  /** Integers and integer strings only; no truncation of `12.5`. */
  toIntStrict(options: CoerceOptions = {}): IntBuilder {
    return this.coerce('int', ['int'], tr.toIntStrict, options, IntBuilder);
  }

  toIntSafe(options: CoerceOptions = {}): IntBuilder {
    return this.coerce('int', ['int'], tr.toIntSafe, options, IntBuilder);
  }

  toDouble(options: CoerceOptions = {}): DoubleBuilder {
    return this.coerce('double', ['double'], tr.toDouble, options, DoubleBuilder);
  }

  toNum(options: CoerceOptions = {}): NumberBuilder {
    return this.coerce(
      'double',
      ['double', 'int'],
      tr.toNum,
      options,
      NumberBuilder
    );
  }

  // bigint shares the numeric slot; comparisons accept both number and bigint
  toBigInt(options: CoerceOptions = {}): NumberBuilder {
    return this.coerce('double', ['double'], tr.toBigInt, options, NumberBuilder);
  }

  toBool(options: CoerceOptions = {}): BoolBuilder {
    return this.coerce('bool', ['bool'], tr.toBool, options, BoolBuilder);
  }

  toBoolStrict(options: CoerceOptions = {}): BoolBuilder {
    return this.coerce('bool', ['bool'], tr.toBoolStrict, options, BoolBuilder);
  }

  toBoolLenient(options: CoerceOptions = {}): BoolBuilder {
    return this.coerce('bool', ['bool'], tr.toBoolLenient, options, BoolBuilder);
  }

  toStr(options: CoerceOptions = {}): StringBuilder {
    return this.coerce('string', ['string'], tr.toStr, options, StringBuilder);
  }

  toJson(options: CoerceOptions = {}): JsonBuilder {
    return this.coerce('json', ['json'], tr.toJsonDecoded, options, JsonBuilder);
  }

  toDate(options: CoerceOptions = {}): DateBuilder {
    return this.coerce('date', ['date'], tr.toDate, options, DateBuilder);
  }

  toDateOnly(options: CoerceOptions = {}): DateBuilder {
    return this.coerce('date', ['date'], tr.toDateOnly, options, DateBuilder);
  }

  /** Install a custom coercion; it composes with any coercion already active. */
  use(pivot: CustomPivot): GenericBuilder {
    this.state.chain.setTransform('custom', pivot.transformer, {
      keepPre: pivot.keepPre,
    });
    return new GenericBuilder(this.state);
  }

  private coerce<B extends BaseBuilder>(
    kind: CoercionKind,
    activeKinds: readonly CoercionKind[],
    transformer: Transformer,
    options: CoerceOptions,
    next: new (state: BuilderState) => B
  ): B {
    const active = this.state.chain.coercionKind;
    if (active === undefined || !activeKinds.includes(active)) {
      const { message } = options;
      this.state.chain.setTransform(
        kind,
        (child) => transformer(child, { message }),
        { keepPre: options.keepPre }
      );
    }
    return new next(this.state);
  }
}

export class StringBuilder extends CoercibleBuilder {
  /** The string's length satisfies every validator in `validators`. */
  length(validators: readonly IValidator[], options: MessageOption = {}): this {
    return this.add(lengthIs(validators), options);
  }

  lengthMin(min: number, options: MessageOption = {}): this {
    return this.length([isGte(min)], options);
  }

  lengthMax(max: number, options: MessageOption = {}): this {
    return this.length([isLte(max)], options);
  }

  lengthRange(min: number, max: number, options: MessageOption = {}): this {
    return this.length([isInRange(min, max)], options);
  }

  empty(options: MessageOption = {}): this {
    return this.add(stringEmpty(), options);
  }

  notEmpty(options: MessageOption = {}): this {
    return this.add(isNotEmpty(), options);
  }

  contains(needle: string, options: MessageOption = {}): this {
    return this.add(containsItem(needle), options);
  }

  matches(pattern: RegExp | string, options: MessageOption = {}): this {
    return this.add(stringMatchesPattern(pattern), options);
  }

  email(options: MessageOption = {}): this {
    return this.add(isEmail(), options);
  }

  url(options: MessageOption & { strict?: boolean } = {}): this {
    return this.add(isUrl({ strict: options.strict }), options);
  }

  strictUrl(options: MessageOption = {}): this {
    return this.add(isStrictUrl(), options);
  }

  uuid(options: MessageOption = {}): this {
    return this.add(isUuidV4(), options);
  }

  lowerCase(options: MessageOption = {}): this {
    return this.add(isLowerCase(), options);
  }

  upperCase(options: MessageOption = {}): this {
    return this.add(isUpperCase(), options);
  }

  intString(options: MessageOption = {}): this {
    return this.add(isIntString(), options);
  }

  doubleString(options: MessageOption = {}): this {
    return this.add(isDoubleString(), options);
  }

  numString(options: MessageOption = {}): this {
    return this.add(isNumString(), options);
  }

  boolString(options: MessageOption = {}): this {
    return this.add(isBoolString(), options);
  }

  dateString(options: MessageOption = {}): this {
    return this.add(isDateString(), options);
  }

  // The normalizers below wrap the active segment, so checks added before
  // and after them both see the normalized string.

  trim(): this {
    return this.wrap((current) => tr.trimString(current));
  }

  collapseWhitespace(): this {
    return this.wrap((current) => tr.collapseWhitespaceString(current));
  }

  toLowerCase(): this {
    return this.wrap((current) => tr.toLowerCaseString(current));
  }

  toUpperCase(): this {
    return this.wrap((current) => tr.toUpperCaseString(current));
  }
}

export class NumberBuilder extends CoercibleBuilder {
  lt(limit: number, options: MessageOption = {}): this {
    return this.add(isLt(limit), options);
  }

  lte(limit: number, options: MessageOption = {}): this {
    return this.add(isLte(limit), options);
  }

  gt(limit: number, options: MessageOption = {}): this {
    return this.add(isGt(limit), options);
  }

  gte(limit: number, options: MessageOption = {}): this {
    return this.add(isGte(limit), options);
  }

  /** Inclusive on both ends. */
  between(min: number, max: number, options: MessageOption = {}): this {
    return this.add(isInRange(min, max), options);
  }
}

export class IntBuilder extends NumberBuilder {}

export class DoubleBuilder extends NumberBuilder {}

export class BoolBuilder extends CoercibleBuilder {
  isTrue(options: MessageOption = {}): this {
    return this.add(isEq(true, { message: options.message ?? 'true' }));
  }

  isFalse(options: MessageOption = {}): this {
    return this.add(isEq(false, { message: options.message ?? 'false' }));
  }
}

export class DateBuilder extends CoercibleBuilder {
  before(bound: Date, options: InclusiveOption = {}): this {
    return this.add(isDateBefore(bound, options));
  }

  after(bound: Date, options: InclusiveOption = {}): this {
    return this.add(isDateAfter(bound, options));
  }

  /**
   * @throws {BuilderError} When `end` is before `start`
   */
  betweenDates(start: Date, end: Date, options: BetweenOptions = {}): this {
    return this.add(isDateBetween(start, end, options));
  }

  sameDay(target: Date, options: MessageOption = {}): this {
    return this.add(isDateSameDay(target, options));
  }

  inPast(options: NowOptions = {}): this {
    return this.add(isDateInPast(options));
  }

  inFuture(options: NowOptions = {}): this {
    return this.add(isDateInFuture(options));
  }
}

export class ListBuilder extends CoercibleBuilder {
  length(validators: readonly IValidator[], options: MessageOption = {}): this {
    return this.add(lengthIs(validators), options);
  }

  lengthMin(min: number, options: MessageOption = {}): this {
    return this.length([isGte(min)], options);
  }

  lengthMax(max: number, options: MessageOption = {}): this {
    return this.length([isLte(max)], options);
  }

  lengthRange(min: number, max: number, options: MessageOption = {}): this {
    return this.length([isInRange(min, max)], options);
  }

  empty(options: MessageOption = {}): this {
    return this.add(listEmpty(), options);
  }

  notEmpty(options: MessageOption = {}): this {
    return this.add(listLength([isGt(0)]), options);
  }

  contains(item: unknown, options: MessageOption = {}): this {
    return this.add(containsItem(item), options);
  }

  each(element: IValidator, options: MessageOption = {}): this {
    return this.add(listEach(element), options);
  }
}

export class MapBuilder extends CoercibleBuilder {
  schema(shape: Shape, options: MessageOption = {}): this {
    return this.add(eskema(shape), options);
  }

  /** {@link schema} that also rejects undeclared keys. */
  strict(shape: Shape, options: MessageOption = {}): this {
    return this.add(eskemaStrict(shape), options);
  }

  containsKey(key: string, options: MessageOption = {}): this {
    return this.add(mapContainsKey(key), options);
  }

  /** Later steps see only the listed keys. */
  pick(keys: readonly string[]): this {
    return this.add(tr.pickKeys(keys, Validator.valid));
  }

  /** Later steps see the value under `key`; a missing key fails. */
  pluck(key: string): this {
    return this.add(tr.pluckKey(key, Validator.valid));
  }

  /**
   * Validate the map so far, then continue with the value under `key` as a
   * fresh chain (which may coerce again).
   *
   * @example
   * ```ts
   * v().map().pluckValue('age').toIntStrict().gte(18).build();
   * ```
   */
  pluckValue(key: string): GenericBuilder {
    this.state.chain.pivot((child) => tr.pluckKey(key, child));
    return new GenericBuilder(this.state);
  }

  /** Later steps see `{ 'a.b': 1 }` for `{ a: { b: 1 } }`. */
  flattenKeys(delimiter = '.'): this {
    return this.add(tr.flattenMapKeys(delimiter, Validator.valid));
  }
}

export class JsonBuilder extends CoercibleBuilder {
  jsonContainer(options: MessageOption = {}): this {
    return this.add(isJsonContainer(), options);
  }

  jsonObject(options: MessageOption = {}): this {
    return this.add(isJsonObject(), options);
  }

  jsonArray(options: MessageOption = {}): this {
    return this.add(isJsonArray(), options);
  }

  jsonRequiresKeys(keys: readonly string[], options: MessageOption = {}): this {
    return this.add(jsonHasKeys(keys), options);
  }

  jsonArrayLen(bounds: LengthBounds, options: MessageOption = {}): this {
    return this.add(jsonArrayLength(bounds), options);
  }

  jsonArrayEach(element: IValidator, options: MessageOption = {}): this {
    return this.add(jsonArrayEvery(element), options);
  }

  schema(shape: Shape, options: MessageOption = {}): this {
    return this.add(eskema(shape), options);
  }

  strict(shape: Shape, options: MessageOption = {}): this {
    return this.add(eskemaStrict(shape), options);
  }

  each(element: IValidator, options: MessageOption = {}): this {
    return this.add(listEach(element), options);
  }
}

/**
 * Builder for a value of unknown type, e.g. after `pluckValue` or `use`.
 * The type selectors add a type check and continue on the same chain.
 */
export class GenericBuilder extends CoercibleBuilder {
  string(options: MessageOption = {}): StringBuilder {
    return new StringBuilder(this.state).add(isString(), options);
  }

  int(options: MessageOption = {}): IntBuilder {
    return new IntBuilder(this.state).add(isInt(), options);
  }

  double(options: MessageOption = {}): DoubleBuilder {
    return new DoubleBuilder(this.state).add(isDouble(), options);
  }

  number(options: MessageOption = {}): NumberBuilder {
    return new NumberBuilder(this.state).add(isNumber(), options);
  }

  bool(options: MessageOption = {}): BoolBuilder {
    return new BoolBuilder(this.state).add(isBool(), options);
  }

  list(options: MessageOption = {}): ListBuilder {
    return new ListBuilder(this.state).add(isList(), options);
  }

  map(options: MessageOption = {}): MapBuilder {
    return new MapBuilder(this.state).add(isMap(), options);
  }

  date(options: MessageOption = {}): DateBuilder {
    return new DateBuilder(this.state).add(isDate(), options);
  }

  json(options: MessageOption = {}): JsonBuilder {
    return new JsonBuilder(this.state).add(isJsonContainer(), options);
  }

  type(
    guard: (value: unknown) => boolean,
    name: string,
    options: MessageOption = {}
  ): GenericBuilder {
    return this.add(isType(guard, name), options);
  }
}

