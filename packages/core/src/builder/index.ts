/**
 * Fluent validator builder
 *
 * @example
 * ```ts
 * const age = v().string().toIntStrict().gte(0).lte(150).build();
 * age.validate('42').value; // 42
 *
 * const user = v().map().schema({
 *   name: v().string().lengthMin(1).build(),
 *   email: v().string().email().optional().build(),
 * }).build();
 * ```
 */

import type { MessageOption } from '../validators/type.js';
import {
  type BoolBuilder,
  type DateBuilder,
  type DoubleBuilder,
  GenericBuilder,
  type IntBuilder,
  type JsonBuilder,
  type ListBuilder,
  type MapBuilder,
  type NumberBuilder,
  type StringBuilder,
} from './type-builders.js';

/** Entry point; every selector starts a new chain. */
export class RootBuilder {
  string(options: MessageOption = {}): StringBuilder {
    return new GenericBuilder().string(options);
  }

  int(options: MessageOption = {}): IntBuilder {
    return new GenericBuilder().int(options);
  }

  /** Any finite number. */
  double(options: MessageOption = {}): DoubleBuilder {
    return new GenericBuilder().double(options);
  }

  number(options: MessageOption = {}): NumberBuilder {
    return new GenericBuilder().number(options);
  }

  bool(options: MessageOption = {}): BoolBuilder {
    return new GenericBuilder().bool(options);
  }

  list(options: MessageOption = {}): ListBuilder {
    return new GenericBuilder().list(options);
  }

  map(options: MessageOption = {}): MapBuilder {
    return new GenericBuilder().map(options);
  }

  date(options: MessageOption = {}): DateBuilder {
    return new GenericBuilder().date(options);
  }

  /** Decoded JSON: a plain object or an array. */
  json(options: MessageOption = {}): JsonBuilder {
    return new GenericBuilder().json(options);
  }

  type(
    guard: (value: unknown) => boolean,
    name: string,
    options: MessageOption = {}
  ): GenericBuilder {
    return new GenericBuilder().type(guard, name, options);
  }

  /** No type check; coerce or pick a type later. */
  any(): GenericBuilder {
    return new GenericBuilder();
  }
}

export function builder(): RootBuilder {
  return new RootBuilder();
}

export const v = builder;

export { Chain, type CoercionKind, type Pivot } from './chain.js';
export { BaseBuilder, type BuilderState, type PredicateOptions } from './base-builder.js';
export {
  BoolBuilder,
  CoercibleBuilder,
  type CoerceOptions,
  type CustomPivot,
  DateBuilder,
  DoubleBuilder,
  GenericBuilder,
  IntBuilder,
  JsonBuilder,
  ListBuilder,
  MapBuilder,
  NumberBuilder,
  StringBuilder,
} from './type-builders.js';
