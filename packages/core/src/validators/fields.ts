/**
 * Class-based schemas
 *
 * A {@link MapValidator} subclass declares its fields as class members and
 * lists them in `fields`. Each entry is keyed by its `id` and the whole set
 * is composed through `eskema`, so paths, codes and the nullable/optional
 * flags behave exactly as in a functional schema.
 *
 * @example
 * ```ts
 * class SettingsValidator extends MapValidator {
 *   readonly theme = new Field({ id: 'theme', validators: [isOneOf(['light', 'dark'])] });
 *   get fields() {
 *     return [this.theme];
 *   }
 * }
 *
 * class UserValidator extends MapValidator {
 *   readonly name = new Field({ id: 'name', validators: [$isString] });
 *   readonly settings = new SettingsValidator({ id: 'settings', nullable: true });
 *   get fields() {
 *     return [this.name, this.settings];
 *   }
 * }
 * ```
 */

import type { Result } from '../types/result.js';
import {
  type AllValidator,
  type IValidator,
  type ValidatorFlags,
  ValueValidator,
} from '../validator/base.js';
import type { MaybePromise } from '../util/maybe-async.js';
import { all } from './combinator.js';
import { eskema, type Shape } from './structure.js';

export interface FieldOptions extends ValidatorFlags {
  /** Key of the field in the enclosing map. */
  id: string;
  /** Checked in order; the first failure ends the field. */
  validators: readonly IValidator[];
}

/** A map key together with the validators its value must satisfy. */
export class Field extends ValueValidator {
  readonly id: string;
  readonly validators: readonly IValidator[];
  private readonly chain: AllValidator;

  constructor(options: FieldOptions) {
    super(options);
    this.id = options.id;
    this.validators = Object.freeze([...options.validators]);
    this.chain = all(this.validators);
  }

  run(value: unknown): MaybePromise<Result> {
    return this.chain.run(value);
  }

  copyWith(flags: ValidatorFlags): Field {
    return new Field({
      id: this.id,
      validators: this.validators,
      ...this.mergeFlags(flags),
    });
  }

  nullable(): Field {
    return this.copyWith({ nullable: true });
  }

  optional(): Field {
    return this.copyWith({ optional: true });
  }
}

export type KeyedValidator = Field | MapValidator;

export interface MapValidatorOptions extends ValidatorFlags {
  /** Key under which a nested map validator sits in its parent. */
  id?: string;
}

export abstract class MapValidator extends ValueValidator {
  readonly id: string;
  // Subclass members are initialised after this constructor runs.
  #schema: AllValidator | undefined;

  constructor(options: MapValidatorOptions = {}) {
    super(options);
    this.id = options.id ?? '';
  }

  abstract get fields(): readonly KeyedValidator[];

  run(value: unknown): MaybePromise<Result> {
    this.#schema ??= eskema(shapeOf(this.fields));
    return this.#schema.run(value);
  }

  /** A flagged copy is a {@link Field} wrapping this validator under the same id. */
  copyWith(flags: ValidatorFlags): Field {
    return new Field({
      id: this.id,
      validators: [this],
      ...this.mergeFlags(flags),
    });
  }

  nullable(): Field {
    return this.copyWith({ nullable: true });
  }

  optional(): Field {
    return this.copyWith({ optional: true });
  }
}

function shapeOf(fields: readonly KeyedValidator[]): Shape {
  const shape: Record<string, IValidator> = {};
  for (const field of fields) shape[field.id] = field;
  return shape;
}
