/**
 * Chain - accumulator behind the fluent builder
 *
 * Layout of a built validator, outermost first:
 *
 *   1. prefix pivots (`pluckValue`): everything built before the pivot runs
 *      first, then the pivot hands its output to the rest
 *   2. pre-coercion validators, on the original type (kept only with
 *      `keepPre`)
 *   3. the coercion, at most one active at a time
 *   4. post-coercion validators, on the coerced value
 */

import {
  type IValidator,
  Validator,
} from '../validator/base.js';

export type CoercionKind =
  | 'int'
  | 'double'
  | 'bool'
  | 'string'
  | 'date'
  | 'json'
  | 'custom';

/** Wraps the validators that should see the pivoted value. */
export type Pivot = (child: IValidator) => IValidator;

export interface CoercionContext {
  readonly kind: CoercionKind;
  readonly transformer: Pivot;
  readonly keepPre: boolean;
}

export class Chain {
  private pre?: IValidator;
  private post?: IValidator;
  private prefix?: Pivot;
  private coercion?: CoercionContext;

  get coercionKind(): CoercionKind | undefined {
    return this.coercion?.kind;
  }

  get isEmpty(): boolean {
    return (
      this.pre === undefined &&
      this.post === undefined &&
      this.prefix === undefined &&
      this.coercion === undefined
    );
  }

  /** Append to the active segment (post once a coercion is set, pre before). */
  add(validator: IValidator): void {
    if (this.coercion) {
      this.post = this.post ? this.post.and(validator) : validator;
    } else {
      this.pre = this.pre ? this.pre.and(validator) : validator;
    }
  }

  /** Replace the active segment with `fn(segment)`. */
  wrap(fn: (current: IValidator) => IValidator): void {
    if (this.coercion) {
      this.post = fn(this.post ?? Validator.valid);
    } else {
      this.pre = fn(this.pre ?? Validator.valid);
    }
  }

  /**
   * Install a coercion. A second built-in coercion replaces the first and
   * discards post validators; a custom one composes with whatever is active.
   */
  setTransform(
    kind: CoercionKind,
    transformer: Pivot,
    options: { keepPre?: boolean } = {}
  ): void {
    const keepPre = options.keepPre ?? false;
    const active = this.coercion;
    if (active && (kind === 'custom' || active.kind === 'custom')) {
      const previous = active.transformer;
      this.coercion = {
        kind,
        transformer: (child) => previous(transformer(child)),
        keepPre: active.keepPre,
      };
    } else {
      this.coercion = { kind, transformer, keepPre };
      if (!keepPre) this.pre = undefined;
    }
    this.post = undefined;
  }

  /**
   * Freeze everything built so far as a guard and pivot the value for the
   * steps that follow.
   */
  pivot(step: Pivot): void {
    const head = this.isEmpty ? undefined : this.build();
    this.prefix = head ? (child) => head.and(step(child)) : step;
    this.pre = undefined;
    this.post = undefined;
    this.coercion = undefined;
  }

  build(): IValidator {
    const core = this.buildCore();
    return this.prefix ? this.prefix(core) : core;
  }

  private buildCore(): IValidator {
    const { coercion, pre } = this;
    if (!coercion) return pre ?? Validator.valid;
    const coerced = coercion.transformer(this.post ?? Validator.valid);
    return coercion.keepPre && pre ? pre.and(coerced) : coerced;
  }
}
