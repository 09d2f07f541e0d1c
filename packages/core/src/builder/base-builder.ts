/**
 * Steps shared by every typed builder. Builders of one chain share a single
 * {@link BuilderState}, so switching type (`toInt()`, `pluckValue()`) keeps
 * the accumulated validators and the nullable/optional marks.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { expectation } from '../types/expectation.js';
import type { Result } from '../types/result.js';
import type { IValidator, ValidateOptions } from '../validator/base.js';
import { not } from '../validators/combinator.js';
import { isDeepEq, isEq, isOneOf } from '../validators/comparison.js';
import { asyncValidator, validator } from '../validators/predicate.js';
import type { MessageOption } from '../validators/type.js';
import { Chain } from './chain.js';

export interface BuilderState {
  readonly chain: Chain;
  /** Consumed by the next `add` / `wrap`. */
  negated: boolean;
  optional: boolean;
  nullable: boolean;
}

export function createBuilderState(): BuilderState {
  return { chain: new Chain(), negated: false, optional: false, nullable: false };
}

export interface PredicateOptions {
  code?: string;
}

export class BaseBuilder {
  protected readonly state: BuilderState;

  constructor(state: BuilderState = createBuilderState()) {
    this.state = state;
  }

  /** Negate the next step only. */
  not(): this {
    this.state.negated = true;
    return this;
  }

  add(validator: IValidator, options: MessageOption = {}): this {
    this.state.chain.add(this.decorate(validator, options.message));
    this.state.negated = false;
    return this;
  }

  /** Replace everything in the active segment with `fn(current)`. */
  wrap(
    fn: (current: IValidator) => IValidator,
    options: MessageOption = {}
  ): this {
    this.state.chain.wrap((current) =>
      this.decorate(fn(current), options.message)
    );
    this.state.negated = false;
    return this;
  }

  /** Skip the whole built validator when the key is absent. Position-independent. */
  optional(): this {
    this.state.optional = true;
    return this;
  }

  /** Accept `null` for the whole built validator. Position-independent. */
  nullable(): this {
    this.state.nullable = true;
    return this;
  }

  /** Replace the failure message of everything so far; codes are kept. */
  error(message: string): this {
    return this.wrap((current) => current.expecting(message));
  }

  oneOf(values: readonly unknown[], options: MessageOption = {}): this {
    return this.add(isOneOf(values, options));
  }

  eq(value: unknown, options: MessageOption = {}): this {
    return this.add(isEq(value, options));
  }

  deepEq(value: unknown, options: MessageOption = {}): this {
    return this.add(isDeepEq(value, options));
  }

  custom(
    predicate: (value: unknown) => boolean,
    message: string,
    options: PredicateOptions = {}
  ): this {
    return this.add(
      validator(predicate, (value) =>
        expectation(message, value, {
          code: options.code ?? ExpectationCodes.logicPredicateFailed,
        })
      )
    );
  }

  async(
    test: (value: unknown) => Promise<boolean>,
    message: string,
    options: PredicateOptions = {}
  ): this {
    return this.add(asyncValidator(test, message, options));
  }

  build(): IValidator {
    const built = this.state.chain.build();
    const { nullable, optional } = this.state;
    if (!nullable && !optional) return built;
    return built.copyWith({
      nullable: nullable || undefined,
      optional: optional || undefined,
    });
  }

  validate(value: unknown, options: ValidateOptions = {}): Result {
    return this.build().validate(value, options);
  }

  validateAsync(value: unknown, options: ValidateOptions = {}): Promise<Result> {
    return this.build().validateAsync(value, options);
  }

  private decorate(v: IValidator, message: string | undefined): IValidator {
    const negated = this.state.negated ? not(v) : v;
    return message === undefined ? negated : negated.expecting(message);
  }
}
