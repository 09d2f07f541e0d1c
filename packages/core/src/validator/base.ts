/**
 * Validator contract and the logical combinators built on it
 *
 * The combinator classes live next to the contract because every validator
 * exposes `and` / `or` / `expecting`, which construct them. Evaluation of
 * sibling children is strictly left-to-right and stays synchronous until the
 * first child returns a promise.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import { AsyncValidatorError, ValidatorFailedError } from '../types/errors.js';
import { Result } from '../types/result.js';
import { isPromise, mapMaybe, type MaybePromise } from '../util/maybe-async.js';
import type { PlainObject } from '../util/pretty.js';

export type ValidatorFn = (value: unknown) => MaybePromise<Result>;

export interface ValidatorFlags {
  nullable?: boolean;
  optional?: boolean;
}

export interface ValidateOptions {
  /** Whether the key holding `value` is present in its parent (default: true) */
  exists?: boolean;
}

export type IValidator = ValueValidator | ContextualValidator;

export abstract class BaseValidator {
  abstract readonly kind: 'value' | 'contextual';
  readonly isNullable: boolean;
  readonly isOptional: boolean;

  constructor(flags: ValidatorFlags = {}) {
    this.isNullable = flags.nullable ?? false;
    this.isOptional = flags.optional ?? false;
  }

  /** Raw evaluation, no nullable/optional handling. Combinators call this on children. */
  abstract run(value: unknown): MaybePromise<Result>;

  abstract copyWith(flags: ValidatorFlags): IValidator;

  /** Flag-aware evaluation that may or may not be pending. */
  evaluate(value: unknown, options: ValidateOptions = {}): MaybePromise<Result> {
    const exists = options.exists ?? true;
    if (value === null || value === undefined) {
      if ((this.isNullable && exists) || (this.isOptional && !exists)) {
        return Result.valid(value);
      }
    }
    return this.run(value);
  }

  /**
   * @throws {AsyncValidatorError} When any participant returned a promise
   */
  validate(value: unknown, options: ValidateOptions = {}): Result {
    const result = this.evaluate(value, options);
    if (isPromise(result)) {
      // Nobody awaits this result; a later rejection must not surface as unhandled.
      void result.catch(() => undefined);
      throw new AsyncValidatorError();
    }
    return result;
  }

  async validateAsync(
    value: unknown,
    options: ValidateOptions = {}
  ): Promise<Result> {
    return this.evaluate(value, options);
  }

  /**
   * @throws {ValidatorFailedError} When the value does not satisfy the validator
   */
  validateOrThrow(value: unknown): Result {
    const result = this.validate(value);
    if (result.isNotValid) throw new ValidatorFailedError({ result });
    return result;
  }

  isValid(value: unknown): boolean {
    return this.validate(value).isValid;
  }

  isNotValid(value: unknown): boolean {
    return !this.isValid(value);
  }

  async isValidAsync(value: unknown): Promise<boolean> {
    return (await this.validateAsync(value)).isValid;
  }

  async isNotValidAsync(value: unknown): Promise<boolean> {
    return !(await this.isValidAsync(value));
  }

  /** Conjunction; plain `all` operands on either side are spliced flat. */
  and(other: IValidator): AllValidator {
    return new AllValidator([...allParts(this.self()), ...allParts(other)]);
  }

  /** Disjunction; plain `any` operands on either side are spliced flat. */
  or(other: IValidator): AnyValidator {
    return new AnyValidator([...anyParts(this.self()), ...anyParts(other)]);
  }

  /** Replace failures with `expectation` (a bare string becomes its message). */
  expecting(expectation: Expectation | string): ExpectationValidator {
    return withExpectation(
      this.self(),
      typeof expectation === 'string'
        ? new Expectation({ message: expectation })
        : expectation
    );
  }

  protected mergeFlags(flags: ValidatorFlags): Required<ValidatorFlags> {
    return {
      nullable: flags.nullable ?? this.isNullable,
      optional: flags.optional ?? this.isOptional,
    };
  }

  protected abstract self(): IValidator;
}

/**
 * A validator over the value itself (as opposed to its parent object).
 */
export abstract class ValueValidator extends BaseValidator {
  readonly kind = 'value' as const;

  abstract copyWith(flags: ValidatorFlags): ValueValidator;

  nullable(): ValueValidator {
    return this.copyWith({ nullable: true });
  }

  optional(): ValueValidator {
    return this.copyWith({ optional: true });
  }

  protected self(): ValueValidator {
    return this;
  }
}

/** Function-backed validator. */
export class Validator extends ValueValidator {
  /** Accepts everything and passes the value through. */
  static readonly valid: Validator = new Validator((value) =>
    Result.valid(value)
  );

  constructor(
    private readonly fn: ValidatorFn,
    flags: ValidatorFlags = {}
  ) {
    super(flags);
  }

  run(value: unknown): MaybePromise<Result> {
    return this.fn(value);
  }

  copyWith(flags: ValidatorFlags): Validator {
    return new Validator(this.fn, this.mergeFlags(flags));
  }
}

/**
 * A validator that needs the enclosing object. Structural traversal hands it
 * the parent through {@link ContextualValidator.runWithParent}; evaluated on
 * its own it returns a `logic.contextual_misuse` failure.
 */
export abstract class ContextualValidator extends BaseValidator {
  readonly kind = 'contextual' as const;

  abstract runWithParent(
    value: unknown,
    parent: PlainObject,
    exists: boolean
  ): MaybePromise<Result>;

  abstract copyWith(flags: ValidatorFlags): ContextualValidator;

  /** Name used in the misuse message, e.g. `when`. */
  protected abstract readonly label: string;

  run(value: unknown): MaybePromise<Result> {
    return Result.invalid(
      value,
      new Expectation({
        message: `\`${this.label}\` validator can only be used inside an \`eskema\` map validator`,
        value,
        code: ExpectationCodes.logicContextualMisuse,
      })
    );
  }

  nullable(): ContextualValidator {
    return this.copyWith({ nullable: true });
  }

  optional(): ContextualValidator {
    return this.copyWith({ optional: true });
  }

  protected self(): ContextualValidator {
    return this;
  }
}

// ---------------------------------------------------------------------------
// Multi-child combinators
// ---------------------------------------------------------------------------

export interface Fold {
  current: unknown;
  expectations: Expectation[];
}

export abstract class MultiValidator extends ValueValidator {
  readonly validators: readonly IValidator[];
  readonly message?: string;

  constructor(
    validators: readonly IValidator[],
    options: { message?: string } & ValidatorFlags = {}
  ) {
    super(options);
    this.validators = Object.freeze([...validators]);
    this.message = options.message;
  }

  /** Thread each child's output into the next child. */
  protected abstract readonly chainsValues: boolean;

  /** Inspect one child result; a returned Result ends the evaluation. */
  protected abstract step(
    result: Result,
    input: unknown,
    fold: Fold
  ): Result | undefined;

  protected abstract finish(fold: Fold, original: unknown): Result;

  run(value: unknown): MaybePromise<Result> {
    const fold: Fold = { current: value, expectations: [] };
    for (let i = 0; i < this.validators.length; i++) {
      const input = this.chainsValues ? fold.current : value;
      const result = this.validators[i].run(input);
      if (isPromise(result)) {
        return this.continueAsync(result, input, i + 1, fold, value);
      }
      const stop = this.advance(result, input, fold);
      if (stop) return stop;
    }
    return this.finish(fold, value);
  }

  private async continueAsync(
    pending: Promise<Result>,
    pendingInput: unknown,
    nextIndex: number,
    fold: Fold,
    original: unknown
  ): Promise<Result> {
    const first = this.advance(await pending, pendingInput, fold);
    if (first) return first;
    for (let i = nextIndex; i < this.validators.length; i++) {
      const input = this.chainsValues ? fold.current : original;
      const stop = this.advance(
        await this.validators[i].run(input),
        input,
        fold
      );
      if (stop) return stop;
    }
    return this.finish(fold, original);
  }

  private advance(
    result: Result,
    input: unknown,
    fold: Fold
  ): Result | undefined {
    const stop = this.step(result, input, fold);
    if (stop) return stop;
    if (this.chainsValues && result.isValid) fold.current = result.value;
    return undefined;
  }

  protected failWithMessage(value: unknown, message: string): Result {
    return Result.invalid(value, new Expectation({ message, value }));
  }
}

/**
 * Conjunction. Short-circuit mode threads values and stops at the first
 * failure; collecting mode runs every child on the original value.
 */
export class AllValidator extends MultiValidator {
  readonly collecting: boolean;
  protected readonly chainsValues: boolean;

  constructor(
    validators: readonly IValidator[],
    options: { message?: string; collecting?: boolean } & ValidatorFlags = {}
  ) {
    super(validators, options);
    this.collecting = options.collecting ?? false;
    this.chainsValues = !this.collecting;
  }

  protected step(result: Result, _input: unknown, fold: Fold): Result | undefined {
    if (result.isValid) return undefined;
    if (this.collecting) {
      fold.expectations.push(...result.expectations);
      return undefined;
    }
    return this.message !== undefined
      ? this.failWithMessage(result.value, this.message)
      : result;
  }

  protected finish(fold: Fold, original: unknown): Result {
    if (!this.collecting) return Result.valid(fold.current, original);
    if (fold.expectations.length > 0 && this.message !== undefined) {
      return this.failWithMessage(original, this.message);
    }
    return Result.fromExpectations(original, fold.expectations, original);
  }

  /** True when this node can be spliced into a neighbouring `and`. */
  get isPlain(): boolean {
    return (
      !this.collecting &&
      this.message === undefined &&
      !this.isNullable &&
      !this.isOptional
    );
  }

  copyWith(flags: ValidatorFlags): AllValidator {
    return new AllValidator(this.validators, {
      ...this.mergeFlags(flags),
      message: this.message,
      collecting: this.collecting,
    });
  }
}

/**
 * Disjunction. The first valid child wins; otherwise every child's
 * expectations are concatenated. With no children it fails closed.
 */
export class AnyValidator extends MultiValidator {
  protected readonly chainsValues = false;

  protected step(result: Result, _input: unknown, fold: Fold): Result | undefined {
    if (result.isValid) return result;
    fold.expectations.push(...result.expectations);
    return undefined;
  }

  protected finish(fold: Fold, original: unknown): Result {
    if (this.message !== undefined) {
      return this.failWithMessage(original, this.message);
    }
    if (fold.expectations.length === 0) {
      return Result.invalid(
        original,
        new Expectation({
          message: 'any of no validators',
          value: original,
          code: ExpectationCodes.logicPredicateFailed,
        })
      );
    }
    return Result.fromExpectations(original, fold.expectations, original);
  }

  get isPlain(): boolean {
    return this.message === undefined && !this.isNullable && !this.isOptional;
  }

  copyWith(flags: ValidatorFlags): AnyValidator {
    return new AnyValidator(this.validators, {
      ...this.mergeFlags(flags),
      message: this.message,
    });
  }
}

/**
 * Valid iff every child fails. Each passing child contributes a
 * `not <message>` expectation.
 */
export class NoneValidator extends MultiValidator {
  protected readonly chainsValues = false;

  protected step(result: Result, input: unknown, fold: Fold): undefined {
    if (result.isValid) {
      fold.expectations.push(...negate(result, input));
    }
    return undefined;
  }

  protected finish(fold: Fold, original: unknown): Result {
    if (fold.expectations.length > 0 && this.message !== undefined) {
      return this.failWithMessage(original, this.message);
    }
    return Result.fromExpectations(original, fold.expectations, original);
  }

  copyWith(flags: ValidatorFlags): NoneValidator {
    return new NoneValidator(this.validators, {
      ...this.mergeFlags(flags),
      message: this.message,
    });
  }
}

// ---------------------------------------------------------------------------
// Single-child combinators
// ---------------------------------------------------------------------------

export abstract class SingleChildValidator extends ValueValidator {
  constructor(
    readonly child: IValidator,
    flags: ValidatorFlags = {}
  ) {
    super(flags);
  }

  run(value: unknown): MaybePromise<Result> {
    return mapMaybe(this.child.run(value), (result) =>
      this.process(result, value)
    );
  }

  protected abstract process(result: Result, value: unknown): Result;
}

export class NotValidator extends SingleChildValidator {
  readonly message?: string;

  constructor(
    child: IValidator,
    options: { message?: string } & ValidatorFlags = {}
  ) {
    super(child, options);
    this.message = options.message;
  }

  protected process(result: Result, value: unknown): Result {
    if (result.isNotValid) return Result.valid(value);
    if (this.message !== undefined) {
      return Result.invalid(
        value,
        new Expectation({
          message: this.message,
          value,
          code:
            result.firstExpectation?.code ?? ExpectationCodes.logicNotExpected,
        })
      );
    }
    return Result.fromExpectations(value, negate(result, value));
  }

  copyWith(flags: ValidatorFlags): NotValidator {
    return new NotValidator(this.child, {
      ...this.mergeFlags(flags),
      message: this.message,
    });
  }
}

/**
 * Boundary adapter: a failing child becomes a thrown
 * {@link ValidatorFailedError}.
 */
export class ThrowInsteadValidator extends SingleChildValidator {
  constructor(child: IValidator) {
    super(child, { nullable: child.isNullable, optional: child.isOptional });
  }

  protected process(result: Result): Result {
    if (result.isNotValid) throw new ValidatorFailedError({ result });
    return Result.valid(result.value);
  }

  copyWith(flags: ValidatorFlags): ThrowInsteadValidator {
    return new ThrowInsteadValidator(this.child.copyWith(flags));
  }
}

/**
 * Replaces the child's failure with a single expectation built from
 * `expectation`. The child's first code wins over the override's.
 */
export class ExpectationValidator extends SingleChildValidator {
  constructor(
    child: IValidator,
    readonly expectation: Expectation,
    readonly message?: string,
    flags: ValidatorFlags = {}
  ) {
    super(child, flags);
  }

  protected process(result: Result, value: unknown): Result {
    const code = result.isValid ? undefined : result.firstExpectation?.code;
    return Result.of(
      result.isValid,
      value,
      this.expectation.copyWith({
        message: this.message ?? this.expectation.message,
        value,
        code: code ?? this.expectation.code,
      })
    );
  }

  copyWith(flags: ValidatorFlags): ExpectationValidator {
    return new ExpectationValidator(
      this.child,
      this.expectation,
      this.message,
      this.mergeFlags(flags)
    );
  }
}

export function withExpectation(
  child: IValidator,
  expectation: Expectation,
  options: { message?: string } = {}
): ExpectationValidator {
  return new ExpectationValidator(child, expectation, options.message);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `not <message>` copies of a passing result's expectations (or of a synthetic `passed`). */
function negate(result: Result, value: unknown): Expectation[] {
  const source =
    result.expectations.length > 0
      ? result.expectations
      : [new Expectation({ message: 'passed', value })];
  return source.map((e) =>
    e.copyWith({
      message: `not ${e.message}`,
      value,
      code: e.code ?? ExpectationCodes.logicNotExpected,
    })
  );
}

function allParts(v: IValidator): readonly IValidator[] {
  return v instanceof AllValidator && v.isPlain ? v.validators : [v];
}

function anyParts(v: IValidator): readonly IValidator[] {
  return v instanceof AnyValidator && v.isPlain ? v.validators : [v];
}
