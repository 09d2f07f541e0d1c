/**
 * Parent-aware validators: `when` and `resolve`.
 */

import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import { mapMaybe, type MaybePromise } from '../util/maybe-async.js';
import type { PlainObject } from '../util/pretty.js';
import {
  ContextualValidator,
  type IValidator,
  type ValidatorFlags,
} from './base.js';

export interface WhenBranches {
  then: IValidator;
  otherwise: IValidator;
  /** Replaces any branch failure (and the misuse failure) with this message. */
  message?: string;
}

/**
 * Runs `condition` against the parent object, then validates the field with
 * `then` or `otherwise`. Branches honour their own nullable/optional flags.
 */
export class WhenValidator extends ContextualValidator {
  protected readonly label = 'when';

  constructor(
    readonly condition: IValidator,
    readonly branches: WhenBranches,
    flags: ValidatorFlags = {}
  ) {
    super(flags);
  }

  runWithParent(
    value: unknown,
    parent: PlainObject,
    exists: boolean
  ): MaybePromise<Result> {
    return mapMaybe(this.condition.run(parent), (condition) => {
      const branch = condition.isValid
        ? this.branches.then
        : this.branches.otherwise;
      return mapMaybe(branch.evaluate(value, { exists }), (result) =>
        this.withMessage(result, value)
      );
    });
  }

  run(value: unknown): MaybePromise<Result> {
    return mapMaybe(super.run(value), (result) =>
      this.withMessage(result, value)
    );
  }

  copyWith(flags: ValidatorFlags): WhenValidator {
    return new WhenValidator(
      this.condition,
      this.branches,
      this.mergeFlags(flags)
    );
  }

  private withMessage(result: Result, value: unknown): Result {
    const { message } = this.branches;
    if (result.isValid || message === undefined) return result;
    const first = result.firstExpectation;
    return Result.invalid(
      value,
      new Expectation({ message, value, code: first?.code })
    );
  }
}

export type Resolver = (parent: PlainObject) => IValidator | null | undefined;

/**
 * Picks the field's validator from the parent object. A resolver that
 * returns nothing accepts the field.
 */
export class ResolveValidator extends ContextualValidator {
  protected readonly label = 'resolve';

  constructor(
    readonly resolver: Resolver,
    flags: ValidatorFlags = {}
  ) {
    super(flags);
  }

  runWithParent(
    value: unknown,
    parent: PlainObject,
    exists: boolean
  ): MaybePromise<Result> {
    const resolved = this.resolver(parent);
    if (!resolved) return Result.valid(value);
    return mapMaybe(resolved.evaluate(value, { exists }), (result) =>
      result.isValid ? Result.valid(value) : result
    );
  }

  copyWith(flags: ValidatorFlags): ResolveValidator {
    return new ResolveValidator(this.resolver, this.mergeFlags(flags));
  }
}
