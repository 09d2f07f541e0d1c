/**
 * Result - outcome of a single validation call
 *
 * Validity is derived from the expectation list, so `isValid` and
 * `expectations.length === 0` cannot disagree.
 */

import type { Expectation, SerializedExpectation } from './expectation.js';
import { ValidatorFailedError } from './errors.js';
import { describeType, prettifyValue } from '../util/pretty.js';

export type NonEmptyExpectations = readonly [Expectation, ...Expectation[]];

export interface SerializedResult {
  valid: boolean;
  value: unknown;
  expectations: SerializedExpectation[];
}

export class Result<T = unknown> {
  readonly value: T;
  readonly originalValue?: unknown;
  readonly expectations: readonly Expectation[];

  private constructor(
    value: T,
    expectations: readonly Expectation[],
    originalValue?: unknown
  ) {
    this.value = value;
    this.expectations = Object.freeze([...expectations]);
    this.originalValue = originalValue;
    Object.freeze(this);
  }

  static valid<T>(value: T, originalValue?: unknown): Result<T> {
    return new Result(value, [], originalValue);
  }

  static invalid<T>(
    value: T,
    expectations: Expectation | NonEmptyExpectations,
    originalValue?: unknown
  ): Result<T> {
    const list = isExpectationList(expectations)
      ? expectations
      : [expectations];
    return new Result(value, list, originalValue);
  }

  /** Attach `expectation` only when `isValid` is false. */
  static of<T>(
    isValid: boolean,
    value: T,
    expectation: Expectation,
    originalValue?: unknown
  ): Result<T> {
    return isValid
      ? Result.valid(value, originalValue)
      : Result.invalid(value, expectation, originalValue);
  }

  /** Valid when `expectations` is empty, invalid otherwise. */
  static fromExpectations<T>(
    value: T,
    expectations: readonly Expectation[],
    originalValue?: unknown
  ): Result<T> {
    return new Result(value, expectations, originalValue);
  }

  get isValid(): boolean {
    return this.expectations.length === 0;
  }

  get isNotValid(): boolean {
    return !this.isValid;
  }

  get firstExpectation(): Expectation | undefined {
    return this.expectations[0];
  }

  get expectationCount(): number {
    return this.expectations.length;
  }

  /** Failure descriptions joined with `, `; the empty string when valid. */
  get description(): string {
    return this.expectations.map((e) => e.description).join(', ');
  }

  valueOr<D>(fallback: D): T | D {
    return this.isValid ? this.value : fallback;
  }

  /** Return the value, or throw {@link ValidatorFailedError} carrying this result. */
  orThrow(): T {
    if (this.isNotValid) {
      throw new ValidatorFailedError({ result: this });
    }
    return this.value;
  }

  toJSON(): SerializedResult {
    return {
      valid: this.isValid,
      value: this.value,
      expectations: this.expectations.map((e) => e.toJSON()),
    };
  }

  toString(): string {
    if (this.isValid) {
      return `Valid (${describeType(this.value)}): ${prettifyValue(this.value)}`;
    }
    return `Invalid (${describeType(this.value)}): ${this.description}`;
  }
}

function isExpectationList(
  input: Expectation | NonEmptyExpectations
): input is NonEmptyExpectations {
  return Array.isArray(input);
}
