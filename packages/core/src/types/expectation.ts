import { Result } from './result.js';

export type ExpectationData = Readonly<Record<string, unknown>>;

export interface ExpectationInit {
  message: string;
  value?: unknown;
  /** Location inside a nested structure, e.g. `.user[2].age` */
  path?: string;
  /** Namespaced machine-readable code, e.g. `value.range_out_of_bounds` */
  code?: string;
  data?: ExpectationData;
}

export interface SerializedExpectation {
  message: string;
  code?: string;
  path?: string;
  value?: unknown;
  data?: ExpectationData;
}

/**
 * One failed constraint. Instances are never mutated: propagation through
 * nested structures goes through {@link Expectation.copyWith}.
 */
export class Expectation {
  readonly message: string;
  readonly value: unknown;
  readonly path?: string;
  readonly code?: string;
  readonly data?: ExpectationData;

  constructor(init: ExpectationInit) {
    this.message = init.message;
    this.value = init.value;
    this.path = init.path;
    this.code = init.code;
    this.data = init.data;
    Object.freeze(this);
  }

  /** `<path>: <message>`, or the bare message at the root. */
  get description(): string {
    return this.path ? `${this.path}: ${this.message}` : this.message;
  }

  /** Keys present in `overrides` win, even when set to `undefined`. */
  copyWith(overrides: Partial<ExpectationInit>): Expectation {
    return new Expectation({
      message: this.message,
      value: this.value,
      path: this.path,
      code: this.code,
      data: this.data,
      ...overrides,
    });
  }

  /** Prefix the path with a parent segment (`.key` or `[index]`). */
  withPathPrefix(segment: string): Expectation {
    return this.copyWith({ path: `${segment}${this.path ?? ''}` });
  }

  toJSON(): SerializedExpectation {
    const out: SerializedExpectation = { message: this.message };
    if (this.code !== undefined) out.code = this.code;
    if (this.path !== undefined) out.path = this.path;
    if (this.value !== undefined && this.value !== null) out.value = this.value;
    if (this.data !== undefined && Object.keys(this.data).length > 0) {
      out.data = this.data;
    }
    return out;
  }

  toString(): string {
    return this.description;
  }

  toInvalidResult(): Result {
    return Result.invalid(this.value, this);
  }
}

export function expectation(
  message: string,
  value?: unknown,
  extra: Omit<ExpectationInit, 'message' | 'value'> = {}
): Expectation {
  return new Expectation({ message, value, ...extra });
}
