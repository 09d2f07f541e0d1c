import { describe, expect, it, vi } from 'vitest';

import {
  all,
  asyncValidator,
  AsyncValidatorError,
  eskema,
  expectation,
  formatExpectationLine,
  isGte,
  isInt,
  isNotEmpty,
  isString,
  listEach,
  throwInstead,
  toInt,
  v,
  validator,
  ValidatorFailedError,
} from '../src/index.js';

describe('conjunction modes', () => {
  it('short-circuit all stops at the first failure', () => {
    const later = vi.fn((_value: unknown) => true);
    const chain = all([isString(), validator(later, (value) => expectation('later', value))]);
    const result = chain.validate(1);
    expect(result.toJSON()).toEqual(isString().validate(1).toJSON());
    expect(later).not.toHaveBeenCalled();
  });

  it('collecting all reports every failure against the original input', () => {
    const result = all([isString(), isGte(10)], { collecting: true }).validate(5);
    expect(result.expectations.map((e) => e.message)).toEqual([
      'string',
      'greater than or equal to 10',
    ]);
    expect(result.expectations.map((e) => e.value)).toEqual([5, 5]);
  });

  // Every branch of a collecting `all` sees the original value, even after a
  // coercion in an earlier branch.
  it('collecting all does not thread coerced values', () => {
    const mixed = all([toInt(isGte(10)), isString()], { collecting: true });
    expect(mixed.validate('5').description).toBe('greater than or equal to 10');
    const valid = mixed.validate('42');
    expect(valid.isValid).toBe(true);
    expect(valid.value).toBe('42');
    expect(mixed.validate(50).description).toBe('string');
  });
});

describe('structural paths', () => {
  it('nested maps', () => {
    const schema = eskema({ a: eskema({ b: isString() }) });
    expect(schema.validate({ a: { b: 1 } }).firstExpectation?.path).toBe('.a.b');
  });

  it('maps inside lists', () => {
    const rows = listEach(eskema({ x: isString() }));
    expect(rows.validate([{ x: 1 }]).firstExpectation?.path).toBe('[0].x');
  });

  it('renders failures as path, message and value', () => {
    const result = eskema({ a: isInt() }).validate({ a: 'x' });
    const first = result.firstExpectation;
    expect(first && formatExpectationLine(first)).toBe('.a: int (value: "x")');
  });
});

describe('absence versus null', () => {
  const schema = eskema({
    req: isString(),
    nul: isString().nullable(),
    opt: isString().optional(),
    both: isString().nullable().optional(),
  });
  const base = { req: 'a', nul: null };

  it.each([
    ['the minimal object', base, ''],
    ['required field absent', { nul: null }, '.req: string'],
    ['required field null', { ...base, req: null }, '.req: string'],
    ['nullable field absent', { req: 'a' }, '.nul: string'],
    ['optional field null', { ...base, opt: null }, '.opt: string'],
    ['optional field present', { ...base, opt: 'x' }, ''],
    ['optional field wrong type', { ...base, opt: 1 }, '.opt: string'],
    ['nullable optional field null', { ...base, both: null }, ''],
  ])('%s', (_label, input, expected) => {
    expect(schema.validate(input).description).toBe(expected);
  });
});

describe('coercion chains', () => {
  it('"42" passes to int >= 10, "abc" fails before the constraint runs', () => {
    const constraint = vi.fn((value: unknown) => typeof value === 'number' && value >= 10);
    const chain = v().any().toInt().custom(constraint, 'at least 10').build();
    expect(chain.validate('42').value).toBe(42);
    expect(constraint).toHaveBeenCalledWith(42);
    constraint.mockClear();
    expect(chain.validate('abc').description).toBe(
      'int, number, a valid formatted int String'
    );
    expect(constraint).not.toHaveBeenCalled();
  });

  it('repeating a coercion kind keeps both constraint sets', () => {
    const chain = v().any().toInt().gte(0).toInt().lte(10).build();
    expect(chain.validate('5').value).toBe(5);
    expect(chain.validate('11').description).toBe('less than or equal to 10');
    expect(chain.validate('-1').description).toBe('greater than or equal to 0');
  });

  it('switching the coercion kind drops constraints on the old type', () => {
    const chain = v().any().toInt().gte(10).toStr().lengthMax(1).build();
    expect(chain.validate(5).value).toBe('5');
    expect(chain.validate(12).description).toBe('length [less than or equal to 1]');
  });
});

describe('sync and async entry points', () => {
  const available = asyncValidator(async (name) => name !== 'taken', 'an available name');
  const signup = eskema({ name: isString().and(available) });

  it('the synchronous entry point refuses asynchronous chains', () => {
    expect(() => signup.validate({ name: 'ada' })).toThrow(AsyncValidatorError);
  });

  it('shared validators serve concurrent calls independently', async () => {
    const [taken, free] = await Promise.all([
      signup.validateAsync({ name: 'taken' }),
      signup.validateAsync({ name: 'ada' }),
    ]);
    expect(taken.description).toBe('.name: an available name');
    expect(free.isValid).toBe(true);
  });
});

describe('construction styles interoperate', () => {
  it('builder output inside combinators and combinators inside builders', () => {
    const named = all([v().string().build(), isNotEmpty()]);
    expect(named.validate('').description).toBe('length [greater than 0]');
    const wrapped = v().any().add(all([isString(), isNotEmpty()])).build();
    expect(wrapped.validate(1).description).toBe('string');
  });

  it('throwInstead converts a failure into an exception at the boundary', () => {
    const age = throwInstead(isInt().and(isGte(0)));
    expect(age.validate(3).isValid).toBe(true);
    let thrown: unknown;
    try {
      age.validate(-1);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(ValidatorFailedError);
    if (thrown instanceof ValidatorFailedError) {
      expect(thrown.result.description).toBe('greater than or equal to 0');
      expect(thrown.summary).toBe('ValidatorFailed(errors=1, type=number)');
    }
  });
});
