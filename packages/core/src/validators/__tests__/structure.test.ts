import { describe, it, expect } from 'vitest';
import { ExpectationCodes } from '../../errors/codes.js';
import { AsyncValidatorError } from '../../types/errors.js';
import { when } from '../contextual.js';
import { asyncValidator } from '../predicate.js';
import { isGte } from '../number.js';
import { eskema, eskemaList, eskemaStrict, listEach } from '../structure.js';
import { isBool, isInt, isNull, isString } from '../type.js';

const user = eskema({
  name: isString(),
  age: isInt().and(isGte(0)),
  nickname: isString().optional(),
  email: isString().nullable(),
});

describe('eskema', () => {
  it('accepts a conforming object and ignores extra keys', () => {
    const input = { name: 'Ada', age: 36, email: null, extra: true };
    const result = user.validate(input);
    expect(result.isValid).toBe(true);
    expect(result.value).toBe(input);
  });

  it('rejects non-objects before looking at fields', () => {
    expect(user.validate(['Ada']).description).toBe('object');
  });

  it('collects every failing field with its path', () => {
    const result = user.validate({ name: 1, age: -1, email: 'a' });
    expect(result.description).toBe('.name: string, .age: greater than or equal to 0');
    expect(result.expectations[1].toJSON()).toEqual({
      message: 'greater than or equal to 0',
      code: ExpectationCodes.valueRangeOutOfBounds,
      path: '.age',
      value: -1,
      data: { operator: '>=', limit: 0 },
    });
  });

  it('distinguishes an absent key from a null value', () => {
    // optional: may be absent, not null
    expect(user.validate({ name: 'Ada', age: 1, email: null, nickname: null }).description).toBe(
      '.nickname: string'
    );
    // nullable: may be null, not absent
    expect(user.validate({ name: 'Ada', age: 1 }).description).toBe('.email: string');
  });

  it('runs absent required fields against undefined', () => {
    const result = eskema({ flag: isBool() }).validate({});
    expect(result.firstExpectation?.toJSON()).toEqual({
      message: 'boolean',
      code: ExpectationCodes.typeMismatch,
      path: '.flag',
      data: { expected: 'boolean', found: 'undefined' },
    });
  });

  it('nests paths through maps and lists', () => {
    const schema = eskema({
      user: eskema({ tags: listEach(isString()) }),
    });
    const result = schema.validate({ user: { tags: ['a', 1] } });
    expect(result.description).toBe('.user.tags[1]: string');
  });

  it('reports a nested object with a null constructor key as a Result', () => {
    const result = eskema({ a: isInt() }).validate({ a: { constructor: null } });
    expect(result.description).toBe('.a: int');
    expect(result.firstExpectation?.data).toEqual({ expected: 'int', found: 'Object' });
  });

  it('replaces field messages with the map message', () => {
    const schema = eskema({ a: isInt() }, { message: 'malformed' });
    expect(schema.validate({ a: 'x' }).description).toBe('.a: malformed');
  });
});

describe('eskemaStrict', () => {
  it('reports unknown keys', () => {
    const result = eskemaStrict({ a: isInt() }).validate({ a: 1, b: 2, c: 3 });
    expect(result.description).toBe('has unknown keys: b, c');
    expect(result.firstExpectation?.code).toBe(ExpectationCodes.structureUnknownKey);
    expect(result.firstExpectation?.data).toEqual({ keys: ['b', 'c'] });
  });

  it('accepts exactly the declared keys', () => {
    expect(eskemaStrict({ a: isInt() }).validate({ a: 1 }).isValid).toBe(true);
  });
});

describe('lists', () => {
  it('eskemaList checks the length then each position', () => {
    const pair = eskemaList([isString(), isInt()]);
    expect(pair.validate(['a', 1]).isValid).toBe(true);
    expect(pair.validate(['a']).description).toBe('length [equal to 2]');
    expect(pair.validate([1, 'a']).description).toBe('[0]: string, [1]: int');
  });

  it('listEach validates every element', () => {
    expect(listEach(isInt()).validate('x').description).toBe('array');
    expect(listEach(isInt()).validate([1, 'a', 'b']).description).toBe('[1]: int, [2]: int');
    expect(listEach(isInt().nullable()).validate([1, null]).isValid).toBe(true);
  });

  it('listEach keeps nested codes and falls back to its own', () => {
    const result = listEach(isInt(), { message: 'numbers only' }).validate(['x']);
    expect(result.firstExpectation?.toJSON()).toEqual({
      message: 'numbers only',
      code: ExpectationCodes.typeMismatch,
      path: '[0]',
      value: 'x',
      data: { expected: 'int', found: 'string' },
    });
  });
});

describe('asynchronous children', () => {
  const slowPositive = asyncValidator(
    async (value) => typeof value === 'number' && value > 0,
    'positive'
  );

  it('listEach collects every pending element failure', async () => {
    const result = await listEach(slowPositive).validateAsync([1, -2, 3, -4]);
    expect(result.description).toBe('[1]: positive, [3]: positive');
    expect(() => listEach(slowPositive).validate([1])).toThrow(AsyncValidatorError);
  });

  it('eskemaList awaits positional validators', async () => {
    const pair = eskemaList([isString(), slowPositive]);
    expect((await pair.validateAsync(['a', 2])).isValid).toBe(true);
    expect((await pair.validateAsync(['a', 0])).description).toBe('[1]: positive');
  });

  it('when awaits its condition before picking a branch', async () => {
    const scored = eskema({
      score: isInt(),
      bonus: when(eskema({ score: slowPositive }), {
        then: isInt(),
        otherwise: isNull(),
      }),
    });
    expect((await scored.validateAsync({ score: 3, bonus: 1 })).isValid).toBe(true);
    expect((await scored.validateAsync({ score: 3, bonus: 'x' })).description).toBe(
      '.bonus: int'
    );
    expect((await scored.validateAsync({ score: -1, bonus: 2 })).description).toBe(
      '.bonus: null'
    );
  });
});
