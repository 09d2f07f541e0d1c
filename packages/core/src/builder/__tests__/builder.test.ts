import { describe, it, expect } from 'vitest';
import { ExpectationCodes } from '../../errors/codes.js';
import { AsyncValidatorError } from '../../types/errors.js';
import { transform } from '../../transformers/core.js';
import { isGte } from '../../validators/number.js';
import { isInt } from '../../validators/type.js';
import { v } from '../index.js';

describe('coercion', () => {
  it('coerces, then checks the coerced value', () => {
    const age = v().string().toIntStrict().gte(10).build();
    expect(age.validate('42').value).toBe(42);
    expect(age.validate('5').description).toBe('greater than or equal to 10');
    expect(age.validate('abc').description).toBe('int, a valid formatted int String');
  });

  it('refuses imprecise and infinite integers', () => {
    expect(v().string().toIntStrict().build().validate('9007199254740993').isValid).toBe(
      false
    );
    expect(v().number().toInt().build().validate(Number.POSITIVE_INFINITY).isValid).toBe(
      false
    );
  });

  it('discards pre-coercion checks unless keepPre is set', () => {
    expect(v().string().toIntStrict().build().validate(5).isValid).toBe(true);
    const kept = v().string().toIntStrict({ keepPre: true }).build();
    expect(kept.validate(5).description).toBe('string');
    expect(kept.validate('5').value).toBe(5);
  });

  it('a coercion to the active kind is a no-op', () => {
    // toInt stays active, so 12.7 is truncated rather than rejected
    expect(v().any().toInt().toIntStrict().build().validate(12.7).value).toBe(12);
  });

  it('a coercion to another kind replaces the active one and its checks', () => {
    const built = v().any().toInt().gte(5).toStr().build();
    expect(built.validate(3).value).toBe('3');
  });

  it('custom coercions compose with the active one', () => {
    const built = v()
      .any()
      .toInt()
      .use({
        name: 'double',
        transformer: (child) =>
          transform((x) => (typeof x === 'number' ? x * 2 : x), child),
      })
      .add(isGte(10))
      .build();
    expect(built.validate('6').value).toBe(12);
    expect(built.validate('4').description).toBe('greater than or equal to 10');
  });

  it('passes the coercion message through', () => {
    const result = v().any().toInt({ message: 'a whole number' }).build().validate('x');
    expect(result.description).toBe('a whole number');
  });
});

describe('flags and decorations', () => {
  it('nullable and optional apply to the whole validator wherever they are called', () => {
    const early = v().string().nullable().lengthMin(2).build();
    const late = v().string().lengthMin(2).nullable().build();
    for (const built of [early, late]) {
      expect(built.isNullable).toBe(true);
      expect(built.validate(null).isValid).toBe(true);
      expect(built.validate('a').isValid).toBe(false);
    }
    expect(v().int().optional().build().isOptional).toBe(true);
  });

  it('flags survive a type switch', () => {
    const built = v().map().nullable().pluckValue('n').int().build();
    expect(built.validate(null).isValid).toBe(true);
  });

  it('not() negates the next step only', () => {
    const built = v().string().not().contains('x').contains('a').build();
    expect(built.validate('abc').isValid).toBe(true);
    expect(built.validate('bcd').description).toBe('contains "a"');
    const negated = built.validate('axb');
    expect(negated.description).toBe('not passed');
    expect(negated.firstExpectation?.code).toBe(ExpectationCodes.logicNotExpected);
  });

  it('a step message replaces the failure but keeps its code', () => {
    const built = v().string().not().contains('x', { message: 'no x please' }).build();
    const result = built.validate('axb');
    expect(result.description).toBe('no x please');
    expect(result.firstExpectation?.code).toBe(ExpectationCodes.logicNotExpected);
    expect(v().string({ message: 'text' }).build().validate(1).description).toBe('text');
  });

  it('error() replaces the message of everything so far', () => {
    const email = v().string().email().error('bad email').build();
    expect(email.validate(5).firstExpectation?.toJSON()).toEqual({
      message: 'bad email',
      code: ExpectationCodes.typeMismatch,
      value: 5,
    });
    expect(email.validate('x').firstExpectation?.code).toBe(
      ExpectationCodes.valueFormatInvalid
    );
  });
});

describe('string normalizers', () => {
  it('apply to checks added before and after them', () => {
    expect(v().string().trim().lengthMin(2).build().validate(' ab ').value).toBe('ab');
    expect(v().string().lengthMin(2).trim().build().validate(' a ').description).toBe(
      'length [greater than or equal to 2]'
    );
    expect(v().string().toLowerCase().oneOf(['yes']).build().validate('YES').value).toBe(
      'yes'
    );
  });
});

describe('map pivots', () => {
  const adult = v().map().pluckValue('age').toIntStrict().gte(18).build();

  it('validates the map, then the plucked and coerced value', () => {
    expect(adult.validate({ age: '21' }).isValid).toBe(true);
    expect(adult.validate({ age: '12' }).description).toBe('greater than or equal to 18');
    expect(adult.validate({}).description).toBe('a Map containing key: age');
    expect(adult.validate('x').description).toBe('object');
  });

  it('pick and pluck feed later steps', () => {
    expect(v().map().pick(['a']).build().validate({ a: 1, b: 2 }).value).toEqual({ a: 1 });
    expect(v().map().pluck('a').add(isInt()).build().validate({ a: 'x' }).description).toBe(
      'int'
    );
    expect(v().map().flattenKeys().build().validate({ a: { b: 1 } }).value).toEqual({
      'a.b': 1,
    });
  });

  it('schema and strict', () => {
    const user = v().map().schema({ name: v().string().lengthMin(1).build() }).build();
    expect(user.validate({ name: '' }).description).toBe(
      '.name: length [greater than or equal to 1]'
    );
    expect(v().map().strict({ a: isInt() }).build().validate({ a: 1, b: 2 }).description).toBe(
      'has unknown keys: b'
    );
  });
});

describe('typed steps', () => {
  it('numbers', () => {
    const n = v().number().between(1, 3).build();
    expect(n.validate(4).description).toBe('between 1 and 3 inclusive');
    expect(v().int().lt(0).build().validate(0).description).toBe('less than 0');
  });

  it('booleans', () => {
    expect(v().bool().isTrue().build().validate(false).description).toBe('true');
    expect(v().any().toBool().isTrue().build().validate('true').value).toBe(true);
  });

  it('dates', () => {
    const after = v().any().toDate().after(new Date('2024-01-01T00:00:00Z')).build();
    expect(after.validate('2024-06-01').value).toEqual(new Date('2024-06-01T00:00:00.000Z'));
    expect(after.validate('2023-06-01').description).toBe(
      'a DateTime after 2024-01-01T00:00:00.000Z'
    );
  });

  it('lists', () => {
    const ints = v().list().each(isInt()).lengthMin(1).build();
    expect(ints.validate([]).description).toBe('length [greater than or equal to 1]');
    expect(ints.validate([1, 'a']).description).toBe('[1]: int');
  });

  it('json', () => {
    const doc = v().json().jsonObject().jsonRequiresKeys(['id']).build();
    expect(doc.validate([]).description).toBe('a JSON object');
    expect(doc.validate({}).description).toBe('JSON object has keys: id');
    const decoded = v().string().toJson().schema({ id: isInt() }).build();
    expect(decoded.validate('{"id":"x"}').description).toBe('.id: int');
  });

  it('custom predicates and equality', () => {
    const even = v()
      .int()
      .custom((n) => typeof n === 'number' && n % 2 === 0, 'even')
      .build();
    expect(even.validate(3).firstExpectation?.code).toBe(ExpectationCodes.logicPredicateFailed);
    expect(v().string().oneOf(['a', 'b']).build().validate('c').description).toBe(
      'one of: ["a","b"]'
    );
  });
});

describe('asynchronous steps', () => {
  const username = v()
    .string()
    .async(async (name) => name !== 'taken', 'an available username')
    .build();

  it('require validateAsync', async () => {
    expect(() => username.validate('ada')).toThrow(AsyncValidatorError);
    expect((await username.validateAsync('taken')).description).toBe('an available username');
    expect((await username.validateAsync('ada')).isValid).toBe(true);
  });

  it('builders validate directly', async () => {
    expect(v().int().validate(1).isValid).toBe(true);
    expect((await v().int().validateAsync('x')).description).toBe('int');
  });
});
