import { describe, it, expect } from 'vitest';
import { ExpectationCodes } from '../../errors/codes.js';
import { eskema } from '../../validators/structure.js';
import { isInt, isMap, isString } from '../../validators/type.js';
import { toJsonDecoded } from '../json.js';
import { flattenMapKeys, getField, pickKeys, pluckKey } from '../map.js';
import { defaultTo } from '../utility.js';

describe('toJsonDecoded', () => {
  it('decodes objects and arrays', () => {
    expect(toJsonDecoded(eskema({ a: isInt() })).validate('{"a":1}').value).toEqual({ a: 1 });
    expect(toJsonDecoded(isMap()).validate({ a: 1 }).isValid).toBe(true);
  });

  it('rejects scalars and malformed text', () => {
    for (const input of ['42', '{bad', 7]) {
      const result = toJsonDecoded(isMap()).validate(input);
      expect(result.description).toBe('a JSON decodable value (object/array)');
      expect(result.firstExpectation?.code).toBe(ExpectationCodes.valueCoercionFailed);
    }
  });
});

describe('map reshaping', () => {
  it('pickKeys keeps the present keys', () => {
    expect(pickKeys(['a', 'c'], isMap()).validate({ a: 1, b: 2 }).value).toEqual({ a: 1 });
    expect(pickKeys(['a', 'c'], isMap()).validate('x').description).toBe(
      'a Map containing keys: a, c'
    );
  });

  it('pluckKey pivots to the field value', () => {
    const result = pluckKey('a', isInt()).validate({ a: 3 });
    expect(result.value).toBe(3);
    expect(result.originalValue).toEqual({ a: 3 });
    expect(pluckKey('a', isInt()).validate({}).description).toBe('a Map containing key: a');
    expect(pluckKey('a', isString()).validate({ a: 3 }).description).toBe('string');
  });

  it('flattenMapKeys joins nested keys', () => {
    const result = flattenMapKeys('.', isMap()).validate({ a: { b: 1, c: {} }, d: [1] });
    expect(result.value).toEqual({ 'a.b': 1, d: [1] });
  });

  it('getField reports failures under the key', () => {
    const age = getField('age', isInt());
    expect(age.validate({ age: 3 }).value).toBe(3);
    expect(age.validate({ age: 'x' }).description).toBe('.age: int');
    expect(age.validate({}).description).toBe('contains key "age"');
  });
});

describe('defaultTo', () => {
  it('substitutes null and undefined', () => {
    expect(defaultTo('anon', isString()).validate(null).value).toBe('anon');
    expect(defaultTo('anon', isString()).validate('Ada').value).toBe('Ada');
    expect(defaultTo(0, isInt()).validate('x').description).toBe('int');
  });
});
