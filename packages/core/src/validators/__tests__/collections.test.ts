import { describe, it, expect } from 'vitest';
import { ExpectationCodes } from '../../errors/codes.js';
import { $listEmpty, $listNotEmpty, $stringNotEmpty } from '../cached.js';
import { listContains, listIsOfLength, listLength } from '../list.js';
import { containsKey, containsKeys, containsValues } from '../map.js';
import { isLte } from '../number.js';

describe('lists', () => {
  it('listLength requires an array', () => {
    expect(listLength([isLte(1)]).validate('ab').description).toBe('array');
    expect(listLength([isLte(1)]).validate([1, 2]).description).toBe(
      'length [less than or equal to 1]'
    );
    expect(listIsOfLength(0).validate([]).isValid).toBe(true);
  });

  it('listContains', () => {
    expect(listContains(2).validate([1, 2]).isValid).toBe(true);
    expect(listContains(2).validate([1]).firstExpectation?.toJSON()).toEqual({
      message: 'List to contain 2',
      code: ExpectationCodes.valueContainsMissing,
      value: [1],
      data: { needle: '2' },
    });
  });

  it('cached emptiness checks', () => {
    expect($listEmpty.validate([]).isValid).toBe(true);
    expect($listEmpty.validate([1]).description).toBe('List to be empty');
    const negated = $listNotEmpty.validate([]);
    expect(negated.description).toBe('not passed');
    expect(negated.firstExpectation?.code).toBe(ExpectationCodes.logicNotExpected);
    expect($stringNotEmpty.validate('x').isValid).toBe(true);
  });
});

describe('maps', () => {
  it('containsKey', () => {
    expect(containsKey('a').validate({ a: undefined }).isValid).toBe(true);
    const result = containsKey('a').validate({});
    expect(result.description).toBe('contains key "a"');
    expect(result.firstExpectation?.data).toEqual({ key: 'a' });
  });

  it('containsKeys lists every required key', () => {
    expect(containsKeys(['a', 'b']).validate({ a: 1 }).description).toBe(
      'contains keys: ["a","b"]'
    );
  });

  it('containsValues compares with ===', () => {
    expect(containsValues([1]).validate({ x: 1 }).isValid).toBe(true);
    expect(containsValues([1]).validate({ x: 2 }).description).toBe(
      'contains values: [1]'
    );
    expect(containsValues([1]).validate([1]).description).toBe('object');
  });
});
