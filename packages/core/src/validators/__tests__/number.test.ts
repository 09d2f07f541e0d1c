import { describe, it, expect } from 'vitest';
import { ExpectationCodes } from '../../errors/codes.js';
import { BuilderError } from '../../types/errors.js';
import { isGt, isGte, isInRange, isLt, isLte } from '../number.js';

describe('numeric ranges', () => {
  it('compares against the limit', () => {
    expect(isLt(5).validate(4).isValid).toBe(true);
    expect(isLt(5).validate(5).isValid).toBe(false);
    expect(isLte(5).validate(5).isValid).toBe(true);
    expect(isGt(5).validate(5).isValid).toBe(false);
    expect(isGte(5).validate(5).isValid).toBe(true);
  });

  it('accepts bigint values', () => {
    expect(isGte(0).validate(10n).isValid).toBe(true);
    expect(isLt(0).validate(10n).isValid).toBe(false);
  });

  it('reports the operator and limit', () => {
    const result = isGt(10).validate(3);
    expect(result.firstExpectation?.toJSON()).toEqual({
      message: 'greater than 10',
      code: ExpectationCodes.valueRangeOutOfBounds,
      value: 3,
      data: { operator: '>', limit: 10 },
    });
  });

  it('fails with a type mismatch on non-numbers', () => {
    const result = isGte(0).validate('5');
    expect(result.description).toBe('number');
    expect(result.firstExpectation?.code).toBe(ExpectationCodes.typeMismatch);
    expect(isGte(0).validate(Number.NaN).description).toBe('number');
  });

  it('isInRange is inclusive on both ends', () => {
    const range = isInRange(1, 3);
    expect([0, 1, 3, 4].map((n) => range.validate(n).isValid)).toEqual([
      false,
      true,
      true,
      false,
    ]);
    expect(range.validate(4).description).toBe('between 1 and 3 inclusive');
    expect(range.validate(4).firstExpectation?.data).toEqual({
      operator: 'between_inclusive',
      min: 1,
      max: 3,
    });
  });

  it('rejects invalid bounds at build time', () => {
    expect(() => isLt(Number.NaN)).toThrow(BuilderError);
    expect(() => isLt(Number.NaN)).toThrow('max must be a valid number');
    expect(() => isInRange(5, 1)).toThrow('min must be <= max');
  });
});
