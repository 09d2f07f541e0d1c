import { describe, it, expect } from 'vitest';
import {
  parseBigIntString,
  parseDateString,
  parseDoubleString,
  parseIntString,
  toIsoDay,
} from '../parse.js';

describe('parseIntString', () => {
  it('accepts signed base-10 integers with surrounding whitespace', () => {
    expect(parseIntString('42')).toBe(42);
    expect(parseIntString(' -7 ')).toBe(-7);
    expect(parseIntString('+3')).toBe(3);
  });

  it.each(['', '12.0', '1e3', '0x10', 'abc', '1 2'])('rejects %j', (text) => {
    expect(parseIntString(text)).toBeUndefined();
  });
});

describe('parseBigIntString', () => {
  it('keeps precision beyond the safe integer range', () => {
    expect(parseBigIntString('9007199254740993')).toBe(9007199254740993n);
    expect(parseBigIntString('+5')).toBe(5n);
    expect(parseBigIntString('5.0')).toBeUndefined();
  });
});

describe('parseDoubleString', () => {
  it('accepts decimal and exponent forms', () => {
    expect(parseDoubleString('3.14')).toBe(3.14);
    expect(parseDoubleString('.5')).toBe(0.5);
    expect(parseDoubleString('-2e3')).toBe(-2000);
    expect(parseDoubleString('7.')).toBe(7);
  });

  it.each(['', 'NaN', 'Infinity', '1e999', '1,5', '--1'])(
    'rejects %j',
    (text) => {
      expect(parseDoubleString(text)).toBeUndefined();
    }
  );
});

describe('parseDateString', () => {
  it('reads date-only text as UTC midnight', () => {
    const parsed = parseDateString('2024-03-05');
    expect(parsed?.date.toISOString()).toBe('2024-03-05T00:00:00.000Z');
    expect(parsed?.dateOnly).toBe(true);
    expect(parsed?.exact).toBe(true);
  });

  it('applies offsets and fractions', () => {
    expect(
      parseDateString('2024-03-05T10:30:00+02:00')?.date.toISOString()
    ).toBe('2024-03-05T08:30:00.000Z');
    expect(
      parseDateString('2024-03-05 10:30:15.25Z')?.date.toISOString()
    ).toBe('2024-03-05T10:30:15.250Z');
  });

  it('flags calendar rollover', () => {
    const parsed = parseDateString('2023-02-30');
    expect(parsed?.exact).toBe(false);
    expect(parsed?.date.toISOString()).toBe('2023-03-02T00:00:00.000Z');
  });

  it.each(['', 'yesterday', '2024/03/05', '05-03-2024'])('rejects %j', (text) => {
    expect(parseDateString(text)).toBeUndefined();
  });
});

describe('toIsoDay', () => {
  it('uses the UTC calendar day', () => {
    expect(toIsoDay(new Date('2024-12-31T23:59:59Z'))).toBe('2024-12-31');
  });
});
