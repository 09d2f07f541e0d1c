import { describe, test, expect } from 'vitest';
import {
  buildValidationFailureMessage,
  buildValidationMessage,
  formatExpectationLine,
} from '../presenter.js';
import { ConfigError } from '../../types/errors.js';
import { expectation } from '../../types/expectation.js';
import { Result } from '../../types/result.js';

describe('presenter', () => {
  const failed = Result.invalid({ age: 'x' }, [
    expectation('int', 'x', {
      path: '.age',
      code: 'type.mismatch',
      data: { expected: 'int', found: 'string' },
    }),
    expectation('is required', undefined, {
      path: '.name',
      code: 'logic.required',
    }),
  ]);

  test('lists every expectation with code and data', () => {
    expect(buildValidationFailureMessage(failed)).toBe(
      [
        'Validation failed (errors: 2) for value (Object): {"age":"x"}',
        '  1) .age: int [code=type.mismatch] {data={"expected":"int","found":"string"}}',
        '  2) .name: is required [code=logic.required]',
      ].join('\n')
    );
  });

  test('summarizes expectations past maxErrorsToList', () => {
    const lines = buildValidationFailureMessage(failed, {
      maxErrorsToList: 1,
    }).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('  … (1 more not shown)');
  });

  test('truncates long values', () => {
    const long = Result.invalid('abcdefghij', expectation('short'));
    expect(
      buildValidationFailureMessage(long, { maxValueLength: 4 }).split('\n')[0]
    ).toBe('Validation failed (errors: 1) for value (string): "abc…');
  });

  test('buildValidationMessage reports valid results on one line', () => {
    expect(buildValidationMessage(Result.valid([1, 2]))).toBe(
      'Valid (Array): [1,2]'
    );
    expect(buildValidationMessage(failed)).toBe(
      buildValidationFailureMessage(failed)
    );
  });

  test('formatExpectationLine shows the failing value', () => {
    expect(formatExpectationLine(failed.expectations[0])).toBe(
      '.age: int (value: "x")'
    );
  });

  test('rejects invalid format options', () => {
    expect(() =>
      buildValidationFailureMessage(failed, { maxErrorsToList: 0 })
    ).toThrow(ConfigError);
  });
});
