/**
 * Presenter - pure presentation layer for validation Results
 * - No business logic; consumes Result/Expectation read-only
 */

import type { Result } from '../types/result.js';
import { type FormatOptions, resolveFormatOptions } from '../types/options.js';
import { safeStringify } from '../util/json-safe.js';
import { describeType, prettifyValue } from '../util/pretty.js';

/**
 * Multi-line report for a failing Result:
 *
 * ```
 * Validation failed (errors: 2) for value (Object): {"age":"x"}
 *   1) .age: int [code=type.mismatch] {data={"expected":"int","found":"string"}}
 *   2) .name: is required [code=logic.required]
 * ```
 */
export function buildValidationFailureMessage(
  result: Result,
  options: FormatOptions = {}
): string {
  const { maxValueLength, maxErrorsToList } = resolveFormatOptions(options);
  const lines: string[] = [
    `Validation failed (errors: ${result.expectationCount}) for value (${describeType(result.value)}): ${truncate(prettifyValue(result.value), maxValueLength)}`,
  ];

  const toShow = result.expectations.slice(0, maxErrorsToList);
  toShow.forEach((e, i) => {
    let line = `  ${i + 1}) ${e.description}`;
    if (e.code !== undefined) line += ` [code=${e.code}]`;
    if (e.data !== undefined && Object.keys(e.data).length > 0) {
      line += ` {data=${safeStringify(e.data) ?? '<unprintable>'}}`;
    }
    lines.push(line);
  });

  const remaining = result.expectationCount - toShow.length;
  if (remaining > 0) {
    lines.push(`  … (${remaining} more not shown)`);
  }

  return lines.join('\n').trimEnd();
}

/** `Valid (Type): <value>` for valid results, the failure report otherwise. */
export function buildValidationMessage(
  result: Result,
  options: FormatOptions = {}
): string {
  if (result.isValid) {
    const { maxValueLength } = resolveFormatOptions(options);
    return `Valid (${describeType(result.value)}): ${truncate(prettifyValue(result.value), maxValueLength)}`;
  }
  return buildValidationFailureMessage(result, options);
}

/** `<path>: <message> (value: <pretty value>)` */
export function formatExpectationLine(
  expectation: Result['expectations'][number],
  options: FormatOptions = {}
): string {
  const { maxValueLength } = resolveFormatOptions(options);
  return `${expectation.description} (value: ${truncate(prettifyValue(expectation.value), maxValueLength)})`;
}

function truncate(repr: string, max: number): string {
  return repr.length > max ? `${repr.slice(0, max)}…` : repr;
}
