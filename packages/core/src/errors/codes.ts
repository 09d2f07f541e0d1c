/**
 * Error Code Infrastructure
 * Stable usage-error codes, exit codes, and the namespaced expectation codes
 * attached to validation failures.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes for thrown (programming/usage) errors
export enum ErrorCode {
  // Evaluation errors (E100–E199)
  ASYNC_IN_SYNC_CONTEXT = 'E100',
  VALIDATION_FAILED = 'E101',

  // Construction errors (E200–E299)
  INVALID_BUILDER_USAGE = 'E200',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.ASYNC_IN_SYNC_CONTEXT]: 20,
  [ErrorCode.VALIDATION_FAILED]: 1,
  [ErrorCode.INVALID_BUILDER_USAGE]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

/**
 * Machine-readable codes carried by `Expectation.code`.
 *
 * Codes follow a `domain.specific_issue` naming:
 * - type.*      : nominal type checks
 * - value.*     : primitive / direct value expectations
 * - structure.* : map/list structural errors
 * - logic.*     : combinator and contextual wrappers
 */
export const ExpectationCodes = {
  typeMismatch: 'type.mismatch',

  valueLengthOutOfRange: 'value.length_out_of_range',
  valueContainsMissing: 'value.contains_missing',
  valuePatternMismatch: 'value.pattern_mismatch',
  valueCaseMismatch: 'value.case_mismatch',
  valueEqualMismatch: 'value.equal_mismatch',
  valueDeepEqualMismatch: 'value.deep_equal_mismatch',
  valueMembershipMismatch: 'value.membership_mismatch',
  valueRangeOutOfBounds: 'value.range_out_of_bounds',
  valueDateOutOfRange: 'value.date_out_of_range',
  valueDateMismatch: 'value.date_mismatch',
  valueDateNotPast: 'value.date_not_past',
  valueDateNotFuture: 'value.date_not_future',
  valueFormatInvalid: 'value.format_invalid',
  valueTypeMismatch: 'value.type_mismatch',
  valueCoercionFailed: 'value.coercion_failed',

  structureMapFieldFailed: 'structure.map_field_failed',
  structureUnknownKey: 'structure.unknown_key',
  structureListItemFailed: 'structure.list_item_failed',

  logicNotExpected: 'logic.not_expected',
  logicPredicateFailed: 'logic.predicate_failed',
  logicContextualMisuse: 'logic.contextual_misuse',
  logicRequired: 'logic.required',
  logicUnknownVariant: 'logic.unknown_variant',
} as const;

export type ExpectationCode =
  (typeof ExpectationCodes)[keyof typeof ExpectationCodes];
