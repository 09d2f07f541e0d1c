import { Expectation } from '../types/expectation.js';
import { Result } from '../types/result.js';
import {
  type IValidator,
  Validator,
  type ValueValidator,
} from '../validator/base.js';
import { $isDate, $isDateString, $isString } from '../validators/cached.js';
import { parseDateString } from '../util/parse.js';
import { transform, type TransformOptions, withMessage } from './core.js';

/**
 * Dates and ISO-8601 strings become a `Date`. Strings without an offset are
 * read as UTC.
 */
export function toDate(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const base = $isDate.or($isDateString).and(
    transform((value) => {
      if (value instanceof Date) return value;
      if (typeof value === 'string') return parseDateString(value)?.date;
      return undefined;
    }, child)
  );
  return withMessage(base, options.message);
}

function midnight(value: unknown): Date | undefined {
  let date: Date | undefined;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string') {
    const parsed = parseDateString(value);
    // `2024-02-30` must not roll over into March
    if (parsed && !(parsed.dateOnly && !parsed.exact)) date = parsed.date;
  }
  if (!date || Number.isNaN(date.getTime())) return undefined;
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
}

/** A `Date` at UTC midnight of the value's calendar day. */
export function toDateOnly(
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  const isMidnightDate = new Validator((value) =>
    value instanceof Date
      ? Result.valid(value)
      : Result.invalid(
          value,
          new Expectation({
            message: 'a value convertible to a Date (midnight)',
            value,
          })
        )
  );
  const base = $isDate
    .or($isString)
    .and(transform(midnight, isMidnightDate))
    .and(child);
  return withMessage(base, options.message);
}
