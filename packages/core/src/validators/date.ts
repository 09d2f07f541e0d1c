/**
 * Date comparisons
 *
 * Values must already be `Date` instances; combine with `toDate` to accept
 * strings. Calendar-day comparisons use UTC fields.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation, type ExpectationData } from '../types/expectation.js';
import { BuilderError } from '../types/errors.js';
import type { ValueValidator } from '../validator/base.js';
import { toIsoDay } from '../util/parse.js';
import { validator } from './predicate.js';
import type { MessageOption } from './type.js';

export interface InclusiveOption extends MessageOption {
  inclusive?: boolean;
}

export interface BetweenOptions extends MessageOption {
  inclusiveStart?: boolean;
  inclusiveEnd?: boolean;
}

export interface NowOptions extends MessageOption {
  allowNow?: boolean;
  /** Clock used for the reference instant (default: `Date.now`). */
  now?: () => number;
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function assertDate(name: string, date: Date): void {
  if (!isValidDate(date)) {
    throw new BuilderError({
      message: `${name} must be a valid Date`,
      context: { setting: name },
    });
  }
}

function dateCheck(
  test: (value: Date) => boolean,
  message: string,
  code: string,
  data: ExpectationData
): ValueValidator {
  return validator(
    (value) => isValidDate(value) && test(value),
    (value) => new Expectation({ message, value, code, data })
  );
}

export function isDateBefore(
  bound: Date,
  options: InclusiveOption = {}
): ValueValidator {
  assertDate('bound', bound);
  const inclusive = options.inclusive ?? false;
  const limit = bound.getTime();
  return dateCheck(
    (d) => (inclusive ? d.getTime() <= limit : d.getTime() < limit),
    options.message ??
      `a DateTime before${inclusive ? ' or equal to' : ''} ${bound.toISOString()}`,
    ExpectationCodes.valueDateOutOfRange,
    { bound: bound.toISOString(), op: 'before', inclusive }
  );
}

export function isDateAfter(
  bound: Date,
  options: InclusiveOption = {}
): ValueValidator {
  assertDate('bound', bound);
  const inclusive = options.inclusive ?? false;
  const limit = bound.getTime();
  return dateCheck(
    (d) => (inclusive ? d.getTime() >= limit : d.getTime() > limit),
    options.message ??
      `a DateTime after${inclusive ? ' or equal to' : ''} ${bound.toISOString()}`,
    ExpectationCodes.valueDateOutOfRange,
    { bound: bound.toISOString(), op: 'after', inclusive }
  );
}

/**
 * @throws {BuilderError} When `end` is before `start`
 */
export function isDateBetween(
  start: Date,
  end: Date,
  options: BetweenOptions = {}
): ValueValidator {
  assertDate('start', start);
  assertDate('end', end);
  if (end.getTime() < start.getTime()) {
    throw new BuilderError({
      message: 'end must not be before start',
      context: { start: start.toISOString(), end: end.toISOString() },
    });
  }
  const inclusiveStart = options.inclusiveStart ?? true;
  const inclusiveEnd = options.inclusiveEnd ?? true;
  const lo = start.getTime();
  const hi = end.getTime();
  const brackets = `${inclusiveStart ? '[' : '('}${inclusiveEnd ? ']' : ')'}`;
  return dateCheck(
    (d) => {
      const t = d.getTime();
      return (inclusiveStart ? t >= lo : t > lo) && (inclusiveEnd ? t <= hi : t < hi);
    },
    options.message ??
      `a DateTime between ${start.toISOString()} and ${end.toISOString()} (${brackets})`,
    ExpectationCodes.valueDateOutOfRange,
    {
      start: start.toISOString(),
      end: end.toISOString(),
      inclusiveStart,
      inclusiveEnd,
    }
  );
}

export function isDateSameDay(
  target: Date,
  options: MessageOption = {}
): ValueValidator {
  assertDate('target', target);
  const day = toIsoDay(target);
  return dateCheck(
    (d) => toIsoDay(d) === day,
    options.message ?? `a DateTime on the same day as ${day}`,
    ExpectationCodes.valueDateMismatch,
    { targetDay: day }
  );
}

/**
 * The reference instant is taken when the validator is built, so one
 * validator gives the same answer for the same value.
 */
export function isDateInPast(options: NowOptions = {}): ValueValidator {
  const allowNow = options.allowNow ?? true;
  const now = (options.now ?? Date.now)();
  return dateCheck(
    (d) => (allowNow ? d.getTime() <= now : d.getTime() < now),
    options.message ?? `a DateTime in the past${allowNow ? ' or now' : ''}`,
    ExpectationCodes.valueDateNotPast,
    { now: new Date(now).toISOString(), allowNow }
  );
}

export function isDateInFuture(options: NowOptions = {}): ValueValidator {
  const allowNow = options.allowNow ?? true;
  const now = (options.now ?? Date.now)();
  return dateCheck(
    (d) => (allowNow ? d.getTime() >= now : d.getTime() > now),
    options.message ?? `a DateTime in the future${allowNow ? ' or now' : ''}`,
    ExpectationCodes.valueDateNotFuture,
    { now: new Date(now).toISOString(), allowNow }
  );
}
