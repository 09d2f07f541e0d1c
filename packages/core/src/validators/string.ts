/**
 * String content and format checks
 *
 * Every check here verifies that the value is a string first, so there is no
 * need to put `isString()` in front of them.
 */

import { ExpectationCodes } from '../errors/codes.js';
import { Expectation } from '../types/expectation.js';
import type { IValidator, ValueValidator } from '../validator/base.js';
import {
  parseDateString,
  parseDoubleString,
  parseIntString,
} from '../util/parse.js';
import { prettifyValue } from '../util/pretty.js';
import { contains, isEq, length } from './comparison.js';
import { isGt, isLte } from './number.js';
import { validator } from './predicate.js';
import { isString, type MessageOption } from './type.js';

const EMAIL_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const UUID_V4_RE =
  /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-4[0-9a-fA-F]{3}-[89abAB][0-9a-fA-F]{3}-[0-9a-fA-F]{12}$/;
const BOOL_STRINGS = new Set(['true', 'false']);
// scheme-less host such as `example.com` or `localhost:8080/path`
const BARE_HOST_RE = /^[a-zA-Z0-9-]+(\.[a-zA-Z0-9-]+)*(:\d+)?([/?#].*)?$/;

/** The string's length satisfies every validator in `validators`. */
export function stringLength(
  validators: readonly IValidator[],
  options: MessageOption = {}
): ValueValidator {
  return isString().and(length(validators, options));
}

export function stringIsOfLength(
  size: number,
  options: MessageOption = {}
): ValueValidator {
  return stringLength([isEq(size)], options);
}

export function stringContains(
  needle: string,
  options: MessageOption = {}
): ValueValidator {
  return isString().and(
    contains(needle).expecting(
      new Expectation({
        message: options.message ?? `String to contain ${prettifyValue(needle)}`,
        code: ExpectationCodes.valueContainsMissing,
        data: { needle },
      })
    )
  );
}

export function stringEmpty(options: MessageOption = {}): ValueValidator {
  return stringLength([isLte(0)]).expecting(
    new Expectation({
      message: options.message ?? 'String to be empty',
      code: ExpectationCodes.valueLengthOutOfRange,
      data: { expected: 0 },
    })
  );
}

/** Global and sticky flags are dropped so repeated tests do not carry state. */
function statelessPattern(pattern: RegExp | string): RegExp {
  if (typeof pattern === 'string') return new RegExp(pattern);
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

export function stringMatchesPattern(
  pattern: RegExp | string,
  options: MessageOption = {}
): ValueValidator {
  const re = statelessPattern(pattern);
  return isString().and(
    validator(
      (value) => typeof value === 'string' && re.test(value),
      (value) =>
        new Expectation({
          message: options.message ?? `String to match "${re.source}"`,
          value,
          code: ExpectationCodes.valuePatternMismatch,
          data: { pattern: re.source },
        })
    )
  );
}

export function isLowerCase(options: MessageOption = {}): ValueValidator {
  return caseCheck(/^[a-z]+$/, options.message ?? 'lowercase string');
}

export function isUpperCase(options: MessageOption = {}): ValueValidator {
  return caseCheck(/^[A-Z]+$/, options.message ?? 'uppercase string');
}

export function isEmail(options: MessageOption = {}): ValueValidator {
  return formatCheck(
    (text) => EMAIL_RE.test(text),
    options.message ?? 'a valid email address',
    'email'
  );
}

function parsesAsUrl(text: string, strict: boolean): boolean {
  if (text.trim() !== text || text.length === 0) return false;
  try {
    const url = new URL(text);
    return url.protocol.length > 1;
  } catch {
    return !strict && BARE_HOST_RE.test(text);
  }
}

/**
 * A URL. Non-strict mode also accepts scheme-less hosts such as
 * `example.com`; see {@link isStrictUrl}.
 */
export function isUrl(
  options: MessageOption & { strict?: boolean } = {}
): ValueValidator {
  const strict = options.strict ?? false;
  return formatCheck(
    (text) => parsesAsUrl(text, strict),
    options.message ?? 'a valid URL',
    strict ? 'absolute-url' : 'url'
  );
}

export function isStrictUrl(options: MessageOption = {}): ValueValidator {
  return isUrl({ ...options, strict: true });
}

export function isUuidV4(options: MessageOption = {}): ValueValidator {
  return formatCheck(
    (text) => UUID_V4_RE.test(text),
    options.message ?? 'a valid UUID v4',
    'uuid-v4'
  );
}

export function isIntString(options: MessageOption = {}): ValueValidator {
  return formatCheck(
    (text) => parseIntString(text) !== undefined,
    options.message ?? 'a valid formatted int String',
    'int'
  );
}

export function isDoubleString(options: MessageOption = {}): ValueValidator {
  return formatCheck(
    (text) => parseDoubleString(text) !== undefined,
    options.message ?? 'a valid formatted double String',
    'double'
  );
}

export function isNumString(options: MessageOption = {}): ValueValidator {
  return formatCheck(
    (text) => parseDoubleString(text) !== undefined,
    options.message ?? 'a valid formatted number String',
    'number'
  );
}

/** `"true"` / `"false"`, case-insensitive. */
export function isBoolString(options: MessageOption = {}): ValueValidator {
  return formatCheck(
    (text) => BOOL_STRINGS.has(text.trim().toLowerCase()),
    options.message ?? 'a valid formatted bool String',
    'bool'
  );
}

export function isDateString(options: MessageOption = {}): ValueValidator {
  return formatCheck(
    (text) => parseDateString(text) !== undefined,
    options.message ?? 'a valid DateTime formatted String',
    'date-time'
  );
}

export function isNotEmpty(options: MessageOption = {}): ValueValidator {
  return stringLength([isGt(0)], options);
}

export function isEmpty(options: MessageOption = {}): ValueValidator {
  return stringLength([isLte(0)], options);
}

function formatCheck(
  test: (text: string) => boolean,
  message: string,
  format: string
): ValueValidator {
  return isString().and(
    validator(
      (value) => typeof value === 'string' && test(value),
      (value) =>
        new Expectation({
          message,
          value,
          code: ExpectationCodes.valueFormatInvalid,
          data: { format },
        })
    )
  );
}

function caseCheck(re: RegExp, message: string): ValueValidator {
  return isString().and(
    validator(
      (value) => typeof value === 'string' && re.test(value),
      (value) =>
        new Expectation({
          message,
          value,
          code: ExpectationCodes.valueCaseMismatch,
        })
    )
  );
}
