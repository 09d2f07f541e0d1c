/**
 * Rendering options for failure messages
 *
 * All options are optional with conservative defaults.
 */

import { ConfigError } from './errors.js';

export interface FormatOptions {
  /** Truncate the pretty-printed input value after this many characters (default: 120) */
  maxValueLength?: number;
  /** List at most this many expectations, then summarize the rest (default: 20) */
  maxErrorsToList?: number;
}

export type ResolvedFormatOptions = Required<FormatOptions>;

export const DEFAULT_FORMAT_OPTIONS: ResolvedFormatOptions = {
  maxValueLength: 120,
  maxErrorsToList: 20,
};

/**
 * Merge user options with defaults
 *
 * @throws {ConfigError} When a limit is not a positive integer
 */
export function resolveFormatOptions(
  userOptions: FormatOptions = {}
): ResolvedFormatOptions {
  const resolved: ResolvedFormatOptions = {
    maxValueLength:
      userOptions.maxValueLength ?? DEFAULT_FORMAT_OPTIONS.maxValueLength,
    maxErrorsToList:
      userOptions.maxErrorsToList ?? DEFAULT_FORMAT_OPTIONS.maxErrorsToList,
  };
  validateFormatOptions(resolved);
  return resolved;
}

function validateFormatOptions(options: ResolvedFormatOptions): void {
  for (const setting of ['maxValueLength', 'maxErrorsToList'] as const) {
    const value = options[setting];
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError({
        message: `${setting} must be a positive integer`,
        context: { setting, value },
      });
    }
  }
}
