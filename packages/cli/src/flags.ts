import {
  ConfigError,
  type FormatOptions,
  resolveFormatOptions,
  type ResolvedFormatOptions,
} from '@eskema/core';

export type OutputFormat = 'text' | 'json';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  schema?: string;
  data?: string;
  export?: string;
  format?: string;
  sync?: boolean;
  maxErrors?: string | number;
  maxValueLength?: string | number;
  debug?: boolean;
  color?: boolean;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'json') {
    return raw;
  }
  throw new ConfigError({
    message: `Invalid --format value "${String(value)}". Supported formats are "text" and "json".`,
    context: { setting: 'format', value },
  });
}

/**
 * Map --max-errors / --max-value-length onto FormatOptions, leaving unset
 * flags to the library defaults.
 */
export function parseFormatOptions(
  options: Pick<CliOptions, 'maxErrors' | 'maxValueLength'>
): ResolvedFormatOptions {
  const formatOptions: FormatOptions = {};
  if (options.maxErrors !== undefined) {
    formatOptions.maxErrorsToList = parseLimit('max-errors', options.maxErrors);
  }
  if (options.maxValueLength !== undefined) {
    formatOptions.maxValueLength = parseLimit(
      'max-value-length',
      options.maxValueLength
    );
  }
  return resolveFormatOptions(formatOptions);
}

function parseLimit(flag: string, value: string | number): number {
  const num = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigError({
      message: `Invalid --${flag} value "${String(value)}". Expected a positive integer.`,
      context: { setting: flag, value },
    });
  }
  return num;
}

/** Named export holding the validator; `default` when the flag is absent. */
export function resolveExportName(value: unknown): string {
  if (value === undefined || value === null || value === '') return 'default';
  const name = String(value).trim();
  if (!/^[A-Za-z_$][\w$]*$/.test(name)) {
    throw new ConfigError({
      message: `Invalid --export value "${String(value)}". Expected an identifier.`,
      context: { setting: 'export', value },
    });
  }
  return name;
}

/**
 * ANSI colours only on a terminal, and never under `--no-color` (commander
 * reports the flag as `color: false`).
 */
export function resolveColor(
  color: boolean | undefined,
  isTTY: boolean | undefined
): boolean {
  return color !== false && isTTY === true;
}
