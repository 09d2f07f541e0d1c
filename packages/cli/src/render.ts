import {
  buildValidationMessage,
  type EskemaError,
  type ResolvedFormatOptions,
  type Result,
  safeStringify,
} from '@eskema/core';
import type { OutputFormat } from './flags.js';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  green: '\u001B[32m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

export interface RenderOptions {
  format: OutputFormat;
  formatOptions: ResolvedFormatOptions;
  colors?: boolean;
}

/**
 * Render a Result for stdout. `json` output is the serialized Result;
 * `text` output is the validation message, colored on the headline only.
 */
export function renderResult(result: Result, options: RenderOptions): string {
  if (options.format === 'json') {
    return safeStringify(result.toJSON(), 2) ?? '{"valid":false}';
  }
  const [headline, ...rest] = buildValidationMessage(
    result,
    options.formatOptions
  ).split('\n');
  const color = result.isValid ? ANSI.green : ANSI.red;
  return [colorize(headline, options.colors ?? false, color), ...rest].join(
    '\n'
  );
}

export interface ErrorView {
  title: string;
  detail?: string;
  colors: boolean;
}

export function toErrorView(error: EskemaError, colors = false): ErrorView {
  const view: ErrorView = {
    title: `Error ${error.errorCode}: ${error.message.split('\n')[0]}`,
    colors,
  };
  const setting = error.context?.setting;
  if (typeof setting === 'string') view.detail = `Setting: ${setting}`;
  return view;
}

export function renderErrorView(view: ErrorView): string {
  const lines: string[] = [];
  const title = `❌ ${view.title}`;
  lines.push(
    colorize(colorize(title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );
  if (view.detail) {
    lines.push(view.detail);
  }
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // Simple ANSI escape code stripper
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}
