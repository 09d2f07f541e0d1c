import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  BaseBuilder,
  ConfigError,
  ErrorCode,
  getExitCode,
  type IValidator,
  type Result,
  ValueValidator,
} from '@eskema/core';
import { printDebug } from '../debug.js';
import {
  type CliOptions,
  parseFormatOptions,
  resolveColor,
  resolveExportName,
  resolveOutputFormat,
} from '../flags.js';
import { renderResult } from '../render.js';

/**
 * `eskema check`: validate one JSON document and print the outcome.
 *
 * @returns The process exit code (0 when the document is valid)
 */
export async function runCheck(
  options: CliOptions,
  cwd: string = process.cwd()
): Promise<number> {
  const schemaPath = options.schema;
  if (!schemaPath) {
    throw new ConfigError({
      message: 'Missing --schema <module>',
      context: { setting: 'schema' },
    });
  }
  const dataPath = options.data;
  if (!dataPath) {
    throw new ConfigError({
      message: 'Missing --data <file>',
      context: { setting: 'data' },
    });
  }

  const format = resolveOutputFormat(options.format);
  const formatOptions = parseFormatOptions(options);
  const exportName = resolveExportName(options.export);

  if (options.debug) {
    printDebug('effective options', {
      schema: schemaPath,
      data: dataPath,
      export: exportName,
      format,
      sync: options.sync === true,
      ...formatOptions,
    });
  }

  const validator = await loadValidator(
    path.resolve(cwd, schemaPath),
    exportName
  );
  const document = await readJsonDocument(path.resolve(cwd, dataPath));

  const result: Result =
    options.sync === true
      ? validator.validate(document)
      : await validator.validateAsync(document);

  if (options.debug) {
    printDebug('result', result.toJSON());
  }

  process.stdout.write(
    `${renderResult(result, {
      format,
      formatOptions,
      colors: resolveColor(options.color, process.stdout.isTTY),
    })}\n`
  );
  return result.isValid ? 0 : getExitCode(ErrorCode.VALIDATION_FAILED);
}

/**
 * Import `file` and return its `exportName` export as a validator. Builders
 * are accepted and built.
 *
 * @throws {ConfigError} When the module cannot be loaded or the export is not a value validator
 */
export async function loadValidator(
  file: string,
  exportName: string
): Promise<IValidator> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(file).href);
  } catch (err: unknown) {
    throw new ConfigError({
      message: `Cannot load schema module: ${file}`,
      context: { setting: 'schema', file },
      cause: err instanceof Error ? err : undefined,
    });
  }

  const exported: unknown =
    typeof mod === 'object' && mod !== null
      ? Reflect.get(mod, exportName)
      : undefined;
  const candidate =
    exported instanceof BaseBuilder ? exported.build() : exported;

  if (!(candidate instanceof ValueValidator)) {
    throw new ConfigError({
      message: `Export "${exportName}" of ${file} is not a validator`,
      context: { setting: 'export', file },
    });
  }
  return candidate;
}

/**
 * @throws {ConfigError} When the file is missing or not valid JSON
 */
export async function readJsonDocument(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (err: unknown) {
    throw new ConfigError({
      message: `Data file not found: ${file}`,
      context: { setting: 'data', file },
      cause: err instanceof Error ? err : undefined,
    });
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err: unknown) {
    throw new ConfigError({
      message: `Data file is not valid JSON: ${file}`,
      context: { setting: 'data', file },
      cause: err instanceof Error ? err : undefined,
    });
  }
}
