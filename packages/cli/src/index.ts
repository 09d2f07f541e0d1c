#!/usr/bin/env node

// CLI entry point
// - Command name: `eskema` with the `check` subcommand.
// - `check` loads a validator exported by an ES module, validates a JSON
//   document against it and prints the Result as text or JSON.
// - Exit codes: 0 valid, 1 invalid, the error's own exit code for usage and
//   configuration errors (see ErrorCode / EXIT_CODES in @eskema/core).

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ErrorCode, EskemaError, isEskemaError } from '@eskema/core';
import { runCheck } from './commands/check.js';
import { printDebug } from './debug.js';
import { type CliOptions, resolveColor } from './flags.js';
import { renderErrorView, toErrorView } from './render.js';

class InternalCliError extends EskemaError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('eskema')
    .description('Validate JSON documents with eskema validators')
    .version('0.1.0');

  program
    .command('check')
    .description('Validate a JSON document against an exported validator')
    .option('-s, --schema <module>', 'ES module exporting the validator')
    .option('-d, --data <file>', 'JSON document to validate')
    .option('-e, --export <name>', 'Export holding the validator', 'default')
    .option('-f, --format <format>', 'Output format: text|json', 'text')
    .option('--sync', 'Validate synchronously (fails on async validators)')
    .option('--max-errors <number>', 'Expectations listed before truncating')
    .option(
      '--max-value-length <number>',
      'Characters of the input value shown in messages'
    )
    .option('--no-color', 'Disable ANSI colors')
    .option('--debug', 'Print diagnostics to stderr')
    .action(async (options: CliOptions) => {
      try {
        process.exitCode = await runCheck(options);
      } catch (err: unknown) {
        handleCliError(err, {
          colors: resolveColor(options.color, process.stderr.isTTY),
          debug: options.debug === true,
        });
      }
    });

  return program;
}

export interface CliErrorOptions {
  colors?: boolean;
  /** Also dump the serialized error to stderr. */
  debug?: boolean;
}

export function handleCliError(
  err: unknown,
  options: CliErrorOptions = {}
): void {
  let error: EskemaError;
  if (isEskemaError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalCliError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  if (options.debug) {
    printDebug('error', error.toJSON());
  }
  process.stderr.write(
    `${renderErrorView(toErrorView(error, options.colors ?? false))}\n`
  );
  process.exitCode = error.getExitCode();
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram()
    .parseAsync(argv)
    .catch((err: unknown) => handleCliError(err));
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
