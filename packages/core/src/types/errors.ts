/**
 * Error hierarchy for Eskema
 *
 * Validation failures are ordinary Results. The classes below are reserved for
 * programming and usage errors, plus the opt-in thrown form of a failure.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';
import { buildValidationFailureMessage } from '../errors/presenter.js';
import { describeType } from '../util/pretty.js';
import type { Result } from './result.js';

export interface ErrorContext {
  path?: string; // expectation path, e.g. '.user[0].name'
  value?: unknown; // offending value (may contain PII)
  setting?: string; // option or flag name for configuration errors
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface EskemaErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all Eskema errors
 */
export abstract class EskemaError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor(params: EskemaErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Serialize error to JSON for logging and `--debug` output. */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      stack: this.stack,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Raised by a synchronous entry point when some validator in the tree
 * returned a promise.
 */
export class AsyncValidatorError extends EskemaError {
  constructor(
    params: { message?: string; context?: ErrorContext; cause?: Error } = {}
  ) {
    super({
      message:
        params.message ??
        'Cannot call validate() on a validator that returned a Promise; use validateAsync() instead',
      errorCode: ErrorCode.ASYNC_IN_SYNC_CONTEXT,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Thrown form of a failing Result (validateOrThrow, throwInstead, Result.orThrow)
 */
export class ValidatorFailedError extends EskemaError {
  public readonly result: Result;

  constructor(params: { result: Result; message?: string }) {
    const { result } = params;
    super({
      message: params.message ?? buildValidationFailureMessage(result),
      errorCode: ErrorCode.VALIDATION_FAILED,
      severity: 'warn',
      context: {
        path: result.firstExpectation?.path,
        value: result.value,
        errorCount: result.expectationCount,
      },
    });
    this.result = result;
  }

  /** One-line summary, e.g. `ValidatorFailed(errors=2, type=Object)` */
  get summary(): string {
    return `ValidatorFailed(errors=${this.result.expectationCount}, type=${describeType(this.result.value)})`;
  }
}

/**
 * Invalid arguments handed to a builder step or factory
 */
export class BuilderError extends EskemaError {
  constructor(params: {
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INVALID_BUILDER_USAGE,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends EskemaError {
  constructor(params: {
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

export function isEskemaError(error: unknown): error is EskemaError {
  return error instanceof EskemaError;
}
