import type { IValidator, ValueValidator } from '../validator/base.js';
import { transform, type TransformOptions, withMessage } from './core.js';

/** `null` and `undefined` become `fallback` before `child` runs. */
export function defaultTo(
  fallback: unknown,
  child: IValidator,
  options: TransformOptions = {}
): ValueValidator {
  return withMessage(
    transform((value) => value ?? fallback, child),
    options.message
  );
}
