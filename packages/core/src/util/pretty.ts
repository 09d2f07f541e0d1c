import { safeStringify } from './json-safe.js';

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== 'object') return false;
  if (Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasOwn(obj: PlainObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Runtime type label used in messages and expectation data. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'Array';
  if (value instanceof Date) return 'Date';
  if (typeof value === 'object') {
    // The prototype's constructor: an own `constructor` key is just data.
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || typeof proto !== 'object') return 'Object';
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor !== 'function' || !ctor.name) return 'Object';
    return ctor.name;
  }
  return typeof value;
}

/**
 * Compact, single-line rendering of a value for messages:
 * strings are quoted, containers are JSON, dates are ISO-8601.
 */
export function prettifyValue(value: unknown): string {
  if (typeof value === 'string') return `"${value}"`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof RegExp) return value.toString();
  if (typeof value === 'bigint') return `${value.toString()}n`;
  if (value instanceof Set) return prettifyValue([...value]);
  if (value instanceof Map) return prettifyValue(Object.fromEntries(value));
  if (value !== null && typeof value === 'object') {
    return safeStringify(value) ?? `<unprintable ${describeType(value)}>`;
  }
  if (typeof value === 'function') return '<function>';
  return String(value);
}
