export * from './cached.js';
export { all, any, none, not, throwInstead, type AllOptions } from './combinator.js';
export * from './comparison.js';
export * from './contextual.js';
export * from './date.js';
export * from './fields.js';
export * from './json.js';
export * from './list.js';
export * from './map.js';
export * from './number.js';
export * from './predicate.js';
export * from './presence.js';
export * from './string.js';
export * from './structure.js';
export * from './type.js';
