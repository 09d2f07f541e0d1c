export {
  expectPreserveValue,
  pivotValue,
  transform,
  type TransformOptions,
  withMessage,
} from './core.js';
export { toBigInt, toDouble, toInt, toIntSafe, toIntStrict, toNum } from './number.js';
export { toBool, toBoolLenient, toBoolStrict } from './boolean.js';
export {
  collapseWhitespace,
  collapseWhitespaceString,
  split,
  toLowerCase,
  toLowerCaseString,
  toStr,
  toUpperCase,
  toUpperCaseString,
  trim,
  trimString,
} from './string.js';
export { toDate, toDateOnly } from './datetime.js';
export { toJsonDecoded } from './json.js';
export { flattenMapKeys, getField, pickKeys, pluckKey } from './map.js';
export { defaultTo } from './utility.js';
