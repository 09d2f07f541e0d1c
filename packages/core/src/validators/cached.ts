/**
 * Shared instances of the zero-argument validators, built once at module
 * load. Validators are immutable, so `$isString` can be reused anywhere
 * `isString()` would be.
 */

import type { ValueValidator } from '../validator/base.js';
import { not } from './combinator.js';
import { listEmpty } from './list.js';
import {
  isBoolString,
  isDateString,
  isDoubleString,
  isEmail,
  isIntString,
  isLowerCase,
  isNumString,
  isStrictUrl,
  isUpperCase,
  isUrl,
  isUuidV4,
  stringEmpty,
} from './string.js';
import {
  isBigInt,
  isBool,
  isDate,
  isDouble,
  isFunction,
  isInt,
  isList,
  isMap,
  isNull,
  isNumber,
  isSet,
  isString,
} from './type.js';

// Type checks
export const $isNull: ValueValidator = isNull();
export const $isString: ValueValidator = isString();
export const $isNumber: ValueValidator = isNumber();
export const $isInt: ValueValidator = isInt();
export const $isDouble: ValueValidator = isDouble();
export const $isBool: ValueValidator = isBool();
export const $isBigInt: ValueValidator = isBigInt();
export const $isFunction: ValueValidator = isFunction();
export const $isList: ValueValidator = isList();
export const $isMap: ValueValidator = isMap();
export const $isSet: ValueValidator = isSet();
export const $isDate: ValueValidator = isDate();

// Strings
export const $stringEmpty: ValueValidator = stringEmpty();
export const $stringNotEmpty: ValueValidator = not($stringEmpty);
export const $isLowerCase: ValueValidator = isLowerCase();
export const $isUpperCase: ValueValidator = isUpperCase();
export const $isEmail: ValueValidator = isEmail();
export const $isUrl: ValueValidator = isUrl();
export const $isStrictUrl: ValueValidator = isStrictUrl();
export const $isUuidV4: ValueValidator = isUuidV4();
export const $isIntString: ValueValidator = isIntString();
export const $isDoubleString: ValueValidator = isDoubleString();
export const $isNumString: ValueValidator = isNumString();
export const $isBoolString: ValueValidator = isBoolString();
export const $isDateString: ValueValidator = isDateString();

// Lists
export const $listEmpty: ValueValidator = listEmpty();
export const $listNotEmpty: ValueValidator = not($listEmpty);
