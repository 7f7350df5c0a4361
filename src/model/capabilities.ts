import type { RichContent } from '../types.js';

/** Object that knows how to turn itself into output data. */
export interface Serializable {
  serialize(): unknown;
}

export interface ArrayConvertible {
  toArray(): unknown;
}

/** Object with its own string form (not the inherited `[object Object]`). */
export interface Stringable {
  toString(): string;
}

function hasMethod(value: object, name: string): boolean {
  return typeof Reflect.get(value, name) === 'function';
}

export function isSerializable(value: object): value is Serializable {
  return hasMethod(value, 'serialize');
}

export function isArrayConvertible(value: object): value is ArrayConvertible {
  return hasMethod(value, 'toArray');
}

export function isStringable(value: object): boolean {
  return hasMethod(value, 'toString') && Reflect.get(value, 'toString') !== Object.prototype.toString;
}

export function isRichContent(value: object): value is RichContent {
  return hasMethod(value, 'toJSON');
}
