export const isNumber = (val: unknown): val is number =>
  typeof val === 'number' && val === val;

export const isString = (val: unknown): val is string =>
  typeof val === 'string';

export const isFunction = (
  val: unknown,
): val is (...args: never[]) => unknown => typeof val === 'function';
