import { isFunction } from '../validation';

export type Ordering = -1 | 0 | 1;

/**
 * Capability of a value that can be ordered against values of type `T`.
 *
 * `compareTo` returns a negative number when the value is less than `other`,
 * zero when equal and a positive number when greater. `undefined` or `NaN`
 * marks the pair as incomparable.
 */
export interface Comparable<T> {
  compareTo(other: T): number | undefined;
}

export type Orderable =
  | number
  | bigint
  | string
  | boolean
  | Date
  | Comparable<unknown>;

export const isComparable = (value: unknown): value is Comparable<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'compareTo' in value &&
  isFunction(value.compareTo);

export const isOrderable = (value: unknown): value is Orderable =>
  typeof value === 'number' ||
  typeof value === 'bigint' ||
  typeof value === 'string' ||
  typeof value === 'boolean' ||
  value instanceof Date ||
  isComparable(value);

const sign = (difference: number | undefined): Ordering | undefined => {
  if (difference === undefined || Number.isNaN(difference)) return undefined;

  return difference < 0 ? -1 : difference > 0 ? 1 : 0;
};

const comparePrimitives = <T extends number | bigint | string>(
  left: T,
  right: T,
): Ordering | undefined =>
  left < right ? -1 : left > right ? 1 : left === right ? 0 : undefined;

/**
 * Partial order over orderable values. Returns `undefined` whenever the pair
 * cannot be ordered: a `NaN` operand, an invalid date, a `compareTo` that
 * declines, or operands of different kinds. `false` orders before `true`.
 */
export const partialCompare = <T extends Orderable>(
  left: T,
  right: T,
): Ordering | undefined => {
  if (typeof left === 'number' && typeof right === 'number')
    return comparePrimitives(left, right);

  if (typeof left === 'bigint' && typeof right === 'bigint')
    return comparePrimitives(left, right);

  if (typeof left === 'string' && typeof right === 'string')
    return comparePrimitives(left, right);

  if (typeof left === 'boolean' && typeof right === 'boolean')
    return comparePrimitives(Number(left), Number(right));

  if (left instanceof Date && right instanceof Date)
    return comparePrimitives(left.getTime(), right.getTime());

  if (isComparable(left)) return sign(left.compareTo(right));

  return undefined;
};
