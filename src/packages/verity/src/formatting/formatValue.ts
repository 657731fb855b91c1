import { inspect } from 'node:util';
import { resolveFormatOptions, type FormatOptions } from '../config';

/**
 * Debug-style rendering of a value, as shown between the angle brackets of a
 * failure diagnostic. Always a single line and never colored.
 *
 * Objects can control their rendering through `inspect.custom`.
 */
export const formatValue = (
  value: unknown,
  options?: Partial<FormatOptions>,
): string => {
  const { depth, maxArrayLength, maxStringLength } =
    resolveFormatOptions(options);

  return inspect(value, {
    depth,
    maxArrayLength,
    maxStringLength,
    colors: false,
    compact: true,
    breakLength: Infinity,
    sorted: false,
  });
};

export const bracketed = (
  value: unknown,
  options?: Partial<FormatOptions>,
): string => `<${formatValue(value, options)}>`;
