import { assertNotEmptyString, assertPositiveNumber } from '../validation';

export type FormatOptions = {
  depth: number;
  maxArrayLength: number;
  maxStringLength: number;
};

export type SpecOptions = {
  name?: string;
  location?: string;
  captureLocation?: boolean;
  format?: Partial<FormatOptions>;
};

export type ResolvedSpecOptions = {
  name: string | undefined;
  location: string | undefined;
  captureLocation: boolean;
  format: FormatOptions;
};

export const defaultFormatOptions: Readonly<FormatOptions> = {
  depth: 4,
  maxArrayLength: 100,
  maxStringLength: 10_000,
};

export const resolveFormatOptions = (
  options?: Partial<FormatOptions>,
): FormatOptions => ({
  depth: assertPositiveNumber(options?.depth ?? defaultFormatOptions.depth),
  maxArrayLength: assertPositiveNumber(
    options?.maxArrayLength ?? defaultFormatOptions.maxArrayLength,
  ),
  maxStringLength: assertPositiveNumber(
    options?.maxStringLength ?? defaultFormatOptions.maxStringLength,
  ),
});

export const resolveSpecOptions = (
  options?: SpecOptions,
): ResolvedSpecOptions => ({
  name:
    options?.name !== undefined
      ? assertNotEmptyString(options.name)
      : undefined,
  location:
    options?.location !== undefined
      ? assertNotEmptyString(options.location)
      : undefined,
  captureLocation: options?.captureLocation === true,
  format: resolveFormatOptions(options?.format),
});
