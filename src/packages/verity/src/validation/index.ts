import { ValidationError } from '../errors';
import { isNumber, isString } from './guards';

export const enum ValidationErrors {
  NOT_A_NONEMPTY_STRING = 'NOT_A_NONEMPTY_STRING',
  NOT_A_POSITIVE_NUMBER = 'NOT_A_POSITIVE_NUMBER',
}

export const assertNotEmptyString = (value: unknown): string => {
  if (!isString(value) || value.length === 0) {
    throw new ValidationError(ValidationErrors.NOT_A_NONEMPTY_STRING);
  }
  return value;
};

export const assertPositiveNumber = (value: unknown): number => {
  if (!isNumber(value) || value <= 0) {
    throw new ValidationError(ValidationErrors.NOT_A_POSITIVE_NUMBER);
  }
  return value;
};

export * from './guards';
