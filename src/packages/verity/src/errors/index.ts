import { isNumber } from '../validation/guards';

export type VerityErrorCode =
  (typeof VerityError.Codes)[keyof typeof VerityError.Codes];

export class VerityError extends Error {
  public static readonly Codes = {
    ValidationError: 400,
    AssertionFailed: 417,
  } as const;

  public errorCode: VerityErrorCode;

  constructor(options: { errorCode: VerityErrorCode; message: string }) {
    super(options.message);
    this.errorCode = options.errorCode;

    // 👇️ because we are extending a built-in class
    Object.setPrototypeOf(this, VerityError.prototype);
  }

  public static isInstanceOf<ErrorType extends VerityError = VerityError>(
    error: unknown,
    errorCode?: VerityErrorCode,
  ): error is ErrorType {
    return (
      typeof error === 'object' &&
      error !== null &&
      'errorCode' in error &&
      isNumber(error.errorCode) &&
      (errorCode === undefined || error.errorCode === errorCode)
    );
  }
}

export class ValidationError extends VerityError {
  constructor(message?: string) {
    super({
      errorCode: VerityError.Codes.ValidationError,
      message:
        message ?? `Validation Error occurred while configuring assertion`,
    });
    this.name = 'ValidationError';

    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Thrown when an assertion does not hold. Test runners report it as the
 * failure of the test that raised it.
 */
export class AssertionError extends VerityError {
  public readonly expected: string | undefined;
  public readonly actual: string | undefined;

  constructor(
    message: string,
    details?: { expected?: string | undefined; actual?: string | undefined },
  ) {
    super({ errorCode: VerityError.Codes.AssertionFailed, message });
    this.name = 'AssertionError';
    this.expected = details?.expected;
    this.actual = details?.actual;

    Object.setPrototypeOf(this, AssertionError.prototype);
  }
}
