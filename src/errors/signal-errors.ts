import { BaseAppError, ErrorMeta } from "./BaseAppError";

const SIGNAL_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}signal/`;

/**
 * InvalidSignal family: a signal rejected at the store boundary never enters history.
 */
export const SignalErrors = {
  InvalidConfidenceError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${SIGNAL_ERROR_PREFIX}invalidConfidence`;
      this.message = "confidence must be a number between 0 and 1";
    }
  },

  UnknownDimensionError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${SIGNAL_ERROR_PREFIX}unknownDimension`;
      this.message = "dimension is not a recognized preference dimension";
    }
  },

  InvalidValueError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${SIGNAL_ERROR_PREFIX}invalidValue`;
      this.message = "value must be a non-empty string or a finite number";
    }
  },
};

export type InvalidSignalError = InstanceType<
  (typeof SignalErrors)[keyof typeof SignalErrors]
>;

export function isInvalidSignalError(error: unknown): error is InvalidSignalError {
  return error instanceof BaseAppError && error.code.startsWith(SIGNAL_ERROR_PREFIX);
}
