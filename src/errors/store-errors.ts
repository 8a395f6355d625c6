import { BaseAppError, ErrorMeta } from "./BaseAppError";

const STORE_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}store/`;

export const StoreErrors = {
  NotInitializedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${STORE_ERROR_PREFIX}notInitialized`;
      this.message = "Signal store not initialized. Call init() first.";
    }
  },

  InitFailedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${STORE_ERROR_PREFIX}initFailed`;
      this.message = "Failed to initialize signal database";
    }
  },

  ReadFailedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${STORE_ERROR_PREFIX}readFailed`;
      this.message = "Failed to read preference signals";
    }
  },

  WriteFailedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${STORE_ERROR_PREFIX}writeFailed`;
      this.message = "Failed to record preference signal";
    }
  },

  CloseFailedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${STORE_ERROR_PREFIX}closeFailed`;
      this.message = "Failed to close database";
    }
  },
};
