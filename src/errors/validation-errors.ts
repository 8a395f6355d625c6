import { BaseAppError, ErrorMeta } from "./BaseAppError";

const VALIDATION_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}validation/`;

export const ValidationErrors = {
  GroupIdEmptyError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}groupIdEmpty`;
      this.message = "groupId must be a non-empty string";
    }
  },

  UserIdEmptyError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}userIdEmpty`;
      this.message = "userId must be a non-empty string";
    }
  },

  MessageIdEmptyError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}messageIdEmpty`;
      this.message = "messageId must be a non-empty string";
    }
  },

  MessageTextEmptyError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}messageTextEmpty`;
      this.message = "text must be a non-empty string";
    }
  },

  InvalidTimestampError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}invalidTimestamp`;
      this.message = "observedAt must be an ISO 8601 timestamp";
    }
  },

  InvalidFeasibilityReportError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}invalidFeasibilityReport`;
      this.message = "feasibility report needs a constraintsVersion and a non-negative integer matchingRestaurants";
    }
  },

  InvalidRequestError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}invalidRequest`;
      this.message = "Request body is invalid";
    }
  },
};
