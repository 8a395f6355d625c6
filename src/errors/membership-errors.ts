import { BaseAppError, ErrorMeta } from "./BaseAppError";

const MEMBERSHIP_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}membership/`;

export const MembershipErrors = {
  FetchFailedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${MEMBERSHIP_ERROR_PREFIX}fetchFailed`;
      this.message = "Failed to fetch group membership";
    }
  },

  InvalidResponseError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${MEMBERSHIP_ERROR_PREFIX}invalidResponse`;
      this.message = "Membership service returned an unexpected payload";
    }
  },
};
