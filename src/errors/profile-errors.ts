import { BaseAppError, ErrorMeta } from "./BaseAppError";

const PROFILE_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}profile/`;

export const ProfileErrors = {
  RecomputeFailedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${PROFILE_ERROR_PREFIX}recomputeFailed`;
      this.message = "Failed to recompute group preference profile";
    }
  },
};
