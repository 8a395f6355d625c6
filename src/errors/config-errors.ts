import { BaseAppError, ErrorMeta } from "./BaseAppError";

const CONFIG_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}config/`;

export const ConfigErrors = {
  InvalidConfigError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${CONFIG_ERROR_PREFIX}invalidConfig`;
      this.message = "Invalid engine configuration";
    }
  },
};
