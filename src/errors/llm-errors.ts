import { BaseAppError, ErrorMeta } from "./BaseAppError";

const LLM_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}llm/`;

export const LLMErrors = {
  ApiKeyMissingError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${LLM_ERROR_PREFIX}apiKeyMissing`;
      this.message = "Missing OPENAI_API_KEY. Set it in .env";
    }
  },

  InvalidJsonError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${LLM_ERROR_PREFIX}invalidJson`;
      this.message = "Invalid JSON returned from LLM";
    }
  },

  InvalidSchemaError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${LLM_ERROR_PREFIX}invalidSchema`;
      this.message = "LLM output did not match the preference extraction schema";
    }
  },

  ExtractionFailedError: class extends BaseAppError {
    constructor(meta?: ErrorMeta) {
      super(meta);
      this.code = `${LLM_ERROR_PREFIX}extractionFailed`;
      this.message = "LLM preference extraction failed";
    }
  },
};
