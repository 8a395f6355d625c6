export const LLM_CONFIG = {
  PREFERENCE_EXTRACTION_MODEL: "gpt-4o-mini",
  TEMPERATURE: 0,
  MAX_EXTRACTION_TOKENS: 600
} as const;

export const LLM_CONTENT_LIMITS = {
  MAX_MESSAGE_TEXT_LENGTH: 2000
} as const;
