import OpenAI from "openai";
import type { Chat } from "openai/resources";
import { logger } from "../utils/logger";
import { BaseAppError, LLMErrors } from "../errors";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { LLM_CONFIG, LLM_CONTENT_LIMITS } from "../constants/llm";
import { isDimension } from "../constants/dimensions";
import {
  PREFERENCE_EXTRACTION_SYSTEM_PROMPT,
  buildPreferenceExtractionUserPrompt
} from "../prompts/preference-extraction.prompt";
import { ExtractedPreference, ExtractedPreferencesSchema } from "../validators/signal.schema";

/**
 * Signal-shaped output of the extractor; the caller adds user, group,
 * message id and timestamp before recording it.
 */
export interface SignalDraft {
  dimension: string;
  value: string | number;
  polarity: "positive" | "negative";
  confidence: number;
}

export interface PreferenceExtractor {
  extract(text: string, context: { messageId: string }): Promise<SignalDraft[]>;
}

export class PreferenceExtractorService implements PreferenceExtractor {
  private getOpenAIClient(): OpenAI {
    if (!process.env.OPENAI_API_KEY) {
      throw new LLMErrors.ApiKeyMissingError();
    }

    return new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  }

  /**
   * Turns one chat message into signal drafts. Items with an unknown
   * dimension or an out-of-range confidence are dropped with a warning.
   */
  async extract(text: string, context: { messageId: string }): Promise<SignalDraft[]> {
    const client = this.getOpenAIClient();

    logger.info(LOG_SOURCES.LLM, LOG_MESSAGES.EXTRACTION_STARTED, { messageId: context.messageId });

    const messages: Chat.ChatCompletionMessageParam[] = [
      { role: "system", content: PREFERENCE_EXTRACTION_SYSTEM_PROMPT },
      {
        role: "user",
        content: buildPreferenceExtractionUserPrompt(text.substring(0, LLM_CONTENT_LIMITS.MAX_MESSAGE_TEXT_LENGTH))
      }
    ];

    try {
      const response = await client.chat.completions.create({
        model: LLM_CONFIG.PREFERENCE_EXTRACTION_MODEL,
        messages,
        response_format: { type: "json_object" },
        temperature: LLM_CONFIG.TEMPERATURE,
        max_completion_tokens: LLM_CONFIG.MAX_EXTRACTION_TOKENS
      });

      const content = response.choices[0]?.message.content;
      if (!content) {
        logger.error(LOG_SOURCES.LLM, LOG_MESSAGES.INVALID_JSON_RETURNED, { messageId: context.messageId });
        throw new LLMErrors.InvalidJsonError({ messageId: context.messageId });
      }

      const drafts = this.parseDrafts(content, context.messageId);

      logger.info(LOG_SOURCES.LLM, LOG_MESSAGES.EXTRACTION_SUCCESSFUL, {
        messageId: context.messageId,
        count: drafts.length
      });

      return drafts;
    } catch (error) {
      if (error instanceof BaseAppError) {
        throw error;
      }

      if (error instanceof Error) {
        throw new LLMErrors.ExtractionFailedError({ originalError: error.message, messageId: context.messageId });
      }
      throw new LLMErrors.ExtractionFailedError({ messageId: context.messageId });
    }
  }

  parseDrafts(content: string, messageId: string): SignalDraft[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (parseError) {
      logger.error(LOG_SOURCES.LLM, LOG_MESSAGES.JSON_PARSE_FAILED, { messageId });
      throw new LLMErrors.InvalidJsonError({ messageId });
    }

    const result = ExtractedPreferencesSchema.safeParse(parsed);
    if (!result.success) {
      logger.error(LOG_SOURCES.LLM, LOG_MESSAGES.SCHEMA_VALIDATION_FAILED, {
        messageId,
        reason: result.error.issues[0]?.message
      });
      throw new LLMErrors.InvalidSchemaError({ messageId });
    }

    return result.data.preferences.filter(item => this.isUsable(item, messageId));
  }

  private isUsable(item: ExtractedPreference, messageId: string): boolean {
    if (!isDimension(item.dimension)) {
      logger.warn(LOG_SOURCES.LLM, LOG_MESSAGES.EXTRACTED_ITEM_DROPPED, {
        messageId,
        dimension: item.dimension,
        reason: "unknown dimension"
      });
      return false;
    }

    if (!Number.isFinite(item.confidence) || item.confidence < 0 || item.confidence > 1) {
      logger.warn(LOG_SOURCES.LLM, LOG_MESSAGES.EXTRACTED_ITEM_DROPPED, {
        messageId,
        dimension: item.dimension,
        confidence: item.confidence,
        reason: "confidence out of range"
      });
      return false;
    }

    return true;
  }
}

export const preferenceExtractor = new PreferenceExtractorService();
