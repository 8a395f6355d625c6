import { z } from "zod";
import { BUDGET_TIERS, Dimension, isDimension } from "../constants/dimensions";
import { SignalErrors, ValidationErrors } from "../errors";
import { NewPreferenceSignal, PreferenceValue } from "../types/preference.types";
import { parseTimestamp } from "../utils/time";
import { RecordSignalInputSchema } from "./signal.schema";

const BUDGET_SYMBOL = /^\$+$/;
const NUMERIC = /^\d+(\.\d+)?$/;

/**
 * Validates a raw signal and returns it in canonical form.
 * Throws an InvalidSignal error (signal/*) for domain violations and a
 * validation/* error for a malformed envelope.
 */
export function parseSignalInput(input: unknown): NewPreferenceSignal {
  const parsed = RecordSignalInputSchema.safeParse(input);

  if (!parsed.success) {
    mapZodErrorToCustomError(parsed.error, input);
  }

  const { userId, groupId, dimension, value, polarity, confidence, sourceMessageId, observedAt } = parsed.data;

  if (!isDimension(dimension)) {
    throw new SignalErrors.UnknownDimensionError({ dimension });
  }

  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new SignalErrors.InvalidConfidenceError({ confidence, dimension });
  }

  return {
    userId,
    groupId,
    dimension,
    value: normalizeValue(dimension, value),
    polarity,
    confidence,
    sourceMessageId,
    observedAt: parseTimestamp(observedAt)
  };
}

/**
 * Canonical spelling per dimension: budget tiers as 1..4 where recognizable,
 * radii as numbers, everything else trimmed lower-case text.
 * Unrecognizable budget or radius values are kept as text; the aggregator
 * reports them as incompatible.
 */
export function normalizeValue(dimension: Dimension, value: PreferenceValue): PreferenceValue {
  const text = typeof value === "string" ? value.trim().toLowerCase() : value;

  switch (dimension) {
    case "budget_tier": {
      if (typeof text === "string" && BUDGET_SYMBOL.test(text) && text.length <= BUDGET_TIERS.MAX) {
        return text.length;
      }
      if (typeof text === "string" && NUMERIC.test(text)) {
        return Number(text);
      }
      return text;
    }
    case "location_radius": {
      const stripped = typeof text === "string" ? text.replace(/\s*km$/, "") : text;
      if (typeof stripped === "string" && NUMERIC.test(stripped)) {
        return Number(stripped);
      }
      return stripped;
    }
    default:
      return typeof text === "number" ? String(text) : text;
  }
}

function mapZodErrorToCustomError(error: z.ZodError, input: unknown): never {
  const raw = typeof input === "object" && input !== null ? input : {};

  for (const issue of error.issues) {
    const path = issue.path[0];

    switch (path) {
      case "userId":
        throw new ValidationErrors.UserIdEmptyError();
      case "groupId":
        throw new ValidationErrors.GroupIdEmptyError();
      case "sourceMessageId":
        throw new ValidationErrors.MessageIdEmptyError();
      case "observedAt":
        throw new ValidationErrors.InvalidTimestampError();
      case "dimension":
        throw new SignalErrors.UnknownDimensionError({ dimension: "dimension" in raw ? raw.dimension : undefined });
      case "confidence":
        throw new SignalErrors.InvalidConfidenceError({ confidence: "confidence" in raw ? raw.confidence : undefined });
      case "value":
        throw new SignalErrors.InvalidValueError();
    }
  }

  // Fallback for unexpected validation errors
  throw new ValidationErrors.InvalidRequestError({ issues: error.issues.map(issue => issue.message) });
}
