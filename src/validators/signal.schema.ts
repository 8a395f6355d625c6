import { z } from "zod";

const idSchema = (field: string) =>
  z
    .string({ required_error: `${field} cannot be empty` })
    .trim()
    .min(1, `${field} cannot be empty`);

export const PreferenceValueSchema = z.union([
  z.string().trim().min(1, "value cannot be empty"),
  z.number().finite()
]);

/**
 * Signal as it arrives at the store boundary. Dimension and confidence are
 * only checked for type here; their domain checks raise InvalidSignal errors.
 */
export const RecordSignalInputSchema = z.object({
  userId: idSchema("userId"),
  groupId: idSchema("groupId"),
  dimension: z.string().trim(),
  value: PreferenceValueSchema,
  polarity: z.enum(["positive", "negative"]).default("positive"),
  confidence: z.number(),
  sourceMessageId: idSchema("sourceMessageId"),
  observedAt: z.string().trim().min(1)
});

export const AnalyzeMessageInputSchema = z.object({
  userId: idSchema("userId"),
  messageId: idSchema("messageId"),
  text: z.string().trim().min(1, "text cannot be empty"),
  observedAt: z.string().trim().min(1).optional()
});

export const MembershipInputSchema = z.object({
  userId: idSchema("userId")
});

export const FeasibilityReportSchema = z.object({
  constraintsVersion: z.string().trim().min(1),
  matchingRestaurants: z.number().int().nonnegative()
});

/**
 * Shape the LLM is asked to return; validated before any item becomes a signal.
 */
export const ExtractedPreferencesSchema = z.object({
  preferences: z.array(
    z.object({
      dimension: z.string(),
      value: z.union([z.string(), z.number()]),
      polarity: z.enum(["positive", "negative"]).default("positive"),
      confidence: z.number()
    })
  )
});

export type RecordSignalInput = z.input<typeof RecordSignalInputSchema>;
export type AnalyzeMessageInput = z.input<typeof AnalyzeMessageInputSchema>;
export type MembershipInput = z.infer<typeof MembershipInputSchema>;
export type FeasibilityReport = z.infer<typeof FeasibilityReportSchema>;
export type ExtractedPreferences = z.infer<typeof ExtractedPreferencesSchema>;
export type ExtractedPreference = ExtractedPreferences["preferences"][number];
