import { z } from "zod";
import { ConfigErrors } from "../errors";
import { EnginePolicy, RecomputePolicy } from "../types/preference.types";

const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

const ratio = z.coerce.number().min(0).max(1);

const EngineEnvSchema = z.object({
  HALF_LIFE_DAYS: z.coerce.number().positive().default(14),
  SET_CONFIDENCE_FLOOR: ratio.default(0.4),
  EXCLUSIVE_OVERRIDE_RATIO: ratio.default(0.75),
  BUDGET_CONFLICT_TOLERANCE: z.coerce.number().int().nonnegative().default(2),
  RADIUS_CONFLICT_TOLERANCE_KM: z.coerce.number().nonnegative().default(10),
  PROFILE_RECOMPUTE_POLICY: z.enum(["lazy", "eager"]).default("lazy"),
  // 0 disables age-based recompute; decay then only shows on the next event
  PROFILE_MAX_AGE_MINUTES: z.coerce.number().nonnegative().default(360),
  RECOMPUTE_RETRIES: z.coerce.number().int().nonnegative().default(3),
  RECOMPUTE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(100),
  SIGNAL_DB_PATH: z.string().trim().min(1).default("./signals.db"),
  MEMBERSHIP_SERVICE_URL: z.string().trim().url().optional()
});

export interface EngineConfig {
  policy: EnginePolicy;
  recomputePolicy: RecomputePolicy;
  profileMaxAgeMs: number;
  recomputeRetries: number;
  recomputeRetryDelayMs: number;
  signalDbPath: string;
  membershipServiceUrl?: string;
}

/**
 * Reads engine tuning from the environment. Empty strings count as unset.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = EngineEnvSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigErrors.InvalidConfigError({
      issues: parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
    });
  }

  const values = parsed.data;
  return {
    policy: {
      halfLifeMs: values.HALF_LIFE_DAYS * DAY_MS,
      setConfidenceFloor: values.SET_CONFIDENCE_FLOOR,
      exclusiveOverrideRatio: values.EXCLUSIVE_OVERRIDE_RATIO,
      budgetConflictTolerance: values.BUDGET_CONFLICT_TOLERANCE,
      radiusConflictToleranceKm: values.RADIUS_CONFLICT_TOLERANCE_KM
    },
    recomputePolicy: values.PROFILE_RECOMPUTE_POLICY,
    profileMaxAgeMs: values.PROFILE_MAX_AGE_MINUTES * MINUTE_MS,
    recomputeRetries: values.RECOMPUTE_RETRIES,
    recomputeRetryDelayMs: values.RECOMPUTE_RETRY_DELAY_MS,
    signalDbPath: values.SIGNAL_DB_PATH,
    membershipServiceUrl: values.MEMBERSHIP_SERVICE_URL
  };
}

export const DEFAULT_POLICY: EnginePolicy = loadEngineConfig({}).policy;
