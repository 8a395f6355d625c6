/**
 * Preference dimensions and the policy each one is resolved and aggregated with.
 *
 * - exclusive: a user holds exactly one value at a time
 * - set: a user may hold several values at once
 * - hard: must hold for every member (aggregated conservatively)
 * - soft: aggregated by weighted vote
 */
export const DIMENSIONS = [
  "cuisine",
  "budget_tier",
  "dietary_restriction",
  "ambience",
  "location_radius",
  "meal_time"
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export type DimensionKind = "exclusive" | "set";
export type ConstraintStrength = "hard" | "soft";

export interface DimensionPolicy {
  kind: DimensionKind;
  strength: ConstraintStrength;
  /** Exclusive hard dimensions aggregate to the lowest rank across members. */
  orderable: boolean;
}

export const DIMENSION_POLICIES: Record<Dimension, DimensionPolicy> = {
  cuisine: { kind: "set", strength: "soft", orderable: false },
  budget_tier: { kind: "exclusive", strength: "hard", orderable: true },
  dietary_restriction: { kind: "set", strength: "hard", orderable: false },
  ambience: { kind: "set", strength: "soft", orderable: false },
  location_radius: { kind: "exclusive", strength: "hard", orderable: true },
  meal_time: { kind: "exclusive", strength: "soft", orderable: false }
};

export const BUDGET_TIERS = {
  MIN: 1,
  MAX: 4
} as const;

export function isDimension(value: string): value is Dimension {
  return (DIMENSIONS as readonly string[]).includes(value);
}
