import { Dimension } from "../constants/dimensions";

export type PreferenceValue = string | number;

export type SignalPolarity = "positive" | "negative";

/**
 * One timestamped, confidence-scored observation about a user's preference.
 * Never mutated after it is recorded; `observedAt` is epoch milliseconds.
 */
export interface PreferenceSignal {
  readonly id: number;
  readonly userId: string;
  readonly groupId: string;
  readonly dimension: Dimension;
  readonly value: PreferenceValue;
  readonly polarity: SignalPolarity;
  readonly confidence: number;
  readonly sourceMessageId: string;
  readonly observedAt: number;
}

export type NewPreferenceSignal = Omit<PreferenceSignal, "id">;

export interface ResolvedValue {
  value: PreferenceValue;
  confidence: number;
  /** Earliest observed_at among the signals that support this value. */
  firstObservedAt: number;
}

interface UserStateBase {
  userId: string;
  groupId: string;
  dimension: Dimension;
  confidence: number;
  signalCount: number;
  lastObservedAt: number | null;
}

export interface ExclusiveUserState extends UserStateBase {
  kind: "exclusive";
  resolved: ResolvedValue | null;
}

export interface SetUserState extends UserStateBase {
  kind: "set";
  values: ResolvedValue[];
}

export type UserPreferenceState = ExclusiveUserState | SetUserState;

export interface RankedValue {
  value: PreferenceValue;
  score: number;
  voters: number;
  firstObservedAt: string;
}

export interface CeilingAggregate {
  status: "resolved";
  kind: "ceiling";
  value: PreferenceValue;
  rank: number;
  contributors: string[];
}

export interface UnionAggregate {
  status: "resolved";
  kind: "union";
  values: PreferenceValue[];
  contributors: string[];
}

export interface RankedAggregate {
  status: "resolved";
  kind: "ranked";
  ranking: RankedValue[];
}

export interface UnresolvedAggregate {
  status: "unresolved";
}

export interface ConflictingAggregate {
  status: "conflicting";
  values: MemberValue[];
}

export type DimensionAggregate =
  | CeilingAggregate
  | UnionAggregate
  | RankedAggregate
  | UnresolvedAggregate
  | ConflictingAggregate;

export interface MemberValue {
  userId: string;
  value: PreferenceValue;
}

export type ConflictType = "incompatible" | "divergent";

export interface ConstraintConflict {
  dimension: Dimension;
  type: ConflictType;
  values: MemberValue[];
}

export type ProfileFlag = "no_members" | "possibly_infeasible";

/**
 * Hard-constraint view a downstream restaurant filter consumes.
 * Null ceilings mean "no constraint".
 */
export interface HardConstraints {
  budgetCeiling: number | null;
  radiusCeilingKm: number | null;
  dietary: string[];
}

export interface SoftPreferences {
  cuisine: string[];
  ambience: string[];
  mealTime: string[];
}

export interface ConstraintView {
  version: string;
  hard: HardConstraints;
  soft: SoftPreferences;
}

export interface GroupPreferenceProfile {
  groupId: string;
  version: string;
  members: string[];
  dimensions: Record<Dimension, DimensionAggregate>;
  conflicts: ConstraintConflict[];
  flags: ProfileFlag[];
  constraints: ConstraintView;
  computedAt: string;
  stale: boolean;
}

export interface EnginePolicy {
  halfLifeMs: number;
  setConfidenceFloor: number;
  exclusiveOverrideRatio: number;
  budgetConflictTolerance: number;
  radiusConflictToleranceKm: number;
}

export type RecomputePolicy = "lazy" | "eager";

export type Clock = () => number;
