import { BUDGET_TIERS, DIMENSIONS, DIMENSION_POLICIES, Dimension } from "../constants/dimensions";
import {
  ConstraintConflict,
  ConstraintView,
  DimensionAggregate,
  EnginePolicy,
  GroupPreferenceProfile,
  HardConstraints,
  MemberValue,
  PreferenceValue,
  ProfileFlag,
  RankedValue,
  SoftPreferences,
  UserPreferenceState
} from "../types/preference.types";
import { contentHash } from "../utils/content-hash";
import { toIso } from "../utils/time";
import { compareText, valueKey } from "./conflict-resolver";

export interface AggregationInput {
  groupId: string;
  members: readonly string[];
  states: readonly UserPreferenceState[];
  asOf: number;
  policy: EnginePolicy;
  /** Constraint versions a downstream filter found no restaurant for. */
  infeasibleConstraintVersions?: ReadonlySet<string>;
}

type DimensionResult = {
  aggregate: DimensionAggregate;
  conflicts: ConstraintConflict[];
};

const UNRESOLVED: DimensionResult = { aggregate: { status: "unresolved" }, conflicts: [] };

/**
 * Builds the group profile from the members' resolved states. Pure: the same
 * input always yields the same profile, and the previous profile is never read.
 */
export function aggregateGroupProfile(input: AggregationInput): GroupPreferenceProfile {
  const members = [...new Set(input.members)].sort(compareText);
  const memberSet = new Set(members);
  const states = input.states.filter(state => state.groupId === input.groupId && memberSet.has(state.userId));

  const results = new Map<Dimension, DimensionResult>();
  for (const dimension of DIMENSIONS) {
    results.set(
      dimension,
      members.length === 0
        ? UNRESOLVED
        : aggregateDimension(
            dimension,
            states.filter(state => state.dimension === dimension),
            input.policy
          )
    );
  }

  const aggregateOf = (dimension: Dimension): DimensionAggregate =>
    (results.get(dimension) ?? UNRESOLVED).aggregate;

  const dimensions: Record<Dimension, DimensionAggregate> = {
    cuisine: aggregateOf("cuisine"),
    budget_tier: aggregateOf("budget_tier"),
    dietary_restriction: aggregateOf("dietary_restriction"),
    ambience: aggregateOf("ambience"),
    location_radius: aggregateOf("location_radius"),
    meal_time: aggregateOf("meal_time")
  };
  const conflicts: ConstraintConflict[] = [...results.values()].flatMap(result => result.conflicts);

  const constraints = buildConstraintView(dimensions);

  const flags: ProfileFlag[] = [];
  if (members.length === 0) {
    flags.push("no_members");
  }
  if (input.infeasibleConstraintVersions?.has(constraints.version)) {
    flags.push("possibly_infeasible");
  }

  const body = { groupId: input.groupId, members, dimensions, conflicts, flags };

  return {
    ...body,
    version: contentHash(body),
    constraints,
    computedAt: toIso(input.asOf),
    stale: false
  };
}

export function aggregateDimension(
  dimension: Dimension,
  states: readonly UserPreferenceState[],
  policy: EnginePolicy
): DimensionResult {
  const dimensionPolicy = DIMENSION_POLICIES[dimension];

  if (dimensionPolicy.strength === "soft") {
    return aggregateRanked(states);
  }
  if (dimensionPolicy.kind === "set") {
    return aggregateUnion(states);
  }
  return aggregateCeiling(dimension, states, policy);
}

/**
 * Tightest value across members. Budget is a hard ceiling, so the result is
 * the minimum, never an average.
 */
function aggregateCeiling(
  dimension: Dimension,
  states: readonly UserPreferenceState[],
  policy: EnginePolicy
): DimensionResult {
  const values: MemberValue[] = [];
  for (const state of states) {
    if (state.kind === "exclusive" && state.resolved) {
      values.push({ userId: state.userId, value: state.resolved.value });
    }
  }

  if (values.length === 0) {
    return UNRESOLVED;
  }

  const ranked: Array<MemberValue & { rank: number }> = [];
  for (const memberValue of values) {
    const rank = orderRank(dimension, memberValue.value);
    if (rank === null) {
      return {
        aggregate: { status: "conflicting", values },
        conflicts: [{ dimension, type: "incompatible", values }]
      };
    }
    ranked.push({ ...memberValue, rank });
  }

  const ranks = ranked.map(entry => entry.rank);
  const tightest = Math.min(...ranks);
  const spread = Math.max(...ranks) - tightest;
  const tightestEntry = ranked.find(entry => entry.rank === tightest);

  if (!tightestEntry) {
    return UNRESOLVED;
  }

  const conflicts: ConstraintConflict[] =
    spread > toleranceFor(dimension, policy) ? [{ dimension, type: "divergent", values }] : [];

  return {
    aggregate: {
      status: "resolved",
      kind: "ceiling",
      value: tightestEntry.value,
      rank: tightest,
      contributors: ranked.filter(entry => entry.rank === tightest).map(entry => entry.userId)
    },
    conflicts
  };
}

/**
 * Any one member's restriction binds the whole group.
 */
function aggregateUnion(states: readonly UserPreferenceState[]): DimensionResult {
  const union = new Map<string, PreferenceValue>();
  const contributors: string[] = [];

  for (const state of states) {
    if (state.kind !== "set" || state.values.length === 0) {
      continue;
    }
    contributors.push(state.userId);
    for (const resolved of state.values) {
      union.set(valueKey(resolved.value), resolved.value);
    }
  }

  if (union.size === 0) {
    return UNRESOLVED;
  }

  const values = [...union.entries()].sort(([a], [b]) => compareText(a, b)).map(([, value]) => value);

  return {
    aggregate: { status: "resolved", kind: "union", values, contributors },
    conflicts: []
  };
}

/**
 * Weighted vote: each member adds their resolved confidence to every value
 * they hold. Ties go to the value first observed, then to value order.
 */
function aggregateRanked(states: readonly UserPreferenceState[]): DimensionResult {
  const tally = new Map<string, { value: PreferenceValue; score: number; voters: number; firstObservedAt: number }>();

  for (const state of states) {
    const held = state.kind === "set" ? state.values : state.resolved ? [state.resolved] : [];

    for (const resolved of held) {
      const id = valueKey(resolved.value);
      const entry = tally.get(id);
      if (entry) {
        entry.score += resolved.confidence;
        entry.voters += 1;
        entry.firstObservedAt = Math.min(entry.firstObservedAt, resolved.firstObservedAt);
      } else {
        tally.set(id, {
          value: resolved.value,
          score: resolved.confidence,
          voters: 1,
          firstObservedAt: resolved.firstObservedAt
        });
      }
    }
  }

  if (tally.size === 0) {
    return UNRESOLVED;
  }

  const ranking: RankedValue[] = [...tally.values()]
    .map(entry => ({ ...entry, score: roundScore(entry.score) }))
    .sort(
      (a, b) =>
        b.score - a.score ||
        a.firstObservedAt - b.firstObservedAt ||
        compareText(valueKey(a.value), valueKey(b.value))
    )
    .map(entry => ({
      value: entry.value,
      score: entry.score,
      voters: entry.voters,
      firstObservedAt: toIso(entry.firstObservedAt)
    }));

  return {
    aggregate: { status: "resolved", kind: "ranked", ranking },
    conflicts: []
  };
}

/**
 * Position of a value on its dimension's scale, or null when the value
 * cannot be ordered against the others.
 */
export function orderRank(dimension: Dimension, value: PreferenceValue): number | null {
  if (typeof value !== "number") {
    return null;
  }

  if (dimension === "budget_tier") {
    return Number.isInteger(value) && value >= BUDGET_TIERS.MIN && value <= BUDGET_TIERS.MAX ? value : null;
  }

  if (dimension === "location_radius") {
    return Number.isFinite(value) && value > 0 ? value : null;
  }

  return null;
}

function toleranceFor(dimension: Dimension, policy: EnginePolicy): number {
  return dimension === "location_radius" ? policy.radiusConflictToleranceKm : policy.budgetConflictTolerance;
}

function roundScore(score: number): number {
  return Math.round(score * 10000) / 10000;
}

/**
 * Serializable view for the downstream restaurant filter. Conflicting or
 * unresolved hard dimensions impose no constraint.
 */
export function buildConstraintView(dimensions: Record<Dimension, DimensionAggregate>): ConstraintView {
  const hard: HardConstraints = {
    budgetCeiling: ceilingOf(dimensions.budget_tier),
    radiusCeilingKm: ceilingOf(dimensions.location_radius),
    dietary: valuesOf(dimensions.dietary_restriction)
  };

  const soft: SoftPreferences = {
    cuisine: valuesOf(dimensions.cuisine),
    ambience: valuesOf(dimensions.ambience),
    mealTime: valuesOf(dimensions.meal_time)
  };

  return { version: contentHash(hard), hard, soft };
}

function ceilingOf(aggregate: DimensionAggregate): number | null {
  if (aggregate.status === "resolved" && aggregate.kind === "ceiling") {
    return aggregate.rank;
  }
  return null;
}

function valuesOf(aggregate: DimensionAggregate): string[] {
  if (aggregate.status !== "resolved") {
    return [];
  }
  switch (aggregate.kind) {
    case "union":
      return aggregate.values.map(value => String(value));
    case "ranked":
      return aggregate.ranking.map(entry => String(entry.value));
    case "ceiling":
      return [String(aggregate.value)];
  }
}
