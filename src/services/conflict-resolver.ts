import { DIMENSION_POLICIES, Dimension } from "../constants/dimensions";
import {
  EnginePolicy,
  ExclusiveUserState,
  PreferenceSignal,
  PreferenceValue,
  ResolvedValue,
  SetUserState,
  UserPreferenceState
} from "../types/preference.types";

export interface StateKey {
  userId: string;
  groupId: string;
  dimension: Dimension;
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Exponential decay with the configured half-life. Elapsed time below zero
 * (a signal stamped in the future) counts as no time at all.
 */
export function decayedConfidence(confidence: number, elapsedMs: number, halfLifeMs: number): number {
  const elapsed = Math.max(0, elapsedMs);
  return clamp01(confidence * Math.pow(0.5, elapsed / halfLifeMs));
}

export function valueKey(value: PreferenceValue): string {
  return `${typeof value}:${String(value)}`;
}

/** Locale-independent ordering so output is identical on every host. */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareSignals(a: PreferenceSignal, b: PreferenceSignal): number {
  return a.observedAt - b.observedAt || a.id - b.id;
}

/**
 * Replays one user's signals for one dimension and returns the current belief.
 * The result depends only on the signals, the evaluation instant and the policy.
 */
export function resolveUserState(
  key: StateKey,
  signals: readonly PreferenceSignal[],
  asOf: number,
  policy: EnginePolicy
): UserPreferenceState {
  const ordered = [...signals].sort(compareSignals);

  if (DIMENSION_POLICIES[key.dimension].kind === "exclusive") {
    return resolveExclusive(key, ordered, policy);
  }
  return resolveSet(key, ordered, asOf, policy);
}

/**
 * The newest positive signal wins only when it is at least as confident as
 * the override ratio times the current value's confidence, decayed over the
 * gap between the two. A negation of the current value clears it.
 * `firstObservedAt` is the earliest signal of the unbroken run that holds the
 * resolved value.
 */
export function resolveExclusive(
  key: StateKey,
  ordered: readonly PreferenceSignal[],
  policy: EnginePolicy
): ExclusiveUserState {
  let current: PreferenceSignal | null = null;
  let since = 0;

  for (const signal of ordered) {
    if (signal.polarity === "negative") {
      if (current && valueKey(current.value) === valueKey(signal.value)) {
        current = null;
      }
      continue;
    }

    if (!current) {
      current = signal;
      since = signal.observedAt;
      continue;
    }

    const threshold =
      policy.exclusiveOverrideRatio *
      decayedConfidence(current.confidence, signal.observedAt - current.observedAt, policy.halfLifeMs);

    if (signal.confidence >= threshold) {
      if (valueKey(signal.value) !== valueKey(current.value)) {
        since = signal.observedAt;
      }
      current = signal;
    }
  }

  const resolved: ResolvedValue | null = current
    ? { value: current.value, confidence: clamp01(current.confidence), firstObservedAt: since }
    : null;

  return {
    ...key,
    kind: "exclusive",
    resolved,
    confidence: resolved ? resolved.confidence : 0,
    signalCount: ordered.length,
    lastObservedAt: lastObservedAt(ordered)
  };
}

/**
 * Union of values whose decayed confidence clears the floor. A negation drops
 * every earlier supporting signal for that value.
 */
export function resolveSet(
  key: StateKey,
  ordered: readonly PreferenceSignal[],
  asOf: number,
  policy: EnginePolicy
): SetUserState {
  const support = new Map<string, PreferenceSignal[]>();

  for (const signal of ordered) {
    const id = valueKey(signal.value);
    if (signal.polarity === "negative") {
      support.delete(id);
      continue;
    }
    const existing = support.get(id);
    if (existing) {
      existing.push(signal);
    } else {
      support.set(id, [signal]);
    }
  }

  const values: ResolvedValue[] = [];
  for (const supporting of support.values()) {
    let confidence = 0;
    let firstObservedAt = Number.POSITIVE_INFINITY;

    for (const signal of supporting) {
      confidence = Math.max(
        confidence,
        decayedConfidence(signal.confidence, asOf - signal.observedAt, policy.halfLifeMs)
      );
      firstObservedAt = Math.min(firstObservedAt, signal.observedAt);
    }

    if (confidence >= policy.setConfidenceFloor) {
      values.push({ value: supporting[0].value, confidence, firstObservedAt });
    }
  }

  values.sort(
    (a, b) =>
      b.confidence - a.confidence ||
      a.firstObservedAt - b.firstObservedAt ||
      compareText(valueKey(a.value), valueKey(b.value))
  );

  return {
    ...key,
    kind: "set",
    values,
    confidence: values.length > 0 ? clamp01(values[0].confidence) : 0,
    signalCount: ordered.length,
    lastObservedAt: lastObservedAt(ordered)
  };
}

/**
 * Resolves every (user, dimension) pair present in a group's signal snapshot,
 * restricted to the given members.
 */
export function resolveGroupStates(
  groupId: string,
  members: readonly string[],
  signals: readonly PreferenceSignal[],
  asOf: number,
  policy: EnginePolicy
): UserPreferenceState[] {
  const memberSet = new Set(members);
  const buckets = new Map<string, { key: StateKey; signals: PreferenceSignal[] }>();

  for (const signal of signals) {
    if (signal.groupId !== groupId || !memberSet.has(signal.userId)) {
      continue;
    }
    const bucketId = `${signal.userId}\u0000${signal.dimension}`;
    const bucket = buckets.get(bucketId);
    if (bucket) {
      bucket.signals.push(signal);
    } else {
      buckets.set(bucketId, {
        key: { userId: signal.userId, groupId, dimension: signal.dimension },
        signals: [signal]
      });
    }
  }

  return [...buckets.values()]
    .map(bucket => resolveUserState(bucket.key, bucket.signals, asOf, policy))
    .sort((a, b) => compareText(a.userId, b.userId) || compareText(a.dimension, b.dimension));
}

function lastObservedAt(ordered: readonly PreferenceSignal[]): number | null {
  return ordered.length > 0 ? ordered[ordered.length - 1].observedAt : null;
}
