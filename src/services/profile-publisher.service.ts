import { logger } from "../utils/logger";
import { retry } from "../utils/retry";
import { systemClock } from "../utils/time";
import { ProfileErrors } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";
import { Clock, EnginePolicy, GroupPreferenceProfile, RecomputePolicy } from "../types/preference.types";
import { resolveGroupStates } from "./conflict-resolver";
import { aggregateGroupProfile } from "./group-aggregator";
import { MembershipProvider } from "./membership.service";
import { SignalStore } from "./signal-store.service";

/** May return a promise; a rejection is logged like a throw. */
export type ProfileListener = (profile: GroupPreferenceProfile) => unknown;

export type InvalidationReason = "signal" | "membership" | "feasibility";

/** Zero-match reports remembered per group; the oldest is forgotten first. */
export const MAX_INFEASIBLE_VERSIONS = 16;

export interface ProfilePublisherOptions {
  store: Pick<SignalStore, "listForGroup">;
  membership: Pick<MembershipProvider, "getMembers">;
  policy: EnginePolicy;
  recomputePolicy?: RecomputePolicy;
  /** 0 disables age-based recompute. */
  profileMaxAgeMs?: number;
  retries?: number;
  retryDelayMs?: number;
  clock?: Clock;
}

interface GroupEntry {
  profile?: GroupPreferenceProfile;
  computedAtMs: number;
  dirty: boolean;
  generation: number;
  inflight?: { generation: number; promise: Promise<GroupPreferenceProfile> };
  infeasible: Set<string>;
}

/**
 * Owns the cached profile of every group it has seen and decides when to
 * recompute. Each invalidation bumps the group's generation; a recompute that
 * finishes under an older generation is thrown away.
 */
export class ProfilePublisher {
  private entries = new Map<string, GroupEntry>();
  private listeners = new Map<string, Set<ProfileListener>>();

  private readonly recomputePolicy: RecomputePolicy;
  private readonly profileMaxAgeMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly clock: Clock;

  constructor(private readonly options: ProfilePublisherOptions) {
    this.recomputePolicy = options.recomputePolicy ?? "lazy";
    this.profileMaxAgeMs = options.profileMaxAgeMs ?? 0;
    this.retries = options.retries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Latest profile for the group. Recomputes first when the group was
   * invalidated or the cached profile outlived the max age; otherwise returns
   * the cached object itself.
   */
  async getProfile(groupId: string): Promise<GroupPreferenceProfile> {
    const entry = this.entryFor(groupId);

    if (entry.profile && !entry.dirty && !this.isExpired(entry)) {
      return entry.profile;
    }

    return this.recompute(groupId);
  }

  invalidate(groupId: string, reason: InvalidationReason): void {
    const entry = this.entryFor(groupId);
    entry.dirty = true;
    entry.generation += 1;

    logger.debug(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.PROFILE_INVALIDATED, {
      groupId,
      reason,
      generation: entry.generation
    });

    if (this.recomputePolicy === "eager") {
      this.recompute(groupId).catch(error => {
        logger.error(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.PROFILE_RECOMPUTE_FAILED, {
          groupId,
          reason: error instanceof Error ? error.message : "unknown"
        });
      });
    }
  }

  /**
   * Registers a callback run after every successful recompute of the group.
   * Delivery is at-least-once. Returns the unsubscribe function.
   */
  onProfileChanged(groupId: string, listener: ProfileListener): () => void {
    const listeners = this.listeners.get(groupId) ?? new Set<ProfileListener>();
    listeners.add(listener);
    this.listeners.set(groupId, listeners);

    return () => {
      const current = this.listeners.get(groupId);
      if (!current) {
        return;
      }
      current.delete(listener);
      if (current.size === 0) {
        this.listeners.delete(groupId);
      }
    };
  }

  /**
   * Records how many restaurants the downstream filter found for a constraints
   * version. Zero marks that version infeasible; any match clears the mark.
   */
  reportFeasibility(groupId: string, constraintsVersion: string, matchingRestaurants: number): void {
    const entry = this.entryFor(groupId);

    if (matchingRestaurants === 0) {
      entry.infeasible.delete(constraintsVersion);
      entry.infeasible.add(constraintsVersion);
      for (const oldest of entry.infeasible) {
        if (entry.infeasible.size <= MAX_INFEASIBLE_VERSIONS) {
          break;
        }
        entry.infeasible.delete(oldest);
      }
    } else {
      entry.infeasible.delete(constraintsVersion);
    }

    logger.info(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.FEASIBILITY_REPORTED, {
      groupId,
      constraintsVersion,
      matchingRestaurants
    });

    this.invalidate(groupId, "feasibility");
  }

  private recompute(groupId: string): Promise<GroupPreferenceProfile> {
    const entry = this.entryFor(groupId);

    if (entry.inflight && entry.inflight.generation === entry.generation) {
      return entry.inflight.promise;
    }

    const generation = entry.generation;
    const promise = this.runRecompute(groupId, entry, generation).finally(() => {
      if (entry.inflight?.promise === promise) {
        entry.inflight = undefined;
      }
    });
    entry.inflight = { generation, promise };

    return promise;
  }

  private async runRecompute(groupId: string, entry: GroupEntry, generation: number): Promise<GroupPreferenceProfile> {
    let profile: GroupPreferenceProfile;
    let asOf: number;

    try {
      ({ profile, asOf } = await retry(() => this.computeSnapshot(groupId, entry), {
        retries: this.retries,
        delay: this.retryDelayMs,
        onRetry: (error, attempt) => {
          logger.warn(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.PROFILE_RECOMPUTE_FAILED, {
            groupId,
            attempt,
            reason: error instanceof Error ? error.message : "unknown"
          });
        }
      }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown";

      if (entry.profile) {
        logger.warn(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.PROFILE_SERVED_STALE, {
          groupId,
          version: entry.profile.version,
          reason
        });
        return { ...entry.profile, stale: true };
      }

      logger.error(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.PROFILE_RECOMPUTE_FAILED, { groupId, reason });
      throw new ProfileErrors.RecomputeFailedError({ groupId, reason });
    }

    if (entry.generation !== generation) {
      logger.debug(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.PROFILE_RECOMPUTE_SUPERSEDED, {
        groupId,
        generation,
        current: entry.generation
      });
      return this.getProfile(groupId);
    }

    entry.profile = profile;
    entry.computedAtMs = asOf;
    entry.dirty = false;

    logger.info(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.PROFILE_RECOMPUTED, {
      groupId,
      version: profile.version,
      members: profile.members.length
    });
    this.logFindings(profile);
    this.notify(profile);
    this.forgetIfIdle(groupId, entry);

    return profile;
  }

  // Groups nobody belongs to or listens on are recomputed on each read rather than cached
  private forgetIfIdle(groupId: string, entry: GroupEntry): void {
    if (
      entry.profile?.flags.includes("no_members") &&
      entry.infeasible.size === 0 &&
      !this.listeners.has(groupId) &&
      this.entries.get(groupId) === entry
    ) {
      this.entries.delete(groupId);
    }
  }

  private async computeSnapshot(
    groupId: string,
    entry: GroupEntry
  ): Promise<{ profile: GroupPreferenceProfile; asOf: number }> {
    const asOf = this.clock();
    const infeasible = new Set(entry.infeasible);

    const [members, signals] = await Promise.all([
      this.options.membership.getMembers(groupId),
      this.options.store.listForGroup(groupId)
    ]);

    const states = resolveGroupStates(groupId, members, signals, asOf, this.options.policy);
    const profile = aggregateGroupProfile({
      groupId,
      members,
      states,
      asOf,
      policy: this.options.policy,
      infeasibleConstraintVersions: infeasible
    });

    return { profile, asOf };
  }

  private notify(profile: GroupPreferenceProfile): void {
    const listeners = this.listeners.get(profile.groupId);
    if (!listeners) {
      return;
    }

    for (const listener of [...listeners]) {
      try {
        const outcome = listener(profile);
        if (outcome instanceof Promise) {
          void outcome.catch(error => this.reportListenerFailure(profile.groupId, error));
        }
      } catch (error) {
        this.reportListenerFailure(profile.groupId, error);
      }
    }
  }

  private reportListenerFailure(groupId: string, error: unknown): void {
    logger.error(LOG_SOURCES.PUBLISHER, LOG_MESSAGES.LISTENER_FAILED, {
      groupId,
      reason: error instanceof Error ? error.message : "unknown"
    });
  }

  private logFindings(profile: GroupPreferenceProfile): void {
    if (profile.flags.includes("no_members")) {
      logger.debug(LOG_SOURCES.AGGREGATOR, LOG_MESSAGES.NO_MEMBERS, { groupId: profile.groupId });
    }
    for (const conflict of profile.conflicts) {
      logger.info(LOG_SOURCES.AGGREGATOR, LOG_MESSAGES.CONFLICT_DETECTED, {
        groupId: profile.groupId,
        dimension: conflict.dimension,
        type: conflict.type
      });
    }
  }

  private isExpired(entry: GroupEntry): boolean {
    return this.profileMaxAgeMs > 0 && this.clock() - entry.computedAtMs >= this.profileMaxAgeMs;
  }

  private entryFor(groupId: string): GroupEntry {
    let entry = this.entries.get(groupId);
    if (!entry) {
      entry = { computedAtMs: 0, dirty: true, generation: 0, infeasible: new Set<string>() };
      this.entries.set(groupId, entry);
    }
    return entry;
  }
}
