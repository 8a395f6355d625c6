import { z } from "zod";
import { logger } from "../utils/logger";
import { KeyedQueue } from "../utils/keyed-queue";
import { systemClock, toIso } from "../utils/time";
import { ValidationErrors, isInvalidSignalError } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";
import { DIMENSIONS } from "../constants/dimensions";
import { loadEngineConfig, EngineConfig } from "../config/engine.config";
import {
  Clock,
  EnginePolicy,
  GroupPreferenceProfile,
  NewPreferenceSignal,
  PreferenceSignal,
  UserPreferenceState
} from "../types/preference.types";
import { FilterView, MembershipChange } from "../types/api.types";
import { AnalyzeMessageInputSchema, FeasibilityReportSchema, MembershipInputSchema } from "../validators/signal.schema";
import { parseSignalInput } from "../validators/signal.validator";
import { resolveUserState } from "./conflict-resolver";
import { MembershipProvider, createMembershipProvider } from "./membership.service";
import { PreferenceExtractor, preferenceExtractor } from "./preference-extractor.service";
import { ProfileListener, ProfilePublisher } from "./profile-publisher.service";
import { SignalStore, signalStore } from "./signal-store.service";

export interface PreferenceEngineDeps {
  store: SignalStore;
  membership: MembershipProvider;
  publisher: ProfilePublisher;
  extractor: PreferenceExtractor;
  policy: EnginePolicy;
  clock?: Clock;
}

/**
 * Entry point for every operation. Writes for one group go through a keyed
 * queue, so a signal is appended and its group marked stale before any later
 * write for that group starts. Profile reads do not wait on the queue.
 */
export class PreferenceEngine {
  private readonly queue = new KeyedQueue();
  private readonly clock: Clock;

  constructor(private readonly deps: PreferenceEngineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async record(input: unknown): Promise<PreferenceSignal> {
    const signal = this.validateSignal(input);

    return this.queue.run(signal.groupId, async () => {
      const recorded = await this.deps.store.append(signal);
      this.deps.publisher.invalidate(recorded.groupId, "signal");
      return recorded;
    });
  }

  /**
   * Runs a chat message through the extractor and records what survives
   * validation. Items the store would reject are dropped, not fatal. The
   * surviving signals are appended as one batch, and the group is marked
   * stale even when that append fails.
   */
  async ingestMessage(groupId: string, input: unknown): Promise<PreferenceSignal[]> {
    const group = requireGroupId(groupId);
    const parsed = AnalyzeMessageInputSchema.safeParse(input);
    if (!parsed.success) {
      mapMessageError(parsed.error);
    }

    const { userId, messageId, text } = parsed.data;
    const observedAt = parsed.data.observedAt ?? toIso(this.clock());

    logger.info(LOG_SOURCES.SIGNALS, LOG_MESSAGES.MESSAGE_ANALYSIS_STARTED, { groupId: group, userId, messageId });
    const drafts = await this.deps.extractor.extract(text, { messageId });

    const signals: NewPreferenceSignal[] = [];
    for (const draft of drafts) {
      try {
        signals.push(parseSignalInput({ ...draft, userId, groupId: group, sourceMessageId: messageId, observedAt }));
      } catch (error) {
        if (!isInvalidSignalError(error)) {
          throw error;
        }
        logger.warn(LOG_SOURCES.SIGNALS, LOG_MESSAGES.EXTRACTED_ITEM_DROPPED, {
          messageId,
          dimension: draft.dimension,
          reason: error.message
        });
      }
    }

    return this.queue.run(group, async () => {
      let recorded: PreferenceSignal[] = [];

      if (signals.length > 0) {
        try {
          recorded = await this.deps.store.appendMany(signals);
        } finally {
          this.deps.publisher.invalidate(group, "signal");
        }
      }

      logger.info(LOG_SOURCES.SIGNALS, LOG_MESSAGES.MESSAGE_ANALYSIS_FINISHED, {
        groupId: group,
        messageId,
        extracted: drafts.length,
        recorded: recorded.length
      });
      return recorded;
    });
  }

  async joinGroup(groupId: string, input: unknown): Promise<MembershipChange> {
    const group = requireGroupId(groupId);
    const { userId } = parseMembershipInput(input);

    return this.queue.run(group, async () => {
      const changed = await this.deps.membership.join(group, userId);
      if (changed) {
        this.deps.publisher.invalidate(group, "membership");
      }
      return { groupId: group, userId, changed };
    });
  }

  async leaveGroup(groupId: string, userId: string): Promise<MembershipChange> {
    const group = requireGroupId(groupId);
    const { userId: member } = parseMembershipInput({ userId });

    return this.queue.run(group, async () => {
      const changed = await this.deps.membership.leave(group, member);
      if (changed) {
        this.deps.publisher.invalidate(group, "membership");
      }
      return { groupId: group, userId: member, changed };
    });
  }

  async getProfile(groupId: string): Promise<GroupPreferenceProfile> {
    return this.deps.publisher.getProfile(requireGroupId(groupId));
  }

  async getFilterView(groupId: string): Promise<FilterView> {
    const profile = await this.getProfile(groupId);
    return {
      groupId: profile.groupId,
      profileVersion: profile.version,
      flags: profile.flags,
      stale: profile.stale,
      ...profile.constraints
    };
  }

  /**
   * Resolved state of one user in one group, for every dimension the user
   * has signals in. Reads the store directly; membership is not consulted.
   */
  async getUserStates(groupId: string, userId: string): Promise<UserPreferenceState[]> {
    const group = requireGroupId(groupId);
    const { userId: user } = parseMembershipInput({ userId });
    const asOf = this.clock();
    const states: UserPreferenceState[] = [];

    for (const dimension of DIMENSIONS) {
      const signals: PreferenceSignal[] = [];
      for await (const signal of this.deps.store.listFor(user, group, dimension)) {
        signals.push(signal);
      }
      if (signals.length > 0) {
        states.push(resolveUserState({ userId: user, groupId: group, dimension }, signals, asOf, this.deps.policy));
      }
    }

    return states;
  }

  async reportFeasibility(groupId: string, input: unknown): Promise<FilterView> {
    const group = requireGroupId(groupId);
    const parsed = FeasibilityReportSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationErrors.InvalidFeasibilityReportError({
        issues: parsed.error.issues.map(issue => issue.message)
      });
    }

    const { constraintsVersion, matchingRestaurants } = parsed.data;
    await this.queue.run(group, async () => {
      this.deps.publisher.reportFeasibility(group, constraintsVersion, matchingRestaurants);
    });

    return this.getFilterView(group);
  }

  onProfileChanged(groupId: string, listener: ProfileListener): () => void {
    return this.deps.publisher.onProfileChanged(requireGroupId(groupId), listener);
  }

  private validateSignal(input: unknown): NewPreferenceSignal {
    try {
      return parseSignalInput(input);
    } catch (error) {
      if (isInvalidSignalError(error)) {
        logger.warn(LOG_SOURCES.SIGNALS, LOG_MESSAGES.SIGNAL_REJECTED, { code: error.code, ...error.meta });
      }
      throw error;
    }
  }
}

function requireGroupId(groupId: string): string {
  const trimmed = groupId.trim();
  if (trimmed.length === 0) {
    throw new ValidationErrors.GroupIdEmptyError();
  }
  return trimmed;
}

function parseMembershipInput(input: unknown): { userId: string } {
  const parsed = MembershipInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationErrors.UserIdEmptyError();
  }
  return parsed.data;
}

function mapMessageError(error: z.ZodError): never {
  for (const issue of error.issues) {
    switch (issue.path[0]) {
      case "userId":
        throw new ValidationErrors.UserIdEmptyError();
      case "messageId":
        throw new ValidationErrors.MessageIdEmptyError();
      case "text":
        throw new ValidationErrors.MessageTextEmptyError();
      case "observedAt":
        throw new ValidationErrors.InvalidTimestampError();
    }
  }

  throw new ValidationErrors.InvalidRequestError({ issues: error.issues.map(issue => issue.message) });
}

export function createPreferenceEngine(
  config: EngineConfig,
  overrides: Partial<Omit<PreferenceEngineDeps, "policy">> = {}
): PreferenceEngine {
  const store = overrides.store ?? signalStore;
  const membership = overrides.membership ?? createMembershipProvider(config.membershipServiceUrl);
  const clock = overrides.clock ?? systemClock;

  const publisher =
    overrides.publisher ??
    new ProfilePublisher({
      store,
      membership,
      policy: config.policy,
      recomputePolicy: config.recomputePolicy,
      profileMaxAgeMs: config.profileMaxAgeMs,
      retries: config.recomputeRetries,
      retryDelayMs: config.recomputeRetryDelayMs,
      clock
    });

  return new PreferenceEngine({
    store,
    membership,
    publisher,
    extractor: overrides.extractor ?? preferenceExtractor,
    policy: config.policy,
    clock
  });
}

export const engineConfig = loadEngineConfig();
export const preferenceEngine = createPreferenceEngine(engineConfig);
