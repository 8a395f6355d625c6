import axios from "axios";
import { z } from "zod";
import { logger } from "../utils/logger";
import { retry } from "../utils/retry";
import { BaseAppError, MembershipErrors } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";

/**
 * Source of truth for who currently belongs to a group.
 * `join` and `leave` resolve to whether the member set actually changed.
 */
export interface MembershipProvider {
  getMembers(groupId: string): Promise<string[]>;
  join(groupId: string, userId: string): Promise<boolean>;
  leave(groupId: string, userId: string): Promise<boolean>;
}

/**
 * In-process registry, used when no groups service is configured.
 */
export class InMemoryMembershipRegistry implements MembershipProvider {
  private groups = new Map<string, Set<string>>();

  async getMembers(groupId: string): Promise<string[]> {
    return [...(this.groups.get(groupId) ?? [])].sort();
  }

  async join(groupId: string, userId: string): Promise<boolean> {
    const members = this.groups.get(groupId) ?? new Set<string>();
    if (members.has(userId)) {
      return false;
    }
    members.add(userId);
    this.groups.set(groupId, members);
    logger.info(LOG_SOURCES.MEMBERSHIP, LOG_MESSAGES.MEMBER_JOINED, { groupId, userId });
    return true;
  }

  async leave(groupId: string, userId: string): Promise<boolean> {
    const members = this.groups.get(groupId);
    if (!members || !members.delete(userId)) {
      return false;
    }
    if (members.size === 0) {
      this.groups.delete(groupId);
    }
    logger.info(LOG_SOURCES.MEMBERSHIP, LOG_MESSAGES.MEMBER_LEFT, { groupId, userId });
    return true;
  }
}

const MembersResponseSchema = z.object({
  members: z.array(z.string().trim().min(1))
});

export interface HttpMembershipOptions {
  timeout?: number;
  retries?: number;
  retryDelayMs?: number;
}

/**
 * Reads membership from the groups service. Changes happen there; join and
 * leave are the service's change notifications, so they write nothing and
 * always report a change, which makes the engine recompute from a fresh read.
 */
export class HttpMembershipProvider implements MembershipProvider {
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly baseUrl: string, options: HttpMembershipOptions = {}) {
    this.timeout = options.timeout ?? 5000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  async getMembers(groupId: string): Promise<string[]> {
    const url = `${this.baseUrl.replace(/\/+$/, "")}/groups/${encodeURIComponent(groupId)}/members`;
    logger.debug(LOG_SOURCES.MEMBERSHIP, LOG_MESSAGES.MEMBERSHIP_FETCH_STARTED, { groupId, url });

    try {
      const response = await retry(() => axios.get<unknown>(url, { timeout: this.timeout }), {
        retries: this.retries,
        delay: this.retryDelayMs,
        onRetry: (error, attempt) => {
          logger.warn(LOG_SOURCES.MEMBERSHIP, LOG_MESSAGES.MEMBERSHIP_FETCH_FAILED, {
            groupId,
            attempt,
            reason: error instanceof Error ? error.message : "unknown"
          });
        }
      });

      const parsed = MembersResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new MembershipErrors.InvalidResponseError({ groupId });
      }

      return [...new Set(parsed.data.members)].sort();
    } catch (error) {
      if (error instanceof BaseAppError) {
        throw error;
      }

      const reason = error instanceof Error ? error.message : "unknown";
      logger.error(LOG_SOURCES.MEMBERSHIP, LOG_MESSAGES.MEMBERSHIP_FETCH_FAILED, { groupId, reason });
      throw new MembershipErrors.FetchFailedError({ groupId, reason });
    }
  }

  async join(groupId: string, userId: string): Promise<boolean> {
    logger.info(LOG_SOURCES.MEMBERSHIP, LOG_MESSAGES.MEMBERSHIP_CHANGE_NOTIFIED, { groupId, userId, change: "join" });
    return true;
  }

  async leave(groupId: string, userId: string): Promise<boolean> {
    logger.info(LOG_SOURCES.MEMBERSHIP, LOG_MESSAGES.MEMBERSHIP_CHANGE_NOTIFIED, { groupId, userId, change: "leave" });
    return true;
  }
}

export function createMembershipProvider(serviceUrl?: string): MembershipProvider {
  return serviceUrl ? new HttpMembershipProvider(serviceUrl) : new InMemoryMembershipRegistry();
}
