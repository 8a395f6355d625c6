import {
  MAX_INFEASIBLE_VERSIONS,
  ProfilePublisher,
  ProfilePublisherOptions
} from "../../src/services/profile-publisher.service";
import { DEFAULT_POLICY } from "../../src/config/engine.config";
import { StoreErrors } from "../../src/errors";
import { GroupPreferenceProfile, PreferenceSignal } from "../../src/types/preference.types";
import { HOUR, T0, makeSignal } from "../helpers/signals";

function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe("Profile Publisher", () => {
  let now: number;
  let members: string[];
  let signals: PreferenceSignal[];
  let listForGroup: jest.Mock<Promise<PreferenceSignal[]>, [string]>;
  let getMembers: jest.Mock<Promise<string[]>, [string]>;

  function createPublisher(overrides: Partial<ProfilePublisherOptions> = {}): ProfilePublisher {
    return new ProfilePublisher({
      store: { listForGroup },
      membership: { getMembers },
      policy: DEFAULT_POLICY,
      retries: 2,
      retryDelayMs: 0,
      clock: () => now,
      ...overrides
    });
  }

  beforeEach(() => {
    now = T0;
    members = ["alice", "bob"];
    signals = [
      makeSignal({ userId: "alice", dimension: "budget_tier", value: 2 }),
      makeSignal({ userId: "bob", dimension: "budget_tier", value: 1 })
    ];
    listForGroup = jest.fn(async (groupId: string) => signals.filter(signal => signal.groupId === groupId));
    getMembers = jest.fn(async (groupId: string) => (groupId === "g1" ? [...members] : []));
  });

  it("returns the identical cached profile when nothing happened in between", async () => {
    const publisher = createPublisher();

    const first = await publisher.getProfile("g1");
    const second = await publisher.getProfile("g1");

    expect(second).toBe(first);
    expect(listForGroup).toHaveBeenCalledTimes(1);
    expect(first.constraints.hard.budgetCeiling).toBe(1);
  });

  it("recomputes after an invalidation", async () => {
    const publisher = createPublisher();
    const first = await publisher.getProfile("g1");

    signals.push(makeSignal({ userId: "bob", dimension: "dietary_restriction", value: "vegan" }));
    publisher.invalidate("g1", "signal");
    const second = await publisher.getProfile("g1");

    expect(second).not.toBe(first);
    expect(second.version).not.toBe(first.version);
    expect(second.constraints.hard.dietary).toEqual(["vegan"]);
  });

  it("recomputes once the cached profile outlives the max age", async () => {
    const publisher = createPublisher({ profileMaxAgeMs: HOUR });
    const first = await publisher.getProfile("g1");

    now = T0 + HOUR - 1;
    expect(await publisher.getProfile("g1")).toBe(first);

    now = T0 + HOUR;
    const refreshed = await publisher.getProfile("g1");

    expect(refreshed).not.toBe(first);
    expect(refreshed.computedAt).toBe("2026-03-01T13:00:00.000Z");
    expect(listForGroup).toHaveBeenCalledTimes(2);
  });

  it("shares one recompute between concurrent readers", async () => {
    const publisher = createPublisher();

    const [first, second] = await Promise.all([publisher.getProfile("g1"), publisher.getProfile("g1")]);

    expect(second).toBe(first);
    expect(listForGroup).toHaveBeenCalledTimes(1);
  });

  describe("listeners", () => {
    it("are called after each successful recompute until unsubscribed", async () => {
      const publisher = createPublisher();
      const listener = jest.fn();
      const unsubscribe = publisher.onProfileChanged("g1", listener);

      const profile = await publisher.getProfile("g1");
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(profile);

      unsubscribe();
      publisher.invalidate("g1", "membership");
      await publisher.getProfile("g1");

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it("keep running when one of them throws", async () => {
      const publisher = createPublisher();
      const failing = jest.fn(() => {
        throw new Error("listener down");
      });
      const rejecting = jest.fn(async () => {
        throw new Error("listener rejected");
      });
      const healthy = jest.fn();
      publisher.onProfileChanged("g1", failing);
      publisher.onProfileChanged("g1", rejecting);
      publisher.onProfileChanged("g1", healthy);

      const profile = await publisher.getProfile("g1");
      await flushPromises();

      expect(failing).toHaveBeenCalledTimes(1);
      expect(rejecting).toHaveBeenCalledTimes(1);
      expect(healthy).toHaveBeenCalledWith(profile);
    });

    it("are scoped to their group", async () => {
      const publisher = createPublisher();
      const listener = jest.fn();
      publisher.onProfileChanged("g2", listener);

      await publisher.getProfile("g1");

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("failures", () => {
    it("serves the last good profile marked stale when every retry fails", async () => {
      const publisher = createPublisher();
      const good = await publisher.getProfile("g1");

      listForGroup.mockRejectedValue(new StoreErrors.ReadFailedError({ reason: "disk I/O error" }));
      publisher.invalidate("g1", "signal");
      const served = await publisher.getProfile("g1");

      expect(served.stale).toBe(true);
      expect(served.version).toBe(good.version);
      expect(good.stale).toBe(false);
      // one good read, then the first attempt plus two retries
      expect(listForGroup).toHaveBeenCalledTimes(4);
    });

    it("recovers on the next read once the store is back", async () => {
      const publisher = createPublisher();
      await publisher.getProfile("g1");

      listForGroup.mockRejectedValueOnce(new StoreErrors.ReadFailedError());
      publisher.invalidate("g1", "signal");
      const recovered = await publisher.getProfile("g1");

      expect(recovered.stale).toBe(false);
      expect(listForGroup).toHaveBeenCalledTimes(3);
    });

    it("fails with RecomputeFailed when there is no profile to fall back on", async () => {
      const publisher = createPublisher();
      listForGroup.mockRejectedValue(new StoreErrors.ReadFailedError());

      await expect(publisher.getProfile("g1")).rejects.toMatchObject({
        code: "groupPreferenceEngine/profile/recomputeFailed",
        meta: { groupId: "g1" }
      });
      expect(listForGroup).toHaveBeenCalledTimes(3);
    });

    it("does not retry errors that are not transient", async () => {
      const publisher = createPublisher();
      listForGroup.mockRejectedValue(new Error("programming error"));

      await expect(publisher.getProfile("g1")).rejects.toMatchObject({
        code: "groupPreferenceEngine/profile/recomputeFailed"
      });
      expect(listForGroup).toHaveBeenCalledTimes(1);
    });
  });

  it("abandons a recompute superseded by a newer invalidation", async () => {
    const publisher = createPublisher();
    const listener = jest.fn();
    publisher.onProfileChanged("g1", listener);

    let releaseFirstRead: (value: PreferenceSignal[]) => void = () => undefined;
    const snapshot = [...signals];
    listForGroup.mockImplementationOnce(
      () =>
        new Promise<PreferenceSignal[]>(resolve => {
          releaseFirstRead = resolve;
        })
    );

    const pending = publisher.getProfile("g1");

    signals.push(makeSignal({ userId: "alice", dimension: "dietary_restriction", value: "halal" }));
    publisher.invalidate("g1", "signal");
    releaseFirstRead(snapshot);

    const profile: GroupPreferenceProfile = await pending;

    expect(profile.constraints.hard.dietary).toEqual(["halal"]);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(profile);
    expect(listForGroup).toHaveBeenCalledTimes(2);
  });

  it("recomputes in the background under the eager policy", async () => {
    const publisher = createPublisher({ recomputePolicy: "eager" });
    const listener = jest.fn();
    publisher.onProfileChanged("g1", listener);

    publisher.invalidate("g1", "membership");
    await flushPromises();

    expect(listForGroup).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(await publisher.getProfile("g1")).toBe(listener.mock.calls[0][0]);
    expect(listForGroup).toHaveBeenCalledTimes(1);
  });

  it("flags possibly_infeasible for a zero feasibility report on the current constraints", async () => {
    const publisher = createPublisher();
    const before = await publisher.getProfile("g1");

    publisher.reportFeasibility("g1", before.constraints.version, 0);
    const flagged = await publisher.getProfile("g1");
    expect(flagged.flags).toEqual(["possibly_infeasible"]);

    publisher.reportFeasibility("g1", before.constraints.version, 7);
    const cleared = await publisher.getProfile("g1");
    expect(cleared.flags).toEqual([]);
    expect(cleared.version).toBe(before.version);
  });

  it("forgets only the oldest zero-match reports once the limit is reached", async () => {
    const publisher = createPublisher();
    const current = (await publisher.getProfile("g1")).constraints.version;

    publisher.reportFeasibility("g1", current, 0);
    for (let index = 1; index < MAX_INFEASIBLE_VERSIONS; index++) {
      publisher.reportFeasibility("g1", `older-${index}`, 0);
    }
    expect((await publisher.getProfile("g1")).flags).toEqual(["possibly_infeasible"]);

    publisher.reportFeasibility("g1", "one-too-many", 0);
    expect((await publisher.getProfile("g1")).flags).toEqual([]);
  });

  it("does not cache groups without members or listeners", async () => {
    const publisher = createPublisher();

    await publisher.getProfile("ghost");
    await publisher.getProfile("ghost");
    publisher.onProfileChanged("watched", jest.fn());
    await publisher.getProfile("watched");
    await publisher.getProfile("watched");

    expect(getMembers.mock.calls.filter(([groupId]) => groupId === "ghost")).toHaveLength(2);
    expect(getMembers.mock.calls.filter(([groupId]) => groupId === "watched")).toHaveLength(1);
  });

  it("reflects membership changes", async () => {
    const publisher = createPublisher();
    await publisher.getProfile("g1");

    members = ["alice"];
    publisher.invalidate("g1", "membership");
    const profile = await publisher.getProfile("g1");

    expect(profile.members).toEqual(["alice"]);
    expect(profile.constraints.hard.budgetCeiling).toBe(2);
  });
});
