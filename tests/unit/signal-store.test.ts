import { SignalStoreService } from "../../src/services/signal-store.service";
import { PreferenceSignal } from "../../src/types/preference.types";
import { parseSignalInput } from "../../src/validators/signal.validator";

const baseInput = {
  userId: "alice",
  groupId: "g1",
  dimension: "budget_tier",
  value: "$$",
  confidence: 0.9,
  sourceMessageId: "msg-1",
  observedAt: "2026-03-01T12:00:00Z"
};

async function collect(iterable: AsyncIterable<PreferenceSignal>): Promise<PreferenceSignal[]> {
  const items: PreferenceSignal[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe("Signal Store", () => {
  let store: SignalStoreService;

  beforeEach(async () => {
    store = new SignalStoreService(2);
    await store.init(":memory:");
  });

  afterEach(async () => {
    await store.close();
  });

  it("records a validated signal in canonical form", async () => {
    const signal = await store.record(baseInput);

    expect(signal).toEqual({
      id: 1,
      userId: "alice",
      groupId: "g1",
      dimension: "budget_tier",
      value: 2,
      polarity: "positive",
      confidence: 0.9,
      sourceMessageId: "msg-1",
      observedAt: Date.parse("2026-03-01T12:00:00Z")
    });
    expect(Object.isFrozen(signal)).toBe(true);
  });

  it("rejects an unknown dimension without writing anything", async () => {
    await expect(store.record({ ...baseInput, dimension: "parking" })).rejects.toMatchObject({
      code: "groupPreferenceEngine/signal/unknownDimension"
    });

    expect(await store.listForGroup("g1")).toEqual([]);
  });

  it("rejects a confidence outside [0, 1] without writing anything", async () => {
    await expect(store.record({ ...baseInput, confidence: 1.5 })).rejects.toMatchObject({
      code: "groupPreferenceEngine/signal/invalidConfidence"
    });

    expect(await store.listForGroup("g1")).toEqual([]);
  });

  it("lists a group's signals oldest first", async () => {
    await store.record({ ...baseInput, observedAt: "2026-03-02T12:00:00Z", value: 3 });
    await store.record({ ...baseInput, userId: "bob", dimension: "cuisine", value: "Thai" });
    await store.record({ ...baseInput, groupId: "g2" });

    const signals = await store.listForGroup("g1");

    expect(signals.map(signal => [signal.userId, signal.value])).toEqual([
      ["bob", "thai"],
      ["alice", 3]
    ]);
  });

  it("iterates one user's dimension lazily across pages", async () => {
    for (let day = 1; day <= 5; day++) {
      await store.record({ ...baseInput, value: (day % 4) + 1, observedAt: `2026-03-0${day}T12:00:00Z` });
    }
    await store.record({ ...baseInput, dimension: "cuisine", value: "thai" });

    const signals = await collect(store.listFor("alice", "g1", "budget_tier"));

    expect(signals.map(signal => signal.value)).toEqual([2, 3, 4, 1, 2]);
  });

  it("restarts from the beginning on every iteration", async () => {
    await store.record(baseInput);
    const sequence = store.listFor("alice", "g1", "budget_tier");

    expect(await collect(sequence)).toHaveLength(1);

    await store.record({ ...baseInput, observedAt: "2026-03-03T12:00:00Z" });

    expect(await collect(sequence)).toHaveLength(2);
  });

  it("keeps signals with identical timestamps in insertion order", async () => {
    await store.record({ ...baseInput, value: 1 });
    await store.record({ ...baseInput, value: 4 });
    await store.record({ ...baseInput, value: 2 });

    const signals = await collect(store.listFor("alice", "g1", "budget_tier"));

    expect(signals.map(signal => signal.value)).toEqual([1, 4, 2]);
  });

  it("appends a batch in one statement with ids in batch order", async () => {
    await store.record(baseInput);
    const batch = [
      { ...parseSignalInput(baseInput), dimension: "dietary_restriction" as const, value: "vegan" },
      { ...parseSignalInput(baseInput), dimension: "cuisine" as const, value: "thai" }
    ];

    const recorded = await store.appendMany(batch);

    expect(recorded.map(signal => [signal.id, signal.dimension, signal.value])).toEqual([
      [2, "dietary_restriction", "vegan"],
      [3, "cuisine", "thai"]
    ]);
    expect((await store.listForGroup("g1")).map(signal => signal.id)).toEqual([1, 2, 3]);
  });

  it("appends nothing for an empty batch", async () => {
    expect(await store.appendMany([])).toEqual([]);
    expect(await store.listForGroup("g1")).toEqual([]);
  });

  it("throws when used before init()", async () => {
    const uninitialized = new SignalStoreService();

    await expect(uninitialized.listForGroup("g1")).rejects.toMatchObject({
      code: "groupPreferenceEngine/store/notInitialized"
    });
  });
});
