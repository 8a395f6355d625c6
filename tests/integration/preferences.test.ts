import request from "supertest";
import express from "express";
import preferencesRouter from "../../src/routes/preferences.route";
import { errorHandler } from "../../src/middleware/error.middleware";
import { signalStore } from "../../src/services/signal-store.service";
import { preferenceExtractor } from "../../src/services/preference-extractor.service";

jest.mock("../../src/services/preference-extractor.service", () => ({
  preferenceExtractor: { extract: jest.fn() }
}));

const API_KEY = "test-api-key";

const app = express();
app.use(express.json());
app.use("/api", preferencesRouter);
app.use(errorHandler);

function signalBody(groupId: string, userId: string, dimension: string, value: string | number, confidence = 0.9) {
  return {
    userId,
    groupId,
    dimension,
    value,
    confidence,
    sourceMessageId: `msg-${userId}`,
    observedAt: new Date().toISOString()
  };
}

describe("Preferences API", () => {
  const extract = jest.mocked(preferenceExtractor.extract);

  beforeAll(async () => {
    process.env.API_KEY = API_KEY;
    await signalStore.init(":memory:");
  });

  afterAll(async () => {
    await signalStore.close();
  });

  beforeEach(() => {
    extract.mockReset();
  });

  function join(groupId: string, userId: string) {
    return request(app).post(`/api/groups/${groupId}/members`).set("x-api-key", API_KEY).send({ userId });
  }

  function recordSignal(body: object) {
    return request(app).post("/api/signals").set("x-api-key", API_KEY).send(body);
  }

  describe("authentication", () => {
    it("rejects a request without an API key", async () => {
      const response = await request(app).get("/api/groups/auth-1/profile");

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe("groupPreferenceEngine/auth/apiKeyMissing");
    });

    it("rejects a wrong API key", async () => {
      const response = await request(app).get("/api/groups/auth-1/profile").set("x-api-key", "wrong-key");

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe("groupPreferenceEngine/auth/unauthorized");
    });

    it("accepts a bearer token", async () => {
      const response = await request(app)
        .get("/api/groups/auth-1/profile")
        .set("Authorization", `Bearer ${API_KEY}`);

      expect(response.status).toBe(200);
    });
  });

  describe("POST /api/signals", () => {
    it("records a signal in canonical form", async () => {
      const response = await recordSignal(signalBody("sig-1", "alice", "budget_tier", "$$"));

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        userId: "alice",
        groupId: "sig-1",
        dimension: "budget_tier",
        value: 2,
        polarity: "positive",
        confidence: 0.9
      });
      expect(typeof response.body.id).toBe("number");
    });

    it("rejects an unknown dimension", async () => {
      const response = await recordSignal(signalBody("sig-2", "alice", "parking", "valet"));

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe("groupPreferenceEngine/signal/unknownDimension");
    });

    it("rejects a confidence above 1", async () => {
      const response = await recordSignal(signalBody("sig-2", "alice", "cuisine", "thai", 1.5));

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe("groupPreferenceEngine/signal/invalidConfidence");
    });

    it("rejects a malformed JSON body", async () => {
      const response = await request(app)
        .post("/api/signals")
        .set("x-api-key", API_KEY)
        .set("Content-Type", "application/json")
        .send("{ not json");

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe("groupPreferenceEngine/validation/invalidJson");
    });
  });

  describe("membership", () => {
    it("returns 201 on a new member and 200 on a repeat", async () => {
      const first = await join("mem-1", "alice");
      const second = await join("mem-1", "alice");

      expect(first.status).toBe(201);
      expect(first.body).toEqual({ groupId: "mem-1", userId: "alice", changed: true });
      expect(second.status).toBe(200);
      expect(second.body.changed).toBe(false);
    });

    it("rejects an empty user id", async () => {
      const response = await join("mem-1", " ");

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe("groupPreferenceEngine/validation/userIdEmpty");
    });

    it("removes a member's constraints on leave", async () => {
      await join("mem-2", "alice");
      await join("mem-2", "bob");
      await recordSignal(signalBody("mem-2", "bob", "dietary_restriction", "vegan"));

      const before = await request(app).get("/api/groups/mem-2/profile/constraints").set("x-api-key", API_KEY);
      const left = await request(app).delete("/api/groups/mem-2/members/bob").set("x-api-key", API_KEY);
      const after = await request(app).get("/api/groups/mem-2/profile/constraints").set("x-api-key", API_KEY);

      expect(before.body.hard.dietary).toEqual(["vegan"]);
      expect(left.status).toBe(200);
      expect(left.body).toEqual({ groupId: "mem-2", userId: "bob", changed: true });
      expect(after.body.hard.dietary).toEqual([]);
    });
  });

  describe("GET /api/groups/:groupId/profile", () => {
    it("aggregates the members' signals", async () => {
      await join("prof-1", "alice");
      await join("prof-1", "bob");
      await recordSignal(signalBody("prof-1", "alice", "budget_tier", 3));
      await recordSignal(signalBody("prof-1", "bob", "budget_tier", "$"));
      await recordSignal(signalBody("prof-1", "carol", "budget_tier", 4));

      const response = await request(app).get("/api/groups/prof-1/profile").set("x-api-key", API_KEY);

      expect(response.status).toBe(200);
      expect(response.body.members).toEqual(["alice", "bob"]);
      expect(response.body.dimensions.budget_tier).toEqual({
        status: "resolved",
        kind: "ceiling",
        value: 1,
        rank: 1,
        contributors: ["bob"]
      });
      expect(response.body.conflicts).toEqual([]);
      expect(response.body.stale).toBe(false);
    });

    it("flags a group without members", async () => {
      const response = await request(app).get("/api/groups/prof-empty/profile").set("x-api-key", API_KEY);

      expect(response.body.flags).toEqual(["no_members"]);
    });
  });

  describe("feasibility", () => {
    it("marks the current constraints as possibly infeasible", async () => {
      await join("feas-1", "alice");
      await recordSignal(signalBody("feas-1", "alice", "budget_tier", 1));
      const view = await request(app).get("/api/groups/feas-1/profile/constraints").set("x-api-key", API_KEY);

      const response = await request(app)
        .post("/api/groups/feas-1/feasibility")
        .set("x-api-key", API_KEY)
        .send({ constraintsVersion: view.body.version, matchingRestaurants: 0 });

      expect(response.status).toBe(200);
      expect(response.body.flags).toEqual(["possibly_infeasible"]);
      expect(response.body.version).toBe(view.body.version);
    });

    it("rejects a negative match count", async () => {
      const response = await request(app)
        .post("/api/groups/feas-1/feasibility")
        .set("x-api-key", API_KEY)
        .send({ constraintsVersion: "v1", matchingRestaurants: -2 });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe("groupPreferenceEngine/validation/invalidFeasibilityReport");
    });
  });

  describe("POST /api/groups/:groupId/messages", () => {
    it("records the preferences extracted from a message", async () => {
      extract.mockResolvedValue([
        { dimension: "cuisine", value: "Thai", polarity: "positive", confidence: 0.8 },
        { dimension: "location_radius", value: "5 km", polarity: "positive", confidence: 0.7 }
      ]);

      const response = await request(app)
        .post("/api/groups/msg-1/messages")
        .set("x-api-key", API_KEY)
        .send({ userId: "alice", messageId: "m-42", text: "Thai food within 5 km?" });

      expect(response.status).toBe(201);
      expect(extract).toHaveBeenCalledWith("Thai food within 5 km?", { messageId: "m-42" });
      expect(
        response.body.signals.map((signal: { dimension: string; value: unknown; sourceMessageId: string }) => [
          signal.dimension,
          signal.value,
          signal.sourceMessageId
        ])
      ).toEqual([
        ["cuisine", "thai", "m-42"],
        ["location_radius", 5, "m-42"]
      ]);
    });

    it("rejects an empty message", async () => {
      const response = await request(app)
        .post("/api/groups/msg-1/messages")
        .set("x-api-key", API_KEY)
        .send({ userId: "alice", messageId: "m-43", text: "" });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe("groupPreferenceEngine/validation/messageTextEmpty");
      expect(extract).not.toHaveBeenCalled();
    });
  });

  describe("GET /api/groups/:groupId/users/:userId/preferences", () => {
    it("returns the user's resolved states", async () => {
      await recordSignal(signalBody("user-1", "alice", "meal_time", "dinner", 0.6));

      const response = await request(app).get("/api/groups/user-1/users/alice/preferences").set("x-api-key", API_KEY);

      expect(response.status).toBe(200);
      expect(response.body.groupId).toBe("user-1");
      expect(response.body.userId).toBe("alice");
      expect(response.body.states).toHaveLength(1);
      expect(response.body.states[0]).toMatchObject({
        dimension: "meal_time",
        kind: "exclusive",
        signalCount: 1,
        resolved: { value: "dinner", confidence: 0.6 }
      });
    });
  });
});
