import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import type { Client } from "@libsql/client";
import {
  createDbClient,
  initializeDatabase,
  Store,
  type FeedbackEvent,
  type SessionRecord,
} from "../../db/index.js";

function feedbackEvent(overrides: Partial<FeedbackEvent> = {}): FeedbackEvent {
  return {
    emailId: "m1",
    threadId: "t1",
    scope: "message",
    decision: "delete",
    recommendation: "KEEP",
    category: "Commercial/Marketing",
    confidence: 0.75,
    feedback: "Expired sale",
    instructionVersion: 2,
    instructionUpdated: true,
    createdAt: "2024-03-01T10:00:00.000Z",
    ...overrides,
  };
}

function session(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    mode: "thread",
    startedAt: "2024-03-01T10:00:00.000Z",
    endedAt: "2024-03-01T10:05:00.000Z",
    processed: 5,
    kept: 3,
    deleted: 2,
    aiAgreements: 4,
    aiDisagreements: 1,
    instructionUpdates: 1,
    ...overrides,
  };
}

describe("Store", () => {
  let db: Client;
  let store: Store;

  beforeEach(async () => {
    db = createDbClient({ databaseUrl: ":memory:" });
    await initializeDatabase(db);
    store = new Store(db);
  });

  afterEach(() => {
    db.close();
  });

  it("should create the review tables", async () => {
    const result = await db.execute(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    expect(result.rows.map((row) => row.name)).toEqual(["feedback_events", "review_sessions"]);
  });

  it("should be safe to initialize twice", async () => {
    await expect(initializeDatabase(db)).resolves.toBeUndefined();
  });

  it("should require a database URL", () => {
    expect(() => createDbClient({ databaseUrl: "" })).toThrow("A database URL is required");
  });

  it("should round-trip feedback events newest first", async () => {
    await store.saveFeedbackEvent(feedbackEvent());
    await store.saveFeedbackEvent(
      feedbackEvent({
        emailId: "m2",
        threadId: null,
        scope: "thread",
        instructionUpdated: false,
        createdAt: "2024-03-02T10:00:00.000Z",
      })
    );

    const recent = await store.getRecentFeedback();

    expect(recent.map((e) => e.emailId)).toEqual(["m2", "m1"]);
    expect(recent[0]).toMatchObject({ threadId: null, scope: "thread", instructionUpdated: false });
    expect(recent[1]).toMatchObject({
      threadId: "t1",
      scope: "message",
      decision: "delete",
      recommendation: "KEEP",
      confidence: 0.75,
      instructionVersion: 2,
      instructionUpdated: true,
    });
  });

  it("should limit recent feedback", async () => {
    for (const id of ["a", "b", "c"]) {
      await store.saveFeedbackEvent(feedbackEvent({ emailId: id }));
    }
    expect(await store.getRecentFeedback(2)).toHaveLength(2);
  });

  it("should save sessions and sum the totals", async () => {
    await store.saveSession(session());
    await store.saveSession(
      session({ mode: "individual", startedAt: "2024-03-02T10:00:00.000Z", processed: 2, kept: 1, deleted: 1 })
    );
    await store.saveFeedbackEvent(feedbackEvent());

    const sessions = await store.getRecentSessions();
    expect(sessions.map((s) => s.mode)).toEqual(["individual", "thread"]);

    expect(await store.getReviewTotals()).toEqual({
      sessions: 2,
      processed: 7,
      kept: 4,
      deleted: 3,
      aiAgreements: 8,
      aiDisagreements: 2,
      instructionUpdates: 2,
      feedbackEvents: 1,
    });
  });

  it("should report zero totals for an empty history", async () => {
    expect(await store.getReviewTotals()).toEqual({
      sessions: 0,
      processed: 0,
      kept: 0,
      deleted: 0,
      aiAgreements: 0,
      aiDisagreements: 0,
      instructionUpdates: 0,
      feedbackEvents: 0,
    });
  });
});
