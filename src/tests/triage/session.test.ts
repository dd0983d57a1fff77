import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import type { Client } from "@libsql/client";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { createDbClient, initializeDatabase, Store } from "../../db/index.js";
import { InstructionStore } from "../../instructions/index.js";
import { ProcessedLedger } from "../../ledger/index.js";
import type { RawMessage } from "../../threads/index.js";
import {
  ActionExecutor,
  LOW_CONFIDENCE_NOTICE,
  ReviewInterrupted,
  ReviewSession,
  ThreadAnalyzer,
  defaultFeedback,
  fetchLimit,
  formatSessionRecord,
  formatStats,
  type FeedbackRequest,
  type MessageDecision,
  type Reviewer,
  type ThreadAnalysis,
  type ThreadDecision,
} from "../../triage/index.js";
import {
  FakeClassifier,
  FakeMailbox,
  makeTempDir,
  messageVerdict,
  raw,
  rawVerdict,
  removeTempDir,
} from "../helpers/fakes.js";

interface Script {
  threadConfirmations?: boolean[];
  threadDecisions?: ThreadDecision[];
  autoAccepts?: boolean[];
  messageDecisions?: MessageDecision[];
  feedback?: Array<string | null>;
}

function next<T>(queue: T[] | undefined): T {
  const value = queue?.shift();
  if (value === undefined) throw new ReviewInterrupted();
  return value;
}

/** Answers prompts from queues; an exhausted queue behaves like closed input. */
class ScriptedReviewer implements Reviewer {
  readonly notices: string[] = [];
  readonly asked: string[] = [];
  readonly feedbackRequests: FeedbackRequest[] = [];

  constructor(private readonly script: Script = {}) {}

  notify(message: string): void {
    this.notices.push(message);
  }

  async confirmThreadRecommendation(analysis: ThreadAnalysis): Promise<boolean> {
    this.asked.push(`confirm-thread:${analysis.threadId}`);
    return next(this.script.threadConfirmations);
  }

  async chooseThreadDecision(analysis: ThreadAnalysis): Promise<ThreadDecision> {
    this.asked.push(`choose-thread:${analysis.threadId}`);
    return next(this.script.threadDecisions);
  }

  async confirmAutoAccept(email: { id: string }): Promise<boolean> {
    this.asked.push(`auto-accept:${email.id}`);
    return next(this.script.autoAccepts);
  }

  async chooseMessageDecision(email: { id: string }): Promise<MessageDecision> {
    this.asked.push(`choose-message:${email.id}`);
    return next(this.script.messageDecisions);
  }

  async requestFeedback(request: FeedbackRequest): Promise<string | null> {
    this.asked.push(`feedback:${request.requirement}`);
    this.feedbackRequests.push(request);
    return next(this.script.feedback);
  }
}

describe("ReviewSession", () => {
  let dir: string;
  let db: Client;
  let store: Store;
  let ledger: ProcessedLedger;
  let instructions: InstructionStore;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);

    dir = await makeTempDir();
    const seedFile = path.join(dir, "seed.md");
    await writeFile(seedFile, "SEED\n");

    db = createDbClient({ databaseUrl: ":memory:" });
    await initializeDatabase(db);
    store = new Store(db);
    ledger = await ProcessedLedger.open(path.join(dir, "processed_log.jsonl"));
    instructions = await InstructionStore.open({
      instructionsFile: path.join(dir, "instructions.md"),
      historyDir: path.join(dir, "history"),
      seedFile,
    });
  });

  afterEach(async () => {
    db.close();
    await removeTempDir(dir);
  });

  function setup(messages: RawMessage[], classifier: FakeClassifier, script: Script) {
    const mailbox = new FakeMailbox(messages);
    const reviewer = new ScriptedReviewer(script);
    const session = new ReviewSession({
      mailbox,
      ledger,
      analyzer: new ThreadAnalyzer(classifier, instructions),
      executor: new ActionExecutor(mailbox, ledger),
      instructions,
      classifier,
      store,
      reviewer,
    });
    return { mailbox, reviewer, session };
  }

  async function ledgerLines(): Promise<unknown[]> {
    const text = await readFile(ledger.path, "utf8");
    return text
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line): unknown => JSON.parse(line));
  }

  describe("fetchLimit", () => {
    it("should add a buffer for larger batches", () => {
      expect(fetchLimit(9)).toBe(9);
      expect(fetchLimit(10)).toBe(15);
      expect(fetchLimit(12)).toBe(18);
      expect(fetchLimit(40)).toBe(45);
    });
  });

  describe("fetchUnprocessed", () => {
    it("should skip messages already in the ledger", async () => {
      await ledger.append({ email_id: "m1", decision: "keep", timestamp: "t" });
      const { mailbox, session } = setup([raw("m1"), raw("m2")], new FakeClassifier(), {});

      const batch = await session.fetchUnprocessed(10);

      expect(mailbox.fetchLimits).toEqual([15]);
      expect(batch.map((m) => m.id)).toEqual(["m2"]);
    });

    it("should return an empty batch when the mailbox fails", async () => {
      const { mailbox, session } = setup([raw("m1")], new FakeClassifier(), {});
      mailbox.fetchError = new Error("connection reset");

      expect(await session.fetchUnprocessed(5)).toEqual([]);
    });
  });

  describe("thread mode", () => {
    it("should follow per-message verdicts for a mixed thread", async () => {
      const classifier = new FakeClassifier([
        rawVerdict("MIXED", 0.6, { category: "Newsletter" }),
        rawVerdict("KEEP", 0.8),
        rawVerdict("JUNK-CANDIDATE", 0.9),
        rawVerdict("KEEP", 0.7),
      ]);
      const { mailbox, reviewer, session } = setup(
        [
          raw("m1", { threadId: "t1", date: "2024-03-01T09:00:00Z" }),
          raw("m2", { threadId: "t1", date: "2024-03-02T09:00:00Z" }),
          raw("m3", { threadId: "t1", date: "2024-03-03T09:00:00Z" }),
        ],
        classifier,
        { threadDecisions: ["mixed"] }
      );

      const stats = await session.run({ batchSize: 10, mode: "thread" });

      expect(reviewer.asked).toEqual(["choose-thread:t1"]);
      expect(mailbox.labelsOf("m1")).toEqual(["INBOX"]);
      expect(mailbox.labelsOf("m2")).toEqual(["Junk-Candidate"]);
      expect(mailbox.labelsOf("m3")).toEqual(["INBOX"]);
      expect(await ledgerLines()).toEqual([
        expect.objectContaining({ email_id: "m1", decision: "keep", user_feedback: "Mixed thread decision" }),
        expect.objectContaining({ email_id: "m2", decision: "delete", user_feedback: "Mixed thread decision" }),
        expect.objectContaining({ email_id: "m3", decision: "keep", user_feedback: "Mixed thread decision" }),
      ]);
      expect(stats).toMatchObject({
        processed: 3,
        kept: 2,
        deleted: 1,
        aiAgreements: 3,
        aiDisagreements: 0,
        instructionUpdates: 0,
      });

      const [saved] = await store.getRecentSessions();
      expect(saved).toMatchObject({ mode: "thread", processed: 3, kept: 2, deleted: 1 });
    });

    it("should apply an accepted decisive recommendation to every message", async () => {
      const classifier = new FakeClassifier([rawVerdict("DELETE_THREAD", 0.9)]);
      const { mailbox, reviewer, session } = setup(
        [raw("m1", { threadId: "t1" }), raw("m2", { threadId: "t1" })],
        classifier,
        { threadConfirmations: [true] }
      );

      const stats = await session.run({ batchSize: 10, mode: "thread" });

      expect(reviewer.asked).toEqual(["confirm-thread:t1"]);
      expect(mailbox.labelsOf("m1")).toEqual(["Junk-Candidate"]);
      expect(mailbox.labelsOf("m2")).toEqual(["Junk-Candidate"]);
      expect(await ledgerLines()).toEqual([
        expect.objectContaining({ email_id: "m1", user_feedback: "Thread delete decision" }),
        expect.objectContaining({ email_id: "m2", user_feedback: "Thread delete decision" }),
      ]);
      expect(stats.deleted).toBe(2);
      expect(stats.aiAgreements).toBe(2);
    });

    it("should learn from a thread choice that contradicts the recommendation", async () => {
      const classifier = new FakeClassifier([rawVerdict("DELETE_THREAD", 0.9)]);
      const { reviewer, session } = setup(
        [raw("m1", { threadId: "t1" }), raw("m2", { threadId: "t1" })],
        classifier,
        { threadConfirmations: [false], threadDecisions: ["thread_keep"], feedback: [null] }
      );

      const stats = await session.run({ batchSize: 10, mode: "thread" });

      const expected = "User chose to keep despite AI recommending DELETE_THREAD. Confidence was 0.90";
      expect(reviewer.asked).toEqual(["confirm-thread:t1", "choose-thread:t1", "feedback:required"]);
      expect(classifier.suggestions).toEqual([
        { instruction: "SEED\n", feedback: expected, example: "Body of m1\n\nBody of m2" },
      ]);
      expect(instructions.version).toBe(2);
      expect(stats).toMatchObject({ kept: 2, aiDisagreements: 2, instructionUpdates: 1 });

      const [event] = await store.getRecentFeedback();
      expect(event).toMatchObject({
        emailId: "m1",
        threadId: "t1",
        scope: "thread",
        decision: "keep",
        recommendation: "DELETE_THREAD",
        feedback: expected,
        instructionVersion: 2,
        instructionUpdated: true,
      });
      expect(await ledgerLines()).toEqual([
        expect.objectContaining({ email_id: "m1", decision: "keep", user_feedback: "Thread keep decision" }),
        expect.objectContaining({ email_id: "m2", decision: "keep", user_feedback: "Thread keep decision" }),
      ]);
    });

    it("should keep a starred thread without asking", async () => {
      const classifier = new FakeClassifier();
      const { reviewer, session } = setup(
        [raw("m1", { threadId: "t1", isStarred: true }), raw("m2", { threadId: "t1" })],
        classifier,
        {}
      );

      const stats = await session.run({ batchSize: 10, mode: "thread" });

      expect(reviewer.asked).toEqual([]);
      expect(classifier.calls).toEqual([]);
      expect(stats.kept).toBe(2);
      expect(await ledgerLines()).toEqual([
        expect.objectContaining({
          email_id: "m1",
          decision: "keep",
          user_feedback: "Auto-keep: starred thread",
          ai_analysis: {
            recommendation: "KEEP",
            category: "Starred Message",
            confidence: 1,
            reasoning: "Message or thread contains starred items",
          },
        }),
        expect.objectContaining({ email_id: "m2", user_feedback: "Auto-keep: starred thread" }),
      ]);
    });

    it("should skip a thread without recording it", async () => {
      const classifier = new FakeClassifier([rawVerdict("KEEP_THREAD", 0.9)]);
      const { session } = setup([raw("m1", { threadId: "t1" })], classifier, {
        threadConfirmations: [false],
        threadDecisions: ["skip"],
      });

      const stats = await session.run({ batchSize: 10, mode: "thread" });

      expect(stats.processed).toBe(0);
      expect(ledger.contains("m1")).toBe(false);
    });

    it("should keep the current thread and stop when input closes", async () => {
      const classifier = new FakeClassifier([
        rawVerdict("DELETE_THREAD", 0.9),
        rawVerdict("DELETE_THREAD", 0.9),
      ]);
      const { mailbox, reviewer, session } = setup(
        [raw("m1", { threadId: "t1" }), raw("m2", { threadId: "t2" })],
        classifier,
        {}
      );

      const stats = await session.run({ batchSize: 10, mode: "thread" });

      expect(reviewer.notices).toContain("Session interrupted. Defaulting to keep thread for safety.");
      expect(classifier.calls).toHaveLength(1);
      expect(mailbox.labelsOf("m1")).toEqual(["INBOX"]);
      expect(ledger.contains("m1")).toBe(true);
      expect(ledger.contains("m2")).toBe(false);
      expect(stats).toMatchObject({ processed: 1, kept: 1 });
    });

    it("should stop on quit", async () => {
      const classifier = new FakeClassifier([
        rawVerdict("KEEP_THREAD", 0.9),
        rawVerdict("KEEP_THREAD", 0.9),
      ]);
      const { session } = setup(
        [raw("m1", { threadId: "t1" }), raw("m2", { threadId: "t2" })],
        classifier,
        { threadConfirmations: [false], threadDecisions: ["quit"] }
      );

      const stats = await session.run({ batchSize: 10, mode: "thread" });

      expect(stats.processed).toBe(0);
      expect(classifier.calls).toHaveLength(1);
      const [saved] = await store.getRecentSessions();
      expect(saved?.processed).toBe(0);
    });
  });

  describe("individual mode", () => {
    it("should accept a confident unambiguous verdict in one step", async () => {
      const classifier = new FakeClassifier([
        rawVerdict("JUNK-CANDIDATE", 0.92, { category: "Commercial/Marketing" }),
      ]);
      const { mailbox, reviewer, session } = setup([raw("m1")], classifier, { autoAccepts: [true] });

      const stats = await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.asked).toEqual(["auto-accept:m1"]);
      expect(mailbox.labelsOf("m1")).toEqual(["Junk-Candidate"]);
      expect(await ledgerLines()).toEqual([
        expect.objectContaining({ email_id: "m1", decision: "delete", user_feedback: null }),
      ]);
      expect(stats).toMatchObject({ deleted: 1, aiAgreements: 1 });
    });

    it("should show the full menu when auto-accept is declined", async () => {
      const classifier = new FakeClassifier([
        rawVerdict("JUNK-CANDIDATE", 0.92, { category: "Commercial/Marketing" }),
      ]);
      const { reviewer, session } = setup([raw("m1")], classifier, {
        autoAccepts: [false],
        messageDecisions: ["keep"],
        feedback: ["I buy from them"],
      });

      await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.asked).toEqual(["auto-accept:m1", "choose-message:m1", "feedback:required"]);
      expect(instructions.version).toBe(2);
    });

    it("should invite optional feedback on a low-confidence agreement", async () => {
      const classifier = new FakeClassifier([rawVerdict("KEEP", 0.3)]);
      const { reviewer, session } = setup([raw("m1")], classifier, {
        messageDecisions: ["keep"],
        feedback: ["Keep receipts"],
      });

      const stats = await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.notices).toContain(LOW_CONFIDENCE_NOTICE);
      expect(reviewer.asked).toEqual(["choose-message:m1", "feedback:optional"]);
      expect(classifier.suggestions[0]?.feedback).toBe("Keep receipts");
      expect(stats.instructionUpdates).toBe(1);
      expect(await ledgerLines()).toEqual([
        expect.objectContaining({ email_id: "m1", user_feedback: "Keep receipts" }),
      ]);
    });

    it("should not update the instruction when optional feedback is declined", async () => {
      const classifier = new FakeClassifier([rawVerdict("KEEP", 0.3)]);
      const { session } = setup([raw("m1")], classifier, {
        messageDecisions: ["keep"],
        feedback: [""],
      });

      await session.run({ batchSize: 10, mode: "individual" });

      expect(classifier.suggestions).toEqual([]);
      expect(instructions.version).toBe(1);
    });

    it("should use the updated instruction for the next message", async () => {
      const classifier = new FakeClassifier([
        rawVerdict("KEEP", 0.7),
        rawVerdict("KEEP", 0.7),
      ]);
      const { session } = setup([raw("m1"), raw("m2")], classifier, {
        messageDecisions: ["delete", "keep"],
        feedback: ["Old newsletters are junk"],
      });

      const stats = await session.run({ batchSize: 10, mode: "individual" });

      expect(classifier.calls[0]?.instruction).toBe("SEED\n");
      expect(classifier.calls[1]?.instruction).toContain("**User Feedback:** Old newsletters are junk");
      expect(stats).toMatchObject({ processed: 2, aiDisagreements: 1, aiAgreements: 1 });
    });

    it("should undo the previous action and move on", async () => {
      const classifier = new FakeClassifier([
        rawVerdict("JUNK-CANDIDATE", 0.6),
        rawVerdict("KEEP", 0.7),
      ]);
      const { mailbox, reviewer, session } = setup([raw("m1"), raw("m2")], classifier, {
        messageDecisions: ["delete", "undo"],
      });

      const stats = await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.notices).toContain("Last action undone successfully");
      expect(mailbox.labelsOf("m1")).toEqual(["INBOX"]);
      expect(ledger.contains("m1")).toBe(false);
      expect(ledger.contains("m2")).toBe(false);
      expect(stats).toMatchObject({ processed: 0, deleted: 0 });
    });

    it("should warn when the ledger cannot record a decision", async () => {
      const classifier = new FakeClassifier([rawVerdict("KEEP", 0.7)]);
      const { reviewer, session } = setup([raw("m1")], classifier, { messageDecisions: ["keep"] });
      await mkdir(ledger.path);

      const stats = await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.notices).toContain(
        "WARNING: could not record message m1 in the processed ledger. It will be offered again next run."
      );
      expect(ledger.contains("m1")).toBe(false);
      expect(stats).toMatchObject({ processed: 1, kept: 1 });
    });

    it("should report an undo with nothing to undo", async () => {
      const classifier = new FakeClassifier([rawVerdict("KEEP", 0.7)]);
      const { reviewer, session } = setup([raw("m1")], classifier, { messageDecisions: ["undo"] });

      await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.notices).toContain("Could not undo last action (empty)");
    });

    it("should not ask for feedback on a fallback verdict", async () => {
      const { reviewer, session } = setup([raw("m1")], new FakeClassifier(), {
        messageDecisions: ["delete"],
      });

      await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.asked).toEqual(["choose-message:m1"]);
      expect(await ledgerLines()).toEqual([
        expect.objectContaining({
          email_id: "m1",
          decision: "delete",
          user_feedback: null,
          ai_analysis: expect.objectContaining({ category: "Error Fallback", confidence: 0.5 }),
        }),
      ]);
    });

    it("should still act when the instruction update fails", async () => {
      const classifier = new FakeClassifier([rawVerdict("KEEP", 0.9)]);
      classifier.suggestion = new Error("overloaded");
      const { mailbox, reviewer, session } = setup([raw("m1")], classifier, {
        messageDecisions: ["delete"],
        feedback: ["Actually junk"],
      });

      const stats = await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.notices).toContain("Failed to update classifier instruction");
      expect(mailbox.labelsOf("m1")).toEqual(["Junk-Candidate"]);
      expect(stats.instructionUpdates).toBe(0);
      const [event] = await store.getRecentFeedback();
      expect(event).toMatchObject({ feedback: "Actually junk", instructionUpdated: false, instructionVersion: 1 });
    });

    it("should stop when input closes at the message prompt", async () => {
      const classifier = new FakeClassifier([rawVerdict("KEEP", 0.7), rawVerdict("KEEP", 0.7)]);
      const { reviewer, session } = setup([raw("m1"), raw("m2")], classifier, {});

      const stats = await session.run({ batchSize: 10, mode: "individual" });

      expect(reviewer.asked).toEqual(["choose-message:m1"]);
      expect(stats.processed).toBe(0);
    });
  });

  it("should say so when nothing is left to review", async () => {
    await ledger.append({ email_id: "m1", decision: "keep", timestamp: "t" });
    const { reviewer, session } = setup([raw("m1")], new FakeClassifier(), {});

    const stats = await session.run({ batchSize: 10, mode: "thread" });

    expect(reviewer.notices).toEqual(["No unprocessed emails found!"]);
    expect(stats.processed).toBe(0);
    expect(await store.getRecentSessions()).toEqual([]);
  });

  it("should build the default feedback text", () => {
    expect(defaultFeedback("delete", messageVerdict({ recommendation: "KEEP", confidence: 0.756 }))).toBe(
      "User chose to delete despite AI recommending KEEP. Confidence was 0.76"
    );
  });

  it("should format statistics with shares of processed", () => {
    const text = formatStats(
      {
        processed: 4,
        kept: 3,
        deleted: 1,
        aiAgreements: 2,
        aiDisagreements: 2,
        instructionUpdates: 1,
        startTime: new Date("2024-03-01T10:00:00Z"),
      },
      new Date("2024-03-01T10:01:30Z")
    );

    expect(text.split("\n")).toEqual([
      "Emails Processed: 4",
      "Kept: 3 (75.0%)",
      "Deleted: 1 (25.0%)",
      "AI Agreements: 2 (50.0%)",
      "AI Disagreements: 2 (50.0%)",
      "Instruction Updates: 1",
      "Session Time: 90s",
    ]);
  });

  it("should format a saved session for the stats report", () => {
    expect(
      formatSessionRecord({
        mode: "individual",
        startedAt: "2024-03-01T10:00:00.000Z",
        endedAt: "2024-03-01T10:05:00.000Z",
        processed: 5,
        kept: 3,
        deleted: 2,
        aiAgreements: 4,
        aiDisagreements: 1,
        instructionUpdates: 1,
      })
    ).toBe(
      "[2024-03-01T10:00:00.000Z] individual: 5 processed (3 kept, 2 deleted), 1 instruction updates"
    );
  });
});
