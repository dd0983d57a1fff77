import type { Client } from "@libsql/client";

// Types

export type FeedbackScope = "message" | "thread";

export interface FeedbackEvent {
  id?: number;
  emailId: string;
  threadId: string | null;
  scope: FeedbackScope;
  decision: string;
  recommendation: string;
  category: string;
  confidence: number;
  feedback: string;
  // Head version after the feedback was processed.
  instructionVersion: number;
  instructionUpdated: boolean;
  createdAt?: string;
}

export type ReviewMode = "thread" | "individual";

export interface SessionRecord {
  id?: number;
  mode: ReviewMode;
  startedAt: string;
  endedAt: string;
  processed: number;
  kept: number;
  deleted: number;
  aiAgreements: number;
  aiDisagreements: number;
  instructionUpdates: number;
}

export interface ReviewTotals {
  sessions: number;
  processed: number;
  kept: number;
  deleted: number;
  aiAgreements: number;
  aiDisagreements: number;
  instructionUpdates: number;
  feedbackEvents: number;
}

// Column readers

function text(value: unknown): string {
  return typeof value === "string" ? value : String(value ?? "");
}

function nullableText(value: unknown): string | null {
  return value === null || value === undefined ? null : text(value);
}

function count(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return 0;
}

function isFeedbackScope(value: string): value is FeedbackScope {
  return value === "message" || value === "thread";
}

function isReviewMode(value: string): value is ReviewMode {
  return value === "thread" || value === "individual";
}

// Store class

export class Store {
  constructor(private readonly db: Client) {}

  // ============ Feedback Events ============

  async saveFeedbackEvent(event: FeedbackEvent): Promise<number> {
    const result = await this.db.execute({
      sql: `INSERT INTO feedback_events
            (email_id, thread_id, scope, decision, recommendation, category,
             confidence, feedback, instruction_version, instruction_updated, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        event.emailId,
        event.threadId,
        event.scope,
        event.decision,
        event.recommendation,
        event.category,
        event.confidence,
        event.feedback,
        event.instructionVersion,
        event.instructionUpdated ? 1 : 0,
        event.createdAt ?? new Date().toISOString(),
      ],
    });

    return Number(result.lastInsertRowid);
  }

  async getRecentFeedback(limit: number = 10): Promise<FeedbackEvent[]> {
    const result = await this.db.execute({
      sql: `SELECT * FROM feedback_events
            ORDER BY created_at DESC, id DESC
            LIMIT ?`,
      args: [limit],
    });

    return result.rows.map((row) => {
      const scope = text(row.scope);
      return {
        id: count(row.id),
        emailId: text(row.email_id),
        threadId: nullableText(row.thread_id),
        scope: isFeedbackScope(scope) ? scope : "message",
        decision: text(row.decision),
        recommendation: text(row.recommendation),
        category: text(row.category),
        confidence: count(row.confidence),
        feedback: text(row.feedback),
        instructionVersion: count(row.instruction_version),
        instructionUpdated: count(row.instruction_updated) === 1,
        createdAt: text(row.created_at),
      };
    });
  }

  // ============ Review Sessions ============

  async saveSession(session: SessionRecord): Promise<number> {
    const result = await this.db.execute({
      sql: `INSERT INTO review_sessions
            (mode, started_at, ended_at, processed, kept, deleted,
             ai_agreements, ai_disagreements, instruction_updates)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        session.mode,
        session.startedAt,
        session.endedAt,
        session.processed,
        session.kept,
        session.deleted,
        session.aiAgreements,
        session.aiDisagreements,
        session.instructionUpdates,
      ],
    });

    return Number(result.lastInsertRowid);
  }

  async getRecentSessions(limit: number = 5): Promise<SessionRecord[]> {
    const result = await this.db.execute({
      sql: `SELECT * FROM review_sessions
            ORDER BY started_at DESC, id DESC
            LIMIT ?`,
      args: [limit],
    });

    return result.rows.map((row) => {
      const mode = text(row.mode);
      return {
        id: count(row.id),
        mode: isReviewMode(mode) ? mode : "thread",
        startedAt: text(row.started_at),
        endedAt: text(row.ended_at),
        processed: count(row.processed),
        kept: count(row.kept),
        deleted: count(row.deleted),
        aiAgreements: count(row.ai_agreements),
        aiDisagreements: count(row.ai_disagreements),
        instructionUpdates: count(row.instruction_updates),
      };
    });
  }

  // ============ Stats ============

  async getReviewTotals(): Promise<ReviewTotals> {
    const sessions = await this.db.execute(`
      SELECT
        COUNT(*) as sessions,
        COALESCE(SUM(processed), 0) as processed,
        COALESCE(SUM(kept), 0) as kept,
        COALESCE(SUM(deleted), 0) as deleted,
        COALESCE(SUM(ai_agreements), 0) as ai_agreements,
        COALESCE(SUM(ai_disagreements), 0) as ai_disagreements,
        COALESCE(SUM(instruction_updates), 0) as instruction_updates
      FROM review_sessions
    `);
    const feedback = await this.db.execute(
      "SELECT COUNT(*) as count FROM feedback_events"
    );

    const row = sessions.rows[0];
    return {
      sessions: count(row?.sessions),
      processed: count(row?.processed),
      kept: count(row?.kept),
      deleted: count(row?.deleted),
      aiAgreements: count(row?.ai_agreements),
      aiDisagreements: count(row?.ai_disagreements),
      instructionUpdates: count(row?.instruction_updates),
      feedbackEvents: count(feedback.rows[0]?.count),
    };
  }
}
