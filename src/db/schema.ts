import { createClient, type Client } from "@libsql/client";

export interface DbSettings {
  databaseUrl: string;
  databaseAuthToken?: string;
}

export function createDbClient(settings: DbSettings): Client {
  if (!settings.databaseUrl) {
    throw new Error("A database URL is required");
  }

  return createClient({
    url: settings.databaseUrl,
    authToken: settings.databaseAuthToken,
  });
}

export async function initializeDatabase(client: Client): Promise<void> {
  await client.executeMultiple(`
    -- Operator feedback captured during review
    CREATE TABLE IF NOT EXISTS feedback_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email_id TEXT NOT NULL,
      thread_id TEXT,
      scope TEXT NOT NULL,
      decision TEXT NOT NULL,
      recommendation TEXT NOT NULL,
      category TEXT NOT NULL,
      confidence REAL NOT NULL,
      feedback TEXT NOT NULL,
      instruction_version INTEGER NOT NULL,
      instruction_updated INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_feedback_events_email ON feedback_events(email_id);
    CREATE INDEX IF NOT EXISTS idx_feedback_events_created ON feedback_events(created_at);

    -- One row per finished review run
    CREATE TABLE IF NOT EXISTS review_sessions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      mode TEXT NOT NULL,
      started_at TEXT NOT NULL,
      ended_at TEXT NOT NULL,
      processed INTEGER NOT NULL DEFAULT 0,
      kept INTEGER NOT NULL DEFAULT 0,
      deleted INTEGER NOT NULL DEFAULT 0,
      ai_agreements INTEGER NOT NULL DEFAULT 0,
      ai_disagreements INTEGER NOT NULL DEFAULT 0,
      instruction_updates INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_review_sessions_started ON review_sessions(started_at);
  `);
}
