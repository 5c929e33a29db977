import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createClient, type Client } from "@libsql/client";

/**
 * Open a local libsql database. `:memory:` gives a throwaway database.
 */
export function createDbClient(path: string): Client {
  if (path === ":memory:") {
    return createClient({ url: ":memory:" });
  }

  mkdirSync(dirname(path), { recursive: true });
  return createClient({ url: `file:${path}` });
}

export async function initializeKnowledgeSchema(client: Client): Promise<void> {
  await client.executeMultiple(`
    CREATE TABLE IF NOT EXISTS knowledge_entries (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      id TEXT NOT NULL,
      content TEXT NOT NULL,
      category TEXT NOT NULL,
      metadata TEXT NOT NULL DEFAULT '{}',
      embedding TEXT NOT NULL,
      embedding_model TEXT NOT NULL,
      created_at TEXT NOT NULL,
      UNIQUE (kind, id)
    );

    CREATE INDEX IF NOT EXISTS idx_knowledge_entries_kind ON knowledge_entries(kind);
    CREATE INDEX IF NOT EXISTS idx_knowledge_entries_model ON knowledge_entries(embedding_model);
  `);
}

export async function initializeFeedbackSchema(client: Client): Promise<void> {
  await client.executeMultiple(`
    CREATE TABLE IF NOT EXISTS feedback_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email_id TEXT NOT NULL,
      email_content TEXT NOT NULL,
      original_category TEXT NOT NULL,
      correct_category TEXT NOT NULL,
      confidence REAL NOT NULL,
      notes TEXT,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_feedback_log_correct ON feedback_log(correct_category);
    CREATE INDEX IF NOT EXISTS idx_feedback_log_email ON feedback_log(email_id);

    -- Audit trail: rows are never rewritten or removed
    CREATE TRIGGER IF NOT EXISTS feedback_log_no_update
    BEFORE UPDATE ON feedback_log
    BEGIN
      SELECT RAISE(ABORT, 'feedback_log is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS feedback_log_no_delete
    BEFORE DELETE ON feedback_log
    BEGIN
      SELECT RAISE(ABORT, 'feedback_log is append-only');
    END;
  `);
}
