import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

/**
 * DDL for the interactions table. Idempotent, so it is safe to run on every
 * process start or lazily before the first write.
 */
export function getInteractionsDdl(): string {
  return `
    CREATE TABLE IF NOT EXISTS interactions (
      id TEXT PRIMARY KEY,
      query TEXT NOT NULL,
      refined_query TEXT NOT NULL,
      paper_ids JSONB NOT NULL DEFAULT '[]'::jsonb,
      answer TEXT NOT NULL DEFAULT '',
      citations JSONB NOT NULL DEFAULT '[]'::jsonb,
      latencies JSONB NOT NULL,
      counts JSONB NOT NULL,
      outcome TEXT NOT NULL,
      is_error BOOLEAN NOT NULL DEFAULT FALSE,
      error_code TEXT,
      feedback TEXT CHECK (feedback IN ('positive', 'negative')),
      feedback_at TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS interactions_created_at_idx ON interactions (created_at);
  `;
}

export async function ensureSchema(db: DbClient): Promise<void> {
  await db.execute(sql.raw(getInteractionsDdl()));
}
