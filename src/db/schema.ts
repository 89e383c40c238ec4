import type { DbClient } from './driver.js';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS embedding_sets (
    cache_key TEXT PRIMARY KEY,
    model TEXT NOT NULL,
    fingerprint TEXT NOT NULL,
    row_count INTEGER NOT NULL,
    dimensions INTEGER,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS embedding_rows (
    cache_key TEXT NOT NULL REFERENCES embedding_sets(cache_key) ON DELETE CASCADE,
    row_index INTEGER NOT NULL,
    kind TEXT NOT NULL CHECK (kind IN ('root', 'parent')),
    embedding BLOB,
    PRIMARY KEY (cache_key, row_index, kind)
  );
`;

/**
 * Create the embedding cache tables. Idempotent.
 * For PostgreSQL, delegates to pg-schema.ts.
 */
export async function initSchema(db: DbClient): Promise<void> {
  if (db.dialect === 'sqlite') {
    await db.exec(SCHEMA_SQL);
  } else {
    const { initPgSchema } = await import('./pg-schema.js');
    await initPgSchema(db);
  }
}
