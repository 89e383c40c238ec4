import type { DbClient } from './driver.js';

export async function initPgSchema(db: DbClient): Promise<void> {
  await db.exec('CREATE EXTENSION IF NOT EXISTS vector');

  await db.exec(`
    CREATE TABLE IF NOT EXISTS embedding_sets (
      cache_key TEXT PRIMARY KEY,
      model TEXT NOT NULL,
      fingerprint TEXT NOT NULL,
      row_count INTEGER NOT NULL,
      dimensions INTEGER,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS embedding_rows (
      cache_key TEXT NOT NULL REFERENCES embedding_sets(cache_key) ON DELETE CASCADE,
      row_index INTEGER NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('root', 'parent')),
      embedding vector,
      PRIMARY KEY (cache_key, row_index, kind)
    );
  `);
}
