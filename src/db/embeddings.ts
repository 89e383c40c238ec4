import type { DbClient } from './driver.js';
import { embeddingToSql, jsNow, sqlToEmbedding } from './sql-helpers.js';
import type { EmbeddingTable, Vector } from '../types/index.js';

export interface EmbeddingSetRow {
  cache_key: string;
  model: string;
  fingerprint: string;
  row_count: number;
  dimensions: number | null;
  created_at: string | Date; // Date from pg TIMESTAMPTZ
}

interface EmbeddingRow {
  row_index: number;
  kind: 'root' | 'parent';
  embedding: Buffer | string | null;
}

export interface StoredEmbeddings {
  meta: EmbeddingSetRow;
  table: EmbeddingTable;
}

function firstDimensions(table: EmbeddingTable): number | null {
  const vec = [...table.root, ...table.parent].find((v): v is Vector => v !== null);
  return vec ? vec.length : null;
}

export async function saveEmbeddingSet(
  db: DbClient,
  cacheKey: string,
  meta: { model: string; fingerprint: string },
  table: EmbeddingTable,
): Promise<void> {
  await db.transaction(async () => {
    await db.run('DELETE FROM embedding_rows WHERE cache_key = ?', [cacheKey]);
    await db.run('DELETE FROM embedding_sets WHERE cache_key = ?', [cacheKey]);
    await db.run(`
      INSERT INTO embedding_sets (cache_key, model, fingerprint, row_count, dimensions, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `, [cacheKey, meta.model, meta.fingerprint, table.root.length, firstDimensions(table), jsNow()]);

    for (const kind of ['root', 'parent'] as const) {
      const vectors = table[kind];
      for (let i = 0; i < vectors.length; i++) {
        const vec = vectors[i];
        await db.run(
          'INSERT INTO embedding_rows (cache_key, row_index, kind, embedding) VALUES (?, ?, ?, ?)',
          [cacheKey, i, kind, vec ? embeddingToSql(db, vec) : null],
        );
      }
    }
  });
}

export async function getEmbeddingSet(db: DbClient, cacheKey: string): Promise<EmbeddingSetRow | undefined> {
  return db.get<EmbeddingSetRow>('SELECT * FROM embedding_sets WHERE cache_key = ?', [cacheKey]);
}

export async function loadEmbeddingSet(db: DbClient, cacheKey: string): Promise<StoredEmbeddings | undefined> {
  const meta = await getEmbeddingSet(db, cacheKey);
  if (!meta) return undefined;

  const rows = await db.all<EmbeddingRow>(
    'SELECT row_index, kind, embedding FROM embedding_rows WHERE cache_key = ? ORDER BY row_index',
    [cacheKey],
  );
  const table: EmbeddingTable = {
    root: new Array<Vector | null>(meta.row_count).fill(null),
    parent: new Array<Vector | null>(meta.row_count).fill(null),
  };
  for (const row of rows) {
    if (row.row_index < 0 || row.row_index >= meta.row_count) continue;
    table[row.kind][row.row_index] = row.embedding === null ? null : sqlToEmbedding(db, row.embedding);
  }
  return { meta, table };
}

export async function deleteEmbeddingSet(db: DbClient, cacheKey: string): Promise<boolean> {
  const existing = await getEmbeddingSet(db, cacheKey);
  if (!existing) return false;
  await db.transaction(async () => {
    await db.run('DELETE FROM embedding_rows WHERE cache_key = ?', [cacheKey]);
    await db.run('DELETE FROM embedding_sets WHERE cache_key = ?', [cacheKey]);
  });
  return true;
}

export async function listEmbeddingSets(db: DbClient): Promise<EmbeddingSetRow[]> {
  return db.all<EmbeddingSetRow>('SELECT * FROM embedding_sets ORDER BY cache_key');
}
