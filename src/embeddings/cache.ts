import { resolve } from 'node:path';
import { datasetFingerprint } from '../dataset.js';
import { loadEmbeddingSet, saveEmbeddingSet } from '../db/embeddings.js';
import type { DbClient } from '../db/driver.js';
import { log } from '../logger.js';
import type { EmbeddingProvider } from './provider.js';
import type { EmbeddingTable, NodeRecord, Vector } from '../types/index.js';

/** Cached tables are keyed by the absolute path of the dataset they were built from. */
export function cacheKeyFor(dataPath: string): string {
  return resolve(dataPath);
}

/** Embed the non-empty texts; empty ones stay null and score 0 downstream. */
async function embedColumn(texts: string[], provider: EmbeddingProvider): Promise<(Vector | null)[]> {
  const present = texts
    .map((text, i) => ({ text: text.trim(), i }))
    .filter(t => t.text !== '');
  const column = new Array<Vector | null>(texts.length).fill(null);
  if (present.length === 0) return column;

  const vectors = await provider.embed(present.map(t => t.text));
  if (vectors.length !== present.length) {
    throw new Error(`Embedding provider returned ${vectors.length} vectors for ${present.length} texts`);
  }
  present.forEach((t, k) => {
    column[t.i] = vectors[k];
  });
  return column;
}

export async function generateEmbeddings(
  records: readonly NodeRecord[],
  provider: EmbeddingProvider,
): Promise<EmbeddingTable> {
  return {
    root: await embedColumn(records.map(r => r.root_description), provider),
    parent: await embedColumn(records.map(r => r.parent_short_summary), provider),
  };
}

/**
 * Load the cached table for `cacheKey` if it was built from the same texts
 * with the same model; otherwise embed, save and return a fresh one.
 */
export async function getOrCreateEmbeddings(
  db: DbClient,
  cacheKey: string,
  records: readonly NodeRecord[],
  provider: EmbeddingProvider,
  opts: { force?: boolean } = {},
): Promise<EmbeddingTable> {
  const fingerprint = datasetFingerprint(records);

  if (!opts.force) {
    const stored = await loadEmbeddingSet(db, cacheKey);
    if (stored) {
      const { meta } = stored;
      if (meta.fingerprint === fingerprint && meta.model === provider.model && meta.row_count === records.length) {
        log('debug', 'Embedding cache hit', { cache_key: cacheKey, rows: meta.row_count });
        return stored.table;
      }
      log('info', 'Embedding cache is stale, regenerating', {
        cache_key: cacheKey,
        cached_model: meta.model,
        model: provider.model,
      });
    } else {
      log('info', 'No cached embeddings, generating', { cache_key: cacheKey, rows: records.length });
    }
  }

  const table = await generateEmbeddings(records, provider);
  await saveEmbeddingSet(db, cacheKey, { model: provider.model, fingerprint }, table);
  return table;
}
