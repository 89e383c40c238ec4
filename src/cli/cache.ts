import { Command } from 'commander';
import { config } from '../config.js';
import { openCacheDb } from '../db/driver.js';
import { deleteEmbeddingSet, listEmbeddingSets } from '../db/embeddings.js';
import { cacheKeyFor } from '../embeddings/cache.js';
import { isJsonMode, outputJson, outputTable } from './helpers.js';

export const cacheCommand = new Command('cache')
  .description('List or clear cached embedding tables')
  .option('--clear <data>', 'Drop the cached table for this dataset path')
  .option('--json', 'Force JSON output')
  .action(async (opts: { clear?: string; json?: boolean }) => {
    const db = await openCacheDb(config);
    try {
      if (opts.clear) {
        const key = cacheKeyFor(opts.clear);
        const removed = await deleteEmbeddingSet(db, key);
        console.log(removed ? `Cleared cached embeddings for ${key}` : `No cached embeddings for ${key}`);
        return;
      }

      const sets = await listEmbeddingSets(db);
      if (isJsonMode(opts)) {
        outputJson(sets);
        return;
      }
      if (sets.length === 0) {
        console.log('No cached embeddings.');
        return;
      }
      outputTable(
        ['dataset', 'model', 'rows', 'dims', 'created'],
        sets.map(s => [
          s.cache_key,
          s.model,
          String(s.row_count),
          s.dimensions === null ? '—' : String(s.dimensions),
          new Date(s.created_at).toISOString(),
        ]),
      );
    } finally {
      await db.close();
    }
  });
