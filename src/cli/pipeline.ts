import { config } from '../config.js';
import { loadDataset } from '../dataset.js';
import { openCacheDb } from '../db/driver.js';
import type { DbClient } from '../db/driver.js';
import { initSchema } from '../db/schema.js';
import { cacheKeyFor, getOrCreateEmbeddings } from '../embeddings/cache.js';
import { openAiProvider } from '../embeddings/provider.js';
import type { EmbeddingProvider } from '../embeddings/provider.js';
import { validateRelationships } from '../validation/validator.js';
import { loadProjectConfig, resolveSettings } from '../yaml-config.js';
import type { Settings } from '../yaml-config.js';
import type { EmbeddingTable, NodeRecord, ValidationResult } from '../types/index.js';
import type { ValidationFlags } from './helpers.js';

export interface PipelineDeps {
  /** Left open for the caller when given; otherwise opened and closed here. */
  db?: DbClient;
  provider?: EmbeddingProvider;
}

export interface LoadedDataset {
  settings: Settings;
  records: NodeRecord[];
  embeddings: EmbeddingTable;
}

function progressToStderr(done: number, total: number): void {
  if (!process.stderr.isTTY) return;
  process.stderr.write(`\r  ${done}/${total} texts embedded`);
  if (done === total) process.stderr.write('\n');
}

export function settingsFrom(dataArg: string | undefined, flags: ValidationFlags): Settings {
  return resolveSettings(
    {
      dataPath: dataArg,
      validityThreshold: flags.validityThreshold,
      suggestionThreshold: flags.suggestionThreshold,
      topN: flags.top,
    },
    loadProjectConfig(flags.config),
  );
}

export async function loadEmbeddedDataset(
  dataArg: string | undefined,
  flags: ValidationFlags & { force?: boolean },
  deps: PipelineDeps = {},
): Promise<LoadedDataset> {
  const settings = settingsFrom(dataArg, flags);
  const records = loadDataset(settings.dataPath);

  const db = deps.db ?? await openCacheDb(config);
  try {
    if (deps.db) await initSchema(db);
    const provider = deps.provider
      ?? openAiProvider(settings.embeddingModel, settings.embeddingBatchSize, progressToStderr);
    const embeddings = await getOrCreateEmbeddings(
      db,
      cacheKeyFor(settings.dataPath),
      records,
      provider,
      { force: flags.force },
    );
    return { settings, records, embeddings };
  } finally {
    if (!deps.db) await db.close();
  }
}

export async function runValidation(
  dataArg: string | undefined,
  flags: ValidationFlags,
  deps: PipelineDeps = {},
): Promise<LoadedDataset & { results: ValidationResult[] }> {
  const loaded = await loadEmbeddedDataset(dataArg, flags, deps);
  const results = validateRelationships(loaded.records, loaded.embeddings, loaded.settings);
  return { ...loaded, results };
}
