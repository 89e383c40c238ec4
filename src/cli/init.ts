import { Command } from 'commander';
import { existsSync, writeFileSync } from 'node:fs';
import { config } from '../config.js';
import { dialectFor, openCacheDb } from '../db/driver.js';

const SAMPLE_CONFIG = `# hierval project settings. Command-line flags take precedence.
data: ${config.dataPath}
validation:
  validity_threshold: ${config.validityThreshold}
  suggestion_threshold: ${config.suggestionThreshold}
  top_n: ${config.topN}
embeddings:
  model: ${config.embeddingModel}
  batch_size: ${config.embeddingBatchSize}
`;

export const initCommand = new Command('init')
  .description('Create the embedding cache and a starter hierval.yaml')
  .option('--config <path>', 'Where to write the project file', config.projectConfig)
  .action(async (opts: { config: string }) => {
    const db = await openCacheDb(config);
    await db.close();
    console.log(dialectFor(config) === 'postgres' ? 'Embedding cache tables created.' : `Embedding cache created at ${config.dbPath}`);

    if (existsSync(opts.config)) {
      console.log(`${opts.config} already exists, left unchanged.`);
      return;
    }
    writeFileSync(opts.config, SAMPLE_CONFIG, 'utf-8');
    console.log(`Wrote ${opts.config}. Run \`hierval validate\` to check your hierarchy.`);
  });
