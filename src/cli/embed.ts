import { Command } from 'commander';
import { loadEmbeddedDataset } from './pipeline.js';
import type { ValidationFlags } from './helpers.js';

interface EmbedOpts extends ValidationFlags {
  force?: boolean;
}

export const embedCommand = new Command('embed')
  .description('Generate and cache embeddings for a dataset')
  .argument('[data]', 'Path to the dataset JSON')
  .option('--config <path>', 'Path to hierval.yaml')
  .option('--force', 'Re-embed even if a cached table exists')
  .action(async (data: string | undefined, opts: EmbedOpts) => {
    const { settings, records, embeddings } = await loadEmbeddedDataset(data, opts);
    const missing = embeddings.root.filter(v => v === null).length
      + embeddings.parent.filter(v => v === null).length;
    console.log(`${settings.dataPath}: ${records.length} records embedded with ${settings.embeddingModel}.`);
    if (missing > 0) {
      console.log(`${missing} empty texts have no embedding and will score 0.`);
    }
  });
