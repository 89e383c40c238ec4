import { Command } from 'commander';
import { suggestionRows } from '../validation/report.js';
import { runValidation } from './pipeline.js';
import {
  formatScore, isJsonMode, outputJson, outputTable, parseCount, truncate, withValidationOptions,
} from './helpers.js';
import type { ValidationFlags } from './helpers.js';

interface SuggestOpts extends ValidationFlags {
  limit?: number;
  betterOnly?: boolean;
  json?: boolean;
}

export const suggestCommand = withValidationOptions(new Command('suggest'))
  .description('List alternative parents, best improvement first')
  .option('--limit <n>', 'Max rows to show', parseCount)
  .option('--better-only', 'Only suggestions that beat the current parent')
  .option('--json', 'Force JSON output')
  .action(async (data: string | undefined, opts: SuggestOpts) => {
    const { results } = await runValidation(data, opts);
    let rows = suggestionRows(results);
    if (opts.betterOnly) rows = rows.filter(r => r.Improvement > 0);
    if (opts.limit !== undefined) rows = rows.slice(0, opts.limit);

    if (isJsonMode(opts)) {
      outputJson(rows);
      return;
    }
    if (rows.length === 0) {
      console.log('No improvement suggestions available.');
      return;
    }
    outputTable(
      ['root', 'current parent', 'suggested parent', 'sim', 'improvement'],
      rows.map(r => [
        truncate(r['Root Name'], 30),
        truncate(r['Current Parent'], 30),
        truncate(r['Suggested Parent'], 30),
        formatScore(r['Similarity Score']),
        (r.Improvement > 0 ? '+' : '') + formatScore(r.Improvement),
      ]),
    );
    console.log(`\n${rows.length} suggestions`);
  });
