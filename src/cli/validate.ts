import { Command, Option } from 'commander';
import { filterResults, summarizeResults } from '../validation/report.js';
import type { Validation } from '../types/index.js';
import { runValidation } from './pipeline.js';
import {
  formatPercent, formatScore, isJsonMode, outputJson, outputTable, parseThreshold, truncate, withValidationOptions,
} from './helpers.js';
import type { ValidationFlags } from './helpers.js';

interface ValidateOpts extends ValidationFlags {
  status?: Validation;
  minScore?: number;
  search?: string;
  json?: boolean;
}

export const validateCommand = withValidationOptions(new Command('validate'))
  .description('Score every parent-child relationship and flag weak ones')
  .addOption(new Option('--status <status>', 'Only show VALID or INVALID').choices(['VALID', 'INVALID']))
  .option('--min-score <n>', 'Only show relationships scoring at least this', parseThreshold)
  .option('--search <text>', 'Filter by root key, root name or parent name')
  .option('--json', 'Force JSON output')
  .action(async (data: string | undefined, opts: ValidateOpts) => {
    const { results } = await runValidation(data, opts);
    const shown = filterResults(results, { status: opts.status, minScore: opts.minScore, search: opts.search });

    if (isJsonMode(opts)) {
      outputJson(shown);
      return;
    }
    if (shown.length === 0) {
      console.log('No relationships match.');
      return;
    }
    outputTable(
      ['root_key', 'root', 'parent', 'score', 'status', 'best alternative'],
      shown.map(r => {
        const best = r.suggested_parents[0];
        return [
          r.root_key || '—',
          truncate(r.root_name, 30),
          truncate(r.current_parent.parent_name, 30),
          formatScore(r.current_parent.similarity_score),
          r.validation,
          best ? `${truncate(best.parent_name, 30)} (${formatScore(best.similarity_score)})` : '—',
        ];
      }),
    );
    const summary = summarizeResults(results);
    console.log(`\n${shown.length} of ${summary.total} relationships shown, ${summary.valid} valid (${formatPercent(summary.pass_rate)})`);
  });
