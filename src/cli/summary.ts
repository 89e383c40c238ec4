import { Command } from 'commander';
import { summarizeResults } from '../validation/report.js';
import { runValidation } from './pipeline.js';
import { formatPercent, formatScore, isJsonMode, outputJson, withValidationOptions } from './helpers.js';
import type { ValidationFlags } from './helpers.js';

export const summaryCommand = withValidationOptions(new Command('summary'))
  .description('Show validation summary metrics')
  .option('--json', 'Force JSON output')
  .action(async (data: string | undefined, opts: ValidationFlags & { json?: boolean }) => {
    const { settings, results } = await runValidation(data, opts);
    const s = summarizeResults(results);

    if (isJsonMode(opts)) {
      outputJson({ ...s, thresholds: {
        validity: settings.validityThreshold,
        suggestion: settings.suggestionThreshold,
        top_n: settings.topN,
      } });
      return;
    }
    console.log(`Total relationships:       ${s.total}`);
    console.log(`Valid relationships:       ${s.valid} (${formatPercent(s.pass_rate)})`);
    console.log(`Invalid relationships:     ${s.invalid}`);
    console.log(`Avg. current score:        ${formatScore(s.avg_current_score)}`);
    console.log(`Suggestions:               ${s.suggestion_count}`);
    console.log(`Avg. improvement possible: ${formatScore(s.avg_improvement)}`);
    console.log(`Nodes with a better fit:   ${s.better_fit_count}`);
    console.log(`Thresholds: validity ${settings.validityThreshold}, suggestion ${settings.suggestionThreshold}, top ${settings.topN}`);
  });
