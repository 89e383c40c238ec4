import { Command } from 'commander';
import { exportReport } from '../export/csv.js';
import { runValidation } from './pipeline.js';
import { withValidationOptions } from './helpers.js';
import type { ValidationFlags } from './helpers.js';

export const exportCommand = withValidationOptions(new Command('export'))
  .description('Write current relationships and suggestions as CSV files')
  .option('--out <dir>', 'Output directory', 'reports')
  .action(async (data: string | undefined, opts: ValidationFlags & { out: string }) => {
    const { results } = await runValidation(data, opts);
    const written = exportReport(results, opts.out);
    console.log(`Wrote ${results.length} relationships to ${written.current}`);
    console.log(`Wrote suggestions to ${written.suggestions}`);
  });
