import { Command } from 'commander';
import { createRequire } from 'node:module';
const { version } = createRequire(import.meta.url)('../../package.json') as { version: string };

import { initCommand } from './init.js';
import { embedCommand } from './embed.js';
import { validateCommand } from './validate.js';
import { suggestCommand } from './suggest.js';
import { summaryCommand } from './summary.js';
import { exportCommand } from './export.js';
import { cacheCommand } from './cache.js';

export const program = new Command();
program
  .name('hierval')
  .description('Hierarchy relationship validator: embedding similarity checks and better-parent suggestions')
  .version(version);

program.addCommand(initCommand);
program.addCommand(embedCommand);
program.addCommand(validateCommand);
program.addCommand(suggestCommand);
program.addCommand(summaryCommand);
program.addCommand(exportCommand);
program.addCommand(cacheCommand);
