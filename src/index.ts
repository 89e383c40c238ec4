#!/usr/bin/env node
import { program } from './cli/index.js';
import { config } from './config.js';
import { InputError } from './errors.js';
import { setLogLevel } from './logger.js';

setLogLevel(config.logLevel);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  // Stack traces only for unexpected errors, in debug mode
  if (!(err instanceof InputError) && config.logLevel === 'debug' && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exitCode = 1;
});
