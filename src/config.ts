import { config as dotenvLoad } from 'dotenv';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { log } from './logger.js';
import type { LogLevel } from './logger.js';

export function expandTilde(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return homedir() + p.slice(1);
  }
  return p;
}

const envFile = process.env.HIERVAL_ENV_FILE ?? join(process.cwd(), '.env');
if (existsSync(envFile)) {
  dotenvLoad({ path: envFile, quiet: true });
}

const DEFAULT_DB_PATH = join(homedir(), '.hierval', 'cache.db');

/**
 * Read a numeric env var. Unparseable or out-of-range values fall back to the
 * default with a warning naming the variable.
 */
export function envNumber(
  name: string,
  raw: string | undefined,
  fallback: number,
  check: (n: number) => boolean = Number.isFinite,
): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (check(n)) return n;
  log('warn', `Ignoring invalid ${name}, using default`, { value: raw, default: fallback });
  return fallback;
}

const isThreshold = (n: number) => Number.isFinite(n) && n >= -1 && n <= 1;
const isCount = (n: number) => Number.isSafeInteger(n) && n >= 0;

function parseLogLevel(raw: string | undefined): LogLevel {
  switch (raw) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return raw;
    default:
      return 'info';
  }
}

export const config = {
  dataPath:             expandTilde(process.env.HIERVAL_DATA_PATH ?? join('data', 'input.json')),
  dbUrl:                process.env.HIERVAL_DB_URL,
  dbPath:               expandTilde(process.env.HIERVAL_DB_PATH ?? DEFAULT_DB_PATH),
  validityThreshold:    envNumber('HIERVAL_VALIDITY_THRESHOLD', process.env.HIERVAL_VALIDITY_THRESHOLD, 0.65, isThreshold),
  suggestionThreshold:  envNumber('HIERVAL_SUGGESTION_THRESHOLD', process.env.HIERVAL_SUGGESTION_THRESHOLD, 0.65, isThreshold),
  topN:                 envNumber('HIERVAL_TOP_N', process.env.HIERVAL_TOP_N, 3, isCount),
  projectConfig:        expandTilde(process.env.HIERVAL_CONFIG ?? join(process.cwd(), 'hierval.yaml')),
  openaiApiKey:         process.env.HIERVAL_OPENAI_API_KEY,
  embeddingModel:       process.env.HIERVAL_EMBEDDING_MODEL ?? 'text-embedding-3-small',
  embeddingBatchSize:   envNumber('HIERVAL_EMBEDDING_BATCH_SIZE', process.env.HIERVAL_EMBEDDING_BATCH_SIZE, 100, n => isCount(n) && n > 0),
  logLevel:             parseLogLevel(process.env.LOG_LEVEL),
} as const;

export type Config = typeof config;
