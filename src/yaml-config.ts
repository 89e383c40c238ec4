import { parse } from 'yaml';
import { readFileSync, existsSync } from 'node:fs';
import { config } from './config.js';
import type { Config } from './config.js';
import type { ProjectConfig, ValidationOptions } from './types/index.js';

export function getConfigPath(): string {
  return config.projectConfig;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(doc: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = doc[name];
  if (value === undefined || value === null) return {};
  if (!isPlainObject(value)) {
    throw new Error(`Config "${name}" must be a mapping`);
  }
  return value;
}

function optionalNumber(
  obj: Record<string, unknown>,
  path: string,
  key: string,
  check: (n: number) => boolean,
  expected: string,
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !check(value)) {
    throw new Error(`Config "${path}.${key}" must be ${expected}, got ${JSON.stringify(value)}`);
  }
  return value;
}

const isThreshold = (n: number) => Number.isFinite(n) && n >= -1 && n <= 1;
const isCount = (n: number) => Number.isInteger(n) && n >= 0;

export function parseProjectConfig(raw: string): ProjectConfig {
  const doc: unknown = parse(raw) ?? {};
  if (!isPlainObject(doc)) {
    throw new Error('Config must be a YAML mapping');
  }

  const data = doc.data;
  if (data !== undefined && typeof data !== 'string') {
    throw new Error('Config "data" must be a path string');
  }

  const validation = section(doc, 'validation');
  const embeddings = section(doc, 'embeddings');
  const model = embeddings.model;
  if (model !== undefined && typeof model !== 'string') {
    throw new Error('Config "embeddings.model" must be a string');
  }

  return {
    data,
    validation: {
      validity_threshold: optionalNumber(validation, 'validation', 'validity_threshold', isThreshold, 'a number in [-1, 1]'),
      suggestion_threshold: optionalNumber(validation, 'validation', 'suggestion_threshold', isThreshold, 'a number in [-1, 1]'),
      top_n: optionalNumber(validation, 'validation', 'top_n', isCount, 'a non-negative integer'),
    },
    embeddings: {
      model,
      batch_size: optionalNumber(embeddings, 'embeddings', 'batch_size', n => isCount(n) && n > 0, 'a positive integer'),
    },
  };
}

/** Returns null when the file does not exist; the project file is optional. */
export function loadProjectConfig(path?: string): ProjectConfig | null {
  const configPath = path ?? getConfigPath();
  if (!existsSync(configPath)) return null;
  return parseProjectConfig(readFileSync(configPath, 'utf-8'));
}

export interface Settings extends ValidationOptions {
  dataPath: string;
  embeddingModel: string;
  embeddingBatchSize: number;
}

export type SettingsOverrides = Partial<Settings>;

/** Precedence: command-line flags, then the YAML project file, then environment defaults. */
export function resolveSettings(
  cli: SettingsOverrides,
  project: ProjectConfig | null,
  env: Pick<Config, 'dataPath' | 'validityThreshold' | 'suggestionThreshold' | 'topN' | 'embeddingModel' | 'embeddingBatchSize'> = config,
): Settings {
  return {
    dataPath: cli.dataPath ?? project?.data ?? env.dataPath,
    validityThreshold: cli.validityThreshold ?? project?.validation.validity_threshold ?? env.validityThreshold,
    suggestionThreshold: cli.suggestionThreshold ?? project?.validation.suggestion_threshold ?? env.suggestionThreshold,
    topN: cli.topN ?? project?.validation.top_n ?? env.topN,
    embeddingModel: cli.embeddingModel ?? project?.embeddings.model ?? env.embeddingModel,
    embeddingBatchSize: cli.embeddingBatchSize ?? project?.embeddings.batch_size ?? env.embeddingBatchSize,
  };
}
