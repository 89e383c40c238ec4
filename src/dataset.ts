import { createHash } from 'node:crypto';
import { existsSync, readFileSync } from 'node:fs';
import { InputError } from './errors.js';
import type { NodeRecord } from './types/index.js';

// Older exports spell the parent key field this way
const PARENT_KEY_ALIAS = 'parnet_key';

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asText(v: unknown): string {
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return '';
}

export function normalizeRecord(raw: Record<string, unknown>): NodeRecord {
  return {
    root_key: asText(raw.root_key),
    root_name: asText(raw.root_name),
    root_description: asText(raw.root_description),
    parent_key: asText(raw.parent_key) || asText(raw[PARENT_KEY_ALIAS]),
    parent_name: asText(raw.parent_name),
    parent_short_summary: asText(raw.parent_short_summary),
  };
}

export function parseDataset(raw: string, source = '<input>'): NodeRecord[] {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(`${source}: invalid JSON (${reason})`, { source });
  }

  if (!Array.isArray(doc)) {
    throw new InputError(`${source}: Input data must be a JSON array`, { source });
  }

  return doc.map((item: unknown, i) => {
    if (!isPlainObject(item)) {
      throw new InputError(`${source}: record ${i} is not an object`, { source, field: `[${i}]` });
    }
    return normalizeRecord(item);
  });
}

export function loadDataset(path: string): NodeRecord[] {
  if (!existsSync(path)) {
    throw new InputError(`Dataset file not found: ${path}`, { source: path });
  }
  return parseDataset(readFileSync(path, 'utf-8'), path);
}

/** Hash of every text that feeds the embedding table, in record order. */
export function datasetFingerprint(records: readonly NodeRecord[]): string {
  const hash = createHash('sha256');
  for (const r of records) {
    hash.update(r.root_description);
    hash.update('\u0000');
    hash.update(r.parent_short_summary);
    hash.update('\u0001');
  }
  return hash.digest('hex');
}
