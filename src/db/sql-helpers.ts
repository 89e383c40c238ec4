import type { DbClient } from './driver.js';
import { bufferToFloat32, float32ToBuffer } from '../embeddings/vectors.js';
import type { Vector } from '../types/index.js';

/** Generate a NOW() timestamp as ISO string (dialect-agnostic) */
export function jsNow(): string {
  return new Date().toISOString();
}

/** Convert a vector to the storage format for the given dialect */
export function embeddingToSql(db: DbClient, vec: Vector): Buffer | string {
  if (db.dialect === 'postgres') {
    return `[${vec.join(',')}]`;
  }
  return float32ToBuffer(vec);
}

/** Convert a stored embedding back to a vector */
export function sqlToEmbedding(db: DbClient, raw: Buffer | string): Vector {
  if (db.dialect === 'postgres' || typeof raw === 'string') {
    const parsed: unknown = JSON.parse(typeof raw === 'string' ? raw : raw.toString());
    if (!Array.isArray(parsed) || !parsed.every((n): n is number => typeof n === 'number')) {
      throw new Error('Stored embedding is not a numeric array');
    }
    return parsed;
  }
  return bufferToFloat32(raw);
}
