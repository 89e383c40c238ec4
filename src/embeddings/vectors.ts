import { VectorError } from '../errors.js';
import type { Vector } from '../types/index.js';

export function cosineSimilarity(a: Vector, b: Vector): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  // Rounding can push |dot / denom| just past 1
  return Math.min(1, Math.max(-1, dot / denom));
}

/**
 * Similarity of two optional vectors. A missing vector scores 0; a malformed
 * pair throws VectorError.
 */
export function similarityScore(a: Vector | null | undefined, b: Vector | null | undefined): number {
  if (a == null || b == null) return 0;
  if (a.length !== b.length) {
    throw new VectorError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  for (let i = 0; i < a.length; i++) {
    if (!Number.isFinite(a[i]) || !Number.isFinite(b[i])) {
      throw new VectorError(`Non-finite vector component at position ${i}`);
    }
  }
  return cosineSimilarity(a, b);
}

export function float32ToBuffer(arr: Vector): Buffer {
  const buf = Buffer.alloc(arr.length * 4);
  for (let i = 0; i < arr.length; i++) {
    buf.writeFloatLE(arr[i], i * 4);
  }
  return buf;
}

export function bufferToFloat32(buf: Buffer): Vector {
  const arr: Vector = [];
  for (let i = 0; i < buf.length; i += 4) {
    arr.push(buf.readFloatLE(i));
  }
  return arr;
}
