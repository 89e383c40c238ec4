import { log } from '../logger.js';
import { similarityScore } from './vectors.js';
import type { Vector } from '../types/index.js';

export interface RankCandidate<P> {
  id: string | number;
  vector: Vector | null;
  payload: P;
}

export interface RankedCandidate<P> {
  score: number;
  id: string | number;
  payload: P;
}

export interface RankOptions {
  topN: number;
  threshold: number;
  onError?: (id: string | number, err: unknown) => void;
}

function warnCandidate(id: string | number, err: unknown): void {
  log('warn', 'Similarity computation failed, candidate skipped', {
    candidate: id,
    error: err instanceof Error ? err.message : String(err),
  });
}

export function rankCandidates<P>(
  target: Vector | null,
  candidates: readonly RankCandidate<P>[],
  { topN, threshold, onError = warnCandidate }: RankOptions,
): RankedCandidate<P>[] {
  if (topN <= 0) return [];

  const scored: RankedCandidate<P>[] = [];
  for (const c of candidates) {
    let score: number;
    try {
      score = similarityScore(target, c.vector);
    } catch (err) {
      onError(c.id, err);
      continue;
    }
    if (score >= threshold) {
      scored.push({ score, id: c.id, payload: c.payload });
    }
  }

  // Array.prototype.sort is stable, so equal scores keep candidate order
  return scored
    .sort((a, b) => b.score - a.score)
    .slice(0, topN);
}
