import { config } from '../config.js';
import { InputError } from '../errors.js';
import { log } from '../logger.js';
import { rankCandidates } from '../embeddings/ranking.js';
import type { RankCandidate } from '../embeddings/ranking.js';
import { similarityScore } from '../embeddings/vectors.js';
import type {
  EmbeddingTable,
  NodeRecord,
  ParentRef,
  ValidationOptions,
  ValidationResult,
} from '../types/index.js';

export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  validityThreshold: config.validityThreshold,
  suggestionThreshold: config.suggestionThreshold,
  topN: config.topN,
};

function hasParent(record: NodeRecord): boolean {
  return record.parent_name !== '';
}

function checkAlignment(records: readonly NodeRecord[], embeddings: EmbeddingTable): void {
  for (const kind of ['root', 'parent'] as const) {
    if (embeddings[kind].length !== records.length) {
      throw new InputError(
        `Embedding table has ${embeddings[kind].length} ${kind} vectors for ${records.length} records. Re-run: hierval embed --force`,
        { field: `embeddings.${kind}` },
      );
    }
  }
}

/**
 * Scores each record against its declared parent and ranks every other
 * parent-bearing record as an alternative. Records without a parent are
 * skipped; a missing vector scores 0.
 */
export function validateRelationships(
  records: readonly NodeRecord[],
  embeddings: EmbeddingTable,
  options: Partial<ValidationOptions> = {},
): ValidationResult[] {
  const validityThreshold = options.validityThreshold ?? DEFAULT_VALIDATION_OPTIONS.validityThreshold;
  const suggestionThreshold = options.suggestionThreshold ?? DEFAULT_VALIDATION_OPTIONS.suggestionThreshold;
  const topN = options.topN ?? DEFAULT_VALIDATION_OPTIONS.topN;
  checkAlignment(records, embeddings);

  // Candidate vectors are the parent-role embeddings of parent-bearing records
  const pool: RankCandidate<ParentRef>[] = [];
  records.forEach((r, j) => {
    if (!hasParent(r)) return;
    pool.push({
      id: j,
      vector: embeddings.parent[j],
      payload: { parent_key: r.parent_key, parent_name: r.parent_name },
    });
  });

  const results: ValidationResult[] = [];
  records.forEach((item, i) => {
    if (!hasParent(item)) return;

    const rootVec = embeddings.root[i];
    let current = 0;
    try {
      current = similarityScore(rootVec, embeddings.parent[i]);
    } catch (err) {
      // Malformed vectors on the record itself leave it at 0 (INVALID)
      log('warn', 'Current relationship could not be scored', {
        root_key: item.root_key,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const candidates = pool.filter(c => c.id !== i);
    const suggestions = rankCandidates(rootVec, candidates, { topN, threshold: suggestionThreshold });

    const valid = current >= validityThreshold;
    results.push({
      root_key: item.root_key,
      root_name: item.root_name,
      current_parent: {
        parent_key: item.parent_key,
        parent_name: item.parent_name,
        similarity_score: current,
      },
      suggested_parents: suggestions.map(s => ({
        parent_key: s.payload.parent_key,
        parent_name: s.payload.parent_name,
        similarity_score: s.score,
        improvement: s.score - current,
      })),
      validation: valid ? 'VALID' : 'INVALID',
      validation_status: valid ? 'PASS' : 'FAIL',
    });
  });

  return results;
}
