export interface NodeRecord {
  root_key: string;
  root_name: string;
  root_description: string;
  parent_key: string;
  parent_name: string;
  parent_short_summary: string;
}

export type Vector = number[];

/** Positionally aligned with the record list: root[i] and parent[i] belong to record i. */
export interface EmbeddingTable {
  root: (Vector | null)[];
  parent: (Vector | null)[];
}

export type Validation = 'VALID' | 'INVALID';
export type ValidationStatus = 'PASS' | 'FAIL';

export interface ParentRef {
  parent_key: string;
  parent_name: string;
}

export interface CurrentParent extends ParentRef {
  similarity_score: number;
}

export interface SuggestedParent extends ParentRef {
  similarity_score: number;
  improvement: number;
}

export interface ValidationResult {
  root_key: string;
  root_name: string;
  current_parent: CurrentParent;
  suggested_parents: SuggestedParent[];
  validation: Validation;
  validation_status: ValidationStatus;
}

export interface ValidationOptions {
  validityThreshold: number;
  suggestionThreshold: number;
  topN: number;
}

export interface ProjectConfig {
  data?: string;
  validation: Partial<{
    validity_threshold: number;
    suggestion_threshold: number;
    top_n: number;
  }>;
  embeddings: Partial<{
    model: string;
    batch_size: number;
  }>;
}
