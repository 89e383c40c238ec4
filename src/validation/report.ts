import type { Validation, ValidationResult } from '../types/index.js';

export interface ValidationSummary {
  total: number;
  valid: number;
  invalid: number;
  pass_rate: number;
  avg_current_score: number;
  suggestion_count: number;
  avg_improvement: number;
  better_fit_count: number;
}

export function summarizeResults(results: readonly ValidationResult[]): ValidationSummary {
  const total = results.length;
  const valid = results.filter(r => r.validation === 'VALID').length;
  const improvements = results.flatMap(r => r.suggested_parents.map(s => s.improvement));
  const scoreSum = results.reduce((sum, r) => sum + r.current_parent.similarity_score, 0);

  return {
    total,
    valid,
    invalid: total - valid,
    pass_rate: total === 0 ? 0 : valid / total,
    avg_current_score: total === 0 ? 0 : scoreSum / total,
    suggestion_count: improvements.length,
    avg_improvement: improvements.length === 0
      ? 0
      : improvements.reduce((a, b) => a + b, 0) / improvements.length,
    better_fit_count: results.filter(r => r.suggested_parents.some(s => s.improvement > 0)).length,
  };
}

export interface ResultFilter {
  status?: Validation;
  minScore?: number;
  search?: string;
}

export function filterResults(results: readonly ValidationResult[], filter: ResultFilter): ValidationResult[] {
  const needle = filter.search?.trim().toLowerCase();
  return results.filter(r => {
    if (filter.status && r.validation !== filter.status) return false;
    if (filter.minScore !== undefined && r.current_parent.similarity_score < filter.minScore) return false;
    if (needle) {
      const haystack = [r.root_key, r.root_name, r.current_parent.parent_name].join('\n').toLowerCase();
      if (!haystack.includes(needle)) return false;
    }
    return true;
  });
}

export interface CurrentRelationshipRow {
  'Root Key': string;
  'Root Name': string;
  'Current Parent': string;
  'Score': number;
  'Status': Validation;
}

export interface SuggestionRow {
  'Root Key': string;
  'Root Name': string;
  'Current Parent': string;
  'Suggested Parent': string;
  'Similarity Score': number;
  'Improvement': number;
}

export function currentRelationshipRows(results: readonly ValidationResult[]): CurrentRelationshipRow[] {
  return results
    .map(r => ({
      'Root Key': r.root_key,
      'Root Name': r.root_name,
      'Current Parent': r.current_parent.parent_name,
      'Score': r.current_parent.similarity_score,
      'Status': r.validation,
    }))
    .sort((a, b) => b.Score - a.Score);
}

export function suggestionRows(results: readonly ValidationResult[]): SuggestionRow[] {
  return results
    .flatMap(r => r.suggested_parents.map(s => ({
      'Root Key': r.root_key,
      'Root Name': r.root_name,
      'Current Parent': r.current_parent.parent_name,
      'Suggested Parent': s.parent_name,
      'Similarity Score': s.similarity_score,
      'Improvement': s.improvement,
    })))
    .sort((a, b) => b.Improvement - a.Improvement);
}
