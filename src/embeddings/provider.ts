import { config } from '../config.js';
import { embedBatched } from './client.js';
import type { Vector } from '../types/index.js';

/** Maps texts to vectors, one per input, in input order. */
export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[]): Promise<Vector[]>;
}

export function openAiProvider(
  model: string = config.embeddingModel,
  batchSize: number = config.embeddingBatchSize,
  onProgress?: (done: number, total: number) => void,
): EmbeddingProvider {
  return {
    model,
    embed: texts => embedBatched(texts, batchSize, model, onProgress),
  };
}
