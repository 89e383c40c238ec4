import type OpenAI from 'openai';
import { config } from '../config.js';
import type { Vector } from '../types/index.js';

let _client: OpenAI | null = null;

async function getClient(): Promise<OpenAI> {
  if (!_client) {
    if (!config.openaiApiKey) {
      throw new Error('HIERVAL_OPENAI_API_KEY is required for embeddings. Set it in .env or environment.');
    }
    const { default: OpenAIClient } = await import('openai');
    _client = new OpenAIClient({ apiKey: config.openaiApiKey });
  }
  return _client;
}

export async function embedTexts(texts: string[], model?: string): Promise<Vector[]> {
  const client = await getClient();
  const response = await client.embeddings.create({
    model: model ?? config.embeddingModel,
    input: texts,
  });
  // Sort by index to ensure order matches input
  return [...response.data]
    .sort((a, b) => a.index - b.index)
    .map(d => d.embedding);
}

export async function embedBatched(
  texts: string[],
  batchSize?: number,
  model?: string,
  onProgress?: (done: number, total: number) => void,
): Promise<Vector[]> {
  const size = batchSize ?? config.embeddingBatchSize;
  const results: Vector[] = [];
  for (let i = 0; i < texts.length; i += size) {
    const batch = texts.slice(i, i + size);
    const embeddings = await embedTexts(batch, model);
    results.push(...embeddings);
    onProgress?.(Math.min(i + size, texts.length), texts.length);
  }
  return results;
}
