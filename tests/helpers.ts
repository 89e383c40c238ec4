import { SqliteClient } from '../src/db/sqlite.js';
import { initSchema } from '../src/db/schema.js';
import type { DbClient } from '../src/db/driver.js';
import type { EmbeddingProvider } from '../src/embeddings/provider.js';
import type { NodeRecord, Vector } from '../src/types/index.js';

export async function createTestDb(): Promise<DbClient> {
  const db = new SqliteClient(':memory:');
  await initSchema(db);
  return db;
}

export function makeRecord(overrides: Partial<NodeRecord>): NodeRecord {
  return {
    root_key: '',
    root_name: '',
    root_description: '',
    parent_key: '',
    parent_name: '',
    parent_short_summary: '',
    ...overrides,
  };
}

/** Looks texts up in a fixed table; unknown texts embed to [0, 0, 1]. */
export class FakeProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];

  constructor(
    private readonly vectors: Record<string, Vector>,
    readonly model = 'fake-model',
  ) {}

  async embed(texts: string[]): Promise<Vector[]> {
    this.calls.push([...texts]);
    return texts.map(t => this.vectors[t] ?? [0, 0, 1]);
  }
}
