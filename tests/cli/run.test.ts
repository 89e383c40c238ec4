import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { runValidation } from '../../src/cli/pipeline.js';
import { parseCount, parseThreshold } from '../../src/cli/helpers.js';
import { listEmbeddingSets } from '../../src/db/embeddings.js';
import { createTestDb, FakeProvider } from '../helpers.js';
import type { DbClient } from '../../src/db/driver.js';

const DATASET = [
  { root_key: 'A', root_name: 'Alpha', root_description: 'alpha text', parnet_key: 'B', parent_name: 'Beta', parent_short_summary: 'beta summary' },
  { root_key: 'B', root_name: 'Beta', root_description: 'beta text', parnet_key: 'C', parent_name: 'Gamma', parent_short_summary: 'gamma summary' },
  { root_key: 'C', root_name: 'Gamma', root_description: 'gamma text' },
];

const VECTORS = {
  'alpha text': [1, 0],
  'beta text': [0.6, 0.8],
  'beta summary': [1, 0],
  'gamma summary': [0, 1],
};

describe('runValidation', () => {
  let dir: string;
  let dataPath: string;
  let db: DbClient;

  before(async () => {
    dir = mkdtempSync(join(tmpdir(), 'hierval-run-'));
    dataPath = join(dir, 'input.json');
    writeFileSync(dataPath, JSON.stringify(DATASET));
    db = await createTestDb();
  });

  after(async () => {
    await db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads, embeds, caches and validates a dataset', async () => {
    const provider = new FakeProvider(VECTORS);
    const { results, settings } = await runValidation(
      dataPath,
      { config: join(dir, 'missing.yaml'), validityThreshold: 0.7, suggestionThreshold: 0.5, top: 2 },
      { db, provider },
    );

    assert.equal(settings.topN, 2);
    assert.equal(results.length, 2);

    const [a, b] = results;
    assert.equal(a.current_parent.parent_key, 'B');
    assert.equal(a.current_parent.similarity_score, 1);
    assert.equal(a.validation, 'VALID');
    // Gamma's summary is orthogonal to alpha text
    assert.deepEqual(a.suggested_parents, []);

    assert.equal(b.current_parent.parent_key, 'C');
    assert.ok(Math.abs(b.current_parent.similarity_score - 0.8) < 1e-6);
    assert.equal(b.validation, 'VALID');
    assert.equal(b.suggested_parents.length, 1);
    assert.equal(b.suggested_parents[0].parent_name, 'Beta');
    assert.ok(Math.abs(b.suggested_parents[0].improvement - (0.6 - 0.8)) < 1e-6);

    const sets = await listEmbeddingSets(db);
    assert.equal(sets.length, 1);
    assert.equal(sets[0].cache_key, dataPath);
  });

  it('reads thresholds from the project file when no flags are given', async () => {
    const configPath = join(dir, 'hierval.yaml');
    writeFileSync(configPath, 'validation:\n  validity_threshold: 0.9\n  suggestion_threshold: 0.5\n  top_n: 0\n');
    const provider = new FakeProvider(VECTORS);
    const { results } = await runValidation(dataPath, { config: configPath }, { db, provider });

    assert.deepEqual(results.map(r => r.validation), ['VALID', 'INVALID']);
    assert.ok(results.every(r => r.suggested_parents.length === 0));
    // Same texts and model, so the cached table is reused
    assert.equal(provider.calls.length, 0);
  });

  it('fails on a dataset that is not an array', async () => {
    const badPath = join(dir, 'bad.json');
    writeFileSync(badPath, '{"root_key": "x"}');
    await assert.rejects(
      runValidation(badPath, { config: join(dir, 'missing.yaml') }, { db, provider: new FakeProvider(VECTORS) }),
      /bad\.json: Input data must be a JSON array/,
    );
  });
});

describe('option parsers', () => {
  it('parseThreshold accepts values in [-1, 1]', () => {
    assert.equal(parseThreshold('0.65'), 0.65);
    assert.equal(parseThreshold('-1'), -1);
    assert.throws(() => parseThreshold('1.2'), InvalidArgumentError);
    assert.throws(() => parseThreshold('abc'), InvalidArgumentError);
  });

  it('parseCount accepts non-negative integers', () => {
    assert.equal(parseCount('0'), 0);
    assert.equal(parseCount('3'), 3);
    assert.throws(() => parseCount('-1'), InvalidArgumentError);
    assert.throws(() => parseCount('2.5'), InvalidArgumentError);
  });
});
