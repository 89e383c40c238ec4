import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseDataset, loadDataset, datasetFingerprint } from '../src/dataset.js';
import { InputError } from '../src/errors.js';

describe('parseDataset', () => {
  it('normalizes records and fills absent fields with empty strings', () => {
    const records = parseDataset(JSON.stringify([
      { root_key: 'r1', root_name: 'Root', root_description: 'desc', parent_key: 'p1', parent_name: 'P', parent_short_summary: 'sum' },
      { root_key: 42, root_name: null },
    ]));
    assert.deepEqual(records[0], {
      root_key: 'r1', root_name: 'Root', root_description: 'desc',
      parent_key: 'p1', parent_name: 'P', parent_short_summary: 'sum',
    });
    assert.deepEqual(records[1], {
      root_key: '42', root_name: '', root_description: '',
      parent_key: '', parent_name: '', parent_short_summary: '',
    });
  });

  it('accepts the misspelled parnet_key field as parent_key', () => {
    const [r] = parseDataset('[{"parnet_key": "p9", "parent_name": "Nine"}]');
    assert.equal(r.parent_key, 'p9');
  });

  it('prefers parent_key when both spellings are present', () => {
    const [r] = parseDataset('[{"parent_key": "p1", "parnet_key": "p9"}]');
    assert.equal(r.parent_key, 'p1');
  });

  it('rejects a document that is not an array', () => {
    assert.throws(
      () => parseDataset('{"root_key": "x"}', 'data/input.json'),
      (err: unknown) => err instanceof InputError
        && err.message === 'data/input.json: Input data must be a JSON array'
        && err.source === 'data/input.json',
    );
  });

  it('rejects invalid JSON naming the source', () => {
    assert.throws(() => parseDataset('[{', 'broken.json'), /^InputError: broken\.json: invalid JSON/);
  });

  it('rejects a non-object record naming its index', () => {
    assert.throws(
      () => parseDataset('[{}, "oops"]', 'd.json'),
      (err: unknown) => err instanceof InputError && err.field === '[1]',
    );
  });

  it('accepts an empty array', () => {
    assert.deepEqual(parseDataset('[]'), []);
  });
});

describe('loadDataset', () => {
  it('reads records from a file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'hierval-data-'));
    try {
      const path = join(dir, 'input.json');
      writeFileSync(path, '[{"root_key": "a", "parent_name": "B"}]');
      const records = loadDataset(path);
      assert.equal(records.length, 1);
      assert.equal(records[0].parent_name, 'B');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('throws InputError naming a missing file', () => {
    assert.throws(() => loadDataset('/nonexistent/input.json'), /Dataset file not found: \/nonexistent\/input\.json/);
  });
});

describe('datasetFingerprint', () => {
  const records = parseDataset('[{"root_description": "a", "parent_short_summary": "b"}]');

  it('is stable for the same texts', () => {
    assert.equal(datasetFingerprint(records), datasetFingerprint(parseDataset('[{"root_description": "a", "parent_short_summary": "b", "root_name": "ignored"}]')));
  });

  it('changes when an embedded text changes', () => {
    assert.notEqual(datasetFingerprint(records), datasetFingerprint(parseDataset('[{"root_description": "ab", "parent_short_summary": ""}]')));
  });
});
