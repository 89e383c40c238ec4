import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { homedir } from 'node:os';

describe('config', () => {
  const origEnv = { ...process.env };

  after(() => {
    process.env = origEnv;
  });

  it('uses default values when no env vars set', async () => {
    for (const key of [
      'HIERVAL_DB_PATH', 'HIERVAL_VALIDITY_THRESHOLD', 'HIERVAL_SUGGESTION_THRESHOLD',
      'HIERVAL_TOP_N', 'HIERVAL_EMBEDDING_MODEL', 'LOG_LEVEL',
    ]) {
      delete process.env[key];
    }
    process.env.HIERVAL_ENV_FILE = '/nonexistent/.env';
    // Re-import to pick up fresh env
    const { config } = await import('../src/config.js');
    assert.ok(config.dbPath.endsWith('.hierval/cache.db'));
    assert.equal(config.validityThreshold, 0.65);
    assert.equal(config.suggestionThreshold, 0.65);
    assert.equal(config.topN, 3);
    assert.equal(config.embeddingModel, 'text-embedding-3-small');
    assert.equal(config.logLevel, 'info');
  });

  it('falls back to the default and warns on an invalid numeric env var', async () => {
    const { envNumber } = await import('../src/config.js');
    const { setLogSink } = await import('../src/logger.js');
    const lines: string[] = [];
    const previous = setLogSink(line => { lines.push(line); });
    try {
      assert.equal(envNumber('HIERVAL_VALIDITY_THRESHOLD', '0,6', 0.65, n => n >= -1 && n <= 1), 0.65);
      assert.equal(envNumber('HIERVAL_TOP_N', 'three', 3, Number.isInteger), 3);
    } finally {
      setLogSink(previous);
    }
    assert.equal(lines.length, 2);
    assert.match(lines[0], /HIERVAL_VALIDITY_THRESHOLD/);
    assert.match(lines[1], /HIERVAL_TOP_N/);
    assert.equal(JSON.parse(lines[0]).level, 'warn');
  });

  it('accepts valid numeric env vars and ignores blank ones', async () => {
    const { envNumber } = await import('../src/config.js');
    assert.equal(envNumber('HIERVAL_VALIDITY_THRESHOLD', '0.5', 0.65), 0.5);
    assert.equal(envNumber('HIERVAL_VALIDITY_THRESHOLD', ' ', 0.65), 0.65);
    assert.equal(envNumber('HIERVAL_TOP_N', undefined, 3), 3);
  });

  it('expands a leading tilde', async () => {
    const { expandTilde } = await import('../src/config.js');
    assert.equal(expandTilde('~/x/cache.db'), `${homedir()}/x/cache.db`);
    assert.equal(expandTilde('/abs/cache.db'), '/abs/cache.db');
  });
});
