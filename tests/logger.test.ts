import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { log, setLogLevel, setLogSink } from '../src/logger.js';
import type { LogSink } from '../src/logger.js';

describe('logger', () => {
  let restore: LogSink | undefined;

  afterEach(() => {
    if (restore) setLogSink(restore);
    setLogLevel('info');
  });

  it('writes JSON lines with level, message and data', () => {
    const lines: string[] = [];
    restore = setLogSink(line => { lines.push(line); });
    log('warn', 'candidate skipped', { candidate: 3 });
    assert.equal(lines.length, 1);
    const entry = JSON.parse(lines[0]);
    assert.equal(entry.level, 'warn');
    assert.equal(entry.msg, 'candidate skipped');
    assert.equal(entry.candidate, 3);
    assert.equal(typeof entry.ts, 'string');
  });

  it('drops entries below the configured level', () => {
    const lines: string[] = [];
    restore = setLogSink(line => { lines.push(line); });
    setLogLevel('warn');
    log('info', 'hidden');
    log('debug', 'hidden');
    log('error', 'shown');
    assert.equal(lines.length, 1);
    assert.equal(JSON.parse(lines[0]).msg, 'shown');
  });
});
