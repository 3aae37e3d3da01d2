import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { openDatabase } from '../db/database.js';
import { InvalidInputError } from '../errors.js';
import { FactStore } from './fact-store.js';
import { cleanSeedCell, loadSeedFile, loadSeedRows, parseSeedCsv } from './seed.js';

describe('cleanSeedCell', () => {
  it('strips wrapping quotes and collapses whitespace', () => {
    assert.equal(cleanSeedCell("  'hello   world'  "), 'hello world');
    assert.equal(cleanSeedCell('“Carlos”'), 'Carlos');
  });

  it('turns pipes into list separators', () => {
    assert.equal(cleanSeedCell('blue|green'), 'blue; green');
  });

  it('keeps unbalanced quotes', () => {
    assert.equal(cleanSeedCell('"open'), '"open');
  });
});

describe('parseSeedCsv', () => {
  it('skips the header, short rows and empty cells', () => {
    const csv = [
      'key,value',
      '"name","Carlos"',
      '“color”,blue|green',
      '',
      'short',
      ',empty',
    ].join('\n');
    assert.deepEqual(parseSeedCsv(csv), [
      { key: 'name', value: 'Carlos' },
      { key: 'color', value: 'blue; green' },
    ]);
  });

  it('keeps commas inside quoted values', () => {
    assert.deepEqual(parseSeedCsv('address,"1 Main St, Springfield"\n'), [
      { key: 'address', value: '1 Main St, Springfield' },
    ]);
  });
});

describe('loadSeedRows', () => {
  it('loads rows as pinned with the seed score and prunes non-pinned', () => {
    let now = 1;
    const store = new FactStore(openDatabase(':memory:'), { clock: () => now++ });
    store.addNonPinned('a', '1');
    store.addNonPinned('b', '2');
    store.addNonPinned('c', '3');

    const result = loadSeedRows(store, [{ key: 'name', value: 'Carlos' }], { keep: 1 });
    assert.deepEqual(result, { loaded: 1, pruned: 2 });
    assert.deepEqual(store.getPinned().map((m) => [m.key, m.score]), [['name', 3]]);
    assert.deepEqual(store.getNonPinned().map((m) => m.key), ['c']);
  });

  it('clears every memory first on reset', () => {
    const store = new FactStore(openDatabase(':memory:'));
    store.pin('old', 'fact');
    store.addNonPinned('a', '1');
    const result = loadSeedRows(store, [{ key: 'name', value: 'Carlos' }], { keep: 10, reset: true });
    assert.deepEqual(result, { loaded: 1, pruned: 0 });
    assert.deepEqual(store.getMemories().map((m) => m.key), ['name']);
  });
});

describe('loadSeedFile', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seed-test-'));

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a CSV file from disk', () => {
    const file = path.join(dir, 'memories.csv');
    fs.writeFileSync(file, 'key,value\nname,Carlos\nbirthday,10/13/1969\n');
    const store = new FactStore(openDatabase(':memory:'));
    assert.deepEqual(loadSeedFile(store, file, { keep: 0 }), { loaded: 2, pruned: 0 });
    assert.deepEqual(store.getPinned().map((m) => m.key), ['name', 'birthday']);
  });

  it('rejects a missing file', () => {
    const store = new FactStore(openDatabase(':memory:'));
    assert.throws(() => loadSeedFile(store, path.join(dir, 'missing.csv'), { keep: 0 }), InvalidInputError);
  });
});
