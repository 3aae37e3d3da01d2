import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { openDatabase, type Db } from '../db/database.js';
import { InvalidInputError } from '../errors.js';
import { TurnLedger } from './turn-ledger.js';

describe('TurnLedger', () => {
  let db: Db;
  let now: number;
  let ledger: TurnLedger;

  beforeEach(() => {
    db = openDatabase(':memory:');
    now = 100;
    ledger = new TurnLedger(db, () => now++);
  });

  it('creates the session on the first turn', () => {
    const turn = ledger.addTurn('s1', 'user', 'hello', { asrMs: 120, llmMs: 300, ttsMs: 80 });
    assert.deepEqual(turn, {
      id: 1,
      sessionId: 's1',
      role: 'user',
      text: 'hello',
      asrLatencyMs: 120,
      llmLatencyMs: 300,
      ttsLatencyMs: 80,
      totalLatencyMs: 500,
      metadata: {},
      createdAt: 100,
    });
    assert.deepEqual(ledger.getSession('s1'), { id: 's1', startedAt: 100, metadata: {} });
  });

  it('returns turns in insertion order', () => {
    ledger.addTurn('s1', 'user', 'one');
    ledger.addTurn('s1', 'assistant', 'two');
    ledger.addTurn('s2', 'user', 'other');
    ledger.addTurn('s1', 'user', 'three');
    assert.deepEqual(ledger.getSessionTurns('s1').map((t) => t.text), ['one', 'two', 'three']);
    assert.deepEqual(ledger.getSessionTurns('s2').map((t) => t.role), ['user']);
    assert.deepEqual(ledger.getSessionTurns('nope'), []);
  });

  it('returns the most recent turns oldest first', () => {
    for (const text of ['a', 'b', 'c', 'd']) ledger.addTurn('s1', 'user', text);
    assert.deepEqual(ledger.getRecentTurns('s1', 2).map((t) => t.text), ['c', 'd']);
    assert.deepEqual(ledger.getRecentTurns('s1', 0), []);
    assert.throws(() => ledger.getRecentTurns('s1', -1), InvalidInputError);
  });

  it('rounds latencies and keeps an explicit total', () => {
    const turn = ledger.addTurn('s1', 'assistant', 'ok', { llmMs: 12.6, totalMs: 40.2 });
    assert.equal(turn.asrLatencyMs, 0);
    assert.equal(turn.llmLatencyMs, 13);
    assert.equal(turn.totalLatencyMs, 40);
    const [stored] = ledger.getSessionTurns('s1');
    assert.equal(stored?.llmLatencyMs, 13);
    assert.equal(stored?.totalLatencyMs, 40);
  });

  it('rejects bad latencies and empty session ids without writing', () => {
    assert.throws(() => ledger.addTurn('s1', 'user', 'x', { asrMs: -1 }), InvalidInputError);
    assert.throws(() => ledger.addTurn('s1', 'user', 'x', { ttsMs: Number.NaN }), /tts latency/);
    assert.throws(() => ledger.addTurn('  ', 'user', 'x'), InvalidInputError);
    assert.deepEqual(ledger.getSessionTurns('s1'), []);
    assert.equal(ledger.getSession('s1'), null);
  });

  it('stores turn metadata', () => {
    ledger.addTurn('s1', 'user', 'hi', {}, { device: 'kitchen', confidence: 0.9 });
    assert.deepEqual(ledger.getSessionTurns('s1')[0]?.metadata, { device: 'kitchen', confidence: 0.9 });
  });

  it('startSession replaces metadata but keeps the start time', () => {
    assert.equal(ledger.startSession('s1', { locale: 'en-US' }), 's1');
    ledger.startSession('s1', { locale: 'es-MX' });
    assert.deepEqual(ledger.getSession('s1'), { id: 's1', startedAt: 100, metadata: { locale: 'es-MX' } });
  });

  it('startSession generates an id when none is given', () => {
    const id = ledger.startSession();
    assert.match(id, /^[0-9a-f-]{36}$/);
    assert.notEqual(ledger.getSession(id), null);
  });

  it('reports unreadable metadata as empty', () => {
    db.prepare("INSERT INTO sessions (id, started_at, metadata_json) VALUES ('s9', 1, 'not json')").run();
    assert.deepEqual(ledger.getSession('s9'), { id: 's9', startedAt: 1, metadata: {} });
  });
});
