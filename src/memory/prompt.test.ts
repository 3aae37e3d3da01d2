import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { openDatabase } from '../db/database.js';
import { InvalidInputError } from '../errors.js';
import { FactStore } from './fact-store.js';
import { assemblePrompt, buildPinnedContext, loadPinnedContext, PINNED_CONTEXT_HEADER } from './prompt.js';

describe('buildPinnedContext', () => {
  it('returns an empty string for no facts', () => {
    assert.equal(buildPinnedContext([]), '');
  });

  it('lists facts under the header in the given order', () => {
    const text = buildPinnedContext([
      { key: 'name', value: 'Carlos' },
      { key: 'birthday', value: '10/13/1969' },
    ]);
    assert.equal(text, 'Pinned user facts (trusted):\n- name: Carlos\n- birthday: 10/13/1969');
  });
});

describe('loadPinnedContext', () => {
  it('formats pinned facts in insertion order', () => {
    let now = 1;
    const store = new FactStore(openDatabase(':memory:'), { clock: () => now });
    store.pin('name', 'Carlos');
    now = 2;
    store.pin('birthday', '10/13/1969');
    store.addNonPinned('mood', 'tired');

    assert.equal(
      loadPinnedContext(store, 50),
      `${PINNED_CONTEXT_HEADER}\n- name: Carlos\n- birthday: 10/13/1969`,
    );
  });

  it('degrades to an empty context when storage fails', () => {
    const db = openDatabase(':memory:');
    const store = new FactStore(db);
    store.pin('name', 'Carlos');
    db.close();
    assert.equal(loadPinnedContext(store, 50), '');
  });

  it('still throws on bad arguments', () => {
    const store = new FactStore(openDatabase(':memory:'));
    assert.throws(() => loadPinnedContext(store, -1), InvalidInputError);
  });
});

describe('assemblePrompt', () => {
  it('puts pinned facts between the system prompt and the user turn', () => {
    const prompt = assemblePrompt({
      systemPrompt: 'You are a helpful voice assistant.',
      pinnedContext: 'Pinned user facts (trusted):\n- name: Carlos',
      userText: 'What is my name?',
    });
    assert.equal(
      prompt,
      'You are a helpful voice assistant.\nPinned user facts (trusted):\n- name: Carlos\nUser: What is my name?\nAssistant:',
    );
  });

  it('omits an empty context block', () => {
    const prompt = assemblePrompt({ systemPrompt: 'sys', pinnedContext: '  ', userText: 'hi' });
    assert.equal(prompt, 'sys\nUser: hi\nAssistant:');
  });
});
