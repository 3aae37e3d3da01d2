import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { openDatabase, type Db } from '../db/database.js';
import { InvalidInputError } from '../errors.js';
import { DocumentIndex } from './document-index.js';

const GARDEN = 'Tomatoes need full sun and regular watering.\n\nBasil grows well next to tomatoes.';
const COOKING = 'Pasta cooks in salted boiling water.';

describe('DocumentIndex', () => {
  let db: Db;
  let index: DocumentIndex;

  beforeEach(() => {
    db = openDatabase(':memory:');
    index = new DocumentIndex(db, { chunkChars: 10, clock: () => 42 });
  });

  it('returns nothing before the first rebuild', () => {
    index.ingestText('garden.txt', GARDEN);
    assert.deepEqual(index.retrieve('tomatoes'), []);
    assert.deepEqual(index.indexStatus(), { built: false, stale: true, chunkCount: 0, builtAt: null });
  });

  it('ranks chunks by BM25 after a rebuild', () => {
    const gardenId = index.ingestText('garden.txt', GARDEN);
    index.ingestText('cooking.txt', COOKING);
    assert.deepEqual(index.rebuildIndex(), { chunkCount: 3, builtAt: 42 });

    const hits = index.retrieve('Tomatoes?');
    assert.deepEqual(
      hits.map((h) => [h.documentId, h.source, h.sequenceNo, h.text]),
      [
        [gardenId, 'garden.txt', 1, 'Basil grows well next to tomatoes.'],
        [gardenId, 'garden.txt', 0, 'Tomatoes need full sun and regular watering.'],
      ],
    );
    assert.ok((hits[0]?.score ?? 0) > (hits[1]?.score ?? 0));
    assert.equal(index.retrieve('tomatoes', 1).length, 1);
  });

  it('returns the same results for the same query', () => {
    index.ingestText('garden.txt', GARDEN);
    index.ingestText('cooking.txt', COOKING);
    index.rebuildIndex();
    assert.deepEqual(index.retrieve('tomatoes water'), index.retrieve('tomatoes water'));
  });

  it('breaks score ties by sequence number, then ingestion order', () => {
    const tied = new DocumentIndex(db, { chunkChars: 5, clock: () => 42 });
    tied.ingestText('b.txt', 'gamma\n\nalpha beta');
    tied.ingestText('a.txt', 'alpha beta');
    tied.ingestText('c.txt', 'alpha beta');
    tied.rebuildIndex();

    const hits = tied.retrieve('alpha');
    assert.deepEqual(hits.map((h) => [h.source, h.sequenceNo]), [['a.txt', 0], ['c.txt', 0], ['b.txt', 1]]);
    assert.equal(hits[0]?.score, hits[2]?.score);
  });

  it('drops chunks below minScore or without a matching term', () => {
    index.ingestText('garden.txt', GARDEN);
    index.rebuildIndex();
    assert.deepEqual(index.retrieve('tomatoes', 5, 100), []);
    assert.deepEqual(index.retrieve('weather', 5, -1), []);
    assert.deepEqual(index.retrieve('?!'), []);
    assert.deepEqual(index.retrieve('tomatoes', 0), []);
  });

  it('does not see new documents until the next rebuild', () => {
    index.ingestText('garden.txt', GARDEN);
    index.rebuildIndex();
    index.ingestText('soup.txt', 'Tomatoes make a good soup.');

    assert.deepEqual(index.indexStatus(), { built: true, stale: true, chunkCount: 2, builtAt: 42 });
    assert.deepEqual(index.retrieve('soup'), []);

    index.rebuildIndex();
    assert.deepEqual(index.retrieve('soup').map((h) => h.source), ['soup.txt']);
    assert.equal(index.indexStatus().stale, false);
  });

  it('handles a rebuild over an empty corpus', () => {
    assert.deepEqual(index.rebuildIndex(), { chunkCount: 0, builtAt: 42 });
    assert.deepEqual(index.retrieve('anything'), []);
    assert.deepEqual(index.indexStatus(), { built: true, stale: false, chunkCount: 0, builtAt: 42 });
  });

  it('lists documents and their chunks', () => {
    const id = index.ingestText(' garden.txt ', GARDEN, { title: 'Garden notes' });
    assert.deepEqual(index.listDocuments(), [{ id, source: 'garden.txt', title: 'Garden notes', createdAt: 42 }]);
    assert.deepEqual(index.getDocumentChunks(id), [
      'Tomatoes need full sun and regular watering.',
      'Basil grows well next to tomatoes.',
    ]);
  });

  it('deleteAll removes documents, chunks and the snapshot', () => {
    index.ingestText('garden.txt', GARDEN);
    index.ingestText('cooking.txt', COOKING);
    index.rebuildIndex();
    assert.deepEqual(index.deleteAll(), { documents: 2, chunks: 3 });
    assert.deepEqual(index.listDocuments(), []);
    assert.deepEqual(index.retrieve('pasta'), []);
    assert.equal(index.indexStatus().built, false);
  });

  it('rejects invalid input', () => {
    assert.throws(() => index.ingestText('  ', 'text'), InvalidInputError);
    assert.throws(() => index.ingestText('empty.txt', '\n\n  \n'), /has no text/);
    assert.throws(() => index.retrieve('x', -1), InvalidInputError);
    assert.throws(() => index.retrieve('x', 1, Number.NaN), InvalidInputError);
    assert.throws(() => new DocumentIndex(db, { chunkChars: 0 }), InvalidInputError);
    assert.deepEqual(index.listDocuments(), []);
  });
});
