import test from 'node:test';
import assert from 'node:assert/strict';

import { SqliteVectorStore } from '../database/vector-store.js';
import { StoreError } from '../errors.js';
import { makeChunk } from './helpers/fixtures.js';

function approx(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-6, `expected ${actual} to be close to ${expected}`);
}

async function seededStore(): Promise<SqliteVectorStore> {
  const store = new SqliteVectorStore(':memory:');
  await store.insertBatch(
    [
      makeChunk({ id: 'alpha:a.go:A', project: 'alpha', filePath: 'a.go', name: 'A' }),
      makeChunk({ id: 'alpha:b.go:B', project: 'alpha', filePath: 'b.go', name: 'B', chunkType: 'struct' }),
      makeChunk({ id: 'beta:c.go:C', project: 'beta', filePath: 'c.go', name: 'C', package: 'util' })
    ],
    [[1, 0], [0, 1], [0.6, 0.8]]
  );
  return store;
}

test('search ranks by cosine similarity', async () => {
  const store = await seededStore();
  try {
    const results = await store.search([1, 0], 10);

    assert.deepStrictEqual(results.map((result) => result.chunk.id), ['alpha:a.go:A', 'beta:c.go:C', 'alpha:b.go:B']);
    approx(results[0].score, 1);
    approx(results[0].distance, 0);
    approx(results[1].score, 0.6);
    approx(results[2].score, 0);
  } finally {
    store.close();
  }
});

test('search applies the limit and filters', async () => {
  const store = await seededStore();
  try {
    assert.deepStrictEqual(
      (await store.search([1, 0], 1)).map((result) => result.chunk.id),
      ['alpha:a.go:A']
    );
    assert.deepStrictEqual(
      (await store.search([1, 0], 10, { project: 'alpha' })).map((result) => result.chunk.id),
      ['alpha:a.go:A', 'alpha:b.go:B']
    );
    assert.deepStrictEqual(
      (await store.search([1, 0], 10, { chunkType: 'struct' })).map((result) => result.chunk.id),
      ['alpha:b.go:B']
    );
    assert.deepStrictEqual(
      (await store.search([1, 0], 10, { package: 'util' })).map((result) => result.chunk.id),
      ['beta:c.go:C']
    );
    assert.deepStrictEqual(
      (await store.search([1, 0], 10, { projects: ['beta'] })).map((result) => result.chunk.id),
      ['beta:c.go:C']
    );
  } finally {
    store.close();
  }
});

test('an empty project list or a non-positive limit matches nothing', async () => {
  const store = await seededStore();
  try {
    assert.deepStrictEqual(await store.search([1, 0], 10, { projects: [] }), []);
    assert.deepStrictEqual(await store.search([1, 0], 0), []);
  } finally {
    store.close();
  }
});

test('vectors of another dimension are skipped', async () => {
  const store = await seededStore();
  try {
    await store.insert(makeChunk({ id: 'gamma:d.go:D', project: 'gamma' }), [1, 0, 0]);

    assert.deepStrictEqual(
      (await store.search([1, 0, 0], 10)).map((result) => result.chunk.id),
      ['gamma:d.go:D']
    );
    assert.equal((await store.search([1, 0], 10)).length, 3);
  } finally {
    store.close();
  }
});

test('inserting an existing id replaces the chunk', async () => {
  const store = await seededStore();
  try {
    await store.insert(makeChunk({ id: 'alpha:a.go:A', project: 'alpha', code: 'func A() { return }' }), [0, 1]);

    const chunk = await store.get('alpha:a.go:A');
    assert.equal(chunk?.code, 'func A() { return }');
    assert.equal(await store.count('alpha'), 2);
    assert.equal((await store.search([0, 1], 1))[0].chunk.id, 'alpha:a.go:A');
  } finally {
    store.close();
  }
});

test('chunks round-trip through storage', async () => {
  const store = new SqliteVectorStore(':memory:');
  try {
    const chunk = makeChunk({
      id: 'proj:api.go:Start',
      chunkType: 'method',
      name: 'Start',
      receiver: '*Server',
      docString: 'Start runs.\n',
      httpEndpoints: ['GET /users'],
      httpCalls: ['Get /ping'],
      imports: ['net/http'],
      lineStart: 3,
      lineEnd: 9
    });
    await store.insert(chunk, [0.5, 0.5]);

    assert.deepStrictEqual(await store.get('proj:api.go:Start'), chunk);
    assert.equal(await store.get('proj:api.go:Missing'), null);
  } finally {
    store.close();
  }
});

test('delete removes one project and listProjects reflects it', async () => {
  const store = await seededStore();
  try {
    assert.deepStrictEqual(await store.listProjects(), ['alpha', 'beta']);

    await store.delete('alpha');

    assert.deepStrictEqual(await store.listProjects(), ['beta']);
    assert.equal(await store.count(), 1);
    assert.deepStrictEqual(await store.search([1, 0], 10, { project: 'alpha' }), []);
  } finally {
    store.close();
  }
});

test('insertBatch rejects mismatched lengths and ignores empty input', async () => {
  const store = new SqliteVectorStore(':memory:', { batchSize: 1 });
  try {
    await assert.rejects(
      store.insertBatch([makeChunk({ id: 'p:a.go:A' })], []),
      (error: unknown) => error instanceof StoreError && error.message === 'chunk count (1) does not match vector count (0)'
    );
    await store.insertBatch([], []);
    assert.equal(await store.count(), 0);

    await store.insertBatch([makeChunk({ id: 'p:a.go:A' }), makeChunk({ id: 'p:b.go:B' })], [[1], [1]]);
    assert.equal(await store.count(), 2);
  } finally {
    store.close();
  }
});
