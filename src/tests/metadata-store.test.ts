import test from 'node:test';
import assert from 'node:assert/strict';

import { isStale } from '../core/metadata.js';
import { SqliteMetadataStore } from '../database/metadata-store.js';
import { ConflictError, NotFoundError } from '../errors.js';

const T0 = new Date('2024-01-01T00:00:00.000Z');
const T1 = new Date('2024-01-02T00:00:00.000Z');
const T2 = new Date('2024-01-03T00:00:00.000Z');

function openStore(): SqliteMetadataStore {
  return new SqliteMetadataStore(':memory:', { now: () => T0 });
}

test('creates, reads, updates and lists groups', async () => {
  const store = openStore();
  try {
    const created = await store.createGroup('backend', 'server side');
    assert.equal(created.name, 'backend');
    assert.equal(created.createdAt.toISOString(), T0.toISOString());

    await store.createGroup('apps');
    await store.updateGroup('backend', 'services');

    assert.equal((await store.getGroup('backend')).description, 'services');
    assert.deepStrictEqual((await store.listGroups()).map((group) => group.name), ['apps', 'backend']);
  } finally {
    store.close();
  }
});

test('duplicate names are conflicts', async () => {
  const store = openStore();
  try {
    await store.createGroup('backend');
    await assert.rejects(store.createGroup('backend'), ConflictError);

    await store.createProject({ name: 'api', path: '/src/api', language: 'go' });
    await assert.rejects(
      store.createProject({ name: 'api', path: '/other', language: 'go' }),
      { name: 'ConflictError', message: 'project already exists: api' }
    );
  } finally {
    store.close();
  }
});

test('missing rows are not-found errors', async () => {
  const store = openStore();
  try {
    await assert.rejects(store.getGroup('nope'), { name: 'NotFoundError', message: 'group not found: nope' });
    await assert.rejects(store.updateGroup('nope', 'x'), NotFoundError);
    await assert.rejects(store.deleteGroup('nope'), NotFoundError);
    await assert.rejects(store.getProject('nope'), NotFoundError);
    await assert.rejects(store.deleteProject('nope'), NotFoundError);
    await assert.rejects(store.getFile(1, 'main.go'), { message: 'file not found: 1:main.go' });
    await assert.rejects(
      store.updateProject({
        name: 'nope',
        path: '/x',
        language: 'go',
        description: '',
        groupId: null,
        chunkCount: 0,
        lastIndexedAt: null,
        lastModifiedAt: null
      }),
      NotFoundError
    );
  } finally {
    store.close();
  }
});

test('projects join their group name and filter by group', async () => {
  const store = openStore();
  try {
    const group = await store.createGroup('backend');
    await store.createProject({ name: 'api', path: '/src/api', language: 'go', groupId: group.id });
    await store.createProject({ name: 'cli', path: '/src/cli', language: 'go' });

    const api = await store.getProject('api');
    assert.equal(api.groupId, group.id);
    assert.equal(api.groupName, 'backend');
    assert.equal(api.lastIndexedAt, null);
    assert.equal(api.chunkCount, 0);

    assert.deepStrictEqual((await store.listProjects()).map((project) => project.name), ['api', 'cli']);
    assert.deepStrictEqual((await store.getProjectsByGroup('backend')).map((project) => project.name), ['api']);
    assert.deepStrictEqual(await store.getProjectsByGroup('frontend'), []);
  } finally {
    store.close();
  }
});

test('a project referencing an unknown group is rejected', async () => {
  const store = openStore();
  try {
    await assert.rejects(
      store.createProject({ name: 'api', path: '/src/api', language: 'go', groupId: 42 }),
      { name: 'NotFoundError', message: 'group not found: 42' }
    );
  } finally {
    store.close();
  }
});

test('updateProject writes every field', async () => {
  const store = openStore();
  try {
    await store.createProject({ name: 'api', path: '/src/api', language: 'go' });
    const updated = await store.updateProject({
      name: 'api',
      path: '/moved/api',
      language: 'go',
      description: 'public api',
      groupId: null,
      chunkCount: 12,
      lastIndexedAt: T2,
      lastModifiedAt: T1
    });

    assert.equal(updated.path, '/moved/api');
    assert.equal(updated.description, 'public api');
    assert.equal(updated.chunkCount, 12);
    assert.equal(updated.lastIndexedAt?.toISOString(), T2.toISOString());
    assert.equal(updated.lastModifiedAt?.toISOString(), T1.toISOString());
  } finally {
    store.close();
  }
});

test('deleting a group keeps its projects ungrouped', async () => {
  const store = openStore();
  try {
    const group = await store.createGroup('backend');
    await store.createProject({ name: 'api', path: '/src/api', language: 'go', groupId: group.id });

    await store.deleteGroup('backend');

    const api = await store.getProject('api');
    assert.equal(api.groupId, null);
    assert.equal(api.groupName, null);
  } finally {
    store.close();
  }
});

test('deleting a project removes its files', async () => {
  const store = openStore();
  try {
    const project = await store.createProject({ name: 'api', path: '/src/api', language: 'go' });
    await store.upsertFile({
      projectId: project.id,
      filePath: 'main.go',
      lastModifiedAt: T0,
      lastIndexedAt: T1,
      chunkCount: 2,
      fileHash: 'abc'
    });

    await store.deleteProject('api');

    assert.deepStrictEqual(await store.listFiles(project.id), []);
    await assert.rejects(store.getProject('api'), NotFoundError);
  } finally {
    store.close();
  }
});

test('upserting a file twice keeps one row with the latest values', async () => {
  const store = openStore();
  try {
    const project = await store.createProject({ name: 'api', path: '/src/api', language: 'go' });
    const first = await store.upsertFile({
      projectId: project.id,
      filePath: 'main.go',
      lastModifiedAt: T0,
      lastIndexedAt: T1,
      chunkCount: 2,
      fileHash: 'abc'
    });
    const second = await store.upsertFile({
      projectId: project.id,
      filePath: 'main.go',
      lastModifiedAt: T1,
      lastIndexedAt: T2,
      chunkCount: 3,
      fileHash: 'def'
    });

    assert.equal(second.id, first.id);
    assert.equal(second.chunkCount, 3);
    assert.equal(second.fileHash, 'def');
    assert.equal((await store.listFiles(project.id)).length, 1);
  } finally {
    store.close();
  }
});

test('upserting files for an unknown project is rejected', async () => {
  const store = openStore();
  try {
    await assert.rejects(
      store.upsertFiles([
        { projectId: 7, filePath: 'main.go', lastModifiedAt: T0, lastIndexedAt: T1, chunkCount: 1, fileHash: '' }
      ]),
      { name: 'NotFoundError', message: 'project not found: 7' }
    );
  } finally {
    store.close();
  }
});

test('stale files are never-indexed or modified after indexing', async () => {
  const store = openStore();
  try {
    const project = await store.createProject({ name: 'api', path: '/src/api', language: 'go' });
    await store.upsertFiles([
      { projectId: project.id, filePath: 'fresh.go', lastModifiedAt: T0, lastIndexedAt: T1, chunkCount: 1, fileHash: '' },
      { projectId: project.id, filePath: 'changed.go', lastModifiedAt: T2, lastIndexedAt: T1, chunkCount: 1, fileHash: '' },
      { projectId: project.id, filePath: 'failed.go', lastModifiedAt: T0, lastIndexedAt: null, chunkCount: 0, fileHash: '' },
      { projectId: project.id, filePath: 'unknown.go', lastModifiedAt: null, lastIndexedAt: T1, chunkCount: 1, fileHash: '' }
    ]);

    const stale = await store.getStaleFiles(project.id);
    assert.deepStrictEqual(stale.map((file) => file.filePath), ['changed.go', 'failed.go']);

    const all = await store.listFiles(project.id);
    assert.deepStrictEqual(all.filter(isStale).map((file) => file.filePath), ['changed.go', 'failed.go']);
  } finally {
    store.close();
  }
});

test('deleteFile removes a single row', async () => {
  const store = openStore();
  try {
    const project = await store.createProject({ name: 'api', path: '/src/api', language: 'go' });
    await store.upsertFiles([
      { projectId: project.id, filePath: 'a.go', lastModifiedAt: T0, lastIndexedAt: T1, chunkCount: 1, fileHash: '' },
      { projectId: project.id, filePath: 'b.go', lastModifiedAt: T0, lastIndexedAt: T1, chunkCount: 1, fileHash: '' }
    ]);

    await store.deleteFile(project.id, 'a.go');
    await assert.rejects(store.deleteFile(project.id, 'a.go'), NotFoundError);
    assert.deepStrictEqual((await store.listFiles(project.id)).map((file) => file.filePath), ['b.go']);

    await store.deleteProjectFiles(project.id);
    assert.deepStrictEqual(await store.listFiles(project.id), []);
  } finally {
    store.close();
  }
});

test('isStale follows the modification and indexing timestamps', () => {
  assert.equal(isStale({ lastIndexedAt: null, lastModifiedAt: null }), true);
  assert.equal(isStale({ lastIndexedAt: T1, lastModifiedAt: T2 }), true);
  assert.equal(isStale({ lastIndexedAt: T1, lastModifiedAt: T1 }), false);
  assert.equal(isStale({ lastIndexedAt: T1, lastModifiedAt: null }), false);
});
