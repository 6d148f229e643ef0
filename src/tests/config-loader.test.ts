import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';

import { loadConfig, mergeConfigs, readEnvConfig, resolveConfig } from '../config/loader.js';
import { ConfigError } from '../errors.js';
import { createTempRepo, writeRepoFile } from './helpers/test-repo.js';

test('file values are overridden by the environment', async () => {
  const repo = await createTempRepo({});
  try {
    const dataDir = path.join(repo.root, 'data');
    await writeRepoFile(repo.root, 'config.json', JSON.stringify({
      dataDir,
      embeddings: { provider: 'openai', model: 'file-model' }
    }));

    const config = loadConfig({
      configPath: path.join(repo.root, 'config.json'),
      env: { CODEATLAS_EMBEDDING_MODEL: 'env-model', OPENAI_API_KEY: 'test-secret' }
    });

    assert.deepStrictEqual(config, {
      dataDir,
      metadata: { dbPath: path.join(dataDir, 'metadata.db') },
      vectorStore: {
        type: 'sqlite',
        path: path.join(dataDir, 'vectors.db'),
        collection: 'codeatlas',
        batchSize: 1000
      },
      embeddings: {
        provider: 'openai',
        model: 'env-model',
        endpoint: undefined,
        apiKey: 'test-secret',
        dimensions: undefined
      }
    });
  } finally {
    await repo.cleanup();
  }
});

test('CODEATLAS_CONFIG names the config file', async () => {
  const repo = await createTempRepo({});
  try {
    await writeRepoFile(repo.root, 'atlas.json', JSON.stringify({ vectorStore: { collection: 'team', batchSize: 50 } }));

    const config = loadConfig({ env: { CODEATLAS_CONFIG: path.join(repo.root, 'atlas.json') } });
    assert.equal(config.vectorStore.collection, 'team');
    assert.equal(config.vectorStore.batchSize, 50);
  } finally {
    await repo.cleanup();
  }
});

test('an explicit config file that does not exist is an error', async () => {
  const repo = await createTempRepo({});
  const missing = path.join(repo.root, 'missing.json');
  try {
    assert.throws(
      () => loadConfig({ configPath: missing, env: {} }),
      (error: unknown) => error instanceof ConfigError && error.message === `config file not found: ${missing}`
    );
  } finally {
    await repo.cleanup();
  }
});

test('malformed or unknown config content is rejected', async () => {
  const repo = await createTempRepo({
    'broken.json': '{ "dataDir": ',
    'extra.json': JSON.stringify({ extra: true }),
    'provider.json': JSON.stringify({ embeddings: { provider: 'cohere' } })
  });
  try {
    assert.throws(() => loadConfig({ configPath: path.join(repo.root, 'broken.json'), env: {} }), ConfigError);
    assert.throws(
      () => loadConfig({ configPath: path.join(repo.root, 'extra.json'), env: {} }),
      (error: unknown) => error instanceof ConfigError && error.message.startsWith('invalid configuration in ')
    );
    assert.throws(() => loadConfig({ configPath: path.join(repo.root, 'provider.json'), env: {} }), ConfigError);
  } finally {
    await repo.cleanup();
  }
});

test('environment overrides are validated', () => {
  assert.throws(
    () => readEnvConfig({ CODEATLAS_EMBEDDING_DIMENSIONS: 'abc' }),
    { name: 'ConfigError', message: 'CODEATLAS_EMBEDDING_DIMENSIONS must be an integer, got "abc"' }
  );
  assert.equal(readEnvConfig({ CODEATLAS_EMBEDDING_DIMENSIONS: '768' }).embeddings?.dimensions, 768);
  assert.throws(() => readEnvConfig({ CODEATLAS_EMBEDDING_PROVIDER: 'cohere' }), ConfigError);
});

test('CODEATLAS_EMBEDDING_API_KEY wins over OPENAI_API_KEY', () => {
  const env = { CODEATLAS_EMBEDDING_API_KEY: 'test-secret-a', OPENAI_API_KEY: 'test-secret-b' };
  assert.equal(readEnvConfig(env).embeddings?.apiKey, 'test-secret-a');
});

test('defaults resolve under the home data directory', () => {
  const config = resolveConfig({});
  const dataDir = path.join(os.homedir(), '.codeatlas');

  assert.equal(config.dataDir, dataDir);
  assert.equal(config.metadata.dbPath, path.join(dataDir, 'metadata.db'));
  assert.equal(config.embeddings.provider, 'ollama');
});

test('in-memory database paths are kept as given', () => {
  const config = resolveConfig(readEnvConfig({ CODEATLAS_METADATA_DB: ':memory:', CODEATLAS_VECTOR_DB: ':memory:' }));

  assert.equal(config.metadata.dbPath, ':memory:');
  assert.equal(config.vectorStore.path, ':memory:');
});

test('later configs win and undefined values never override', () => {
  const merged = mergeConfigs(
    { dataDir: '/a', embeddings: { provider: 'ollama', model: 'bge-m3' } },
    null,
    { embeddings: { model: 'nomic-embed-text', provider: undefined } }
  );

  assert.equal(merged.dataDir, '/a');
  assert.equal(merged.embeddings?.provider, 'ollama');
  assert.equal(merged.embeddings?.model, 'nomic-embed-text');
});
