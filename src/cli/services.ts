import type { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import type { AtlasConfig } from '../config/types.js';
import { SqliteMetadataStore } from '../database/metadata-store.js';
import { SqliteVectorStore } from '../database/vector-store.js';
import { createEmbeddingProvider, type EmbeddingProvider } from '../providers/index.js';

export interface CliServices {
  config: AtlasConfig;
  metadata: SqliteMetadataStore;
  vectorStore: SqliteVectorStore;
  embedder: EmbeddingProvider;
}

function globalConfigPath(command: Command): string | undefined {
  const value: unknown = command.optsWithGlobals().config;
  return typeof value === 'string' ? value : undefined;
}

/**
 * Opens the stores named by the resolved config for the duration of `fn`.
 */
export async function withServices<T>(command: Command, fn: (services: CliServices) => Promise<T>): Promise<T> {
  const config = loadConfig({ configPath: globalConfigPath(command) });
  const metadata = new SqliteMetadataStore(config.metadata.dbPath);
  const vectorStore = new SqliteVectorStore(config.vectorStore.path, {
    collection: config.vectorStore.collection,
    batchSize: config.vectorStore.batchSize
  });

  try {
    return await fn({ config, metadata, vectorStore, embedder: createEmbeddingProvider(config.embeddings) });
  } finally {
    vectorStore.close();
    metadata.close();
  }
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return parsed;
}

export function formatDate(value: Date | null): string {
  return value ? value.toISOString() : 'never';
}
