import { z } from 'zod';

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'mock'] as const;
export type EmbeddingProviderName = typeof EMBEDDING_PROVIDERS[number];

const EmbeddingConfigSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS).optional(),
  model: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  dimensions: z.number().int().positive().optional()
}).strict();

/** Shape of a config file or of the environment overrides; every key optional. */
export const PartialConfigSchema = z.object({
  dataDir: z.string().min(1).optional(),
  metadata: z.object({
    dbPath: z.string().min(1).optional()
  }).strict().optional(),
  vectorStore: z.object({
    type: z.literal('sqlite').optional(),
    path: z.string().min(1).optional(),
    collection: z.string().min(1).optional(),
    batchSize: z.number().int().positive().optional()
  }).strict().optional(),
  embeddings: EmbeddingConfigSchema.optional()
}).strict();

export type PartialConfig = z.infer<typeof PartialConfigSchema>;

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model?: string;
  endpoint?: string;
  apiKey?: string;
  dimensions?: number;
}

export interface VectorStoreConfig {
  type: 'sqlite';
  path: string;
  collection: string;
  batchSize: number;
}

/** Fully resolved configuration; paths are absolute. */
export interface AtlasConfig {
  dataDir: string;
  metadata: { dbPath: string };
  vectorStore: VectorStoreConfig;
  embeddings: EmbeddingConfig;
}
