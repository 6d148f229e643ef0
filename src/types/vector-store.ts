import type { ChunkKind, CodeChunk } from './chunk.js';

export interface SearchFilters {
  project?: string;
  /** Match any of these projects; an empty list matches nothing. */
  projects?: string[];
  language?: string;
  chunkType?: ChunkKind;
  package?: string;
  filePath?: string;
}

export interface SearchResult {
  chunk: CodeChunk;
  /** `1 - distance`; higher is closer. */
  score: number;
  distance: number;
}

/**
 * Storage for chunks and their embeddings. Writes are upserts keyed by
 * chunk id.
 */
export interface VectorStore {
  insert(chunk: CodeChunk, vector: ArrayLike<number>): Promise<void>;
  insertBatch(chunks: CodeChunk[], vectors: ArrayLike<number>[]): Promise<void>;
  search(queryVector: ArrayLike<number>, limit: number, filters?: SearchFilters): Promise<SearchResult[]>;
  /** Removes every chunk of the project. */
  delete(projectName: string): Promise<void>;
  listProjects(): Promise<string[]>;
  get(id: string): Promise<CodeChunk | null>;
  close(): void;
}
