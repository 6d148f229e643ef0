import { QUERY_DEFAULTS } from '../config/constants.js';
import { AtlasError, IndexingError } from '../errors.js';
import type { EmbeddingProvider } from '../providers/base.js';
import type { MetadataStore } from '../types/metadata.js';
import type { SearchFilters, SearchResult, VectorStore } from '../types/vector-store.js';
import { log } from '../utils/logger.js';

export interface QueryDependencies {
  embedder: EmbeddingProvider;
  vectorStore: VectorStore;
  metadata: MetadataStore;
}

/**
 * Retrieval entry point: embeds the question and searches the vector store.
 */
export class QueryEngine {
  constructor(private readonly deps: QueryDependencies) {}

  async query(text: string, limit: number = QUERY_DEFAULTS.LIMIT, filters: SearchFilters = {}): Promise<SearchResult[]> {
    let vector: number[];
    try {
      await this.deps.embedder.init();
      vector = await this.deps.embedder.generateEmbedding(text);
    } catch (error) {
      throw new IndexingError('embed', 'failed to embed query', error);
    }

    try {
      const results = await this.deps.vectorStore.search(vector, limit, filters);
      log.debug('Query finished', { results: results.length, limit });
      return results;
    } catch (error) {
      throw new IndexingError('search', 'vector search failed', error);
    }
  }

  /** Searches across every project of the group. */
  async queryGroup(text: string, limit: number, groupName: string): Promise<SearchResult[]> {
    const projects = await this.deps.metadata.getProjectsByGroup(groupName);
    if (projects.length === 0) {
      throw new AtlasError('NOT_FOUND', `no projects found in group ${groupName}`);
    }
    return this.query(text, limit, { projects: projects.map((project) => project.name) });
  }
}
