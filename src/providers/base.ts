/**
 * Embedding collaborator. Implementations must return vectors of
 * `getDimensions()` length, in input order for batches.
 */
export abstract class EmbeddingProvider {
  abstract generateEmbedding(text: string): Promise<number[]>;
  abstract getDimensions(): number;
  abstract getName(): string;
  abstract getModelName(): string;

  /** Lazily creates the underlying client. Safe to call repeatedly. */
  async init(): Promise<void> {}

  // Providers with a batch endpoint override this
  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const [index, text] of texts.entries()) {
      try {
        embeddings.push(await this.generateEmbedding(text));
      } catch (error) {
        throw new EmbeddingBatchError(this.getName(), index, error);
      }
    }
    return embeddings;
  }
}

export class EmbeddingBatchError extends Error {
  readonly index: number;

  constructor(provider: string, index: number, cause: unknown) {
    super(`${provider} failed to embed text at index ${index}`, { cause });
    this.name = 'EmbeddingBatchError';
    this.index = index;
  }
}

export interface EmbeddingOptions {
  model?: string;
  endpoint?: string;
  apiKey?: string;
  dimensions?: number;
}
