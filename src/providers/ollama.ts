import { Ollama } from 'ollama';
import { log } from '../utils/logger.js';
import { EmbeddingProvider, type EmbeddingOptions } from './base.js';

export const DEFAULT_OLLAMA_MODEL = 'bge-m3';
export const DEFAULT_OLLAMA_ENDPOINT = 'http://localhost:11434';

const MODEL_DIMENSIONS: Record<string, number> = {
  'bge-m3': 1024,
  'mxbai-embed-large': 1024,
  'nomic-embed-text': 768
};

export class OllamaProvider extends EmbeddingProvider {
  private client: Ollama | null = null;
  private readonly model: string;
  private readonly endpoint: string;
  private readonly dimensionsOverride?: number;

  constructor(options: EmbeddingOptions = {}) {
    super();
    this.model = options.model || DEFAULT_OLLAMA_MODEL;
    this.endpoint = options.endpoint || DEFAULT_OLLAMA_ENDPOINT;
    this.dimensionsOverride = options.dimensions;
  }

  async init(): Promise<void> {
    if (!this.client) {
      this.client = new Ollama({ host: this.endpoint });
    }
  }

  private async getClient(): Promise<Ollama> {
    await this.init();
    if (!this.client) {
      throw new Error('Ollama client failed to initialize');
    }
    return this.client;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const client = await this.getClient();
    const response = await client.embed({ model: this.model, input: text });

    const embedding = response.embeddings[0];
    if (!embedding || embedding.length === 0) {
      throw new Error(`Ollama returned no embedding for model ${this.model}`);
    }
    return embedding;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    log.debug('Requesting Ollama embeddings', { model: this.model, count: texts.length });
    return super.generateEmbeddings(texts);
  }

  getDimensions(): number {
    if (this.dimensionsOverride !== undefined) {
      return this.dimensionsOverride;
    }
    return MODEL_DIMENSIONS[this.model] ?? 1024;
  }

  getName(): string {
    return 'Ollama';
  }

  getModelName(): string {
    return this.model;
  }
}
