import { OpenAI } from 'openai';
import { log } from '../utils/logger.js';
import { EmbeddingProvider, type EmbeddingOptions } from './base.js';

export const DEFAULT_OPENAI_MODEL = 'text-embedding-3-small';

export class OpenAIProvider extends EmbeddingProvider {
  private openai: OpenAI | null = null;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly baseUrl?: string;
  private readonly dimensionsOverride?: number;

  constructor(options: EmbeddingOptions = {}) {
    super();
    this.model = options.model || DEFAULT_OPENAI_MODEL;
    this.apiKey = options.apiKey;
    this.baseUrl = options.endpoint;
    this.dimensionsOverride = options.dimensions;
  }

  async init(): Promise<void> {
    if (!this.openai) {
      this.openai = new OpenAI({
        ...(this.apiKey ? { apiKey: this.apiKey } : {}),
        ...(this.baseUrl ? { baseURL: this.baseUrl } : {})
      });
    }
  }

  private async getClient(): Promise<OpenAI> {
    await this.init();
    if (!this.openai) {
      throw new Error('OpenAI client failed to initialize');
    }
    return this.openai;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text]);
    return embedding;
  }

  /** One request for the whole batch; results are put back in input order. */
  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const client = await this.getClient();
    log.debug('Requesting OpenAI embeddings', { model: this.model, count: texts.length });

    const response = await client.embeddings.create({
      model: this.model,
      input: texts,
      ...(this.dimensionsOverride !== undefined ? { dimensions: this.dimensionsOverride } : {})
    });

    if (response.data.length !== texts.length) {
      throw new Error(`OpenAI returned ${response.data.length} embeddings for ${texts.length} inputs`);
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  getDimensions(): number {
    if (this.dimensionsOverride !== undefined) {
      return this.dimensionsOverride;
    }
    if (this.model.includes('3-large')) return 3072;
    return 1536;
  }

  getName(): string {
    return 'OpenAI';
  }

  getModelName(): string {
    return this.model;
  }
}
