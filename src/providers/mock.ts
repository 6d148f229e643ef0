import crypto from 'crypto';
import { EmbeddingProvider } from './base.js';

function normalizeVector(values: number[]): number[] {
  const magnitude = Math.sqrt(values.reduce((sum, value) => sum + value * value, 0)) || 1;
  return values.map((value) => value / magnitude);
}

/**
 * Unit vector filled from sha256 blocks of `<block>:<text>`, with bytes
 * mapped onto [-1, 1]. Equal texts give equal vectors in any process.
 */
export function buildDeterministicVector(text: string, dimensions: number): number[] {
  const values: number[] = [];

  for (let block = 0; values.length < dimensions; block++) {
    const digest = crypto.createHash('sha256').update(`${block}:${text}`).digest();
    for (const byte of digest) {
      if (values.length === dimensions) break;
      values.push(byte / 127.5 - 1);
    }
  }

  return normalizeVector(values);
}

/**
 * Network-free provider for tests and offline runs.
 */
export class MockEmbeddingProvider extends EmbeddingProvider {
  constructor(
    private readonly dimensions = 32,
    private readonly model = 'mock'
  ) {
    super();
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getName(): string {
    return 'mock';
  }

  getModelName(): string {
    return this.model;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    return buildDeterministicVector(text, this.dimensions);
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    return texts.map((text) => buildDeterministicVector(text, this.dimensions));
  }
}
