import type { EmbeddingConfig } from '../config/types.js';
import { EmbeddingProvider } from './base.js';
import { MockEmbeddingProvider } from './mock.js';
import { OllamaProvider } from './ollama.js';
import { OpenAIProvider } from './openai.js';

export * from './base.js';
export * from './mock.js';
export * from './ollama.js';
export * from './openai.js';

/**
 * Builds the configured embedding provider. The mock provider defaults to
 * 32 dimensions.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  const options = {
    model: config.model,
    endpoint: config.endpoint,
    apiKey: config.apiKey,
    dimensions: config.dimensions
  };

  switch (config.provider) {
    case 'mock':
      return new MockEmbeddingProvider(config.dimensions ?? 32);
    case 'openai':
      return new OpenAIProvider(options);
    case 'ollama':
      return new OllamaProvider(options);
  }
}
