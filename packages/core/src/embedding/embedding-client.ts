import type { AppConfig } from '@epirisk/schemas/src/app-config.schema.js';
import { createMockEmbeddingClient } from './mock-embedding-client.js';
import { createVertexEmbeddingClient } from './vertex-embedding-client.js';

export interface EmbeddingClient {
  generateEmbedding(text: string): Promise<number[]>;
  generateEmbeddings(texts: readonly string[]): Promise<number[][]>;
}

/** Follows the LLM provider: the mock LLM pairs with mock embeddings. */
export function createEmbeddingClient(config: AppConfig): EmbeddingClient {
  if (config.llm.provider === 'mock' || process.env['EPIRISK_MOCK_LLM'] === 'true') {
    return createMockEmbeddingClient();
  }
  return createVertexEmbeddingClient({
    model: config.retrieval.embeddingModel,
    location: config.llm.location,
  });
}
