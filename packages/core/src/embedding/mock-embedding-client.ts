import type { EmbeddingClient } from './embedding-client.js';

export const MOCK_EMBEDDING_DIMENSION = 1024;

const TOKEN_PATTERN = /[a-z0-9]+/g;

/** 32-bit FNV-1a. */
function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Hashed bag of words, normalized to unit length. Texts sharing vocabulary
 * land close together, which is enough for offline runs and tests.
 */
export function embedTokens(text: string): number[] {
  const vector = new Array<number>(MOCK_EMBEDDING_DIMENSION).fill(0);
  for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
    vector[fnv1a(token) % MOCK_EMBEDDING_DIMENSION] += 1;
  }

  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return magnitude === 0 ? vector : vector.map((v) => v / magnitude);
}

export function createMockEmbeddingClient(): EmbeddingClient {
  return {
    generateEmbedding(text: string): Promise<number[]> {
      return Promise.resolve(embedTokens(text));
    },

    generateEmbeddings(texts: readonly string[]): Promise<number[][]> {
      return Promise.resolve(texts.map((text) => embedTokens(text)));
    },
  };
}
