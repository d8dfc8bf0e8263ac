import { VertexAIEmbeddings } from '@langchain/google-vertexai';
import type { EmbeddingClient } from './embedding-client.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@epirisk/shared/src/utils/errors.js';

const log = createChildLogger('embedding:vertex');

export interface VertexEmbeddingOptions {
  readonly model: string;
  readonly location: string;
}

function toLlmError(error: unknown): LlmError {
  const cause = error instanceof Error ? error : undefined;
  return new LlmError(
    `Vertex AI embedding failed: ${cause?.message ?? String(error)}`,
    false,
    cause,
  );
}

export function createVertexEmbeddingClient(options: VertexEmbeddingOptions): EmbeddingClient {
  const projectId = process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? options.location;

  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI embedding client',
    );
  }

  const embeddings = new VertexAIEmbeddings({
    model: options.model,
    location,
    authOptions: { projectId },
  });

  log.info({ projectId, location, model: options.model }, 'Initializing Vertex AI embedding client');

  return {
    async generateEmbedding(text: string): Promise<number[]> {
      log.debug({ textLength: text.length }, 'Generating single embedding');
      try {
        return await embeddings.embedQuery(text);
      } catch (error) {
        throw toLlmError(error);
      }
    },

    async generateEmbeddings(texts: readonly string[]): Promise<number[][]> {
      log.debug({ count: texts.length }, 'Generating batch embeddings');
      try {
        const vectors = await embeddings.embedDocuments([...texts]);
        if (vectors.length !== texts.length) {
          throw new LlmError(
            `Unexpected embedding response: expected ${String(texts.length)} vectors, got ${String(vectors.length)}`,
            false,
          );
        }
        return vectors;
      } catch (error) {
        if (error instanceof LlmError) throw error;
        throw toLlmError(error);
      }
    },
  };
}
