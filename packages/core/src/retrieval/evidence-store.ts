import { createHash } from 'node:crypto';
import type { RetrievalConfig } from '@epirisk/schemas/src/app-config.schema.js';
import type { CorpusStats, EvidenceChunk } from '@epirisk/shared/src/types/evidence.types.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { RetrievalError } from '@epirisk/shared/src/utils/errors.js';
import { clamp01, cosineSimilarity } from '@epirisk/shared/src/utils/math.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { chunkText } from './chunker.js';

const log = createChildLogger('retrieval:evidence-store');

export interface EvidenceStore {
  /** Replaces any chunks previously indexed for `sourceId`; returns the new chunk count. */
  indexDocument(sourceId: string, text: string): Promise<number>;
  retrieve(claimText: string, topK?: number): Promise<readonly EvidenceChunk[]>;
  clear(): void;
  stats(): CorpusStats;
}

interface StoredChunk {
  readonly id: string;
  readonly text: string;
  readonly sourceId: string;
  readonly chunkIndex: number;
  readonly embedding: readonly number[];
}

export type EvidenceStoreConfig = Pick<
  RetrievalConfig,
  'chunkSize' | 'chunkOverlap' | 'topK' | 'similarityThreshold'
>;

export function chunkId(sourceId: string, chunkIndex: number, text: string): string {
  return createHash('sha256')
    .update(`${sourceId}:${String(chunkIndex)}:${text.slice(0, 100)}`)
    .digest('hex')
    .slice(0, 16);
}

export function createInMemoryEvidenceStore(
  embeddingClient: EmbeddingClient,
  config: EvidenceStoreConfig,
): EvidenceStore {
  let chunks: StoredChunk[] = [];

  return {
    async indexDocument(sourceId: string, text: string): Promise<number> {
      const pieces = chunkText(text, config.chunkSize, config.chunkOverlap);

      let embeddings: number[][] = [];
      if (pieces.length > 0) {
        try {
          embeddings = await embeddingClient.generateEmbeddings(pieces);
        } catch (error) {
          throw new RetrievalError(
            `Failed to embed ${sourceId}: ${error instanceof Error ? error.message : String(error)}`,
            error instanceof Error ? error : undefined,
          );
        }
      }

      chunks = chunks.filter((chunk) => chunk.sourceId !== sourceId);
      pieces.forEach((piece, chunkIndex) => {
        chunks.push({
          id: chunkId(sourceId, chunkIndex, piece),
          text: piece,
          sourceId,
          chunkIndex,
          embedding: embeddings[chunkIndex],
        });
      });

      log.debug({ sourceId, chunkCount: pieces.length }, 'Document indexed');
      return pieces.length;
    },

    async retrieve(claimText: string, topK: number = config.topK): Promise<readonly EvidenceChunk[]> {
      if (chunks.length === 0) {
        return [];
      }

      let query: number[];
      try {
        query = await embeddingClient.generateEmbedding(claimText);
      } catch (error) {
        throw new RetrievalError(
          `Failed to embed claim: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        );
      }

      const scored = chunks
        .map((chunk) => ({ chunk, similarityScore: clamp01(cosineSimilarity(query, chunk.embedding)) }))
        .filter(({ similarityScore }) => similarityScore >= config.similarityThreshold)
        .sort((a, b) => b.similarityScore - a.similarityScore)
        .slice(0, topK);

      log.debug(
        { claimLength: claimText.length, candidates: chunks.length, returned: scored.length },
        'Evidence retrieved',
      );

      return scored.map(({ chunk, similarityScore }) => ({
        id: chunk.id,
        text: chunk.text,
        sourceId: chunk.sourceId,
        similarityScore,
        chunkIndex: chunk.chunkIndex,
      }));
    },

    clear(): void {
      chunks = [];
    },

    stats(): CorpusStats {
      return {
        totalChunks: chunks.length,
        totalDocuments: new Set(chunks.map((chunk) => chunk.sourceId)).size,
      };
    },
  };
}
