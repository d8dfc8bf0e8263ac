import { serve } from '@hono/node-server';
import { loadConfig } from '@epirisk/schemas/src/config-loader.js';
import { createLlmClient } from '@epirisk/core/src/llm/llm-client.js';
import { createEmbeddingClient } from '@epirisk/core/src/embedding/embedding-client.js';
import { createInMemoryEvidenceStore } from '@epirisk/core/src/retrieval/evidence-store.js';
import { indexDirectory } from '@epirisk/core/src/retrieval/corpus-indexer.js';
import { createDetector } from '@epirisk/core/src/orchestration/detector.js';
import { createScoringPipeline } from '@epirisk/core/src/orchestration/scoring-pipeline.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const config = await loadConfig(process.env['EPIRISK_CONFIG']);

  const llmClient = await createLlmClient(config.llm);
  const evidenceStore = createInMemoryEvidenceStore(createEmbeddingClient(config), config.retrieval);

  const corpusDir = process.env['CORPUS_DIR'];
  if (corpusDir) {
    const chunkCount = await indexDirectory(evidenceStore, corpusDir, config.retrieval.extensions);
    log.info({ corpusDir, chunkCount }, 'Corpus indexed');
  } else {
    log.warn('CORPUS_DIR not set, every claim will be scored without evidence');
  }

  const app = createApp({
    detector: createDetector({ llmClient, evidenceStore, config }),
    scoringPipeline: createScoringPipeline(config.scoring),
    evidenceStore,
  });

  log.info({ port }, 'Starting Epirisk API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Epirisk API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
