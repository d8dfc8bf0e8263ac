import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { Detector } from '@epirisk/core/src/orchestration/detector.js';
import type { ScoringPipeline } from '@epirisk/core/src/orchestration/scoring-pipeline.js';
import type { EvidenceStore } from '@epirisk/core/src/retrieval/evidence-store.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { API_VERSION, createHealthRoutes } from './routes/health.js';
import { createAnalysisRoutes } from './routes/analyze.js';

const log = createChildLogger('api:server');

export interface AppDeps {
  readonly detector: Detector;
  readonly scoringPipeline: ScoringPipeline;
  readonly evidenceStore: EvidenceStore;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(deps.evidenceStore));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Epirisk API',
        version: API_VERSION,
        description: 'Epistemic risk scoring for language model answers',
      },
    });
    return c.json(spec);
  });

  app.route('/', createAnalysisRoutes(deps));

  return app;
}
