import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { EvidenceStore } from '@epirisk/core/src/retrieval/evidence-store.js';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export const API_VERSION = '0.1.0';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check',
  responses: {
    200: {
      description: 'Service is healthy',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export function createHealthRoutes(evidenceStore: Pick<EvidenceStore, 'stats'>): OpenAPIHono<AppEnv> {
  const health = createRouter();

  health.openapi(healthRoute, (c) => {
    return c.json({ status: 'ok', version: API_VERSION, corpus: evidenceStore.stats() }, 200);
  });

  return health;
}
