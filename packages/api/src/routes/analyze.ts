import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { EvidenceChunk } from '@epirisk/shared/src/types/evidence.types.js';
import type { AnswerReport } from '@epirisk/shared/src/types/analysis.types.js';
import type { ExtractionMetadata } from '@epirisk/shared/src/types/claim.types.js';
import type { Detector } from '@epirisk/core/src/orchestration/detector.js';
import type { ScoringPipeline } from '@epirisk/core/src/orchestration/scoring-pipeline.js';
import { renderStructured } from '@epirisk/core/src/rendering/structured-renderer.js';
import { renderText } from '@epirisk/core/src/rendering/text-renderer.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { AnalyzeRequestSchema, ScoreRequestSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  ReportResponseSchema,
  type ReportResponse,
} from '../schemas/responses.js';

const log = createChildLogger('api:analyze');

export interface AnalysisRouteDeps {
  readonly detector: Detector;
  readonly scoringPipeline: ScoringPipeline;
}

const errorResponses = {
  400: {
    description: 'Validation error',
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
  },
  502: {
    description: 'Language model failure',
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
  },
} as const;

const analyzeRoute = createRoute({
  method: 'post',
  path: '/analyze',
  tags: ['Analysis'],
  summary: 'Extract claims from an answer and score them against the indexed corpus',
  request: {
    body: {
      content: {
        'application/json': {
          schema: AnalyzeRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Risk report for the answer',
      content: {
        'application/json': {
          schema: ReportResponseSchema,
        },
      },
    },
    ...errorResponses,
  },
});

const scoreRoute = createRoute({
  method: 'post',
  path: '/score',
  tags: ['Analysis'],
  summary: 'Score pre-extracted claims against caller-supplied evidence',
  request: {
    body: {
      content: {
        'application/json': {
          schema: ScoreRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Risk report for the claims',
      content: {
        'application/json': {
          schema: ReportResponseSchema,
        },
      },
    },
    400: errorResponses[400],
  },
});

function toResponse(
  report: AnswerReport,
  includeText: boolean,
  extraction?: ExtractionMetadata,
): ReportResponse {
  return ReportResponseSchema.parse({
    ...renderStructured(report, extraction),
    ...(includeText ? { text: renderText(report) } : {}),
  });
}

export function createAnalysisRoutes(deps: AnalysisRouteDeps): OpenAPIHono<AppEnv> {
  const router = createRouter();

  router.openapi(analyzeRoute, async (c) => {
    const { answerText, includeText } = c.req.valid('json');

    const { report, extraction } = await deps.detector.analyze(answerText, {
      signal: c.req.raw.signal,
    });

    log.info(
      {
        requestId: c.get('requestId'),
        claimCount: report.outcomes.length,
        overallRisk: report.overallRisk,
      },
      'Answer analyzed',
    );

    return c.json(toResponse(report, includeText, extraction), 200);
  });

  router.openapi(scoreRoute, async (c) => {
    const { answerText, claims, evidence, includeText } = c.req.valid('json');

    const evidenceByClaim = new Map<string, readonly EvidenceChunk[]>(Object.entries(evidence));
    const report = await deps.scoringPipeline.analyze(answerText, claims, evidenceByClaim, {
      signal: c.req.raw.signal,
    });

    log.info(
      {
        requestId: c.get('requestId'),
        claimCount: report.outcomes.length,
        overallRisk: report.overallRisk,
      },
      'Claims scored',
    );

    return c.json(toResponse(report, includeText), 200);
  });

  return router;
}
