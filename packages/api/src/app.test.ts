import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { validateAppConfig } from '@epirisk/schemas/src/validators.js';
import { LlmError } from '@epirisk/shared/src/utils/errors.js';
import { createLlmClient, type LlmClient } from '@epirisk/core/src/llm/llm-client.js';
import { createMockEmbeddingClient } from '@epirisk/core/src/embedding/mock-embedding-client.js';
import {
  createInMemoryEvidenceStore,
  type EvidenceStore,
} from '@epirisk/core/src/retrieval/evidence-store.js';
import { createDetector } from '@epirisk/core/src/orchestration/detector.js';
import { createScoringPipeline } from '@epirisk/core/src/orchestration/scoring-pipeline.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';
import type { ReportResponse } from './schemas/responses.js';

const config = validateAppConfig({ llm: { provider: 'mock' } });

function jsonPost(body: Record<string, unknown>, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

const gilClaim = {
  id: 'gil',
  text: 'Python 3.12 completely removed the GIL',
  span: { start: 0, end: 38 },
  rawConfidence: 0.92,
};

const gilEvidence = [
  {
    id: 'release-notes',
    text: 'Python 3.12 did NOT remove the GIL; free-threading is an experimental build option.',
    sourceId: 'release-notes.md',
    similarityScore: 0.81,
  },
  {
    id: 'pep703',
    text: 'PEP 703 proposes making the GIL optional in future CPython releases.',
    sourceId: 'pep703.md',
    similarityScore: 0.55,
  },
];

function createTestApp(llmClient: LlmClient, evidenceStore: EvidenceStore): OpenAPIHono<AppEnv> {
  return createApp({
    detector: createDetector({ llmClient, evidenceStore, config }),
    scoringPipeline: createScoringPipeline(config.scoring),
    evidenceStore,
  });
}

describe('API', () => {
  let evidenceStore: EvidenceStore;
  let app: OpenAPIHono<AppEnv>;

  beforeEach(async () => {
    evidenceStore = createInMemoryEvidenceStore(createMockEmbeddingClient(), config.retrieval);
    await evidenceStore.indexDocument('tower.md', 'The Eiffel Tower is in Paris, France.');
    await evidenceStore.indexDocument('fruit.md', 'Bananas are yellow when ripe.');
    app = createTestApp(await createLlmClient(config.llm), evidenceStore);
  });

  describe('GET /health', () => {
    it('should report status and corpus size', async () => {
      const res = await app.request('/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        version: '0.1.0',
        corpus: { totalChunks: 2, totalDocuments: 2 },
      });
    });

    it('should echo a caller-supplied request id', async () => {
      const res = await app.request('/health', { headers: { 'X-Request-Id': 'req-123' } });
      expect(res.headers.get('X-Request-Id')).toBe('req-123');
    });

    it('should generate a request id when none is sent', async () => {
      const res = await app.request('/health');
      expect(res.headers.get('X-Request-Id')).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('GET /openapi.json', () => {
    it('should document the analysis routes', async () => {
      const res = await app.request('/openapi.json');
      expect(res.status).toBe(200);
      const body = (await res.json()) as { openapi: string; paths: Record<string, unknown> };
      expect(body.openapi).toBe('3.1.0');
      expect(Object.keys(body.paths)).toEqual(expect.arrayContaining(['/analyze', '/score']));
    });
  });

  describe('POST /analyze', () => {
    it('should extract and score the claims of an answer', async () => {
      const res = await app.request(
        '/analyze',
        jsonPost({ answerText: 'The Eiffel Tower is in Paris. Bananas are purple.' }),
      );
      expect(res.status).toBe(200);

      const body = (await res.json()) as ReportResponse;
      expect(body.claimsCount).toBe(2);
      expect(body.claims.map((claim) => claim.verdict)).toEqual(['GROUNDED', 'HALLUCINATED']);
      expect(body.statistics).toEqual({ grounded: 1, weak: 0, hallucinated: 1, unverifiable: 0 });
      expect(body.summary).toBe(
        '1/2 claims flagged as potential hallucinations. 1 claims are well-grounded.',
      );
      expect(body.extraction?.afterFiltering).toBe(2);
      expect(body.text).toBeUndefined();

      const [grounded] = body.claims;
      expect(grounded.claim.span).toEqual([0, 28]);
      expect('bestEvidence' in grounded && grounded.bestEvidence?.sourceId).toBe('tower.md');
    });

    it('should return an empty report for a blank answer', async () => {
      const res = await app.request('/analyze', jsonPost({ answerText: '   ' }));
      expect(res.status).toBe(200);

      const body = (await res.json()) as ReportResponse;
      expect(body.claimsCount).toBe(0);
      expect(body.overallRisk).toBeNull();
      expect(body.summary).toBe('No factual claims found in the answer.');
      expect(body.extraction?.error).toBe('Empty input text');
    });

    it('should reject a request without answer text', async () => {
      const res = await app.request(
        '/analyze',
        jsonPost({ includeText: true }, { 'X-Request-Id': 'req-400' }),
      );
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId: 'req-400',
        details: ['answerText: Required'],
      });
    });

    it('should map language model failures to 502', async () => {
      const invoke = vi.fn().mockRejectedValue(new LlmError('Vertex AI invocation failed', true));
      const failing = createTestApp({ invoke }, evidenceStore);

      const res = await failing.request(
        '/analyze',
        jsonPost({ answerText: 'The Eiffel Tower is in Paris.' }, { 'X-Request-Id': 'req-502' }),
      );
      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({
        error: 'Language model processing failed',
        code: 'LLM_ERROR',
        requestId: 'req-502',
      });
    });

    it('should map unexpected failures to 500', async () => {
      const invoke = vi.fn().mockRejectedValue(new Error('socket closed'));
      const failing = createTestApp({ invoke }, evidenceStore);

      const res = await failing.request(
        '/analyze',
        jsonPost({ answerText: 'The Eiffel Tower is in Paris.' }, { 'X-Request-Id': 'req-500' }),
      );
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
        requestId: 'req-500',
      });
    });
  });

  describe('POST /score', () => {
    it('should score supplied claims against supplied evidence', async () => {
      const res = await app.request(
        '/score',
        jsonPost({ claims: [gilClaim], evidence: { gil: gilEvidence } }),
      );
      expect(res.status).toBe(200);

      const body = (await res.json()) as ReportResponse;
      expect(body.overallRisk).toBe(0.646);
      expect(body.meanRisk).toBe(0.646);
      expect(body.claims).toHaveLength(1);
      expect(body.claims[0]).toMatchObject({
        claim: { id: 'gil', text: gilClaim.text, span: [0, 38] },
        verdict: 'HALLUCINATED',
        riskScore: 0.646,
        evidenceStrength: 0.138,
        contradictionType: 'DIRECT_NEGATION',
        confidence: { raw: 0.92, calibrated: 0.32, penalties: ['contradiction'] },
        evidence: [
          {
            id: 'release-notes',
            sourceId: 'release-notes.md',
            relation: 'CONTRADICTS',
            similarity: 0.81,
          },
          { id: 'pep703', sourceId: 'pep703.md', relation: 'WEAK_SUPPORT', similarity: 0.55 },
        ],
        bestEvidence: {
          id: 'pep703',
          sourceId: 'pep703.md',
          relation: 'WEAK_SUPPORT',
          similarity: 0.55,
          text: 'PEP 703 proposes making the GIL optional in future CPython releases.',
        },
      });
      expect(body.extraction).toBeUndefined();
    });

    it('should warn about evidence for unknown claims', async () => {
      const res = await app.request(
        '/score',
        jsonPost({ claims: [gilClaim], evidence: { gil: gilEvidence, ghost: gilEvidence } }),
      );

      const body = (await res.json()) as ReportResponse;
      expect(body.warnings).toEqual(['Evidence references unknown claim: ghost']);
    });

    it('should include the text rendering when asked', async () => {
      const res = await app.request(
        '/score',
        jsonPost({ claims: [gilClaim], evidence: { gil: gilEvidence }, includeText: true }),
      );

      const body = (await res.json()) as ReportResponse;
      const lines = (body.text ?? '').split('\n');
      expect(lines[0]).toBe('═══ EPISTEMIC RISK ANALYSIS ═══');
      expect(lines[3]).toBe(`Overall risk: ${'█'.repeat(12)}${'░'.repeat(8)} 65%`);
    });

    it('should mark an out-of-range claim unverifiable and still score the others', async () => {
      const bad = { ...gilClaim, id: 'bad', rawConfidence: 1.5 };
      const res = await app.request(
        '/score',
        jsonPost({ claims: [bad, gilClaim], evidence: { bad: gilEvidence, gil: gilEvidence } }),
      );
      expect(res.status).toBe(200);

      const body = (await res.json()) as ReportResponse;
      expect(body.statistics).toEqual({ grounded: 0, weak: 0, hallucinated: 1, unverifiable: 1 });
      expect(body.overallRisk).toBe(0.646);
      expect(body.claims[0]).toEqual({
        claim: { id: 'bad', text: gilClaim.text, span: [0, 38] },
        verdict: 'UNVERIFIABLE',
        reason: 'Claim confidence must be within [0, 1], got 1.5',
        code: 'MALFORMED_CLAIM',
      });
      expect(body.claims[1]).toMatchObject({ verdict: 'HALLUCINATED', riskScore: 0.646 });
    });

    it('should mark a claim with blank evidence unverifiable', async () => {
      const blank = { id: 'blank', text: '  ', sourceId: 'empty.md', similarityScore: 0.9 };
      const res = await app.request(
        '/score',
        jsonPost({ claims: [gilClaim], evidence: { gil: [blank] } }),
      );
      expect(res.status).toBe(200);

      const body = (await res.json()) as ReportResponse;
      expect(body.claims[0]).toMatchObject({
        verdict: 'UNVERIFIABLE',
        reason: 'Evidence blank has empty text',
        code: 'MALFORMED_EVIDENCE',
      });
    });

    it('should reject claims with the wrong shape', async () => {
      const res = await app.request(
        '/score',
        jsonPost({ claims: [{ ...gilClaim, rawConfidence: 'high' }] }),
      );
      expect(res.status).toBe(400);

      const body = (await res.json()) as { details: string[] };
      expect(body.details).toEqual(['claims.0.rawConfidence: Expected number, received string']);
    });
  });
});
