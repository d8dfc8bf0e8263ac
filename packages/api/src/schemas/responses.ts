import { z } from '@hono/zod-openapi';
import { ClaimTypeSchema } from '@epirisk/schemas/src/records.schema.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
    corpus: z.object({
      totalChunks: z.number().int(),
      totalDocuments: z.number().int(),
    }),
  })
  .openapi('HealthResponse');

// Reports
const ClaimSchema = z.object({
  id: z.string(),
  text: z.string(),
  span: z.tuple([z.number(), z.number()]),
});

const EvidenceSchema = z.object({
  id: z.string(),
  sourceId: z.string(),
  relation: z.enum(['SUPPORTS', 'WEAK_SUPPORT', 'CONTRADICTS', 'IRRELEVANT']),
  similarity: z.number(),
});

const VerdictSchema = z
  .object({
    claim: ClaimSchema,
    verdict: z.enum(['GROUNDED', 'WEAK', 'HALLUCINATED']),
    riskScore: z.number(),
    evidenceStrength: z.number(),
    contradictionType: z.enum(['NONE', 'DIRECT_NEGATION', 'TEMPORAL_MISMATCH']),
    confidence: z.object({
      raw: z.number(),
      calibrated: z.number(),
      penalties: z.array(
        z.enum(['no_evidence', 'contradiction', 'weak_evidence_only', 'vague_language']),
      ),
    }),
    explanation: z.string(),
    evidence: z.array(EvidenceSchema),
    bestEvidence: EvidenceSchema.extend({ text: z.string() }).nullable(),
  })
  .openapi('ClaimVerdict');

const UnverifiableSchema = z
  .object({
    claim: ClaimSchema,
    verdict: z.literal('UNVERIFIABLE'),
    reason: z.string(),
    code: z.string(),
  })
  .openapi('UnverifiableClaim');

const ExtractionSchema = z.object({
  totalExtracted: z.number().int(),
  afterFiltering: z.number().int(),
  filteredOpinions: z.number().int(),
  hedgedClaims: z.number().int(),
  claimTypes: z.record(ClaimTypeSchema, z.number().int()),
  error: z.string().optional(),
});

export const ReportResponseSchema = z
  .object({
    answerText: z.string(),
    claimsCount: z.number().int(),
    overallRisk: z.number().nullable(),
    meanRisk: z.number().nullable(),
    summary: z.string(),
    degraded: z.boolean(),
    cancelled: z.boolean(),
    warnings: z.array(z.string()),
    statistics: z.object({
      grounded: z.number().int(),
      weak: z.number().int(),
      hallucinated: z.number().int(),
      unverifiable: z.number().int(),
    }),
    claims: z.array(z.union([VerdictSchema, UnverifiableSchema])),
    extraction: ExtractionSchema.optional(),
    text: z.string().optional(),
  })
  .openapi('ReportResponse');

export type ReportResponse = z.infer<typeof ReportResponseSchema>;
