import { z } from '@hono/zod-openapi';
import { ClaimRecordSchema, EvidenceChunkSchema } from '@epirisk/schemas/src/records.schema.js';

const MAX_ANSWER_LENGTH = 50_000;

export const AnalyzeRequestSchema = z
  .object({
    answerText: z.string().max(MAX_ANSWER_LENGTH),
    includeText: z.boolean().default(false),
  })
  .openapi('AnalyzeRequest');

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;

export const ScoreRequestSchema = z
  .object({
    answerText: z.string().max(MAX_ANSWER_LENGTH).default(''),
    claims: z.array(ClaimRecordSchema).max(200),
    evidence: z.record(z.string(), z.array(EvidenceChunkSchema)).default({}),
    includeText: z.boolean().default(false),
  })
  .openapi('ScoreRequest');

export type ScoreRequest = z.infer<typeof ScoreRequestSchema>;
