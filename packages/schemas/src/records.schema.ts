import { z } from 'zod';

export const ClaimTypeSchema = z.enum([
  'DIRECT',
  'HEDGED',
  'MULTI_HOP',
  'TEMPORAL',
  'COMPARATIVE',
  'QUANTITATIVE',
]);

/**
 * Shape-only: blank text and values outside [0, 1] are left to the scoring
 * pipeline, which marks the affected claim UNVERIFIABLE and scores the rest.
 */
export const ClaimRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  span: z.object({ start: z.number().int(), end: z.number().int() }).default({ start: 0, end: 0 }),
  rawConfidence: z.number().optional(),
  hedgeFlags: z.array(z.string()).default([]),
  claimType: ClaimTypeSchema.optional(),
});

export const EvidenceChunkSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  sourceId: z.string().min(1),
  similarityScore: z.number(),
  chunkIndex: z.number().int().min(0).optional(),
});

export type ClaimRecordInput = z.input<typeof ClaimRecordSchema>;
export type EvidenceChunkInput = z.input<typeof EvidenceChunkSchema>;
