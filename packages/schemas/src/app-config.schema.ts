import { z } from 'zod';
import { ScoringConfigSchema } from './scoring-config.schema.js';

const LlmConfigSchema = z.object({
  provider: z.enum(['vertex', 'mock']).default('vertex'),
  model: z.string().min(1).default('gemini-2.0-flash'),
  temperature: z.number().min(0).max(2).default(0),
  location: z.string().min(1).default('europe-west1'),
});

const RetrievalConfigSchema = z.object({
  chunkSize: z.number().int().positive().default(512),
  chunkOverlap: z.number().int().min(0).default(64),
  topK: z.number().int().positive().default(5),
  similarityThreshold: z.number().min(0).max(1).default(0.3),
  embeddingModel: z.string().min(1).default('text-embedding-005'),
  extensions: z.array(z.string().regex(/^\.\w+$/)).min(1).default(['.txt', '.md']),
});

const ExtractionConfigSchema = z.object({
  maxClaims: z.number().int().positive().default(50),
  minClaimLength: z.number().int().positive().default(10),
  maxRetries: z.number().int().min(0).default(1),
  includeOpinions: z.boolean().default(false),
});

export const AppConfigSchema = z
  .object({
    $schema: z.string().optional(),
    llm: LlmConfigSchema.default({}),
    retrieval: RetrievalConfigSchema.default({}),
    extraction: ExtractionConfigSchema.default({}),
    scoring: ScoringConfigSchema.default({}),
  })
  .refine((config) => config.retrieval.chunkOverlap < config.retrieval.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['retrieval', 'chunkOverlap'],
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
