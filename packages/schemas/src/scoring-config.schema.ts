import { z } from 'zod';

/** Unknown keys are rejected so a misspelled option fails at load time. */
export const ScoringConfigSchema = z
  .object({
    similarityThreshold: z.number().default(0.3),
    strongSimilarityThreshold: z.number().default(0.7),
    weakSupportWeight: z.number().default(0.5),
    noEvidencePenalty: z.number().default(0.4),
    contradictionPenalty: z.number().default(0.6),
    weakEvidencePenalty: z.number().default(0.15),
    vagueLanguagePenalty: z.number().default(0.2),
    hallucinationThreshold: z.number().default(0.3),
    groundedThreshold: z.number().default(0.7),
    riskConfidenceWeight: z.number().default(0.4),
    riskEvidenceWeight: z.number().default(0.6),
    defaultRawConfidence: z.number().default(0.5),
  })
  .strict();

export type ScoringConfig = Readonly<z.infer<typeof ScoringConfigSchema>>;
export type ScoringConfigInput = z.input<typeof ScoringConfigSchema>;
export const DEFAULT_SCORING_CONFIG: ScoringConfig = Object.freeze(ScoringConfigSchema.parse({}));
