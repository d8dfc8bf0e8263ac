export type ClaimType =
  | 'DIRECT'
  | 'HEDGED'
  | 'MULTI_HOP'
  | 'TEMPORAL'
  | 'COMPARATIVE'
  | 'QUANTITATIVE';

/** Character offsets into the source answer. Best-effort; may not point at the claim text. */
export interface ClaimSpan {
  readonly start: number;
  readonly end: number;
}

export interface ClaimRecord {
  readonly id: string;
  readonly text: string;
  readonly span: ClaimSpan;
  readonly rawConfidence?: number;
  readonly hedgeFlags: readonly string[];
  readonly claimType?: ClaimType;
}

/** A claim after defaults are applied and hedges are merged in. */
export interface NormalizedClaim extends ClaimRecord {
  readonly rawConfidence: number;
}

export interface ExtractionMetadata {
  readonly totalExtracted: number;
  readonly afterFiltering: number;
  readonly filteredOpinions: number;
  readonly hedgedClaims: number;
  readonly claimTypes: Readonly<Record<ClaimType, number>>;
  readonly error?: string;
}
