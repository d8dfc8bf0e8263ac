import { createHash } from 'node:crypto';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ExtractionConfig } from '@epirisk/schemas/src/app-config.schema.js';
import { ClaimTypeSchema } from '@epirisk/schemas/src/records.schema.js';
import type {
  ClaimRecord,
  ClaimSpan,
  ClaimType,
  ExtractionMetadata,
} from '@epirisk/shared/src/types/claim.types.js';
import { createChildLogger } from '@epirisk/shared/src/logger.js';
import { AgentError } from '@epirisk/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { classifyClaimType, detectHedges } from '../scoring/hedge-detector.js';

const log = createChildLogger('extraction:claim-extractor');

const ExtractedClaimSchema = z.object({
  text: z.string().trim().min(1),
  start: z.number().int().default(0),
  end: z.number().int().default(0),
  confidence: z.number().min(0).max(1),
  isFactual: z.boolean().default(true),
  claimType: ClaimTypeSchema.optional().catch(undefined),
  extractionConfidence: z.number().min(0).max(1).optional(),
});

const ClaimExtractionSchema = z.object({
  claims: z.array(ExtractedClaimSchema),
});

export type ExtractedClaim = z.infer<typeof ExtractedClaimSchema>;

const ClaimExtractionJsonSchema = zodToJsonSchema(ClaimExtractionSchema, {
  name: 'ClaimExtraction',
  $refStrategy: 'none',
});

const SYSTEM_PROMPT = `You are a precise claim extractor. Decompose the user's text into atomic, falsifiable claims.

Rules:
- Each claim is a single checkable assertion; split compound sentences
- Preserve the original meaning and wording as closely as possible
- Keep temporal details (dates, versions) inside the claim they qualify
- Opinions are not factual unless framed as facts ("Studies show ...")
- claimType is one of DIRECT, HEDGED, MULTI_HOP, TEMPORAL, COMPARATIVE, QUANTITATIVE

Respond with a JSON object containing:
- claims: array of { text, start, end, confidence, isFactual, claimType, extractionConfidence }
  where start/end are character offsets into the text and confidence (0-1) is how
  certain the text sounds about the claim`;

export interface ExtractionResult {
  readonly claims: readonly ClaimRecord[];
  readonly metadata: ExtractionMetadata;
}

function countTypes(claims: readonly ClaimRecord[]): Record<ClaimType, number> {
  const counts: Record<ClaimType, number> = {
    DIRECT: 0,
    HEDGED: 0,
    MULTI_HOP: 0,
    TEMPORAL: 0,
    COMPARATIVE: 0,
    QUANTITATIVE: 0,
  };
  for (const claim of claims) {
    if (claim.claimType) counts[claim.claimType]++;
  }
  return counts;
}

function emptyResult(error: string): ExtractionResult {
  return {
    claims: [],
    metadata: {
      totalExtracted: 0,
      afterFiltering: 0,
      filteredOpinions: 0,
      hedgedClaims: 0,
      claimTypes: countTypes([]),
      error,
    },
  };
}

export function claimId(text: string, start: number): string {
  return createHash('sha256').update(`${text}:${String(start)}`).digest('hex').slice(0, 12);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Model offsets are unreliable, so spans are re-derived from the answer: an
 * exact case-insensitive match (preferring one at or after the model's start),
 * else the first five words up to the end of their sentence. Falls back to the
 * model's span clipped to the answer.
 */
export function anchorSpan(answerText: string, claim: ExtractedClaim): ClaimSpan {
  const haystack = answerText.toLowerCase();
  const needle = claim.text.toLowerCase();

  const hinted = haystack.indexOf(needle, Math.max(0, claim.start));
  const found = hinted >= 0 ? hinted : haystack.indexOf(needle);
  if (found >= 0) {
    return { start: found, end: found + claim.text.length };
  }

  const words = claim.text.split(/\s+/).slice(0, 5).map(escapeRegExp);
  const match = new RegExp(`\\b${words.join('\\s+')}`, 'i').exec(answerText);
  if (match) {
    const sentenceEnd = /[.!?]/.exec(answerText.slice(match.index));
    const end = sentenceEnd ? match.index + sentenceEnd.index + 1 : match.index + claim.text.length;
    return { start: match.index, end: Math.min(end, answerText.length) };
  }

  return { start: claim.start, end: Math.min(claim.end, answerText.length) };
}

function toClaimRecord(answerText: string, extracted: ExtractedClaim): ClaimRecord {
  const span = anchorSpan(answerText, extracted);
  const hedgeFlags = detectHedges(extracted.text);
  const claimType: ClaimType =
    hedgeFlags.length > 0 ? 'HEDGED' : (extracted.claimType ?? classifyClaimType(extracted.text));

  return {
    id: claimId(extracted.text, span.start),
    text: extracted.text,
    span,
    rawConfidence: extracted.confidence,
    hedgeFlags,
    claimType,
  };
}

/**
 * Asks the model to decompose an answer into claims, then filters and
 * normalizes them. Output the model cannot produce validly is reported through
 * `metadata.error`; transport failures propagate as LlmError.
 */
export async function extractClaims(
  answerText: string,
  llmClient: LlmClient,
  config: ExtractionConfig,
): Promise<ExtractionResult> {
  if (answerText.trim().length === 0) {
    return emptyResult('Empty input text');
  }

  log.info({ answerLength: answerText.length }, 'Extracting claims');

  let extracted: readonly ExtractedClaim[];
  try {
    const result = await invokeAndValidate({
      llmClient,
      request: {
        systemPrompt: SYSTEM_PROMPT,
        userMessage: answerText,
        jsonSchema: ClaimExtractionJsonSchema,
      },
      schema: ClaimExtractionSchema,
      operation: 'Claim extractor',
      maxRetries: config.maxRetries,
    });
    extracted = result.claims;
  } catch (error) {
    if (error instanceof AgentError) {
      log.warn({ error: error.message }, 'Claim extraction failed, returning no claims');
      return emptyResult(error.message);
    }
    throw error;
  }

  const claims: ClaimRecord[] = [];
  const seen = new Set<string>();

  for (const candidate of extracted) {
    if (!candidate.isFactual && !config.includeOpinions) continue;
    if (candidate.text.length < config.minClaimLength) continue;
    if (claims.length >= config.maxClaims) break;

    const claim = toClaimRecord(answerText, candidate);
    if (seen.has(claim.id)) {
      log.debug({ claimId: claim.id }, 'Skipping duplicate claim');
      continue;
    }
    seen.add(claim.id);
    claims.push(claim);
  }

  const metadata: ExtractionMetadata = {
    totalExtracted: extracted.length,
    afterFiltering: claims.length,
    filteredOpinions: config.includeOpinions
      ? 0
      : extracted.filter((claim) => !claim.isFactual).length,
    hedgedClaims: claims.filter((claim) => claim.hedgeFlags.length > 0).length,
    claimTypes: countTypes(claims),
  };

  log.info(
    { totalExtracted: metadata.totalExtracted, afterFiltering: metadata.afterFiltering },
    'Claim extraction complete',
  );

  return { claims, metadata };
}
