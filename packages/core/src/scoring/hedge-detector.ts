import type { ClaimType } from '@epirisk/shared/src/types/claim.types.js';

const HEDGE_PATTERN =
  /\b(?:might|may(?!\s+\d)|could|possibly|perhaps|probably|likely|unlikely|it is believed|it is thought|some say|reportedly|allegedly|seems?|appears?|suggests?|indicates?|i think|i believe|in my opinion|arguably|generally|typically|usually|often|sometimes|approximately|roughly)\b/gi;

const MULTI_HOP_PATTERN =
  /\b(?:because|therefore|thus|hence|consequently|as a result|since|given that|due to|owing to|which means|this implies|leading to)\b/i;

const QUANTITATIVE_PATTERN =
  /\b\d+(?:\.\d+)?\s*(?:billion|million|thousand|percent\b|%)|\b(?:approximately|about|around|roughly)\s*\d+\b/i;

const COMPARATIVE_PATTERN =
  /\b(?:faster|slower|better|worse|more|less|larger|smaller)\s+than\b|\b(?:compared to|relative to|versus|vs\.?)(?=\s)|\bthe (?:most|least|best|worst)\b/i;

const TEMPORAL_PATTERN =
  /\b(?:as of|until|before|after|recently|currently|now|last year|this year|next year)\b|\b(?:in|during|by) \d{4}\b/i;

/**
 * Returns the distinct hedging markers found in `text`, lower-cased, in order
 * of first appearance.
 */
export function detectHedges(text: string): readonly string[] {
  const markers: string[] = [];
  for (const match of text.matchAll(HEDGE_PATTERN)) {
    // Capitalized mid-sentence "May" is the month.
    if (match[0] === 'May' && match.index !== undefined && match.index > 0) continue;

    const marker = match[0].toLowerCase().replace(/\s+/g, ' ');
    if (!markers.includes(marker)) {
      markers.push(marker);
    }
  }
  return markers;
}

export function mergeHedgeFlags(declared: readonly string[], text: string): readonly string[] {
  const merged = declared.map((flag) => flag.toLowerCase());
  for (const marker of detectHedges(text)) {
    if (!merged.includes(marker)) {
      merged.push(marker);
    }
  }
  return merged;
}

// More specific shapes are checked first.
export function classifyClaimType(text: string): ClaimType {
  if (detectHedges(text).length > 0) return 'HEDGED';
  if (MULTI_HOP_PATTERN.test(text)) return 'MULTI_HOP';
  if (QUANTITATIVE_PATTERN.test(text)) return 'QUANTITATIVE';
  if (COMPARATIVE_PATTERN.test(text)) return 'COMPARATIVE';
  if (TEMPORAL_PATTERN.test(text)) return 'TEMPORAL';
  return 'DIRECT';
}
