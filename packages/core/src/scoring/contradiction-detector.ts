import type { ContradictionType } from '@epirisk/shared/src/types/analysis.types.js';

const NEGATION_PATTERN =
  /\b(?:not|no|never|none|neither|nor|nothing|nowhere|nobody|cannot)\b|\b[a-z]+n['’]t\b/i;

const NEGATION_WORDS = new Set([
  'not',
  'no',
  'never',
  'none',
  'neither',
  'nor',
  'nothing',
  'nowhere',
  'nobody',
  'cannot',
]);

const STOP_WORDS = new Set([
  'the',
  'and',
  'for',
  'with',
  'that',
  'this',
  'these',
  'those',
  'was',
  'were',
  'are',
  'has',
  'have',
  'had',
  'its',
  'from',
  'into',
  'than',
  'then',
  'but',
  'did',
  'does',
  'been',
  'being',
  'which',
  'who',
  'what',
  'when',
  'where',
  'also',
  'any',
  'all',
  'can',
  'will',
  'would',
  'there',
  'their',
  'they',
]);

const TOKEN_PATTERN = /[a-z0-9]+(?:\.[0-9]+)*/g;
const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/g;

/**
 * Decides whether an evidence passage contradicts a claim. Implementations may
 * be as simple as a regex or as heavy as an entailment model; the evaluator
 * only sees the returned type.
 */
export interface ContradictionDetector {
  detect(claimText: string, evidenceText: string): ContradictionType;
}

export function hasNegation(text: string): boolean {
  return NEGATION_PATTERN.test(text);
}

/** Lower-cased words of three or more characters, or containing a digit, minus stop and negation words. */
export function contentTerms(text: string): ReadonlySet<string> {
  const terms = new Set<string>();
  for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
    if (token.length < 3 && !/\d/.test(token)) continue;
    if (STOP_WORDS.has(token) || NEGATION_WORDS.has(token)) continue;
    terms.add(token);
  }
  return terms;
}

function years(text: string): ReadonlySet<string> {
  return new Set(text.match(YEAR_PATTERN) ?? []);
}

function sharedTerms(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter((term) => b.has(term));
}

export function createPatternContradictionDetector(): ContradictionDetector {
  return {
    detect(claimText: string, evidenceText: string): ContradictionType {
      const shared = sharedTerms(contentTerms(claimText), contentTerms(evidenceText));
      if (shared.length === 0) {
        return 'NONE';
      }

      if (hasNegation(claimText) !== hasNegation(evidenceText)) {
        return 'DIRECT_NEGATION';
      }

      const claimYears = years(claimText);
      const evidenceYears = years(evidenceText);
      if (
        claimYears.size > 0 &&
        evidenceYears.size > 0 &&
        sharedTerms(claimYears, evidenceYears).length === 0
      ) {
        return 'TEMPORAL_MISMATCH';
      }

      return 'NONE';
    },
  };
}

/** Adapts a boolean predicate; a positive answer is reported as a direct negation. */
export function contradictionDetectorFromPredicate(
  isContradiction: (claimText: string, evidenceText: string) => boolean,
): ContradictionDetector {
  return {
    detect(claimText: string, evidenceText: string): ContradictionType {
      return isContradiction(claimText, evidenceText) ? 'DIRECT_NEGATION' : 'NONE';
    },
  };
}
