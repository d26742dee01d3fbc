import type { Evidence, Interaction } from '../types/index.js';
import { DetectorUnavailableError } from '../errors.js';
import { findMatches, locate, noisyOr, type Detector, type DetectorResult } from './scoring.js';

const HEDGING_MARKERS = [
  'i think',
  'maybe',
  'possibly',
  'might be',
  'not sure',
  'unclear',
  'uncertain',
  'probably',
  'as far as i know'
];

// Overconfident patterns
const OVERCONFIDENT_PATTERNS = [
  /\bdefinitely\b/i,
  /\bcertainly\b/i,
  /\babsolutely\b/i,
  /\bwithout\s+(a\s+)?doubt\b/i,
  /\bi('m|\s+am)\s+(100%|completely|totally)\s+(sure|certain|confident)\b/i,
  /\bthe\s+truth\s+is\b/i,
  /\bthe\s+fact\s+is\b/i,
  /\bit('s|\s+is)\s+obvious\s+that\b/i,
  /\beveryone\s+knows\b/i,
  /\bguaranteed\b/i
];

// Numbers, percentages and attributions that should be traceable to a source
const SPECIFIC_CLAIM = /\b\d+(?:[.,]\d+)*%?|\baccording\s+to\s+[^.,;\n]+|\bstudies\s+(?:show|have\s+shown)\b|\bet\s+al\./gi;

const NEGATIONS = new Set(['not', 'no', 'never', 'none', 'cannot', "can't", "don't", "doesn't", "isn't", "won't", 'neither', 'nor']);

const STOPWORDS = new Set([
  'the', 'and', 'for', 'with', 'that', 'this', 'does', 'did', 'are', 'was', 'were', 'has', 'have', 'had',
  'its', 'from', 'into', 'than', 'then', 'they', 'them', 'their', 'there', 'which', 'what', 'will', 'would',
  'can', 'could', 'should', 'about', 'also', 'but', 'you', 'your', 'our', 'all', 'any'
]);

const UNSUPPORTED_CLAIM_WEIGHT = 0.2;
const UNVERIFIABLE_CLAIM_WEIGHT = 0.15;
const CONFIDENCE_MISMATCH_WEIGHT = 0.5;
const CONTRADICTION_WEIGHT = 0.6;
const OVERLAP_RATIO = 0.6;
const MIN_SHARED_TERMS = 3;

function sentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map(sentence => sentence.trim())
    .filter(Boolean);
}

function words(sentence: string): string[] {
  return sentence.toLowerCase().match(/[a-z0-9']+/g) ?? [];
}

function contentTerms(sentence: string): Set<string> {
  return new Set(words(sentence).filter(word => word.length >= 3 && !STOPWORDS.has(word) && !NEGATIONS.has(word)));
}

function isNegated(sentence: string): boolean {
  return words(sentence).some(word => NEGATIONS.has(word));
}

function findContradiction(completion: string, context: string): { claim: string; source: string } | null {
  const contextSentences = sentences(context);

  for (const claim of sentences(completion)) {
    const claimTerms = contentTerms(claim);
    for (const source of contextSentences) {
      const sourceTerms = contentTerms(source);
      const shared = [...claimTerms].filter(term => sourceTerms.has(term)).length;
      const smaller = Math.min(claimTerms.size, sourceTerms.size);

      if (shared >= MIN_SHARED_TERMS && shared / smaller >= OVERLAP_RATIO && isNegated(claim) !== isNegated(source)) {
        return { claim, source };
      }
    }
  }

  return null;
}

export function scoreHallucination(completion: string, context?: string): DetectorResult {
  const evidence: Evidence[] = [];
  const weights: number[] = [];
  const lower = completion.toLowerCase();

  const hedges = HEDGING_MARKERS.filter(marker => lower.includes(marker));
  if (hedges.length > 2) {
    const weight = Math.min(hedges.length * 0.15, 0.6);
    weights.push(weight);
    evidence.push({ category: 'hallucination', signal: 'hedging_density', snippet: hedges.join(', '), confidence: weight });
  }

  const overconfident = OVERCONFIDENT_PATTERNS.flatMap(pattern => findMatches(pattern, completion));
  if (overconfident.length > 0 && hedges.length > 0) {
    weights.push(CONFIDENCE_MISMATCH_WEIGHT);
    evidence.push({
      category: 'hallucination',
      signal: 'confidence_mismatch',
      snippet: `${overconfident[0].text} / ${hedges[0]}`,
      confidence: CONFIDENCE_MISMATCH_WEIGHT,
      location: locate('completion', overconfident[0])
    });
  }

  const claims = findMatches(SPECIFIC_CLAIM, completion);
  if (context !== undefined && context.trim().length > 0) {
    const groundTruth = context.toLowerCase();
    for (const claim of claims) {
      if (!groundTruth.includes(claim.text.toLowerCase())) {
        weights.push(UNSUPPORTED_CLAIM_WEIGHT);
        evidence.push({
          category: 'hallucination',
          signal: 'unsupported_claim',
          snippet: claim.text,
          confidence: UNSUPPORTED_CLAIM_WEIGHT,
          location: locate('completion', claim)
        });
      }
    }

    const contradiction = findContradiction(completion, context);
    if (contradiction) {
      weights.push(CONTRADICTION_WEIGHT);
      evidence.push({
        category: 'hallucination',
        signal: 'context_contradiction',
        snippet: contradiction.claim,
        confidence: CONTRADICTION_WEIGHT
      });
    }
  } else if (overconfident.length > 0) {
    // Without context, specifics are only suspicious when asserted overconfidently
    for (const claim of claims) {
      weights.push(UNVERIFIABLE_CLAIM_WEIGHT);
      evidence.push({
        category: 'hallucination',
        signal: 'unverifiable_claim',
        snippet: claim.text,
        confidence: UNVERIFIABLE_CLAIM_WEIGHT,
        location: locate('completion', claim)
      });
    }
  }

  return { score: noisyOr(weights), evidence };
}

export const hallucinationDetector: Detector = {
  name: 'hallucination-heuristics',
  category: 'hallucination',
  detect: (interaction: Interaction) => {
    if (interaction.completion === null) {
      throw new DetectorUnavailableError('No completion to evaluate', 'hallucination', 'hallucination-heuristics');
    }
    return scoreHallucination(interaction.completion, interaction.context);
  }
};
