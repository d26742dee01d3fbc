import type { Evidence, EvidenceLocation, Interaction, RiskCategory } from '../types/index.js';

export interface DetectorResult {
  score: number;
  evidence: Evidence[];
}

/**
 * A pure function of the Interaction. Throw DetectorUnavailableError when
 * the input needed for scoring is missing.
 */
export interface Detector {
  readonly name: string;
  readonly category: RiskCategory;
  detect(interaction: Interaction): DetectorResult | Promise<DetectorResult>;
}

export interface TextMatch {
  text: string;
  start: number;
  end: number;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// Independent signals: 1 - Π(1 - wᵢ). Grows with both strength and count.
export function noisyOr(weights: number[]): number {
  return clamp01(1 - weights.reduce((remaining, weight) => remaining * (1 - clamp01(weight)), 1));
}

export function findMatches(pattern: RegExp, text: string): TextMatch[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  const global = new RegExp(pattern.source, flags);
  return Array.from(text.matchAll(global), match => {
    const start = match.index ?? 0;
    return { text: match[0], start, end: start + match[0].length };
  });
}

export function locate(source: EvidenceLocation['source'], match: TextMatch): EvidenceLocation {
  return { source, start: match.start, end: match.end };
}

export function overlaps(a: { start: number; end: number }, b: { start: number; end: number }): boolean {
  return a.start < b.end && b.start < a.end;
}
