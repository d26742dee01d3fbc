import type { Evidence, EvidenceLocation, Interaction } from '../types/index.js';
import { findMatches, locate, noisyOr, overlaps, type Detector, type DetectorResult } from './scoring.js';

export interface LeakageOptions {
  /** Minimum Shannon entropy (bits per character) for a credential-shaped token. */
  entropy_threshold: number;
  min_token_length: number;
}

export const DEFAULT_LEAKAGE_OPTIONS: LeakageOptions = {
  entropy_threshold: 4.0,
  min_token_length: 20
};

interface SecretPattern {
  signal: string;
  pattern: RegExp;
  confidence: number;
}

const SECRET_PATTERNS: SecretPattern[] = [
  { signal: 'private_key', pattern: /-----BEGIN (?:RSA |EC |OPENSSH |DSA )?PRIVATE KEY-----/g, confidence: 1.0 },
  { signal: 'aws_access_key', pattern: /\b(?:AKIA|ASIA)[0-9A-Z]{16}\b/g, confidence: 0.95 },
  { signal: 'jwt', pattern: /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g, confidence: 0.85 },
  { signal: 'bearer_token', pattern: /\bBearer\s+[A-Za-z0-9\-._~+/]{16,}=*/g, confidence: 0.8 },
  { signal: 'api_key_assignment', pattern: /\b(?:api[_-]?key|secret[_-]?key|access[_-]?token)\s*[:=]\s*['"]?[A-Za-z0-9_\-]{8,}['"]?/gi, confidence: 0.85 },
  { signal: 'password_assignment', pattern: /\b(?:password|passwd|pwd)\s*[:=]\s*['"]?\S{4,}['"]?/gi, confidence: 0.8 },
  { signal: 'ssn', pattern: /\b\d{3}-\d{2}-\d{4}\b/g, confidence: 0.9 },
  { signal: 'email', pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, confidence: 0.5 },
  { signal: 'phone_number', pattern: /(?:\+1[\s.-]?)?\(?\b\d{3}\)?[\s.-]\d{3}[\s.-]\d{4}\b/g, confidence: 0.4 }
];

const CARD_CANDIDATE = /\b(?:\d[ -]?){12,18}\d\b/g;
const CARD_CONFIDENCE = 0.95;
const UNCHECKED_CARD_CONFIDENCE = 0.3;

const TOKEN_CANDIDATE = /[A-Za-z0-9_\-+/=]+/g;
const ENTROPY_CONFIDENCE = 0.6;

interface Candidate extends Evidence {
  location: EvidenceLocation;
}

export function luhnValid(digits: string): boolean {
  let sum = 0;
  let double = false;

  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 48;
    if (double) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    double = !double;
  }

  return sum % 10 === 0;
}

export function shannonEntropy(value: string): number {
  if (value.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const char of value) {
    counts.set(char, (counts.get(char) ?? 0) + 1);
  }

  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / value.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

function scan(text: string, source: EvidenceLocation['source'], options: LeakageOptions): Candidate[] {
  const candidates: Candidate[] = [];
  const push = (signal: string, confidence: number, match: { text: string; start: number; end: number }): void => {
    candidates.push({
      category: 'data_leakage',
      signal,
      snippet: match.text,
      confidence,
      location: locate(source, match)
    });
  };

  for (const { signal, pattern, confidence } of SECRET_PATTERNS) {
    for (const match of findMatches(pattern, text)) {
      push(signal, confidence, match);
    }
  }

  for (const match of findMatches(CARD_CANDIDATE, text)) {
    const digits = match.text.replace(/\D/g, '');
    if (digits.length < 13 || digits.length > 19) continue;

    if (luhnValid(digits)) {
      push('credit_card', CARD_CONFIDENCE, match);
    } else {
      push('card_like_number', UNCHECKED_CARD_CONFIDENCE, match);
    }
  }

  for (const match of findMatches(TOKEN_CANDIDATE, text)) {
    if (match.text.length < options.min_token_length) continue;
    if (!/[A-Za-z]/.test(match.text) || !/\d/.test(match.text)) continue;
    if (shannonEntropy(match.text) < options.entropy_threshold) continue;
    push('high_entropy_token', ENTROPY_CONFIDENCE, match);
  }

  return candidates;
}

// Highest confidence first; a candidate overlapping an accepted one is dropped
function resolveOverlaps(candidates: Candidate[]): Candidate[] {
  const ranked = [...candidates].sort(
    (a, b) => b.confidence - a.confidence || a.location.start - b.location.start
  );
  const accepted: Candidate[] = [];

  for (const candidate of ranked) {
    const clash = accepted.some(
      other => other.location.source === candidate.location.source && overlaps(other.location, candidate.location)
    );
    if (!clash) accepted.push(candidate);
  }

  return accepted.sort(
    (a, b) => a.location.source.localeCompare(b.location.source) || a.location.start - b.location.start
  );
}

export function scanLeakage(
  prompt: string,
  completion: string | null,
  options: LeakageOptions = DEFAULT_LEAKAGE_OPTIONS
): DetectorResult {
  const candidates = scan(prompt, 'prompt', options);
  if (completion !== null) {
    candidates.push(...scan(completion, 'completion', options));
  }

  const evidence = resolveOverlaps(candidates);
  return {
    score: noisyOr(evidence.map(item => item.confidence)),
    evidence
  };
}

export function createLeakageDetector(options: Partial<LeakageOptions> = {}): Detector {
  const resolved: LeakageOptions = { ...DEFAULT_LEAKAGE_OPTIONS, ...options };
  return {
    name: 'data-leakage-scanner',
    category: 'data_leakage',
    detect: (interaction: Interaction) => scanLeakage(interaction.prompt, interaction.completion, resolved)
  };
}
