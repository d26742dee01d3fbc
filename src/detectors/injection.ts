import type { Evidence, Interaction } from '../types/index.js';
import { findMatches, locate, noisyOr, type Detector, type DetectorResult } from './scoring.js';

interface InjectionPattern {
  signal: string;
  pattern: RegExp;
  weight: number;
}

// Prompt injection and manipulation patterns
const INJECTION_PATTERNS: InjectionPattern[] = [
  // Instruction override
  { signal: 'instruction_override', pattern: /ignore\s+(all\s+)?(the\s+|your\s+)?(previous|prior|above|earlier)\s+(instructions|prompts|rules)/gi, weight: 0.95 },
  { signal: 'disregard_instructions', pattern: /disregard\s+(all\b|everything|your\s+(instructions|rules))/gi, weight: 0.9 },
  { signal: 'forget_instructions', pattern: /forget\s+(everything|all\s+(previous|prior)\s+instructions)/gi, weight: 0.85 },

  // Jailbreak personas and safety bypass
  { signal: 'jailbreak_persona', pattern: /you\s+are\s+now\s+(DAN|jailbroken|unrestricted|unfiltered)\b/gi, weight: 0.95 },
  { signal: 'limits_removal', pattern: /pretend\s+(that\s+)?you\s+(have\s+no|don't\s+have)\s+(limits|restrictions|rules)/gi, weight: 0.9 },
  { signal: 'safety_bypass', pattern: /(bypass|override|disable)\s+(your\s+|the\s+)?(safety|content)\s+(filters?|rules?|polic(y|ies))/gi, weight: 0.9 },
  { signal: 'privileged_mode', pattern: /\b(developer|admin|god)\s+mode\b/gi, weight: 0.7 },
  { signal: 'capability_unlock', pattern: /unlock\s+(all|full)\s+(capabilities|features)/gi, weight: 0.6 },

  // System prompt extraction
  { signal: 'system_prompt_extraction', pattern: /(reveal|show|print|repeat|output)\s+(me\s+)?(your|the)\s+(system\s+prompt|hidden\s+instructions|initial\s+instructions)/gi, weight: 0.8 },
  { signal: 'system_prompt_reference', pattern: /system\s+prompt/gi, weight: 0.4 },

  // Instruction smuggling
  { signal: 'template_token', pattern: /\[SYSTEM\]|\[INST\]|<\|im_start\|>|<<SYS>>|###\s*(Instruction|System|Human|Assistant):/gi, weight: 0.6 },

  // Role confusion
  { signal: 'role_reassignment', pattern: /from\s+now\s+on,?\s+(you|your)\s+(are|role|persona)/gi, weight: 0.5 },
  { signal: 'persona_switch', pattern: /you\s+are\s+now\b/gi, weight: 0.4 },
  { signal: 'role_play', pattern: /act\s+as\s+(if\s+you\s+are|though\s+you're)|roleplay\s+as/gi, weight: 0.3 },

  // Encoding tricks
  { signal: 'encoded_payload', pattern: /base64\s*:\s*[A-Za-z0-9+/=]{20,}/gi, weight: 0.5 },
  { signal: 'escape_sequence', pattern: /\\x[0-9a-f]{2}|&#x?[0-9a-f]+;/gi, weight: 0.3 }
];

// Suspicion score patterns (accumulated)
const SUSPICION_PATTERNS: [RegExp, number][] = [
  [/ignore/i, 1],
  [/previous/i, 1],
  [/instruction/i, 2],
  [/pretend/i, 2],
  [/hypothetical/i, 1],
  [/imagine\s+you/i, 2],
  [/let's\s+play\s+a\s+game/i, 2],
  [/in\s+this\s+story/i, 1],
  [/fictional/i, 1]
];

const SUSPICION_THRESHOLD = 3;

export function scoreInjection(prompt: string): DetectorResult {
  const evidence: Evidence[] = [];
  const weights: number[] = [];

  for (const { signal, pattern, weight } of INJECTION_PATTERNS) {
    for (const match of findMatches(pattern, prompt)) {
      weights.push(weight);
      evidence.push({
        category: 'injection',
        signal,
        snippet: match.text,
        confidence: weight,
        location: locate('prompt', match)
      });
    }
  }

  let suspicionScore = 0;
  const suspiciousTerms: string[] = [];
  for (const [pattern, score] of SUSPICION_PATTERNS) {
    const match = prompt.match(pattern);
    if (match) {
      suspicionScore += score;
      suspiciousTerms.push(match[0]);
    }
  }

  if (suspicionScore >= SUSPICION_THRESHOLD) {
    const weight = Math.min(0.5, suspicionScore / 20);
    weights.push(weight);
    evidence.push({
      category: 'injection',
      signal: 'suspicion_terms',
      snippet: suspiciousTerms.join(', '),
      confidence: weight
    });
  }

  return { score: noisyOr(weights), evidence };
}

export const injectionDetector: Detector = {
  name: 'injection-patterns',
  category: 'injection',
  detect: (interaction: Interaction) => scoreInjection(interaction.prompt)
};
