import type {
  CostRecord,
  Interaction,
  PolicyDecision,
  RiskAssessment
} from '../types/index.js';

export function makeInteraction(overrides: Partial<Interaction> = {}): Interaction {
  return {
    interaction_id: 'int-1',
    correlation_id: 'int-1',
    provider: 'mock',
    model: 'test-model',
    prompt: 'What is the capital of France?',
    completion: 'Paris is the capital of France.',
    usage: { prompt_tokens: 500, completion_tokens: 500 },
    latency_ms: 12,
    attempts: 1,
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides
  };
}

export function makeAssessment(overrides: Partial<RiskAssessment> = {}): RiskAssessment {
  return {
    interaction_id: 'int-1',
    scores: { injection: 0, hallucination: 0, unsafe_content: 0, data_leakage: 0 },
    aggregate: 0,
    aggregation: 'max',
    level: 'safe',
    confidence: 0.5,
    evaluated: { injection: true, hallucination: true, unsafe_content: true, data_leakage: true },
    evidence: [],
    ...overrides
  };
}

export function makeDecision(overrides: Partial<PolicyDecision> = {}): PolicyDecision {
  return {
    interaction_id: 'int-1',
    action: 'allow',
    rule_id: 'default_allow',
    target: null,
    threshold: null,
    response_source: 'original',
    output: 'Paris is the capital of France.',
    synthetic: false,
    reason: 'No rule matched',
    state: 'enforced',
    ...overrides
  };
}

export function makeCost(overrides: Partial<CostRecord> = {}): CostRecord {
  return {
    interaction_id: 'int-1',
    model: 'test-model',
    amount: 0.01,
    currency: 'USD',
    tokens: { prompt: 500, completion: 500, rewrite_prompt: 0, rewrite_completion: 0, total: 1000 },
    anomaly: false,
    z_score: null,
    window_mean: null,
    window_std: null,
    estimated: false,
    confidence: 1,
    ...overrides
  };
}

/** A consistent tuple for one interaction id. */
export function makeTuple(id: string): [Interaction, RiskAssessment, PolicyDecision, CostRecord] {
  return [
    makeInteraction({ interaction_id: id, correlation_id: id }),
    makeAssessment({ interaction_id: id }),
    makeDecision({ interaction_id: id }),
    makeCost({ interaction_id: id })
  ];
}
