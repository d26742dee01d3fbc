export const RISK_CATEGORIES = ['injection', 'hallucination', 'unsafe_content', 'data_leakage'] as const;

export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export type RiskLevel = 'safe' | 'low' | 'medium' | 'high' | 'critical';

export type AggregationMode = 'max' | 'weighted_sum';

export interface EvidenceLocation {
  source: 'prompt' | 'completion';
  start: number;
  end: number;
}

export interface Evidence {
  category: RiskCategory;
  signal: string;
  snippet: string;
  confidence: number;
  location?: EvidenceLocation;
  not_evaluated?: boolean;
}

export type CategoryScores = Record<RiskCategory, number>;

export interface RiskAssessment {
  readonly interaction_id: string;
  readonly scores: Readonly<CategoryScores>;
  readonly aggregate: number;
  readonly aggregation: AggregationMode;
  readonly level: RiskLevel;
  readonly confidence: number;
  readonly evaluated: Readonly<Record<RiskCategory, boolean>>;
  readonly evidence: readonly Evidence[];
}

export function isRiskCategory(value: string): value is RiskCategory {
  return RISK_CATEGORIES.some(category => category === value);
}
