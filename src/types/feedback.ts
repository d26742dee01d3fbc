export type FeedbackType = 'positive' | 'negative' | 'neutral';

export type RiskLabel = 'safe' | 'unsafe';

export interface FeedbackInput {
  interaction_id: string;
  rating: number;
  feedback_type: FeedbackType;
  label?: RiskLabel;
  comment?: string;
  tags?: string[];
}

export interface FeedbackRecord {
  readonly feedback_id: string;
  readonly interaction_id: string;
  readonly rating: number;
  readonly feedback_type: FeedbackType;
  readonly label?: RiskLabel;
  readonly comment?: string;
  readonly tags: readonly string[];
  readonly submitted_at: string;
}

export interface WindowMetrics {
  size: number;
  labeled: number;
  agreement_rate: number | null;
  false_positive_rate: number | null;
  false_negative_rate: number | null;
  avg_rating: number | null;
  positive_rate: number | null;
  negative_rate: number | null;
  mean_risk: number | null;
  intervention_rate: number | null;
}

export type DriftMetric = Exclude<keyof WindowMetrics, 'size' | 'labeled'>;

export interface MetricDivergence {
  baseline: number;
  recent: number;
  divergence: number;
  drift: boolean;
}

export interface ThresholdRecommendation {
  rule_id: string;
  current_threshold: number;
  recommended_threshold: number;
  reason: string;
}

export interface DriftReport {
  generated_at: string;
  drift_detected: boolean;
  reason?: string;
  baseline: WindowMetrics;
  recent: WindowMetrics;
  divergences: Partial<Record<DriftMetric, MetricDivergence>>;
  recommendations: ThresholdRecommendation[];
}
