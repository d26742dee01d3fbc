export interface TokenBreakdown {
  prompt: number;
  completion: number;
  rewrite_prompt: number;
  rewrite_completion: number;
  total: number;
}

export interface CostRecord {
  readonly interaction_id: string;
  readonly model: string;
  readonly amount: number;
  readonly currency: string;
  readonly tokens: Readonly<TokenBreakdown>;
  readonly anomaly: boolean;
  readonly z_score: number | null;
  readonly window_mean: number | null;
  readonly window_std: number | null;
  readonly estimated: boolean;
  readonly confidence: number;
  readonly error?: string;
}

export interface ModelPrice {
  input_per_1k: number;
  output_per_1k: number;
}

export interface CostPoint {
  interaction_id: string;
  model: string;
  timestamp: string;
  amount: number;
  z_score: number | null;
  anomaly: boolean;
  estimated: boolean;
}

export interface CostSummary {
  total_requests: number;
  total_cost: number;
  currency: string;
  avg_latency_ms: number;
  total_tokens: number;
  cost_by_model: Record<string, number>;
  tokens_by_model: Record<string, number>;
  anomalies: number;
  estimated: number;
}
