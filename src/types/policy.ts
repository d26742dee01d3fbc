import type { AggregationMode, RiskCategory } from './risk.js';
import type { ProviderUsage } from './interaction.js';

export const POLICY_ACTIONS = ['allow', 'block', 'fallback', 'rewrite'] as const;

export type PolicyAction = (typeof POLICY_ACTIONS)[number];

export type RuleTarget = RiskCategory | 'aggregate';

export type PolicyState = 'pending' | 'evaluated' | 'enforced';

export type ResponseSource = 'original' | 'fallback' | 'rewritten' | 'refusal';

export interface PolicyRule {
  id: string;
  name?: string;
  target: RuleTarget;
  threshold: number;
  action: PolicyAction;
  enabled: boolean;
}

export interface PolicyConfig {
  version: string;
  rules: PolicyRule[];
  refusal_message: string;
  fallback_response: string;
  top_severity_threshold: number;
  aggregation: {
    mode: AggregationMode;
    weights: Record<RiskCategory, number>;
  };
}

export interface RewriteDetails {
  sanitized_prompt: string;
  completion: string | null;
  usage: ProviderUsage;
  aggregate: number | null;
  downgraded: boolean;
  error?: string;
}

export interface PolicyDecision {
  readonly interaction_id: string;
  readonly action: PolicyAction;
  readonly rule_id: string;
  readonly target: RuleTarget | null;
  readonly threshold: number | null;
  readonly response_source: ResponseSource;
  readonly output: string | null;
  readonly synthetic: boolean;
  readonly reason: string;
  readonly state: 'enforced';
  readonly rewrite?: RewriteDetails;
}
