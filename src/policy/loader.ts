import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { PolicyConfig, ThresholdRecommendation } from '../types/index.js';
import { PolicyFileSchema, formatIssues } from '../config/schema.js';
import { PolicyConfigError, errorMessage } from '../errors.js';

export const DEFAULT_POLICY: PolicyConfig = {
  version: '1',
  rules: [
    { id: 'injection_block', name: 'Block prompt injection', target: 'injection', threshold: 0.9, action: 'block', enabled: true },
    { id: 'data_leakage_rewrite', name: 'Redact and retry on data leakage', target: 'data_leakage', threshold: 0.8, action: 'rewrite', enabled: true },
    { id: 'critical_risk_block', name: 'Block critical risk responses', target: 'aggregate', threshold: 0.7, action: 'block', enabled: true },
    { id: 'high_risk_fallback', name: 'Fallback for high risk', target: 'aggregate', threshold: 0.6, action: 'fallback', enabled: true },
    { id: 'medium_risk_rewrite', name: 'Rewrite medium risk prompts', target: 'aggregate', threshold: 0.3, action: 'rewrite', enabled: true }
  ],
  refusal_message: '[Response blocked by safety policy]',
  fallback_response:
    'I cannot assist with that request as it may involve harmful or unethical activities. Please ask something else that I can help with constructively.',
  top_severity_threshold: 0.7,
  aggregation: {
    mode: 'max',
    weights: { injection: 1, hallucination: 1, unsafe_content: 1, data_leakage: 1 }
  }
};

const inUnitRange = (value: number): boolean => Number.isFinite(value) && value >= 0 && value <= 1;

/**
 * Parses and validates a policy document. Every violation is collected
 * into a single PolicyConfigError.
 */
export function validatePolicy(raw: unknown): PolicyConfig {
  const parsed = PolicyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PolicyConfigError('Invalid policy', formatIssues(parsed.error));
  }

  const policy = parsed.data;
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const rule of policy.rules) {
    if (seen.has(rule.id)) {
      issues.push(`duplicate rule id "${rule.id}"`);
    }
    seen.add(rule.id);

    if (!inUnitRange(rule.threshold)) {
      issues.push(`rule "${rule.id}" threshold ${rule.threshold} is outside [0, 1]`);
    }
  }

  const fallbackRules = policy.rules.filter(rule => rule.action === 'fallback');
  if (fallbackRules.length !== 1) {
    issues.push(`exactly one fallback rule is required, found ${fallbackRules.length}`);
  }

  if (policy.fallback_response.trim().length === 0) {
    issues.push('fallback_response must not be empty');
  }

  if (policy.refusal_message.trim().length === 0) {
    issues.push('refusal_message must not be empty');
  }

  if (!inUnitRange(policy.top_severity_threshold)) {
    issues.push(`top_severity_threshold ${policy.top_severity_threshold} is outside [0, 1]`);
  }

  if (policy.aggregation.mode === 'weighted_sum') {
    const total = Object.values(policy.aggregation.weights).reduce((sum, weight) => sum + weight, 0);
    if (total <= 0) {
      issues.push('weighted_sum aggregation needs at least one positive weight');
    }
  }

  if (issues.length > 0) {
    throw new PolicyConfigError('Invalid policy', issues);
  }

  return policy;
}

export function loadPolicyFile(path: string): PolicyConfig {
  if (!existsSync(path)) {
    throw new PolicyConfigError(`Policy file not found: ${path}`, []);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new PolicyConfigError(`Policy file ${path} is not valid YAML`, [errorMessage(error)]);
  }

  return validatePolicy(raw);
}

/**
 * Produces a new, re-validated policy with recommended thresholds applied.
 * The input policy is left untouched.
 */
export function applyRecommendations(
  policy: PolicyConfig,
  recommendations: ThresholdRecommendation[]
): PolicyConfig {
  const byRule = new Map(recommendations.map(rec => [rec.rule_id, rec.recommended_threshold]));

  for (const ruleId of byRule.keys()) {
    if (!policy.rules.some(rule => rule.id === ruleId)) {
      throw new PolicyConfigError('Recommendation targets an unknown rule', [ruleId]);
    }
  }

  return validatePolicy({
    ...policy,
    rules: policy.rules.map(rule => {
      const threshold = byRule.get(rule.id);
      return threshold === undefined ? { ...rule } : { ...rule, threshold };
    })
  });
}
