import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_POLICY, applyRecommendations, loadPolicyFile, validatePolicy } from './loader.js';
import { PolicyConfigError } from '../errors.js';

const DEFAULT_POLICY_FILE = fileURLToPath(new URL('../../policies/default.yaml', import.meta.url));

function issuesOf(raw: unknown): string[] {
  try {
    validatePolicy(raw);
  } catch (error) {
    if (error instanceof PolicyConfigError) return error.issues;
    throw error;
  }
  return [];
}

const base = {
  refusal_message: 'No.',
  fallback_response: 'Try something else.',
  rules: [
    { id: 'block_injection', target: 'injection', threshold: 0.9, action: 'block' },
    { id: 'fallback_high', target: 'aggregate', threshold: 0.6, action: 'fallback' }
  ]
};

describe('validatePolicy', () => {
  it('fills defaults', () => {
    const policy = validatePolicy(base);
    expect(policy.version).toBe('1');
    expect(policy.top_severity_threshold).toBe(0.7);
    expect(policy.aggregation).toEqual({
      mode: 'max',
      weights: { injection: 1, hallucination: 1, unsafe_content: 1, data_leakage: 1 }
    });
    expect(policy.rules.every(rule => rule.enabled)).toBe(true);
  });

  it('collects every violation into one error', () => {
    expect(
      issuesOf({
        ...base,
        rules: [
          { id: 'a', target: 'injection', threshold: 1.5, action: 'block' },
          { id: 'a', target: 'aggregate', threshold: 0.5, action: 'block' }
        ]
      })
    ).toEqual([
      'rule "a" threshold 1.5 is outside [0, 1]',
      'duplicate rule id "a"',
      'exactly one fallback rule is required, found 0'
    ]);
  });

  it('rejects two fallback rules', () => {
    expect(
      issuesOf({
        ...base,
        rules: [...base.rules, { id: 'fallback_two', target: 'aggregate', threshold: 0.4, action: 'fallback' }]
      })
    ).toEqual(['exactly one fallback rule is required, found 2']);
  });

  it('rejects empty response texts', () => {
    expect(issuesOf({ ...base, fallback_response: ' ', refusal_message: '' })).toEqual([
      'fallback_response must not be empty',
      'refusal_message must not be empty'
    ]);
  });

  it('rejects unknown targets and actions', () => {
    expect(() =>
      validatePolicy({ ...base, rules: [{ id: 'x', target: 'tone', threshold: 0.5, action: 'fallback' }] })
    ).toThrow(PolicyConfigError);
    expect(() =>
      validatePolicy({ ...base, rules: [{ id: 'x', target: 'aggregate', threshold: 0.5, action: 'escalate' }] })
    ).toThrow(PolicyConfigError);
  });

  it('needs a positive weight for weighted_sum', () => {
    expect(
      issuesOf({
        ...base,
        aggregation: {
          mode: 'weighted_sum',
          weights: { injection: 0, hallucination: 0, unsafe_content: 0, data_leakage: 0 }
        }
      })
    ).toEqual(['weighted_sum aggregation needs at least one positive weight']);
  });
});

describe('loadPolicyFile', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it('ships a default policy file equal to the built-in policy', () => {
    expect(loadPolicyFile(DEFAULT_POLICY_FILE)).toEqual(DEFAULT_POLICY);
  });

  it('fails on a missing file', () => {
    expect(() => loadPolicyFile('/nonexistent/policy.yaml')).toThrow('Policy file not found: /nonexistent/policy.yaml');
  });

  it('fails on invalid YAML', () => {
    const dir = mkdtempSync(join(tmpdir(), 'policy-'));
    dirs.push(dir);
    const path = join(dir, 'broken.yaml');
    writeFileSync(path, 'rules: [\n  - id: a\n');

    expect(() => loadPolicyFile(path)).toThrow(PolicyConfigError);
  });
});

describe('applyRecommendations', () => {
  it('returns a new policy with updated thresholds', () => {
    const next = applyRecommendations(DEFAULT_POLICY, [
      { rule_id: 'critical_risk_block', current_threshold: 0.7, recommended_threshold: 0.75, reason: 'fp' }
    ]);

    expect(next.rules.find(rule => rule.id === 'critical_risk_block')?.threshold).toBe(0.75);
    expect(DEFAULT_POLICY.rules.find(rule => rule.id === 'critical_risk_block')?.threshold).toBe(0.7);
  });

  it('rejects recommendations for unknown rules', () => {
    expect(() =>
      applyRecommendations(DEFAULT_POLICY, [
        { rule_id: 'missing', current_threshold: 0.5, recommended_threshold: 0.55, reason: 'fp' }
      ])
    ).toThrow(PolicyConfigError);
  });
});
