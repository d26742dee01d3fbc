import { describe, it, expect } from 'vitest';
import { enforcementStats, policyHistory, riskTrends } from './reports.js';
import { DEFAULT_POLICY } from '../policy/loader.js';
import type { PolicySnapshot } from '../policy/store.js';
import type { AuditEntry, PolicyRule } from '../types/index.js';
import { makeAssessment, makeCost, makeDecision, makeInteraction } from '../test/fixtures.js';

function entry(sequence: number, parts: Partial<Pick<AuditEntry, 'interaction' | 'assessment' | 'decision'>> = {}): AuditEntry {
  const id = `int-${sequence}`;
  return {
    sequence,
    entry_id: `entry-${sequence}`,
    interaction_id: id,
    recorded_at: '2026-01-01T00:00:01.000Z',
    interaction: parts.interaction ?? makeInteraction({ interaction_id: id }),
    assessment: parts.assessment ?? makeAssessment({ interaction_id: id }),
    decision: parts.decision ?? makeDecision({ interaction_id: id }),
    cost: makeCost({ interaction_id: id }),
    prev_hash: '0'.repeat(64),
    hash: 'f'.repeat(64)
  };
}

describe('enforcementStats', () => {
  it('counts actions, rules and downgraded rewrites', () => {
    const downgraded = makeDecision({
      interaction_id: 'int-2',
      action: 'block',
      rule_id: 'data_leakage_rewrite',
      response_source: 'refusal',
      rewrite: {
        sanitized_prompt: 'My card is [REDACTED:credit_card]',
        completion: null,
        usage: { prompt_tokens: 0, completion_tokens: 0 },
        aggregate: null,
        downgraded: true
      }
    });

    expect(enforcementStats([entry(1), entry(2, { decision: downgraded })])).toEqual({
      total: 2,
      by_action: { allow: 1, block: 1, fallback: 0, rewrite: 0 },
      by_rule: { default_allow: 1, data_leakage_rewrite: 1 },
      downgraded_rewrites: 1,
      failed_interactions: 0
    });
  });
});

describe('riskTrends', () => {
  it('reports zeros for an empty log', () => {
    const empty = { flagged: 0, avg_score: 0, not_evaluated: 0 };
    expect(riskTrends([])).toEqual({
      total: 0,
      avg_aggregate: 0,
      by_level: { safe: 0, low: 0, medium: 0, high: 0, critical: 0 },
      by_category: { injection: empty, hallucination: empty, unsafe_content: empty, data_leakage: empty }
    });
  });

  it('counts categories that were not evaluated', () => {
    const assessment = makeAssessment({
      interaction_id: 'int-1',
      scores: { injection: 0, hallucination: 0, unsafe_content: 0, data_leakage: 0.4 },
      aggregate: 0.4,
      level: 'low',
      evaluated: { injection: true, hallucination: true, unsafe_content: false, data_leakage: true }
    });

    const trends = riskTrends([entry(1, { assessment }), entry(2)]);

    expect(trends.by_level).toEqual({ safe: 1, low: 1, medium: 0, high: 0, critical: 0 });
    expect(trends.avg_aggregate).toBe(0.2);
    expect(trends.by_category.unsafe_content).toEqual({ flagged: 0, avg_score: 0, not_evaluated: 1 });
    expect(trends.by_category.data_leakage).toEqual({ flagged: 1, avg_score: 0.2, not_evaluated: 0 });
  });
});

describe('policyHistory', () => {
  it('lists threshold changes between consecutive revisions', () => {
    const piiBlock: PolicyRule = { id: 'pii_block', target: 'data_leakage', threshold: 0.5, action: 'block', enabled: true };
    const revised = {
      ...DEFAULT_POLICY,
      version: '2',
      rules: [
        ...DEFAULT_POLICY.rules
          .filter(rule => rule.id !== 'medium_risk_rewrite')
          .map(rule => (rule.id === 'injection_block' ? { ...rule, threshold: 0.85 } : rule)),
        piiBlock
      ]
    };
    const snapshots: PolicySnapshot[] = [
      { revision: 1, policy: DEFAULT_POLICY, applied_at: '2026-01-01T00:00:00.000Z', applied_by: 'startup' },
      { revision: 2, policy: revised, applied_at: '2026-01-02T00:00:00.000Z', applied_by: 'admin', note: 'tightened' }
    ];

    const [first, second] = policyHistory(snapshots);

    expect(first).toEqual({
      revision: 1,
      version: '1',
      applied_at: '2026-01-01T00:00:00.000Z',
      applied_by: 'startup',
      thresholds: {
        injection_block: 0.9,
        data_leakage_rewrite: 0.8,
        critical_risk_block: 0.7,
        high_risk_fallback: 0.6,
        medium_risk_rewrite: 0.3
      },
      changes: []
    });
    expect(second).toMatchObject({ revision: 2, version: '2', applied_by: 'admin', note: 'tightened' });
    expect(second.changes).toEqual([
      { rule_id: 'injection_block', from: 0.9, to: 0.85 },
      { rule_id: 'pii_block', from: null, to: 0.5 },
      { rule_id: 'medium_risk_rewrite', from: 0.3, to: null }
    ]);
  });
});
