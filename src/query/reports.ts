import {
  RISK_CATEGORIES,
  type AuditEntry,
  type PolicyAction,
  type RiskCategory,
  type RiskLevel
} from '../types/index.js';
import type { PolicySnapshot } from '../policy/store.js';

export interface TimeRange {
  from?: string;
  to?: string;
}

export interface EnforcementStats {
  total: number;
  by_action: Record<PolicyAction, number>;
  by_rule: Record<string, number>;
  downgraded_rewrites: number;
  failed_interactions: number;
}

export interface CategoryTrend {
  flagged: number;
  avg_score: number;
  not_evaluated: number;
}

export interface RiskTrends {
  total: number;
  avg_aggregate: number;
  by_level: Record<RiskLevel, number>;
  by_category: Record<RiskCategory, CategoryTrend>;
}

export interface ThresholdChange {
  rule_id: string;
  from: number | null;
  to: number | null;
}

export interface PolicyRevisionSummary {
  revision: number;
  version: string;
  applied_at: string;
  applied_by: string;
  note?: string;
  thresholds: Record<string, number>;
  changes: ThresholdChange[];
}

function round4(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}

function emptyTrend(): CategoryTrend {
  return { flagged: 0, avg_score: 0, not_evaluated: 0 };
}

export function inTimeRange(entry: AuditEntry, range: TimeRange): boolean {
  const at = Date.parse(entry.interaction.timestamp);
  if (range.from !== undefined && at < Date.parse(range.from)) return false;
  if (range.to !== undefined && at > Date.parse(range.to)) return false;
  return true;
}

export function enforcementStats(entries: readonly AuditEntry[]): EnforcementStats {
  const byAction: Record<PolicyAction, number> = { allow: 0, block: 0, fallback: 0, rewrite: 0 };
  const byRule: Record<string, number> = {};
  let downgraded = 0;
  let failed = 0;

  for (const { decision, interaction } of entries) {
    byAction[decision.action]++;
    byRule[decision.rule_id] = (byRule[decision.rule_id] ?? 0) + 1;
    if (decision.rewrite?.downgraded) downgraded++;
    if (interaction.completion === null) failed++;
  }

  return {
    total: entries.length,
    by_action: byAction,
    by_rule: byRule,
    downgraded_rewrites: downgraded,
    failed_interactions: failed
  };
}

/** Averages include every entry, so a category that never fired averages 0. */
export function riskTrends(entries: readonly AuditEntry[]): RiskTrends {
  const byLevel: Record<RiskLevel, number> = { safe: 0, low: 0, medium: 0, high: 0, critical: 0 };
  const sums: Record<RiskCategory, number> = { injection: 0, hallucination: 0, unsafe_content: 0, data_leakage: 0 };
  const byCategory: Record<RiskCategory, CategoryTrend> = {
    injection: emptyTrend(),
    hallucination: emptyTrend(),
    unsafe_content: emptyTrend(),
    data_leakage: emptyTrend()
  };
  let aggregateSum = 0;

  for (const { assessment } of entries) {
    byLevel[assessment.level]++;
    aggregateSum += assessment.aggregate;
    for (const category of RISK_CATEGORIES) {
      const score = assessment.scores[category];
      sums[category] += score;
      if (score > 0) byCategory[category].flagged++;
      if (!assessment.evaluated[category]) byCategory[category].not_evaluated++;
    }
  }

  const count = entries.length;
  for (const category of RISK_CATEGORIES) {
    byCategory[category].avg_score = count > 0 ? round4(sums[category] / count) : 0;
  }

  return {
    total: count,
    avg_aggregate: count > 0 ? round4(aggregateSum / count) : 0,
    by_level: byLevel,
    by_category: byCategory
  };
}

// Rules present in only one of the two revisions show up with a null side
function thresholdChanges(previous: Record<string, number>, next: Record<string, number>): ThresholdChange[] {
  const changes: ThresholdChange[] = [];
  for (const [ruleId, threshold] of Object.entries(next)) {
    const before = previous[ruleId];
    if (before === undefined) changes.push({ rule_id: ruleId, from: null, to: threshold });
    else if (before !== threshold) changes.push({ rule_id: ruleId, from: before, to: threshold });
  }
  for (const [ruleId, threshold] of Object.entries(previous)) {
    if (!(ruleId in next)) changes.push({ rule_id: ruleId, from: threshold, to: null });
  }
  return changes;
}

export function policyHistory(snapshots: readonly PolicySnapshot[]): PolicyRevisionSummary[] {
  let previous: Record<string, number> | null = null;

  return snapshots.map(snapshot => {
    const thresholds: Record<string, number> = {};
    for (const rule of snapshot.policy.rules) thresholds[rule.id] = rule.threshold;
    const changes = previous ? thresholdChanges(previous, thresholds) : [];
    previous = thresholds;

    return {
      revision: snapshot.revision,
      version: snapshot.policy.version,
      applied_at: snapshot.applied_at,
      applied_by: snapshot.applied_by,
      ...(snapshot.note !== undefined ? { note: snapshot.note } : {}),
      thresholds,
      changes
    };
  });
}
