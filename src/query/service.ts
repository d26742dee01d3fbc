import type {
  AuditEntry,
  AuditVerification,
  CostPoint,
  CostSummary,
  DriftReport,
  FeedbackInput,
  FeedbackRecord,
  PolicyAction,
  RiskCategory,
  RiskLevel
} from '../types/index.js';
import type { AuditLog } from '../audit/audit-log.js';
import type { CostMonitor } from '../cost/monitor.js';
import type { DriftEngine } from '../feedback/drift.js';
import type { FeedbackStore } from '../feedback/store.js';
import type { PolicyStore } from '../policy/store.js';
import {
  enforcementStats,
  inTimeRange,
  policyHistory,
  riskTrends,
  type EnforcementStats,
  type PolicyRevisionSummary,
  type RiskTrends,
  type TimeRange
} from './reports.js';

export interface InteractionQuery extends TimeRange {
  action?: PolicyAction;
  category?: RiskCategory;
  min_score?: number;
  model?: string;
  limit?: number;
  offset?: number;
}

export interface InteractionSummary {
  interaction_id: string;
  sequence: number;
  timestamp: string;
  provider: string;
  model: string;
  action: PolicyAction;
  rule_id: string;
  aggregate: number;
  level: RiskLevel;
  cost: number;
  anomaly: boolean;
  failed: boolean;
}

export interface InteractionPage {
  total: number;
  limit: number;
  offset: number;
  items: InteractionSummary[];
}

export interface InteractionDetail {
  interaction: AuditEntry['interaction'];
  assessment: AuditEntry['assessment'];
  decision: AuditEntry['decision'];
  cost: AuditEntry['cost'];
  audit: {
    sequence: number;
    entry_id: string;
    recorded_at: string;
    prev_hash: string;
    hash: string;
    signature?: string;
  };
  feedback: FeedbackRecord[];
}

export interface AuditSummary {
  total_entries: number;
  first_recorded_at: string | null;
  last_recorded_at: string | null;
  tail_hash: string | null;
  /** Entries with any non-zero risk score. */
  risk_events: number;
  /** Entries whose action was anything but allow. */
  enforcements: number;
  failed_interactions: number;
  cost_anomalies: number;
  unique_users: number;
  signed: boolean;
  key_id: string | null;
  chain: AuditVerification;
}

export interface ComplianceReport {
  generated_at: string;
  range: TimeRange;
  policy: { revision: number; version: string };
  audit: AuditSummary;
  enforcement: EnforcementStats;
  risk: RiskTrends;
  entries: AuditEntry[];
}

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;
export const DEFAULT_TOP_COST = 10;

function clampLimit(limit: number | undefined, fallback: number): number {
  return Math.min(Math.max(limit ?? fallback, 1), MAX_PAGE_SIZE);
}

function summarize(entry: AuditEntry): InteractionSummary {
  return {
    interaction_id: entry.interaction_id,
    sequence: entry.sequence,
    timestamp: entry.interaction.timestamp,
    provider: entry.interaction.provider,
    model: entry.interaction.model,
    action: entry.decision.action,
    rule_id: entry.decision.rule_id,
    aggregate: entry.assessment.aggregate,
    level: entry.assessment.level,
    cost: entry.cost.amount,
    anomaly: entry.cost.anomaly,
    failed: entry.interaction.completion === null
  };
}

function matches(entry: AuditEntry, query: InteractionQuery): boolean {
  if (!inTimeRange(entry, query)) return false;
  if (query.action !== undefined && entry.decision.action !== query.action) return false;
  if (query.model !== undefined && entry.interaction.model !== query.model) return false;

  if (query.min_score !== undefined) {
    const score = query.category ? entry.assessment.scores[query.category] : entry.assessment.aggregate;
    if (score < query.min_score) return false;
  } else if (query.category !== undefined && entry.assessment.scores[query.category] <= 0) {
    return false;
  }

  return true;
}

/**
 * Read side over the audit log, cost history and feedback. Recording
 * feedback is the only write it performs.
 */
export class QueryService {
  constructor(
    private readonly deps: {
      audit: AuditLog;
      cost: CostMonitor;
      feedback: FeedbackStore;
      drift: DriftEngine;
      policies: PolicyStore;
      now?: () => Date;
    }
  ) {}

  async listInteractions(query: InteractionQuery = {}): Promise<InteractionPage> {
    const limit = clampLimit(query.limit, DEFAULT_PAGE_SIZE);
    const offset = Math.max(query.offset ?? 0, 0);

    const entries = await this.deps.audit.entries();
    const selected = entries
      .filter(entry => matches(entry, query))
      .sort((a, b) => b.sequence - a.sequence);

    return {
      total: selected.length,
      limit,
      offset,
      items: selected.slice(offset, offset + limit).map(summarize)
    };
  }

  async getInteraction(interactionId: string): Promise<InteractionDetail | null> {
    const entry = await this.deps.audit.get(interactionId);
    if (!entry) return null;

    return {
      interaction: entry.interaction,
      assessment: entry.assessment,
      decision: entry.decision,
      cost: entry.cost,
      audit: {
        sequence: entry.sequence,
        entry_id: entry.entry_id,
        recorded_at: entry.recorded_at,
        prev_hash: entry.prev_hash,
        hash: entry.hash,
        ...(entry.signature ? { signature: entry.signature } : {})
      },
      feedback: this.deps.feedback.forInteraction(interactionId)
    };
  }

  costSeries(limit?: number): CostPoint[] {
    return this.deps.cost.series(limit);
  }

  costSummary(): CostSummary {
    return this.deps.cost.summary();
  }

  /** Most expensive audited interactions, ties broken by audit order. */
  async topCost(limit?: number): Promise<InteractionSummary[]> {
    const entries = await this.deps.audit.entries();
    return entries
      .sort((a, b) => b.cost.amount - a.cost.amount || a.sequence - b.sequence)
      .slice(0, clampLimit(limit, DEFAULT_TOP_COST))
      .map(summarize);
  }

  async enforcementStats(range: TimeRange = {}): Promise<EnforcementStats> {
    return enforcementStats(await this.entriesIn(range));
  }

  async riskTrends(range: TimeRange = {}): Promise<RiskTrends> {
    return riskTrends(await this.entriesIn(range));
  }

  async auditSummary(): Promise<AuditSummary> {
    const { audit } = this.deps;
    const entries = await audit.entries();
    const first = entries[0];
    const last = entries[entries.length - 1];
    const users = new Set(entries.flatMap(entry => (entry.interaction.user_id ? [entry.interaction.user_id] : [])));

    return {
      total_entries: entries.length,
      first_recorded_at: first ? first.recorded_at : null,
      last_recorded_at: last ? last.recorded_at : null,
      tail_hash: last ? last.hash : null,
      risk_events: entries.filter(entry => entry.assessment.aggregate > 0).length,
      enforcements: entries.filter(entry => entry.decision.action !== 'allow').length,
      failed_interactions: entries.filter(entry => entry.interaction.completion === null).length,
      cost_anomalies: entries.filter(entry => entry.cost.anomaly).length,
      unique_users: users.size,
      signed: audit.signed,
      key_id: audit.keyId,
      chain: await audit.inspect()
    };
  }

  /**
   * Everything an auditor needs for one period: chain status over the whole
   * log, statistics and full entries for interactions inside `range`.
   */
  async complianceReport(range: TimeRange = {}): Promise<ComplianceReport> {
    const entries = await this.entriesIn(range);
    const { revision, policy } = this.deps.policies.current();

    return {
      generated_at: (this.deps.now?.() ?? new Date()).toISOString(),
      range,
      policy: { revision, version: policy.version },
      audit: await this.auditSummary(),
      enforcement: enforcementStats(entries),
      risk: riskTrends(entries),
      entries
    };
  }

  policyHistory(): PolicyRevisionSummary[] {
    return policyHistory(this.deps.policies.revisions());
  }

  async drift(): Promise<DriftReport> {
    const entries = await this.deps.audit.entries();
    return this.deps.drift.analyze(entries, this.deps.feedback.list(), this.deps.policies.current().policy);
  }

  private async entriesIn(range: TimeRange): Promise<AuditEntry[]> {
    const entries = await this.deps.audit.entries();
    return entries.filter(entry => inTimeRange(entry, range));
  }

  /** Returns null when the interaction was never audited. */
  async submitFeedback(input: FeedbackInput): Promise<FeedbackRecord | null> {
    if (!this.deps.audit.has(input.interaction_id)) return null;
    return this.deps.feedback.add(input);
  }
}
