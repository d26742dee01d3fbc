import type {
  AuditEntry,
  DriftMetric,
  DriftReport,
  FeedbackRecord,
  MetricDivergence,
  PolicyConfig,
  RiskLabel,
  ThresholdRecommendation,
  WindowMetrics
} from '../types/index.js';

export interface DriftOptions {
  window_size: number;
  divergence_threshold: number;
  /** Aggregate score at or above which an interaction counts as predicted risky. */
  risk_threshold: number;
  error_rate_limit: number;
  step: number;
}

export const DEFAULT_DRIFT_OPTIONS: DriftOptions = {
  window_size: 100,
  divergence_threshold: 0.15,
  risk_threshold: 0.5,
  error_rate_limit: 0.2,
  step: 0.05
};

const DRIFT_METRICS: DriftMetric[] = [
  'agreement_rate',
  'false_positive_rate',
  'false_negative_rate',
  'avg_rating',
  'positive_rate',
  'negative_rate',
  'mean_risk',
  'intervention_rate'
];

const MAX_THRESHOLD = 0.95;
const MIN_THRESHOLD = 0.05;

const ratio = (count: number, total: number): number | null => (total > 0 ? count / total : null);
const round2 = (value: number): number => Math.round(value * 100) / 100;

// Explicit label wins; otherwise 1-2 stars mean unsafe and 4-5 mean safe
export function humanLabel(feedback: FeedbackRecord): RiskLabel | null {
  if (feedback.label) return feedback.label;
  if (feedback.rating <= 2) return 'unsafe';
  if (feedback.rating >= 4) return 'safe';
  return null;
}

/**
 * Compares model-vs-human agreement and output statistics between the
 * most recent window of audited interactions and the window before it.
 * Recommendations are advisory only.
 */
export class DriftEngine {
  private readonly options: DriftOptions;

  constructor(options: Partial<DriftOptions> = {}) {
    this.options = { ...DEFAULT_DRIFT_OPTIONS, ...options };
  }

  analyze(entries: readonly AuditEntry[], feedback: readonly FeedbackRecord[], policy: PolicyConfig): DriftReport {
    const ordered = [...entries].sort((a, b) => a.sequence - b.sequence);
    const size = this.options.window_size;
    const recentEntries = ordered.slice(-size);
    const baselineEntries = ordered.slice(-2 * size, -size);

    // Latest feedback per interaction
    const latest = new Map<string, FeedbackRecord>();
    for (const item of feedback) {
      latest.set(item.interaction_id, item);
    }

    const baseline = this.metrics(baselineEntries, latest);
    const recent = this.metrics(recentEntries, latest);

    const divergences: DriftReport['divergences'] = {};
    for (const metric of DRIFT_METRICS) {
      const before = baseline[metric];
      const after = recent[metric];
      if (before === null || after === null) continue;

      const divergence: MetricDivergence = {
        baseline: before,
        recent: after,
        divergence: Math.abs(after - before),
        drift: Math.abs(after - before) > this.options.divergence_threshold
      };
      divergences[metric] = divergence;
    }

    const drifting = DRIFT_METRICS.filter(metric => divergences[metric]?.drift);

    return {
      generated_at: new Date().toISOString(),
      drift_detected: drifting.length > 0,
      ...(baselineEntries.length === 0
        ? { reason: 'Not enough history for a baseline window' }
        : drifting.length > 0
          ? { reason: `Drift in ${drifting.join(', ')}` }
          : {}),
      baseline,
      recent,
      divergences,
      recommendations: this.recommend(recent, policy)
    };
  }

  metrics(entries: readonly AuditEntry[], feedback: ReadonlyMap<string, FeedbackRecord>): WindowMetrics {
    let labeled = 0;
    let agree = 0;
    let falsePositives = 0;
    let falseNegatives = 0;
    let rated = 0;
    let ratingSum = 0;
    let positive = 0;
    let negative = 0;
    let riskSum = 0;
    let interventions = 0;

    for (const entry of entries) {
      const aggregate = entry.assessment.aggregate;
      riskSum += aggregate;
      if (entry.decision.action !== 'allow') interventions++;

      const item = feedback.get(entry.interaction_id);
      if (!item) continue;

      rated++;
      ratingSum += item.rating;
      if (item.feedback_type === 'positive') positive++;
      if (item.feedback_type === 'negative') negative++;

      const label = humanLabel(item);
      if (label === null) continue;

      labeled++;
      const predictedRisky = aggregate >= this.options.risk_threshold;
      if (predictedRisky === (label === 'unsafe')) agree++;
      else if (predictedRisky) falsePositives++;
      else falseNegatives++;
    }

    return {
      size: entries.length,
      labeled,
      agreement_rate: ratio(agree, labeled),
      false_positive_rate: ratio(falsePositives, labeled),
      false_negative_rate: ratio(falseNegatives, labeled),
      avg_rating: ratio(ratingSum, rated),
      positive_rate: ratio(positive, rated),
      negative_rate: ratio(negative, rated),
      mean_risk: ratio(riskSum, entries.length),
      intervention_rate: ratio(interventions, entries.length)
    };
  }

  private recommend(recent: WindowMetrics, policy: PolicyConfig): ThresholdRecommendation[] {
    const { error_rate_limit: limit, step } = this.options;
    const fpRate = recent.false_positive_rate;
    const fnRate = recent.false_negative_rate;

    let direction: 1 | -1;
    let reason: string;
    if (fpRate !== null && fpRate > limit) {
      direction = 1;
      reason = `false positive rate ${fpRate.toFixed(2)} exceeds ${limit}`;
    } else if (fnRate !== null && fnRate > limit) {
      direction = -1;
      reason = `false negative rate ${fnRate.toFixed(2)} exceeds ${limit}`;
    } else {
      return [];
    }

    return policy.rules
      .filter(rule => rule.enabled && rule.action !== 'allow')
      .flatMap(rule => {
        const moved = round2(rule.threshold + direction * step);
        const recommended = Math.min(MAX_THRESHOLD, Math.max(MIN_THRESHOLD, moved));
        if (recommended === rule.threshold) return [];
        return [{ rule_id: rule.id, current_threshold: rule.threshold, recommended_threshold: recommended, reason }];
      });
  }
}
