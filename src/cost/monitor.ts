import type { Logger } from 'pino';
import type {
  CostPoint,
  CostRecord,
  CostSummary,
  Interaction,
  ModelPrice,
  ProviderUsage,
  TokenBreakdown
} from '../types/index.js';
import { CostComputationError } from '../errors.js';

export interface CostMonitorOptions {
  currency: string;
  models: Record<string, ModelPrice>;
  fallback_per_1k: number;
  window_size: number;
  window_ms?: number;
  z_threshold: number;
  min_samples: number;
  min_std: number;
  history_size: number;
}

export const DEFAULT_COST_OPTIONS: CostMonitorOptions = {
  currency: 'USD',
  models: {},
  fallback_per_1k: 0,
  window_size: 50,
  z_threshold: 3.0,
  min_samples: 5,
  min_std: 1e-6,
  history_size: 1000
};

interface WindowSample {
  amount: number;
  at: number;
}

interface HistoryItem {
  point: CostPoint;
  latency_ms: number;
  tokens: number;
}

export interface WindowStats {
  mean: number;
  std: number;
  count: number;
}

const NO_USAGE: ProviderUsage = { prompt_tokens: 0, completion_tokens: 0 };

function isValidCount(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function roundAmount(value: number): number {
  return Math.round(value * 1e8) / 1e8;
}

export function windowStats(values: number[], minStd: number): WindowStats {
  const count = values.length;
  const mean = values.reduce((sum, value) => sum + value, 0) / count;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / count;
  return { mean, std: Math.max(Math.sqrt(variance), minStd), count };
}

/**
 * Prices every interaction and flags cost anomalies with a rolling z-score.
 *
 * `record` is fully synchronous: reading the window, scoring the new value
 * and appending it happen without yielding to the event loop, so concurrent
 * requests always observe a consistent window.
 */
export class CostMonitor {
  private readonly options: CostMonitorOptions;
  private readonly window: WindowSample[] = [];
  private readonly history: HistoryItem[] = [];
  private readonly prefixes: string[];

  constructor(
    options: Partial<CostMonitorOptions>,
    private readonly logger: Logger
  ) {
    this.options = { ...DEFAULT_COST_OPTIONS, ...options };
    this.prefixes = Object.keys(this.options.models).sort((a, b) => b.length - a.length);
  }

  /** Exact model name first, then the longest configured prefix. */
  priceFor(model: string): ModelPrice {
    const exact = this.options.models[model];
    if (exact) return exact;

    const prefix = this.prefixes.find(candidate => model.startsWith(candidate));
    if (prefix !== undefined) return this.options.models[prefix];

    throw new CostComputationError(`No pricing configured for model ${model}`, model);
  }

  record(interaction: Interaction, rewriteUsage: ProviderUsage = NO_USAGE): CostRecord {
    const tokens: TokenBreakdown = {
      prompt: interaction.usage.prompt_tokens,
      completion: interaction.usage.completion_tokens,
      rewrite_prompt: rewriteUsage.prompt_tokens,
      rewrite_completion: rewriteUsage.completion_tokens,
      total:
        interaction.usage.prompt_tokens +
        interaction.usage.completion_tokens +
        rewriteUsage.prompt_tokens +
        rewriteUsage.completion_tokens
    };

    let record: CostRecord;
    try {
      record = this.score(interaction, tokens, this.compute(interaction.model, tokens));
    } catch (error) {
      if (!(error instanceof CostComputationError)) throw error;
      record = this.estimate(interaction, tokens, error);
    }

    this.remember(interaction, record);
    return record;
  }

  series(limit = 100): CostPoint[] {
    return this.history.slice(-limit).map(item => ({ ...item.point }));
  }

  summary(): CostSummary {
    const costByModel: Record<string, number> = {};
    const tokensByModel: Record<string, number> = {};
    let totalCost = 0;
    let totalTokens = 0;
    let totalLatency = 0;
    let anomalies = 0;
    let estimated = 0;

    for (const { point, latency_ms, tokens } of this.history) {
      totalCost += point.amount;
      totalTokens += tokens;
      totalLatency += latency_ms;
      costByModel[point.model] = roundAmount((costByModel[point.model] ?? 0) + point.amount);
      tokensByModel[point.model] = (tokensByModel[point.model] ?? 0) + tokens;
      if (point.anomaly) anomalies++;
      if (point.estimated) estimated++;
    }

    const count = this.history.length;
    return {
      total_requests: count,
      total_cost: roundAmount(totalCost),
      currency: this.options.currency,
      avg_latency_ms: count > 0 ? Math.round(totalLatency / count) : 0,
      total_tokens: totalTokens,
      cost_by_model: costByModel,
      tokens_by_model: tokensByModel,
      anomalies,
      estimated
    };
  }

  private compute(model: string, tokens: TokenBreakdown): number {
    const counts = [tokens.prompt, tokens.completion, tokens.rewrite_prompt, tokens.rewrite_completion];
    if (!counts.every(isValidCount)) {
      throw new CostComputationError(`Invalid token usage for model ${model}`, model);
    }

    const price = this.priceFor(model);
    const input = tokens.prompt + tokens.rewrite_prompt;
    const output = tokens.completion + tokens.rewrite_completion;
    return roundAmount((input / 1000) * price.input_per_1k + (output / 1000) * price.output_per_1k);
  }

  // z-score against the window as it was before this value
  private score(interaction: Interaction, tokens: TokenBreakdown, amount: number): CostRecord {
    const at = Date.parse(interaction.timestamp);
    this.prune(at);

    let zScore: number | null = null;
    let stats: WindowStats | null = null;
    if (this.window.length >= this.options.min_samples) {
      stats = windowStats(this.window.map(sample => sample.amount), this.options.min_std);
      zScore = (amount - stats.mean) / stats.std;
    }

    this.window.push({ amount, at });
    if (this.window.length > this.options.window_size) {
      this.window.splice(0, this.window.length - this.options.window_size);
    }

    const anomaly = zScore !== null && zScore > this.options.z_threshold;
    if (anomaly) {
      this.logger.warn(
        { interaction_id: interaction.interaction_id, model: interaction.model, amount, z_score: zScore, window_mean: stats?.mean },
        'Cost anomaly detected'
      );
    }

    return Object.freeze({
      interaction_id: interaction.interaction_id,
      model: interaction.model,
      amount,
      currency: this.options.currency,
      tokens: Object.freeze(tokens),
      anomaly,
      z_score: zScore,
      window_mean: stats ? stats.mean : null,
      window_std: stats ? stats.std : null,
      estimated: false,
      confidence: 1
    });
  }

  private estimate(interaction: Interaction, tokens: TokenBreakdown, error: CostComputationError): CostRecord {
    const billable = isValidCount(tokens.total) ? tokens.total : 0;
    const amount = roundAmount((billable / 1000) * this.options.fallback_per_1k);

    this.logger.warn(
      { interaction_id: interaction.interaction_id, model: interaction.model, err: error.message },
      'Cost estimated with fallback pricing'
    );

    return Object.freeze({
      interaction_id: interaction.interaction_id,
      model: interaction.model,
      amount,
      currency: this.options.currency,
      tokens: Object.freeze(tokens),
      anomaly: false,
      z_score: null,
      window_mean: null,
      window_std: null,
      estimated: true,
      confidence: 0,
      error: error.message
    });
  }

  private prune(now: number): void {
    const windowMs = this.options.window_ms;
    if (windowMs === undefined || !Number.isFinite(now)) return;

    // Samples arrive in completion order, which need not match timestamp order
    const cutoff = now - windowMs;
    const fresh = this.window.filter(sample => sample.at >= cutoff);
    this.window.splice(0, this.window.length, ...fresh);
  }

  private remember(interaction: Interaction, record: CostRecord): void {
    this.history.push({
      point: {
        interaction_id: record.interaction_id,
        model: record.model,
        timestamp: interaction.timestamp,
        amount: record.amount,
        z_score: record.z_score,
        anomaly: record.anomaly,
        estimated: record.estimated
      },
      latency_ms: interaction.latency_ms,
      tokens: isValidCount(record.tokens.total) ? record.tokens.total : 0
    });

    if (this.history.length > this.options.history_size) {
      this.history.shift();
    }
  }
}
