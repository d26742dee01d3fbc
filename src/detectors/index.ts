export { scoreInjection, injectionDetector } from './injection.js';
export { scoreHallucination, hallucinationDetector } from './hallucination.js';
export { classifyUnsafe, unsafeContentDetector, UNSAFE_CATEGORIES, type UnsafeCategory } from './unsafe.js';
export {
  scanLeakage,
  createLeakageDetector,
  luhnValid,
  shannonEntropy,
  DEFAULT_LEAKAGE_OPTIONS,
  type LeakageOptions
} from './leakage.js';
export { noisyOr, clamp01, type Detector, type DetectorResult } from './scoring.js';

import type { Logger } from 'pino';
import {
  RISK_CATEGORIES,
  type AggregationMode,
  type CategoryScores,
  type Evidence,
  type Interaction,
  type RiskAssessment,
  type RiskCategory,
  type RiskLevel
} from '../types/index.js';
import { DetectorUnavailableError, errorMessage } from '../errors.js';
import { injectionDetector } from './injection.js';
import { hallucinationDetector } from './hallucination.js';
import { unsafeContentDetector } from './unsafe.js';
import { createLeakageDetector, type LeakageOptions } from './leakage.js';
import { clamp01, type Detector, type DetectorResult } from './scoring.js';

export interface AggregationSettings {
  mode: AggregationMode;
  weights: CategoryScores;
}

export interface RiskDetectorOptions {
  timeoutMs: number;
}

export const MAX_AGGREGATION: AggregationSettings = {
  mode: 'max',
  weights: { injection: 1, hallucination: 1, unsafe_content: 1, data_leakage: 1 }
};

type Outcome =
  | { detector: Detector; ok: true; result: DetectorResult }
  | { detector: Detector; ok: false; error: DetectorUnavailableError };

export function createDefaultDetectors(leakage: Partial<LeakageOptions> = {}): Detector[] {
  return [injectionDetector, hallucinationDetector, unsafeContentDetector, createLeakageDetector(leakage)];
}

export function riskLevel(aggregate: number): RiskLevel {
  if (aggregate >= 0.7) return 'critical';
  if (aggregate >= 0.5) return 'high';
  if (aggregate >= 0.3) return 'medium';
  if (aggregate > 0) return 'low';
  return 'safe';
}

export function aggregateScores(scores: CategoryScores, aggregation: AggregationSettings): number {
  if (aggregation.mode === 'max') {
    return clamp01(Math.max(...RISK_CATEGORIES.map(category => scores[category])));
  }

  let weighted = 0;
  let totalWeight = 0;
  for (const category of RISK_CATEGORIES) {
    weighted += aggregation.weights[category] * scores[category];
    totalWeight += aggregation.weights[category];
  }
  return totalWeight > 0 ? clamp01(weighted / totalWeight) : 0;
}

/**
 * Runs every registered detector concurrently against an Interaction and
 * joins the results into one RiskAssessment. A detector that throws or
 * exceeds the timeout scores 0 and leaves a `not_evaluated` evidence item.
 */
export class RiskDetector {
  private readonly timeoutMs: number;

  constructor(
    private readonly detectors: Detector[],
    options: RiskDetectorOptions,
    private readonly logger: Logger
  ) {
    this.timeoutMs = options.timeoutMs;
  }

  async assess(interaction: Interaction, aggregation: AggregationSettings = MAX_AGGREGATION): Promise<RiskAssessment> {
    const outcomes = await Promise.all(this.detectors.map(detector => this.run(detector, interaction)));

    const scores: CategoryScores = { injection: 0, hallucination: 0, unsafe_content: 0, data_leakage: 0 };
    const evaluated: Record<RiskCategory, boolean> = {
      injection: false,
      hallucination: false,
      unsafe_content: false,
      data_leakage: false
    };
    const evidence: Evidence[] = [];

    for (const outcome of outcomes) {
      const category = outcome.detector.category;

      if (outcome.ok) {
        evaluated[category] = true;
        scores[category] = Math.max(scores[category], clamp01(outcome.result.score));
        evidence.push(...outcome.result.evidence);
        continue;
      }

      this.logger.warn(
        { interaction_id: interaction.interaction_id, detector: outcome.detector.name, category, err: outcome.error.message },
        'Detector unavailable, category not evaluated'
      );
      evidence.push({
        category,
        signal: outcome.detector.name,
        snippet: outcome.error.message,
        confidence: 0,
        not_evaluated: true
      });
    }

    const aggregate = aggregateScores(scores, aggregation);
    const scored = evidence.filter(item => !item.not_evaluated).length;

    return Object.freeze({
      interaction_id: interaction.interaction_id,
      scores: Object.freeze(scores),
      aggregate,
      aggregation: aggregation.mode,
      level: riskLevel(aggregate),
      confidence: Math.min(0.5 + 0.1 * scored, 0.95),
      evaluated: Object.freeze(evaluated),
      evidence: Object.freeze(evidence.map(item => Object.freeze(item)))
    });
  }

  private async run(detector: Detector, interaction: Interaction): Promise<Outcome> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new DetectorUnavailableError(`Timed out after ${this.timeoutMs}ms`, detector.category, detector.name)),
        this.timeoutMs
      );
    });

    try {
      const result = await Promise.race([Promise.resolve().then(() => detector.detect(interaction)), timeout]);
      return { detector, ok: true, result };
    } catch (error) {
      const unavailable =
        error instanceof DetectorUnavailableError
          ? error
          : new DetectorUnavailableError(errorMessage(error), detector.category, detector.name);
      return { detector, ok: false, error: unavailable };
    } finally {
      clearTimeout(timer);
    }
  }
}
