import type { Logger } from 'pino';
import type {
  Interaction,
  PolicyConfig,
  PolicyDecision,
  PolicyRule,
  PolicyState,
  RewriteDetails,
  RiskAssessment
} from '../types/index.js';
import { PolicyStateError } from '../errors.js';
import type { GatewayAdapter } from '../gateway/adapter.js';
import type { RiskDetector } from '../detectors/index.js';
import { SAFETY_SYSTEM_PROMPT, sanitizePrompt } from './rewrite.js';

export const DEFAULT_ALLOW_RULE = 'default_allow';

export interface RuleMatch {
  rule: PolicyRule | null;
  score: number;
}

const NEXT_STATE: Record<PolicyState, PolicyState | null> = {
  pending: 'evaluated',
  evaluated: 'enforced',
  enforced: null
};

/**
 * Lifecycle of one decision: pending → evaluated → enforced. Any other
 * transition throws PolicyStateError.
 */
export class PolicyRun {
  private current: PolicyState = 'pending';

  get state(): PolicyState {
    return this.current;
  }

  advance(to: PolicyState): void {
    if (NEXT_STATE[this.current] !== to) {
      throw new PolicyStateError(this.current, to);
    }
    this.current = to;
  }
}

export interface EnforceOptions {
  signal?: AbortSignal;
}

export interface PolicyEngineDeps {
  gateway: GatewayAdapter;
  detector: RiskDetector;
  logger: Logger;
}

function targetScore(rule: PolicyRule, assessment: RiskAssessment): number {
  return rule.target === 'aggregate' ? assessment.aggregate : assessment.scores[rule.target];
}

export class PolicyEngine {
  private readonly gateway: GatewayAdapter;
  private readonly detector: RiskDetector;
  private readonly logger: Logger;

  constructor(deps: PolicyEngineDeps) {
    this.gateway = deps.gateway;
    this.detector = deps.detector;
    this.logger = deps.logger;
  }

  /** First enabled rule, in file order, whose target score reaches its threshold. */
  match(assessment: RiskAssessment, policy: PolicyConfig): RuleMatch {
    for (const rule of policy.rules) {
      if (!rule.enabled) continue;
      const score = targetScore(rule, assessment);
      if (score >= rule.threshold) {
        return { rule, score };
      }
    }
    return { rule: null, score: assessment.aggregate };
  }

  async enforce(
    interaction: Interaction,
    assessment: RiskAssessment,
    policy: PolicyConfig,
    options: EnforceOptions = {}
  ): Promise<PolicyDecision> {
    const run = new PolicyRun();
    const { rule, score } = this.match(assessment, policy);
    run.advance('evaluated');

    const decision = rule
      ? await this.apply(rule, score, interaction, assessment, policy, options)
      : this.allow(interaction, DEFAULT_ALLOW_RULE, null, null, 'No rule matched');

    run.advance('enforced');
    return Object.freeze({ ...decision, state: 'enforced' as const });
  }

  private async apply(
    rule: PolicyRule,
    score: number,
    interaction: Interaction,
    assessment: RiskAssessment,
    policy: PolicyConfig,
    options: EnforceOptions
  ): Promise<Omit<PolicyDecision, 'state'>> {
    const reason = `${rule.target} score ${score.toFixed(3)} >= ${rule.threshold}`;

    switch (rule.action) {
      case 'allow':
        return this.allow(interaction, rule.id, rule.target, rule.threshold, reason);

      case 'block':
        return this.block(interaction, rule, policy, reason);

      case 'fallback':
        return {
          interaction_id: interaction.interaction_id,
          action: 'fallback',
          rule_id: rule.id,
          target: rule.target,
          threshold: rule.threshold,
          response_source: 'fallback',
          output: policy.fallback_response,
          synthetic: true,
          reason
        };

      case 'rewrite':
        return this.rewrite(rule, interaction, assessment, policy, reason, options);
    }
  }

  private allow(
    interaction: Interaction,
    ruleId: string,
    target: PolicyRule['target'] | null,
    threshold: number | null,
    reason: string
  ): Omit<PolicyDecision, 'state'> {
    return {
      interaction_id: interaction.interaction_id,
      action: 'allow',
      rule_id: ruleId,
      target,
      threshold,
      response_source: 'original',
      output: interaction.completion,
      synthetic: false,
      reason
    };
  }

  private block(
    interaction: Interaction,
    rule: PolicyRule,
    policy: PolicyConfig,
    reason: string,
    rewrite?: RewriteDetails
  ): Omit<PolicyDecision, 'state'> {
    return {
      interaction_id: interaction.interaction_id,
      action: 'block',
      rule_id: rule.id,
      target: rule.target,
      threshold: rule.threshold,
      response_source: 'refusal',
      output: policy.refusal_message,
      synthetic: true,
      reason,
      ...(rewrite ? { rewrite: Object.freeze(rewrite) } : {})
    };
  }

  // Exactly one re-invocation; the result is re-assessed before it can be returned
  private async rewrite(
    rule: PolicyRule,
    interaction: Interaction,
    assessment: RiskAssessment,
    policy: PolicyConfig,
    reason: string,
    options: EnforceOptions
  ): Promise<Omit<PolicyDecision, 'state'>> {
    const sanitized = sanitizePrompt(interaction.prompt, assessment.evidence);

    const rewritten = await this.gateway.send(
      {
        prompt: sanitized,
        model: interaction.model,
        provider: interaction.provider,
        correlation_id: interaction.correlation_id,
        ...(interaction.context !== undefined ? { context: interaction.context } : {}),
        ...(interaction.user_id !== undefined ? { user_id: interaction.user_id } : {}),
        parameters: { system_prompt: SAFETY_SYSTEM_PROMPT }
      },
      options.signal ? { signal: options.signal } : {}
    );

    if (rewritten.error || rewritten.completion === null) {
      this.logger.warn(
        { interaction_id: interaction.interaction_id, rule_id: rule.id, kind: rewritten.error?.kind },
        'Rewrite call failed, downgrading to block'
      );
      return this.block(interaction, rule, policy, `${reason}; rewrite failed`, {
        sanitized_prompt: sanitized,
        completion: null,
        usage: { ...rewritten.usage },
        aggregate: null,
        downgraded: true,
        error: rewritten.error?.message ?? 'Rewrite returned no completion'
      });
    }

    const reassessed = await this.detector.assess(rewritten, policy.aggregation);
    const details: RewriteDetails = {
      sanitized_prompt: sanitized,
      completion: rewritten.completion,
      usage: { ...rewritten.usage },
      aggregate: reassessed.aggregate,
      downgraded: reassessed.aggregate >= policy.top_severity_threshold
    };

    if (details.downgraded) {
      this.logger.warn(
        { interaction_id: interaction.interaction_id, rule_id: rule.id, aggregate: reassessed.aggregate },
        'Rewritten response still above top severity, downgrading to block'
      );
      return this.block(
        interaction,
        rule,
        policy,
        `${reason}; rewritten aggregate ${reassessed.aggregate.toFixed(3)} >= ${policy.top_severity_threshold}`,
        details
      );
    }

    return {
      interaction_id: interaction.interaction_id,
      action: 'rewrite',
      rule_id: rule.id,
      target: rule.target,
      threshold: rule.threshold,
      response_source: 'rewritten',
      output: rewritten.completion,
      synthetic: false,
      reason,
      rewrite: Object.freeze(details)
    };
  }
}
