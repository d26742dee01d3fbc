import type { Logger } from 'pino';
import type {
  AuditEntry,
  AuditMode,
  CompletionRequest,
  CostRecord,
  Interaction,
  InteractionError,
  PolicyAction,
  PolicyDecision,
  ResponseSource,
  RiskAssessment,
  RiskLevel
} from '../types/index.js';
import { AuditWriteError, DuplicateAuditEntryError } from '../errors.js';
import type { GatewayAdapter } from '../gateway/adapter.js';
import type { RiskDetector } from '../detectors/index.js';
import type { PolicyEngine } from '../policy/engine.js';
import type { PolicyStore } from '../policy/store.js';
import type { CostMonitor } from '../cost/monitor.js';
import type { AuditLog } from '../audit/audit-log.js';
import { backoffDelay, sleep as defaultSleep, type BackoffPolicy, type Sleep } from '../util/backoff.js';

export interface PipelineDeps {
  gateway: GatewayAdapter;
  detector: RiskDetector;
  engine: PolicyEngine;
  policies: PolicyStore;
  cost: CostMonitor;
  audit: AuditLog;
  auditMode: AuditMode;
  auditRetry: BackoffPolicy;
  logger: Logger;
  sleep?: Sleep;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

export interface GovernedResponse {
  interaction_id: string;
  correlation_id: string;
  output: string | null;
  action: PolicyAction;
  rule_id: string;
  response_source: ResponseSource;
  synthetic: boolean;
  model: string;
  provider: string;
  risk: {
    aggregate: number;
    level: RiskLevel;
    scores: RiskAssessment['scores'];
  };
  cost: {
    amount: number;
    currency: string;
    anomaly: boolean;
    estimated: boolean;
  };
  policy_revision: number;
  latency_ms: number;
  audit: { sequence: number; hash: string; signature?: string } | null;
  audit_warning?: string;
  error?: InteractionError;
}

/** A complete governance tuple that has not reached the audit log yet. */
export interface PendingAudit {
  interaction: Interaction;
  assessment: RiskAssessment;
  decision: PolicyDecision;
  cost: CostRecord;
  failed_at: string;
}

/**
 * Runs one request through gateway, risk assessment, policy enforcement,
 * cost accounting and audit. Every interaction that leaves the gateway,
 * failed ones included, produces exactly one assessment, decision, cost
 * record and audit entry.
 */
export class GovernancePipeline {
  private readonly pending: PendingAudit[] = [];
  private readonly sleep: Sleep;
  private flushing: Promise<{ flushed: number; remaining: number }> | null = null;

  constructor(private readonly deps: PipelineDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  async process(request: CompletionRequest, options: ProcessOptions = {}): Promise<GovernedResponse> {
    const { gateway, detector, engine, policies, cost, logger } = this.deps;
    const snapshot = policies.current();

    const interaction = await gateway.send(request, options.signal ? { signal: options.signal } : {});
    const assessment = await detector.assess(interaction, snapshot.policy.aggregation);
    const decision = await engine.enforce(interaction, assessment, snapshot.policy, options);
    const record = cost.record(interaction, decision.rewrite?.usage);

    let entry: AuditEntry | null = null;
    let auditWarning: string | undefined;
    try {
      entry = await this.appendWithRetry(interaction, assessment, decision, record);
    } catch (error) {
      logger.error(
        { interaction_id: interaction.interaction_id, mode: this.deps.auditMode, err: error },
        'Audit append failed'
      );
      if (this.deps.auditMode === 'blocking' || !(error instanceof AuditWriteError) || error instanceof DuplicateAuditEntryError) {
        throw error;
      }
      this.pending.push({ interaction, assessment, decision, cost: record, failed_at: new Date().toISOString() });
      auditWarning = `Audit write failed; entry queued for retry (${this.pending.length} pending)`;
    }

    logger.info(
      {
        interaction_id: interaction.interaction_id,
        model: interaction.model,
        action: decision.action,
        rule_id: decision.rule_id,
        aggregate: assessment.aggregate,
        cost: record.amount,
        anomaly: record.anomaly,
        latency_ms: interaction.latency_ms
      },
      'Request governed'
    );

    return {
      interaction_id: interaction.interaction_id,
      correlation_id: interaction.correlation_id,
      output: decision.output,
      action: decision.action,
      rule_id: decision.rule_id,
      response_source: decision.response_source,
      synthetic: decision.synthetic,
      model: interaction.model,
      provider: interaction.provider,
      risk: { aggregate: assessment.aggregate, level: assessment.level, scores: assessment.scores },
      cost: { amount: record.amount, currency: record.currency, anomaly: record.anomaly, estimated: record.estimated },
      policy_revision: snapshot.revision,
      latency_ms: interaction.latency_ms,
      audit: entry
        ? { sequence: entry.sequence, hash: entry.hash, ...(entry.signature ? { signature: entry.signature } : {}) }
        : null,
      ...(auditWarning ? { audit_warning: auditWarning } : {}),
      ...(interaction.error ? { error: interaction.error } : {})
    };
  }

  /**
   * Retries parked audit tuples in their original order, stopping at the
   * first one that still fails. Concurrent callers share one flush.
   */
  flushPending(): Promise<{ flushed: number; remaining: number }> {
    if (!this.flushing) {
      this.flushing = this.drainPending().finally(() => {
        this.flushing = null;
      });
    }
    return this.flushing;
  }

  private async drainPending(): Promise<{ flushed: number; remaining: number }> {
    const { audit, logger } = this.deps;
    let flushed = 0;

    while (this.pending.length > 0) {
      const next = this.pending[0];
      const interactionId = next.interaction.interaction_id;
      try {
        await audit.append(next.interaction, next.assessment, next.decision, next.cost);
      } catch (error) {
        if (error instanceof DuplicateAuditEntryError && audit.has(interactionId)) {
          logger.warn({ interaction_id: interactionId }, 'Pending entry already audited');
          this.removePending(next);
          continue;
        }
        logger.error({ interaction_id: interactionId, remaining: this.pending.length, err: error }, 'Pending audit flush failed');
        break;
      }
      this.removePending(next);
      flushed++;
    }

    return { flushed, remaining: this.pending.length };
  }

  private removePending(tuple: PendingAudit): void {
    const index = this.pending.indexOf(tuple);
    if (index !== -1) this.pending.splice(index, 1);
  }

  private async appendWithRetry(
    interaction: Interaction,
    assessment: RiskAssessment,
    decision: PolicyDecision,
    record: CostRecord
  ): Promise<AuditEntry> {
    const retry = this.deps.auditRetry;
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await this.deps.audit.append(interaction, assessment, decision, record);
      } catch (error) {
        if (error instanceof DuplicateAuditEntryError || attempt >= retry.max_attempts) {
          throw error;
        }
        const delayMs = backoffDelay(retry, attempt);
        this.deps.logger.warn(
          { interaction_id: interaction.interaction_id, attempt, delay_ms: delayMs },
          'Audit append failed, retrying'
        );
        await this.sleep(delayMs);
      }
    }
  }
}
