import type { Interaction } from './interaction.js';
import type { RiskAssessment } from './risk.js';
import type { PolicyDecision } from './policy.js';
import type { CostRecord } from './cost.js';

export interface AuditEntry {
  sequence: number;
  entry_id: string;
  interaction_id: string;
  recorded_at: string;
  interaction: Interaction;
  assessment: RiskAssessment;
  decision: PolicyDecision;
  cost: CostRecord;
  prev_hash: string;
  hash: string;
  signature?: string;
}

export type UnhashedAuditEntry = Omit<AuditEntry, 'hash' | 'signature'>;

export interface AuditRange {
  from?: number;
  to?: number;
}

export interface AuditVerification {
  valid: boolean;
  checked: number;
  errors: string[];
}

export type AuditMode = 'blocking' | 'best_effort';
