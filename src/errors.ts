import type { ProviderErrorKind, RiskCategory } from './types/index.js';

/**
 * Normalized failure of a provider call. `retryable` marks transient
 * failures the gateway may retry with backoff.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly retryable: boolean,
    public readonly provider: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * A detector could not produce a score. Degrades the category to
 * "not evaluated" instead of failing the assessment.
 */
export class DetectorUnavailableError extends Error {
  constructor(
    message: string,
    public readonly category: RiskCategory,
    public readonly detector: string
  ) {
    super(message);
    this.name = 'DetectorUnavailableError';
  }
}

/**
 * Invalid policy file. Fatal at startup.
 */
export class PolicyConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PolicyConfigError';
  }
}

/**
 * Invalid gateway configuration. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class PolicyStateError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Illegal policy transition ${from} -> ${to}`);
    this.name = 'PolicyStateError';
  }
}

/**
 * The audit store failed to persist an entry. Never swallowed.
 */
export class AuditWriteError extends Error {
  constructor(
    message: string,
    public readonly interactionId: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AuditWriteError';
  }
}

export class DuplicateAuditEntryError extends AuditWriteError {
  constructor(interactionId: string) {
    super(`Interaction ${interactionId} is already recorded in the audit log`, interactionId);
    this.name = 'DuplicateAuditEntryError';
  }
}

export class CostComputationError extends Error {
  constructor(
    message: string,
    public readonly model: string
  ) {
    super(message);
    this.name = 'CostComputationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
