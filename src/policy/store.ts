import type { PolicyConfig } from '../types/index.js';
import { validatePolicy } from './loader.js';

export interface PolicySnapshot {
  readonly revision: number;
  readonly policy: PolicyConfig;
  readonly applied_at: string;
  readonly applied_by: string;
  readonly note?: string;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
  }
  return value;
}

/**
 * Holds the active policy as an immutable, revisioned snapshot. A new
 * policy is fully validated before the single reference swap, so readers
 * see either the old or the new policy and never a mix.
 */
export class PolicyStore {
  private active: PolicySnapshot;
  private readonly history: PolicySnapshot[] = [];

  constructor(initial: PolicyConfig, appliedBy = 'startup') {
    this.active = this.snapshot(1, validatePolicy(initial), appliedBy);
    this.history.push(this.active);
  }

  current(): PolicySnapshot {
    return this.active;
  }

  replace(next: unknown, appliedBy: string, note?: string): PolicySnapshot {
    const policy = validatePolicy(next);
    const snapshot = this.snapshot(this.active.revision + 1, policy, appliedBy, note);
    this.active = snapshot;
    this.history.push(snapshot);
    return snapshot;
  }

  revisions(): readonly PolicySnapshot[] {
    return [...this.history];
  }

  private snapshot(revision: number, policy: PolicyConfig, appliedBy: string, note?: string): PolicySnapshot {
    return deepFreeze({
      revision,
      policy,
      applied_at: new Date().toISOString(),
      applied_by: appliedBy,
      ...(note !== undefined ? { note } : {})
    });
  }
}
