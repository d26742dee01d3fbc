import { setTimeout as delay } from 'timers/promises';

export interface BackoffPolicy {
  max_attempts: number;
  initial_delay_ms: number;
  max_delay_ms: number;
  multiplier: number;
}

// Delay before the retry that follows `attempt` (1-based)
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const raw = policy.initial_delay_ms * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(policy.max_delay_ms, raw);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};
