import type { CompletionParameters, ProviderUsage } from '../types/index.js';
import { ProviderError, errorMessage } from '../errors.js';

export type ProviderType = 'openai' | 'anthropic' | 'mock';

export interface ProviderCallResult {
  completion: string;
  usage: ProviderUsage;
  latency_ms: number;
}

/**
 * Chat-completion capability. Implementations throw ProviderError for
 * every failure so the gateway can decide whether to retry.
 */
export interface CompletionProvider {
  readonly name: string;
  readonly type: ProviderType;
  call(
    model: string,
    prompt: string,
    parameters: CompletionParameters,
    signal: AbortSignal
  ): Promise<ProviderCallResult>;
}

export function errorForStatus(provider: string, status: number, detail: string): ProviderError {
  const message = `${provider} API error: ${status}${detail ? ` - ${detail}` : ''}`;

  if (status === 429) return new ProviderError(message, 'rate_limit', true, provider, status);
  if (status === 408 || status === 504) return new ProviderError(message, 'timeout', true, provider, status);
  if (status === 401 || status === 403) return new ProviderError(message, 'auth', false, provider, status);
  if (status >= 500) return new ProviderError(message, 'unknown', true, provider, status);

  return new ProviderError(message, 'unknown', false, provider, status);
}

export function toProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) return error;
  return new ProviderError(errorMessage(error), 'unknown', false, provider);
}

export function timeoutError(provider: string): ProviderError {
  return new ProviderError(`${provider} call timed out`, 'timeout', true, provider);
}
