export type ProviderErrorKind = 'rate_limit' | 'timeout' | 'auth' | 'malformed' | 'unknown';

export interface ProviderUsage {
  prompt_tokens: number;
  completion_tokens: number;
}

export interface CompletionParameters {
  max_tokens?: number;
  temperature?: number;
  system_prompt?: string;
}

export interface CompletionRequest {
  prompt: string;
  model: string;
  provider?: string;
  context?: string;
  parameters?: CompletionParameters;
  user_id?: string;
  correlation_id?: string;
}

export interface InteractionError {
  kind: ProviderErrorKind;
  message: string;
  retryable: boolean;
}

export interface Interaction {
  readonly interaction_id: string;
  readonly correlation_id: string;
  readonly provider: string;
  readonly model: string;
  readonly prompt: string;
  readonly context?: string;
  readonly completion: string | null;
  readonly usage: Readonly<ProviderUsage>;
  readonly latency_ms: number;
  readonly attempts: number;
  readonly timestamp: string;
  readonly user_id?: string;
  readonly error?: Readonly<InteractionError>;
}
