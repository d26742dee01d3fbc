import Anthropic from '@anthropic-ai/sdk';
import type { CompletionParameters } from '../types/index.js';
import { ProviderError, errorMessage } from '../errors.js';
import { errorForStatus, timeoutError, type CompletionProvider, type ProviderCallResult } from './provider.js';

export interface AnthropicProviderOptions {
  name?: string;
  apiKey?: string;
  baseUrl?: string;
  client?: Anthropic;
}

export class AnthropicProvider implements CompletionProvider {
  readonly type = 'anthropic' as const;
  readonly name: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicProviderOptions = {}) {
    this.name = options.name ?? 'anthropic';
    // the gateway owns retries
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  async call(
    model: string,
    prompt: string,
    parameters: CompletionParameters,
    signal: AbortSignal
  ): Promise<ProviderCallResult> {
    const startTime = Date.now();

    const response = await this.client.messages
      .create(
        {
          model,
          max_tokens: parameters.max_tokens ?? 1024,
          ...(parameters.system_prompt ? { system: parameters.system_prompt } : {}),
          ...(parameters.temperature !== undefined ? { temperature: parameters.temperature } : {}),
          messages: [{ role: 'user', content: prompt }]
        },
        { signal, maxRetries: 0 }
      )
      .catch((error: unknown) => {
        throw this.normalize(error, signal);
      });

    const completion = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('\n');

    if (completion.length === 0) {
      throw new ProviderError(`${this.name} returned no text content`, 'malformed', false, this.name);
    }

    return {
      completion,
      usage: {
        prompt_tokens: response.usage.input_tokens,
        completion_tokens: response.usage.output_tokens
      },
      latency_ms: Date.now() - startTime
    };
  }

  private normalize(error: unknown, signal: AbortSignal): ProviderError {
    if (signal.aborted || error instanceof Anthropic.APIConnectionTimeoutError) {
      return timeoutError(this.name);
    }
    if (error instanceof Anthropic.RateLimitError) {
      return new ProviderError(error.message, 'rate_limit', true, this.name, 429);
    }
    if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
      return new ProviderError(error.message, 'auth', false, this.name, error.status);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new ProviderError(error.message, 'unknown', true, this.name);
    }
    if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
      return errorForStatus(this.name, error.status, error.message);
    }
    return new ProviderError(errorMessage(error), 'unknown', false, this.name);
  }
}
