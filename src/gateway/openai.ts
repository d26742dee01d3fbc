import { z } from 'zod';
import type { CompletionParameters } from '../types/index.js';
import { ProviderError, errorMessage } from '../errors.js';
import { errorForStatus, timeoutError, type CompletionProvider, type ProviderCallResult } from './provider.js';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable()
        })
      })
    )
    .min(1),
  usage: z.object({
    prompt_tokens: z.number().int().min(0),
    completion_tokens: z.number().int().min(0)
  })
});

export interface OpenAIProviderOptions {
  name?: string;
  apiKey: string;
  baseUrl?: string;
}

/**
 * Chat completions over any OpenAI-compatible endpoint.
 */
export class OpenAIProvider implements CompletionProvider {
  readonly type = 'openai' as const;
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name ?? 'openai';
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
  }

  async call(
    model: string,
    prompt: string,
    parameters: CompletionParameters,
    signal: AbortSignal
  ): Promise<ProviderCallResult> {
    const startTime = Date.now();

    const messages = [
      ...(parameters.system_prompt ? [{ role: 'system', content: parameters.system_prompt }] : []),
      { role: 'user', content: prompt }
    ];

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model,
          messages,
          max_tokens: parameters.max_tokens ?? 500,
          temperature: parameters.temperature ?? 0.7
        }),
        signal
      });
    } catch (error) {
      if (signal.aborted) throw timeoutError(this.name);
      // network failures (DNS, reset, refused) are transient
      throw new ProviderError(`${this.name} request failed: ${errorMessage(error)}`, 'unknown', true, this.name);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw errorForStatus(this.name, response.status, detail.slice(0, 200));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal.aborted) throw timeoutError(this.name);
      throw new ProviderError(`${this.name} returned invalid JSON: ${errorMessage(error)}`, 'malformed', false, this.name);
    }

    const parsed = ChatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(`${this.name} response is missing choices or usage`, 'malformed', false, this.name);
    }

    const content = parsed.data.choices[0].message.content;
    if (content === null) {
      throw new ProviderError(`${this.name} returned no text content`, 'malformed', false, this.name);
    }

    return {
      completion: content,
      usage: {
        prompt_tokens: parsed.data.usage.prompt_tokens,
        completion_tokens: parsed.data.usage.completion_tokens
      },
      latency_ms: Date.now() - startTime
    };
  }
}
