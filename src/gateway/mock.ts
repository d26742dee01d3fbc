import type { CompletionParameters, ProviderUsage } from '../types/index.js';
import { ProviderError } from '../errors.js';
import { timeoutError, type CompletionProvider, type ProviderCallResult } from './provider.js';

export interface MockReply {
  completion: string;
  usage?: ProviderUsage;
  delay_ms?: number;
}

export type MockStep = MockReply | ProviderError;

export interface MockProviderOptions {
  name?: string;
  script?: MockStep[];
  respond?: (prompt: string, model: string) => string;
  delay_ms?: number;
}

export interface MockCall {
  model: string;
  prompt: string;
  parameters: CompletionParameters;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Deterministic provider for tests and local runs. Scripted steps are
 * consumed in order; afterwards every call gets the default reply.
 */
export class MockProvider implements CompletionProvider {
  readonly type = 'mock' as const;
  readonly name: string;
  readonly calls: MockCall[] = [];
  private readonly script: MockStep[];
  private readonly respond: (prompt: string, model: string) => string;
  private readonly delayMs: number;

  constructor(options: MockProviderOptions = {}) {
    this.name = options.name ?? 'mock';
    this.script = [...(options.script ?? [])];
    this.respond = options.respond ?? ((prompt) => `Mock response to: ${prompt.slice(0, 50)}...`);
    this.delayMs = options.delay_ms ?? 0;
  }

  async call(
    model: string,
    prompt: string,
    parameters: CompletionParameters,
    signal: AbortSignal
  ): Promise<ProviderCallResult> {
    const startTime = Date.now();
    this.calls.push({ model, prompt, parameters });

    const step = this.script.shift();
    if (step instanceof ProviderError) {
      throw step;
    }

    const delayMs = step?.delay_ms ?? this.delayMs;
    if (delayMs > 0) {
      await waitFor(delayMs, signal, this.name);
    }

    const completion = step?.completion ?? this.respond(prompt, model);
    const usage = step?.usage ?? {
      prompt_tokens: countWords(prompt),
      completion_tokens: countWords(completion)
    };

    return { completion, usage, latency_ms: Date.now() - startTime };
  }
}

function waitFor(ms: number, signal: AbortSignal, provider: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(timeoutError(provider));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(timeoutError(provider));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
