import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import type { CompletionRequest, Interaction, ProviderUsage } from '../types/index.js';
import { ProviderError } from '../errors.js';
import { backoffDelay, sleep as defaultSleep, type BackoffPolicy, type Sleep } from '../util/backoff.js';
import { toProviderError, type CompletionProvider } from './provider.js';

export interface GatewayOptions {
  defaultProvider: string;
  timeoutMs: number;
  retry: BackoffPolicy;
  sleep?: Sleep;
}

export interface SendOptions {
  signal?: AbortSignal;
}

const NO_USAGE: ProviderUsage = { prompt_tokens: 0, completion_tokens: 0 };

function freezeInteraction(interaction: Interaction): Interaction {
  Object.freeze(interaction.usage);
  if (interaction.error) Object.freeze(interaction.error);
  return Object.freeze(interaction);
}

/**
 * Normalizes calls to the configured providers into Interactions.
 *
 * Provider failures never reject: a terminal error or an exhausted retry
 * budget yields an Interaction with `completion: null` and `error` set, so
 * the failure is scored, enforced and audited like any other outcome.
 */
export class GatewayAdapter {
  private readonly providers = new Map<string, CompletionProvider>();
  private readonly defaultProvider: string;
  private readonly timeoutMs: number;
  private readonly retry: BackoffPolicy;
  private readonly sleep: Sleep;

  constructor(
    providers: CompletionProvider[],
    options: GatewayOptions,
    private readonly logger: Logger
  ) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
    this.defaultProvider = options.defaultProvider;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry;
    this.sleep = options.sleep ?? defaultSleep;
  }

  hasProvider(name: string): boolean {
    return this.providers.has(name);
  }

  getAvailableProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  async send(request: CompletionRequest, options: SendOptions = {}): Promise<Interaction> {
    const startTime = Date.now();
    const interactionId = uuidv4();
    const providerName = request.provider ?? this.defaultProvider;

    const base = {
      interaction_id: interactionId,
      correlation_id: request.correlation_id ?? interactionId,
      provider: providerName,
      model: request.model,
      prompt: request.prompt,
      ...(request.context !== undefined ? { context: request.context } : {}),
      ...(request.user_id !== undefined ? { user_id: request.user_id } : {}),
      timestamp: new Date(startTime).toISOString()
    };

    const provider = this.providers.get(providerName);
    if (!provider) {
      const error = new ProviderError(`Provider ${providerName} is not configured`, 'unknown', false, providerName);
      return this.failed(base, error, 0, startTime);
    }

    let lastError: ProviderError | undefined;
    let attempts = 0;

    while (attempts < this.retry.max_attempts) {
      // Cancellation only stops calls that have not been issued yet
      if (options.signal?.aborted) {
        lastError ??= new ProviderError('Request cancelled before provider call', 'unknown', false, providerName);
        break;
      }

      attempts++;
      try {
        const result = await provider.call(
          request.model,
          request.prompt,
          request.parameters ?? {},
          AbortSignal.timeout(this.timeoutMs)
        );

        return freezeInteraction({
          ...base,
          completion: result.completion,
          usage: { ...result.usage },
          latency_ms: Date.now() - startTime,
          attempts
        });
      } catch (error) {
        lastError = toProviderError(error, providerName);

        if (!lastError.retryable || attempts >= this.retry.max_attempts) {
          break;
        }

        const delayMs = backoffDelay(this.retry, attempts);
        this.logger.warn(
          { interaction_id: interactionId, provider: providerName, kind: lastError.kind, attempt: attempts, delay_ms: delayMs },
          'Provider call failed, retrying'
        );
        await this.sleep(delayMs);
      }
    }

    const error =
      lastError ?? new ProviderError('Provider call was not attempted', 'unknown', false, providerName);
    return this.failed(base, error, attempts, startTime);
  }

  private failed(
    base: Omit<Interaction, 'completion' | 'usage' | 'latency_ms' | 'attempts' | 'error'>,
    error: ProviderError,
    attempts: number,
    startTime: number
  ): Interaction {
    this.logger.warn(
      { interaction_id: base.interaction_id, provider: base.provider, kind: error.kind, attempts },
      'Provider call failed'
    );

    return freezeInteraction({
      ...base,
      completion: null,
      usage: { ...NO_USAGE },
      latency_ms: Date.now() - startTime,
      attempts,
      error: { kind: error.kind, message: error.message, retryable: error.retryable }
    });
  }
}
