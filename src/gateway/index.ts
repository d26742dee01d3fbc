export { GatewayAdapter, type GatewayOptions, type SendOptions } from './adapter.js';
export { OpenAIProvider, type OpenAIProviderOptions } from './openai.js';
export { AnthropicProvider, type AnthropicProviderOptions } from './anthropic.js';
export { MockProvider, countWords, type MockStep, type MockReply, type MockCall } from './mock.js';
export {
  errorForStatus,
  toProviderError,
  type CompletionProvider,
  type ProviderCallResult,
  type ProviderType
} from './provider.js';

import type { ProviderConfig } from '../config/schema.js';
import { ConfigError } from '../errors.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';
import { MockProvider } from './mock.js';
import type { CompletionProvider } from './provider.js';

const DEFAULT_KEY_ENV: Record<'openai' | 'anthropic', string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY'
};

// One variant per configured provider entry, chosen by `type`
export function createProviders(
  configs: ProviderConfig[],
  env: NodeJS.ProcessEnv = process.env
): CompletionProvider[] {
  return configs.map((config): CompletionProvider => {
    switch (config.type) {
      case 'mock':
        return new MockProvider({ name: config.name });

      case 'openai': {
        const keyEnv = config.api_key_env ?? DEFAULT_KEY_ENV.openai;
        const apiKey = env[keyEnv];
        if (!apiKey) {
          throw new ConfigError(`Provider ${config.name} needs an API key`, [`${keyEnv} is not set`]);
        }
        return new OpenAIProvider({ name: config.name, apiKey, baseUrl: config.base_url });
      }

      case 'anthropic': {
        const keyEnv = config.api_key_env ?? DEFAULT_KEY_ENV.anthropic;
        const apiKey = env[keyEnv];
        if (!apiKey) {
          throw new ConfigError(`Provider ${config.name} needs an API key`, [`${keyEnv} is not set`]);
        }
        return new AnthropicProvider({ name: config.name, apiKey, baseUrl: config.base_url });
      }
    }
  });
}
