import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { GatewayConfigSchema, formatIssues, type GatewayConfig } from './schema.js';
import { ConfigError, errorMessage } from '../errors.js';

export const DEFAULT_CONFIG_PATHS = [
  resolve(process.cwd(), 'guardrail.yaml'),
  resolve(homedir(), '.guardrail', 'config.yaml'),
  resolve(homedir(), '.config', 'guardrail', 'config.yaml')
];

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = GatewayConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError('Invalid gateway configuration', formatIssues(parsed.error));
  }

  const config = parsed.data;

  const envKey = env.GUARDRAIL_API_KEY;
  if (envKey && !config.auth.api_keys.includes(envKey)) {
    config.auth.api_keys.push(envKey);
  }

  const providerNames = new Set<string>();
  for (const provider of config.providers) {
    if (providerNames.has(provider.name)) {
      throw new ConfigError('Invalid gateway configuration', [`duplicate provider "${provider.name}"`]);
    }
    providerNames.add(provider.name);
  }

  const defaultProvider = config.gateway.default_provider;
  if (defaultProvider !== undefined && !providerNames.has(defaultProvider)) {
    throw new ConfigError('Invalid gateway configuration', [
      `gateway.default_provider "${defaultProvider}" is not a configured provider`
    ]);
  }

  return config;
}

/**
 * Loads the first config file found on the search path, or the defaults
 * when none exists.
 */
export function loadConfig(paths: string[] = DEFAULT_CONFIG_PATHS): { config: GatewayConfig; source: string | null } {
  for (const path of paths) {
    if (existsSync(path)) {
      let raw: unknown;
      try {
        raw = parseYaml(readFileSync(path, 'utf-8'));
      } catch (error) {
        throw new ConfigError(`Config file ${path} is not valid YAML`, [errorMessage(error)]);
      }
      return { config: parseConfig(raw), source: path };
    }
  }

  return { config: parseConfig({}), source: null };
}
