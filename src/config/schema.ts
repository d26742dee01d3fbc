import { z } from 'zod';
import { POLICY_ACTIONS, RISK_CATEGORIES } from '../types/index.js';

const probability = z.number().min(0).max(1);

export const RetrySchema = z.object({
  max_attempts: z.number().int().min(1).default(3),
  initial_delay_ms: z.number().int().min(0).default(250),
  max_delay_ms: z.number().int().min(0).default(8000),
  multiplier: z.number().min(1).default(2)
});

export const ProviderConfigSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['openai', 'anthropic', 'mock']),
  base_url: z.string().url().optional(),
  api_key_env: z.string().optional()
});

export const ModelPriceSchema = z.object({
  input_per_1k: z.number().min(0),
  output_per_1k: z.number().min(0)
});

export const GatewayConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535).default(8088),
    host: z.string().default('127.0.0.1')
  }).default({}),
  auth: z.object({
    api_keys: z.array(z.string().min(1)).default([]),
    admin_keys: z.array(z.string().min(1)).default([]),
    allowed_origins: z.array(z.string()).default([])
  }).default({}),
  rate_limits: z.object({
    requests_per_minute: z.number().int().min(1).default(600)
  }).default({}),
  providers: z.array(ProviderConfigSchema).min(1).default([{ name: 'mock', type: 'mock' }]),
  gateway: z.object({
    default_provider: z.string().optional(),
    timeout_ms: z.number().int().min(1).default(30000),
    retry: RetrySchema.default({})
  }).default({}),
  detectors: z.object({
    timeout_ms: z.number().int().min(1).default(250),
    leakage: z.object({
      entropy_threshold: z.number().min(0).default(4.0),
      min_token_length: z.number().int().min(8).default(20)
    }).default({})
  }).default({}),
  pricing: z.object({
    currency: z.string().default('USD'),
    models: z.record(ModelPriceSchema).default({}),
    fallback_per_1k: z.number().min(0).default(0)
  }).default({}),
  cost: z.object({
    window_size: z.number().int().min(2).default(50),
    window_ms: z.number().int().min(1).optional(),
    z_threshold: z.number().positive().default(3.0),
    min_samples: z.number().int().min(2).default(5),
    min_std: z.number().positive().default(1e-6),
    history_size: z.number().int().min(1).default(1000)
  }).superRefine((cost, ctx) => {
    // A window that can never hold min_samples never yields a z-score
    if (cost.min_samples > cost.window_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['min_samples'],
        message: `must not exceed window_size (${cost.window_size})`
      });
    }
  }).default({}),
  audit: z.object({
    path: z.string().optional(),
    mode: z.enum(['blocking', 'best_effort']).default('blocking'),
    key_dir: z.string().optional(),
    write_retry: RetrySchema.default({})
  }).default({}),
  feedback: z.object({
    path: z.string().optional(),
    window_size: z.number().int().min(1).default(100),
    divergence_threshold: probability.default(0.15),
    risk_threshold: probability.default(0.5),
    error_rate_limit: probability.default(0.2),
    step: probability.default(0.05)
  }).default({}),
  policy: z.object({
    path: z.string().optional()
  }).default({})
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

const ruleTargets = ['aggregate', ...RISK_CATEGORIES] as const;

export const PolicyRuleSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  target: z.enum(ruleTargets),
  threshold: z.number(),
  action: z.enum(POLICY_ACTIONS),
  enabled: z.boolean().default(true)
});

// Range checks on thresholds are done by validatePolicy so every problem is reported together
export const PolicyFileSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).default('1'),
  rules: z.array(PolicyRuleSchema),
  refusal_message: z.string(),
  fallback_response: z.string(),
  top_severity_threshold: z.number().default(0.7),
  aggregation: z.object({
    mode: z.enum(['max', 'weighted_sum']).default('max'),
    weights: z.object({
      injection: z.number().min(0).default(1),
      hallucination: z.number().min(0).default(1),
      unsafe_content: z.number().min(0).default(1),
      data_leakage: z.number().min(0).default(1)
    }).default({})
  }).default({})
});

export type PolicyFile = z.infer<typeof PolicyFileSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
