import { z } from 'zod';
import { POLICY_ACTIONS, RISK_CATEGORIES } from '../types/index.js';

// Shapes of persisted audit entries, checked when the JSONL log is read back

const RULE_TARGETS = ['aggregate', ...RISK_CATEGORIES] as const;

const UsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number()
});

const InteractionSchema = z.object({
  interaction_id: z.string(),
  correlation_id: z.string(),
  provider: z.string(),
  model: z.string(),
  prompt: z.string(),
  context: z.string().optional(),
  completion: z.string().nullable(),
  usage: UsageSchema,
  latency_ms: z.number(),
  attempts: z.number(),
  timestamp: z.string(),
  user_id: z.string().optional(),
  error: z
    .object({
      kind: z.enum(['rate_limit', 'timeout', 'auth', 'malformed', 'unknown']),
      message: z.string(),
      retryable: z.boolean()
    })
    .optional()
});

const categoryRecord = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    injection: value,
    hallucination: value,
    unsafe_content: value,
    data_leakage: value
  });

const EvidenceSchema = z.object({
  category: z.enum(RISK_CATEGORIES),
  signal: z.string(),
  snippet: z.string(),
  confidence: z.number(),
  location: z
    .object({
      source: z.enum(['prompt', 'completion']),
      start: z.number(),
      end: z.number()
    })
    .optional(),
  not_evaluated: z.boolean().optional()
});

const AssessmentSchema = z.object({
  interaction_id: z.string(),
  scores: categoryRecord(z.number()),
  aggregate: z.number(),
  aggregation: z.enum(['max', 'weighted_sum']),
  level: z.enum(['safe', 'low', 'medium', 'high', 'critical']),
  confidence: z.number(),
  evaluated: categoryRecord(z.boolean()),
  evidence: z.array(EvidenceSchema)
});

const DecisionSchema = z.object({
  interaction_id: z.string(),
  action: z.enum(POLICY_ACTIONS),
  rule_id: z.string(),
  target: z.enum(RULE_TARGETS).nullable(),
  threshold: z.number().nullable(),
  response_source: z.enum(['original', 'fallback', 'rewritten', 'refusal']),
  output: z.string().nullable(),
  synthetic: z.boolean(),
  reason: z.string(),
  state: z.literal('enforced'),
  rewrite: z
    .object({
      sanitized_prompt: z.string(),
      completion: z.string().nullable(),
      usage: UsageSchema,
      aggregate: z.number().nullable(),
      downgraded: z.boolean(),
      error: z.string().optional()
    })
    .optional()
});

const CostSchema = z.object({
  interaction_id: z.string(),
  model: z.string(),
  amount: z.number(),
  currency: z.string(),
  tokens: z.object({
    prompt: z.number(),
    completion: z.number(),
    rewrite_prompt: z.number(),
    rewrite_completion: z.number(),
    total: z.number()
  }),
  anomaly: z.boolean(),
  z_score: z.number().nullable(),
  window_mean: z.number().nullable(),
  window_std: z.number().nullable(),
  estimated: z.boolean(),
  confidence: z.number(),
  error: z.string().optional()
});

export const ChainFieldsSchema = z.object({
  sequence: z.number().int(),
  interaction_id: z.string(),
  prev_hash: z.string(),
  hash: z.string(),
  signature: z.string().optional()
});

export const AuditEntrySchema = ChainFieldsSchema.extend({
  entry_id: z.string(),
  recorded_at: z.string(),
  interaction: InteractionSchema,
  assessment: AssessmentSchema,
  decision: DecisionSchema,
  cost: CostSchema
});

export type ChainFields = z.infer<typeof ChainFieldsSchema>;
