import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z } from 'zod';
import type { Logger } from 'pino';

import { GATEWAY_VERSION, POLICY_ACTIONS, RISK_CATEGORIES, type PolicyConfig } from './types/index.js';
import { AuditWriteError, PolicyConfigError } from './errors.js';
import { formatIssues, type GatewayConfig } from './config/schema.js';
import type { GatewayAdapter } from './gateway/adapter.js';
import type { GovernancePipeline } from './pipeline/pipeline.js';
import type { QueryService } from './query/service.js';
import type { PolicyStore } from './policy/store.js';
import type { AuditLog } from './audit/audit-log.js';
import { applyRecommendations } from './policy/loader.js';
import { FeedbackInputSchema } from './feedback/store.js';

export interface ServerDeps {
  config: GatewayConfig;
  gateway: GatewayAdapter;
  pipeline: GovernancePipeline;
  query: QueryService;
  policies: PolicyStore;
  audit: AuditLog;
  /** Re-reads the policy file; throws PolicyConfigError when it is invalid. */
  loadPolicy: () => PolicyConfig;
  logger: Logger;
}

const CompleteBodySchema = z.object({
  prompt: z.string().min(1),
  model: z.string().min(1),
  provider: z.string().min(1).optional(),
  context: z.string().optional(),
  parameters: z
    .object({
      max_tokens: z.number().int().positive().optional(),
      temperature: z.number().min(0).max(2).optional(),
      system_prompt: z.string().optional()
    })
    .optional(),
  user_id: z.string().optional(),
  correlation_id: z.string().optional()
});

const InteractionQuerySchema = z.object({
  from: z.string().datetime({ offset: true }).optional(),
  to: z.string().datetime({ offset: true }).optional(),
  action: z.enum(POLICY_ACTIONS).optional(),
  category: z.enum(RISK_CATEGORIES).optional(),
  min_score: z.coerce.number().min(0).max(1).optional(),
  model: z.string().optional(),
  limit: z.coerce.number().int().min(1).optional(),
  offset: z.coerce.number().int().min(0).optional()
});

const RangeQuerySchema = z.object({
  from: z.string().datetime({ offset: true }).optional(),
  to: z.string().datetime({ offset: true }).optional()
});

const TopQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional()
});

const SeriesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(10000).optional()
});

const ApplyBodySchema = z
  .object({
    rule_ids: z.array(z.string()).optional()
  })
  .default({});

const PUBLIC_ROUTES = new Set(['/api/health']);
const ADMIN_PREFIX = '/api/admin/';

function bearer(header: string | undefined): string | undefined {
  if (!header?.startsWith('Bearer ')) return undefined;
  return header.slice('Bearer '.length).trim() || undefined;
}

// Exact match, or `*` as a wildcard (e.g. http://localhost:*)
export function originAllowed(origin: string, allowed: string[]): boolean {
  return allowed.some(candidate => {
    if (!candidate.includes('*')) return candidate === origin;
    const escaped = candidate.split('*').map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'));
    return new RegExp('^' + escaped.join('.*') + '$').test(origin);
  });
}

function invalid(issues: string[]): { error: string; issues: string[] } {
  return { error: 'invalid_request', issues };
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config, gateway, pipeline, query, policies, audit, logger } = deps;
  const apiKeys = new Set(config.auth.api_keys);
  const adminKeys = new Set(config.auth.admin_keys);
  const log = logger.child({ component: 'http' });

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: (origin, callback) => {
      callback(null, origin === undefined || originAllowed(origin, config.auth.allowed_origins));
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  app.addHook('onRequest', async (request, reply) => {
    const path = request.url.split('?')[0];
    if (PUBLIC_ROUTES.has(path)) return;

    const token = bearer(request.headers.authorization);

    if (path.startsWith(ADMIN_PREFIX)) {
      if (!token || !adminKeys.has(token)) {
        return reply.status(401).send({ error: 'unauthorized', message: 'Admin key required' });
      }
      return;
    }

    // An empty key list leaves the API open (local development)
    if (apiKeys.size > 0 && (!token || !apiKeys.has(token))) {
      return reply.status(401).send({ error: 'unauthorized', message: 'Invalid or missing API key' });
    }
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AuditWriteError) {
      log.error({ url: request.url, interaction_id: error.interactionId, err: error }, 'Request failed on audit write');
      return reply.status(503).send({ error: 'audit_unavailable', message: error.message });
    }

    if (error instanceof PolicyConfigError) {
      return reply.status(400).send({ error: 'invalid_policy', message: error.message, issues: error.issues });
    }

    const status = error.statusCode ?? 500;
    if (status >= 500) {
      log.error({ url: request.url, err: error }, 'Unhandled request error');
    }
    return reply.status(status).send({
      error: status >= 500 ? 'internal_error' : 'request_error',
      message: error.message
    });
  });

  app.get('/api/health', async () => {
    const verification = await audit.inspect();
    return {
      status: verification.valid ? 'healthy' : 'degraded',
      version: GATEWAY_VERSION,
      providers: gateway.getAvailableProviders(),
      policy_revision: policies.current().revision,
      audit: {
        valid: verification.valid,
        entries: audit.size(),
        signed: audit.signed,
        ...(audit.keyId ? { key_id: audit.keyId } : {}),
        pending: pipeline.pendingCount()
      }
    };
  });

  app.post('/api/complete', async (request, reply) => {
    const body = CompleteBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send(invalid(formatIssues(body.error)));
    }

    // A client disconnect only prevents provider calls not yet issued
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    return pipeline.process(body.data, { signal: controller.signal });
  });

  app.get('/api/interactions', async (request, reply) => {
    const parsed = InteractionQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }
    return query.listInteractions(parsed.data);
  });

  app.get<{ Params: { id: string } }>('/api/interactions/:id', async (request, reply) => {
    const detail = await query.getInteraction(request.params.id);
    if (!detail) {
      return reply.status(404).send({ error: 'not_found', message: `Unknown interaction ${request.params.id}` });
    }
    return detail;
  });

  app.get('/api/cost/series', async (request, reply) => {
    const parsed = SeriesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }
    return { points: query.costSeries(parsed.data.limit) };
  });

  app.get('/api/cost/summary', async () => query.costSummary());

  app.get('/api/cost/top', async (request, reply) => {
    const parsed = TopQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }
    return { items: await query.topCost(parsed.data.limit) };
  });

  app.get('/api/stats/enforcement', async (request, reply) => {
    const parsed = RangeQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }
    return query.enforcementStats(parsed.data);
  });

  app.get('/api/stats/risk', async (request, reply) => {
    const parsed = RangeQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }
    return query.riskTrends(parsed.data);
  });

  app.get('/api/audit/summary', async () => query.auditSummary());

  app.get('/api/audit/export', async (request, reply) => {
    const parsed = RangeQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }
    const report = await query.complianceReport(parsed.data);
    log.info({ entries: report.entries.length, ...parsed.data }, 'Compliance report exported');
    return reply
      .header('content-disposition', `attachment; filename="compliance-report-${report.generated_at.slice(0, 10)}.json"`)
      .send(report);
  });

  app.get('/api/policy/history', async () => ({ revisions: query.policyHistory() }));

  app.get('/api/drift', async () => query.drift());

  app.post('/api/feedback', async (request, reply) => {
    const parsed = FeedbackInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }

    const record = await query.submitFeedback(parsed.data);
    if (!record) {
      return reply.status(404).send({ error: 'not_found', message: `Unknown interaction ${parsed.data.interaction_id}` });
    }
    return reply.status(201).send(record);
  });

  app.post('/api/admin/policy/reload', async () => {
    const snapshot = policies.replace(deps.loadPolicy(), 'admin', 'reloaded from file');
    log.info({ revision: snapshot.revision, version: snapshot.policy.version }, 'Policy reloaded');
    return { revision: snapshot.revision, version: snapshot.policy.version, applied_at: snapshot.applied_at };
  });

  app.post('/api/admin/policy/apply-recommendations', async (request, reply) => {
    const parsed = ApplyBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send(invalid(formatIssues(parsed.error)));
    }

    const report = await query.drift();
    const wanted = parsed.data.rule_ids;
    const recommendations = wanted
      ? report.recommendations.filter(rec => wanted.includes(rec.rule_id))
      : report.recommendations;

    if (recommendations.length === 0) {
      return { applied: false, revision: policies.current().revision, recommendations: [] };
    }

    const next = applyRecommendations(policies.current().policy, recommendations);
    const snapshot = policies.replace(next, 'admin', `applied ${recommendations.length} threshold recommendation(s)`);
    log.info({ revision: snapshot.revision, rules: recommendations.map(rec => rec.rule_id) }, 'Threshold recommendations applied');

    return { applied: true, revision: snapshot.revision, recommendations };
  });

  return app;
}
