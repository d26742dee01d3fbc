#!/usr/bin/env node

import { createLogger, type Logger } from './logger.js';
import { loadConfig } from './config/loader.js';
import type { GatewayConfig } from './config/schema.js';
import { ConfigError, PolicyConfigError } from './errors.js';
import { GatewayAdapter, createProviders } from './gateway/index.js';
import { RiskDetector, createDefaultDetectors } from './detectors/index.js';
import { DEFAULT_POLICY, loadPolicyFile } from './policy/loader.js';
import { PolicyStore } from './policy/store.js';
import { PolicyEngine } from './policy/engine.js';
import { CostMonitor } from './cost/monitor.js';
import { AuditLog, JsonlAuditStore, MemoryAuditStore, type AuditStore } from './audit/index.js';
import { loadKeyPair, type KeyPair } from './crypto/signer.js';
import { DriftEngine, JsonlFeedbackStore, MemoryFeedbackStore, type FeedbackStore } from './feedback/index.js';
import { GovernancePipeline } from './pipeline/pipeline.js';
import { QueryService } from './query/service.js';
import { buildServer } from './server.js';
import type { PolicyConfig } from './types/index.js';

const PENDING_FLUSH_INTERVAL_MS = 30_000;

function policyLoader(config: GatewayConfig): () => PolicyConfig {
  const path = config.policy.path;
  return path ? () => loadPolicyFile(path) : () => DEFAULT_POLICY;
}

async function start(logger: Logger): Promise<void> {
  const { config, source } = loadConfig();
  logger.info({ source: source ?? 'defaults' }, 'Configuration loaded');

  const loadPolicy = policyLoader(config);
  const policies = new PolicyStore(loadPolicy());
  logger.info(
    { path: config.policy.path ?? 'built-in', rules: policies.current().policy.rules.length },
    'Policy loaded'
  );

  const providers = createProviders(config.providers);
  const gateway = new GatewayAdapter(
    providers,
    {
      defaultProvider: config.gateway.default_provider ?? providers[0].name,
      timeoutMs: config.gateway.timeout_ms,
      retry: config.gateway.retry
    },
    logger.child({ component: 'gateway' })
  );

  const detector = new RiskDetector(
    createDefaultDetectors(config.detectors.leakage),
    { timeoutMs: config.detectors.timeout_ms },
    logger.child({ component: 'detectors' })
  );

  const engine = new PolicyEngine({ gateway, detector, logger: logger.child({ component: 'policy' }) });

  const cost = new CostMonitor(
    {
      currency: config.pricing.currency,
      models: config.pricing.models,
      fallback_per_1k: config.pricing.fallback_per_1k,
      ...config.cost
    },
    logger.child({ component: 'cost' })
  );

  let keyPair: KeyPair | null = null;
  if (config.audit.key_dir) {
    keyPair = loadKeyPair(config.audit.key_dir);
    if (!keyPair) {
      throw new ConfigError('Audit signing keys not found', [`no key pair in ${config.audit.key_dir}; run npm run keygen`]);
    }
  }

  const auditStore: AuditStore = config.audit.path ? new JsonlAuditStore(config.audit.path) : new MemoryAuditStore();
  const audit = await AuditLog.open(auditStore, { keyPair }, logger.child({ component: 'audit' }));
  if (!config.audit.path) {
    logger.warn('audit.path not set; audit entries are kept in memory only');
  }

  const feedback: FeedbackStore = config.feedback.path
    ? new JsonlFeedbackStore(config.feedback.path)
    : new MemoryFeedbackStore();
  await feedback.load();

  const drift = new DriftEngine(config.feedback);

  const pipeline = new GovernancePipeline({
    gateway,
    detector,
    engine,
    policies,
    cost,
    audit,
    auditMode: config.audit.mode,
    auditRetry: config.audit.write_retry,
    logger: logger.child({ component: 'pipeline' })
  });

  const query = new QueryService({ audit, cost, feedback, drift, policies });

  const app = await buildServer({ config, gateway, pipeline, query, policies, audit, loadPolicy, logger });

  if (config.auth.api_keys.length === 0) {
    logger.warn('No API keys configured; the API accepts unauthenticated requests');
  }

  if (config.audit.mode === 'best_effort') {
    const timer = setInterval(() => {
      if (pipeline.pendingCount() === 0) return;
      pipeline.flushPending().then(
        result => logger.info(result, 'Pending audit entries flushed'),
        error => logger.error({ err: error }, 'Pending audit flush failed')
      );
    }, PENDING_FLUSH_INTERVAL_MS);
    timer.unref();
  }

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      error => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(
    { host: config.server.host, port: config.server.port, providers: gateway.getAvailableProviders() },
    'Gateway listening'
  );
}

const logger = createLogger();

start(logger).catch(error => {
  if (error instanceof ConfigError || error instanceof PolicyConfigError) {
    logger.fatal({ issues: error.issues }, error.message);
  } else {
    logger.fatal({ err: error }, 'Gateway failed to start');
  }
  process.exit(1);
});
