import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { getMetrics, getContentType } from '../observability/metrics';
import { DependencyHealthManager } from '../resilience/dependency-health';

export interface HealthDeps {
  health: DependencyHealthManager;
  redis?: Redis;
  /** Provider probe; omitted in tests and when no provider is configured */
  llm?: { healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>> };
  enableMetrics: boolean;
  now?: () => number;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  const now = deps.now ?? Date.now;

  /** Liveness: 200 while the process runs */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date(now()).toISOString() });
  });

  /** Readiness: Redis, LLM providers and collaborator circuits */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    if (deps.redis) {
      const start = now();
      try {
        await deps.redis.ping();
        checks.redis = { status: 'ok', latencyMs: now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    if (deps.llm) {
      try {
        for (const [providerName, check] of Object.entries(await deps.llm.healthCheck())) {
          checks[`llm_${providerName}`] = check;
        }
      } catch {
        checks.llm = { status: 'error' };
      }
    } else {
      checks.llm = { status: 'skipped' };
    }

    for (const [name, health] of Object.entries(deps.health.getHealthSummary())) {
      checks[`dep_${name}`] = { status: health.circuitOpen ? 'error' : 'ok' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      degradationLevel: deps.health.getDegradationLevel(),
      timestamp: new Date(now()).toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (deps.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
