import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';
import { initDefaultMetrics } from './observability/metrics';

const REDELIVERY_INTERVAL_MS = 30_000;

async function main(): Promise<void> {
  if (env.observability.enableMetrics) initDefaultMetrics();

  const { app, orchestrator, redis } = await buildApp();

  // Outbox sweep: effects whose delivery failed after commit
  const sweep = setInterval(() => {
    orchestrator.redeliverPending().catch((err: unknown) => {
      logger.warn({ err }, 'Pending effect sweep failed');
    });
  }, REDELIVERY_INTERVAL_MS);
  sweep.unref();

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...');
    clearInterval(sweep);
    await app.close();
    await orchestrator.drain();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });

  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({
      port: env.port,
      env: env.nodeEnv,
      primaryProvider: env.llm.primaryProvider,
    }, 'Encore Desk orchestration engine started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
