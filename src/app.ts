import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { Channel } from './config/types';
import { ConfigService } from './config/config-service';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { DependencyHealthManager } from './resilience/dependency-health';
import { Delay, FallbackController } from './resilience/fallback-controller';
import { sleep } from './resilience/timeout';
import { createConversationStore } from './memory/conversation-store';
import { ConversationStore } from './memory/types';
import { createTicketingService } from './ticketing/ticketing-service';
import { TicketingService } from './ticketing/types';
import { createAuditStore } from './audit/audit-store';
import { AuditService } from './audit/audit-service';
import { createDedupStore } from './security/dedup-store';
import { buildModelRouterFromEnv } from './llm/provider-factory';
import { LanguageService, RouterLanguageService } from './llm/language-service';
import { ModelRouter } from './llm/model-router';
import { PromptManager } from './agent/prompt-manager';
import { createAgentRoster } from './agent/specialist-agent';
import { KnowledgeService } from './knowledge/knowledge-service';
import { OpenAIEmbeddingProvider } from './knowledge/embedding-service';
import { CatalogClient, FileCatalogClient } from './tools/catalog-client';
import { createToolRegistry } from './tools/registry';
import { ChannelOutbound } from './channels/types';
import { WhatsAppOutboundAdapter } from './channels/whatsapp-adapter';
import { WebOutbox } from './channels/web-outbox';
import { OutboundRouter } from './channels/outbound-router';
import { registerRawJsonParser } from './channels/raw-body';
import { registerWhatsAppWebhook } from './channels/whatsapp-webhook';
import { registerWebChatRoutes } from './channels/web-chat-routes';
import { registerAdminRoutes } from './admin/admin-routes';
import { registerHealthRoutes } from './health/health-routes';
import { TenantRuntimeRegistry } from './orchestrator/tenant-runtime';
import { TurnPipeline } from './orchestrator/turn-pipeline';
import { EffectDispatcher } from './orchestrator/effect-dispatcher';
import { Orchestrator } from './orchestrator/orchestrator';

/** Collaborators a caller may substitute; anything omitted is built from env */
export interface AppOptions {
  /** Pass null to run without Redis even when REDIS_URL is set */
  redis?: Redis | null;
  language?: LanguageService;
  store?: ConversationStore;
  ticketing?: TicketingService;
  whatsapp?: ChannelOutbound;
  knowledge?: KnowledgeService;
  configService?: ConfigService;
  catalog?: CatalogClient;
  health?: DependencyHealthManager;
  adminApiKey?: string;
  now?: () => number;
  delay?: Delay;
  newTicketRef?: () => string;
}

export interface AppContext {
  app: FastifyInstance;
  orchestrator: Orchestrator;
  webOutbox: WebOutbox;
  audit: AuditService;
  redis?: Redis;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) {
    logger.info('REDIS_URL not set; using in-memory stores');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const now = options.now ?? Date.now;
  const delay = options.delay ?? sleep;

  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PATCH'],
  });

  // Keep raw JSON for webhook signature verification
  registerRawJsonParser(app);

  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const redis = options.redis === null ? undefined : options.redis ?? (await connectRedis());

  // ───── Configuration and shared collaborators ─────
  const configService = options.configService ?? new ConfigService();
  const health = options.health ?? new DependencyHealthManager();
  const store = options.store ?? createConversationStore(redis);
  const ticketing = options.ticketing ?? createTicketingService(env.ticketing, now);
  const dedup = createDedupStore(redis, now);

  const audit = new AuditService(createAuditStore(redis), now);
  try {
    await audit.init();
  } catch (err) {
    logger.warn({ err }, 'Audit chain head unavailable; starting from genesis');
  }

  // ───── Language stack ─────
  const prompts = new PromptManager();
  let modelRouter: ModelRouter | undefined;
  let language = options.language;
  if (!language) {
    modelRouter = buildModelRouterFromEnv();
    language = new RouterLanguageService(modelRouter, prompts, {
      classifierTemperature: env.llm.classifierTemperature,
    });
    logger.info({ primary: modelRouter.primaryProviderName }, 'Multi-LLM stack initialized');
  }

  // ───── Knowledge ─────
  const knowledge = options.knowledge ?? new KnowledgeService();
  if (env.rag.enabled && env.openai.apiKey) {
    knowledge.setEmbeddingProvider(new OpenAIEmbeddingProvider());
    knowledge.initializeVectorIndex().catch((err: unknown) => {
      logger.warn({ err }, 'Vector index build failed; keyword search only');
    });
  }

  // ───── Tools and per-tenant policies ─────
  const registry = createToolRegistry(options.catalog ?? new FileCatalogClient());
  const tenants = new TenantRuntimeRegistry({
    configService,
    classifier: language,
    registry,
    health,
    audit,
    now,
    delay,
  });

  // ───── Channels ─────
  const webOutbox = new WebOutbox(now);
  const outbound = new OutboundRouter({
    whatsapp: options.whatsapp ?? new WhatsAppOutboundAdapter(),
    web: webOutbox,
  } satisfies Record<Channel, ChannelOutbound>);

  // ───── Turn pipeline ─────
  const pipeline = new TurnPipeline({
    store,
    tenants,
    language,
    knowledge,
    agents: createAgentRoster(language),
    registry,
    audit,
    now,
    newTicketRef: options.newTicketRef,
  });
  const dispatcher = new EffectDispatcher(
    store,
    ticketing,
    outbound,
    new FallbackController(configService.get(env.defaultTenantId).retry, health, delay),
    audit,
    dedup,
  );
  const orchestrator = new Orchestrator({ pipeline, dispatcher, store, tenants, dedup, audit, now });

  // ───── Routes ─────
  registerHealthRoutes(app, {
    health,
    redis,
    llm: modelRouter,
    enableMetrics: env.observability.enableMetrics,
    now,
  });
  await registerAdminRoutes(app, {
    orchestrator,
    configService,
    tenants,
    prompts,
    knowledge,
    ticketing,
    audit,
    adminApiKey: options.adminApiKey ?? env.security.adminApiKey,
  });
  registerWhatsAppWebhook(app, orchestrator);
  registerWebChatRoutes(app, orchestrator, webOutbox, now);

  logger.info({ tenants: configService.tenantIds() }, 'Application built');
  return { app, orchestrator, webOutbox, audit, redis };
}
