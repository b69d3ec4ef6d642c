import crypto from 'crypto';
import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AUTOMATED_AGENTS, AutomatedAgentId } from '../config/types';
import { ConfigService } from '../config/config-service';
import { PromptManager } from '../agent/prompt-manager';
import { KnowledgeService } from '../knowledge/knowledge-service';
import { TicketingService, TicketStatus, TICKET_STATUSES } from '../ticketing/types';
import { AuditService } from '../audit/audit-service';
import { AUDIT_CATEGORIES, AuditCategory } from '../audit/types';
import { Orchestrator } from '../orchestrator/orchestrator';
import { TenantRuntimeRegistry } from '../orchestrator/tenant-runtime';
import { logger } from '../observability/logger';

export interface AdminDeps {
  orchestrator: Orchestrator;
  configService: ConfigService;
  tenants: TenantRuntimeRegistry;
  prompts: PromptManager;
  knowledge: KnowledgeService;
  ticketing: TicketingService;
  audit: AuditService;
  adminApiKey: string;
}

const ADMIN_HEADER = 'x-admin-api-key';

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/** Operator identity for the audit trail; defaults to the shared key's holder */
function actorOf(req: FastifyRequest): string {
  const header = req.headers['x-admin-actor'];
  return typeof header === 'string' && header ? `operator:${header}` : 'operator';
}

const resumeSchema = {
  type: 'object',
  required: ['agent'],
  properties: { agent: { type: 'string', enum: AUTOMATED_AGENTS } },
} as const;

const ticketStatusSchema = {
  type: 'object',
  required: ['status'],
  properties: { status: { type: 'string', enum: TICKET_STATUSES } },
} as const;

const auditQuerySchema = {
  type: 'object',
  properties: {
    conversationKey: { type: 'string' },
    tenantId: { type: 'string' },
    category: { type: 'string', enum: AUDIT_CATEGORIES },
    since: { type: 'integer', minimum: 0 },
    limit: { type: 'integer', minimum: 1, maximum: 1000 },
  },
} as const;

export async function registerAdminRoutes(app: FastifyInstance, deps: AdminDeps): Promise<void> {
  const { orchestrator, configService, tenants, prompts, knowledge, ticketing, audit } = deps;

  const verifyAdminKey = async (req: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    const key = req.headers[ADMIN_HEADER];
    if (!deps.adminApiKey || typeof key !== 'string' || !keysMatch(key, deps.adminApiKey)) {
      return reply.status(403).send({ error: 'Forbidden' });
    }
    return undefined;
  };

  await app.register(async (admin) => {
    admin.addHook('preHandler', verifyAdminKey);

    /** Reload tenant configs, prompts and knowledge; cached tenant policies are rebuilt on next use */
    admin.post('/admin/reload-config', async (req, reply) => {
      try {
        configService.loadAll();
        prompts.loadAll();
        knowledge.loadAll();
        tenants.invalidate();
      } catch (err) {
        logger.error({ err }, 'Config reload failed');
        return reply.status(500).send({ error: 'Reload failed' });
      }
      await audit.record({ category: 'admin_action', action: 'config_reloaded', actor: actorOf(req) });
      logger.info({ admin: true, tenants: configService.tenantIds() }, 'Configuration reloaded');
      return reply.send({ status: 'ok', tenants: configService.tenantIds() });
    });

    admin.get<{ Params: { tenantId: string } }>('/admin/config/:tenantId', async (req, reply) => {
      return reply.send(configService.getSummary(req.params.tenantId));
    });

    admin.get<{ Params: { key: string } }>('/admin/conversations/:key', async (req, reply) => {
      const conversation = await orchestrator.getConversation(req.params.key);
      if (!conversation) return reply.status(404).send({ error: 'Conversation not found' });
      return reply.send(conversation);
    });

    admin.post<{ Params: { key: string }; Body: { agent: AutomatedAgentId } }>(
      '/admin/conversations/:key/resume',
      { schema: { body: resumeSchema } },
      async (req, reply) => {
        const result = await orchestrator.resume(req.params.key, req.body.agent, actorOf(req));
        if (result.ok) {
          return reply.send({ status: 'ok', agent: result.conversation.currentAgent, version: result.conversation.version });
        }
        const code = result.reason === 'not_found' ? 404 : 409;
        return reply.status(code).send({ error: result.reason });
      },
    );

    admin.get<{ Params: { key: string } }>('/admin/conversations/:key/tickets', async (req, reply) => {
      return reply.send({ tickets: await ticketing.listByConversation(req.params.key) });
    });

    admin.get<{ Params: { ref: string } }>('/admin/tickets/:ref', async (req, reply) => {
      const ticket = await ticketing.getTicket(req.params.ref);
      if (!ticket) return reply.status(404).send({ error: 'Ticket not found' });
      return reply.send(ticket);
    });

    admin.patch<{ Params: { ref: string }; Body: { status: TicketStatus } }>(
      '/admin/tickets/:ref',
      { schema: { body: ticketStatusSchema } },
      async (req, reply) => {
        const existing = await ticketing.getTicket(req.params.ref);
        if (!existing) return reply.status(404).send({ error: 'Ticket not found' });

        const updated = await ticketing.updateStatus(req.params.ref, req.body.status);
        await audit.record({
          category: 'admin_action',
          action: 'ticket_status_changed',
          actor: actorOf(req),
          conversationKey: updated.conversationKey,
          tenantId: updated.tenantId,
          details: { ticketRef: updated.ticketRef, from: existing.status, to: updated.status },
        });
        return reply.send(updated);
      },
    );

    admin.get<{
      Querystring: { conversationKey?: string; tenantId?: string; category?: AuditCategory; since?: number; limit?: number };
    }>('/admin/audit', { schema: { querystring: auditQuerySchema } }, async (req, reply) => {
      const events = await audit.getAuditTrail({ ...req.query, limit: req.query.limit ?? 100 });
      return reply.send({ events, count: events.length });
    });

    admin.get<{ Querystring: { conversationKey?: string } }>('/admin/audit/verify', async (req, reply) => {
      return reply.send(await audit.verifyIntegrity(req.query.conversationKey));
    });

    admin.post('/admin/effects/redeliver', async (req, reply) => {
      const result = await orchestrator.redeliverPending();
      await audit.record({ category: 'admin_action', action: 'effects_redelivered', actor: actorOf(req), details: result });
      return reply.send(result);
    });
  });
}
