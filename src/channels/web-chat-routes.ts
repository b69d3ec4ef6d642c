import { FastifyInstance } from 'fastify';
import { InboundMessage, conversationKeyFor } from '../config/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { createTraceContext } from '../observability/trace';
import { Orchestrator } from '../orchestrator/orchestrator';
import { WebOutbox } from './web-outbox';

interface ChatBody {
  session_id: string;
  message: string;
  message_id?: string;
  name?: string;
}

const chatBodySchema = {
  type: 'object',
  required: ['session_id', 'message'],
  properties: {
    session_id: { type: 'string', minLength: 1, maxLength: 128 },
    message: { type: 'string', minLength: 1 },
    message_id: { type: 'string', maxLength: 128 },
    name: { type: 'string', maxLength: 120 },
  },
} as const;

/**
 * Web chat channel. POST runs the turn before answering, so the response
 * already carries the reply; GET collects anything delivered later, such as
 * replies redelivered by the outbox sweep.
 */
export function registerWebChatRoutes(
  app: FastifyInstance,
  orchestrator: Orchestrator,
  outbox: WebOutbox,
  now: () => number = Date.now,
): void {
  app.post<{ Body: ChatBody }>('/chat/messages', { schema: { body: chatBodySchema } }, async (req, reply) => {
    const { session_id: sessionId, message_id: messageId, name } = req.body;
    const text = req.body.message.trim();
    if (!text) {
      return reply.status(400).send({ error: 'message is required' });
    }

    const tenantHeader = req.headers['x-tenant-id'];
    const tenantId = typeof tenantHeader === 'string' && tenantHeader ? tenantHeader : env.defaultTenantId;
    const inbound: InboundMessage = {
      channel: 'web',
      conversationKey: conversationKeyFor('web', sessionId),
      callerId: sessionId,
      text,
      timestamp: now(),
      tenantId,
      messageId,
      userProfile: name ? { name } : undefined,
    };
    const trace = createTraceContext({ conversationKey: inbound.conversationKey, channel: 'web', tenantId });

    const outcome = await orchestrator.handleInbound(inbound, trace);
    if (!outcome) {
      return reply.status(200).send({ status: 'duplicate', requestId: trace.requestId });
    }

    logger.debug({ requestId: trace.requestId, status: outcome.status }, 'Web chat turn finished');
    return reply.status(200).send({
      status: outcome.status,
      requestId: outcome.requestId,
      agent: outcome.agent,
      replies: outbox.collect(inbound.conversationKey).map((r) => r.text),
      ticketRef: outcome.ticketRef ?? null,
    });
  });

  app.get<{ Params: { sessionId: string } }>('/chat/:sessionId/replies', async (req, reply) => {
    const replies = outbox.collect(conversationKeyFor('web', req.params.sessionId));
    return reply.send({ replies: replies.map((r) => ({ text: r.text, sentAt: r.sentAt })) });
  });
}
