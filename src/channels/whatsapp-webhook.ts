import { FastifyInstance } from 'fastify';
import { parseWhatsAppWebhook } from './whatsapp-adapter';
import { WhatsAppWebhookPayload } from './types';
import { verifyWebhookSignature } from '../security/webhook-verifier';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { createTraceContext } from '../observability/trace';
import { Orchestrator } from '../orchestrator/orchestrator';

export interface WhatsAppWebhookOptions {
  verifyToken: string;
  appSecret: string;
  /** Accept unsigned deliveries when no secret is configured (development) */
  allowUnsigned: boolean;
  defaultTenantId: string;
}

interface VerifyQuery {
  'hub.mode'?: string;
  'hub.verify_token'?: string;
  'hub.challenge'?: string;
}

const payloadSchema = {
  type: 'object',
  required: ['object'],
  properties: {
    object: { type: 'string' },
    entry: { type: 'array', items: { type: 'object' } },
  },
} as const;

export function registerWhatsAppWebhook(
  app: FastifyInstance,
  orchestrator: Orchestrator,
  options: WhatsAppWebhookOptions = {
    verifyToken: env.whatsapp.verifyToken,
    appSecret: env.whatsapp.appSecret,
    allowUnsigned: env.isDev,
    defaultTenantId: env.defaultTenantId,
  },
): void {
  /** Subscription handshake */
  app.get<{ Querystring: VerifyQuery }>('/webhooks/whatsapp', async (req, reply) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    if (mode === 'subscribe' && options.verifyToken && token === options.verifyToken) {
      return reply.status(200).type('text/plain').send(req.query['hub.challenge'] ?? '');
    }
    logger.warn({ mode }, 'WhatsApp webhook verification failed');
    return reply.status(403).send({ error: 'Verification failed' });
  });

  app.post<{ Body: WhatsAppWebhookPayload }>(
    '/webhooks/whatsapp',
    { schema: { body: payloadSchema } },
    async (req, reply) => {
      const signatureHeader = req.headers['x-hub-signature-256'];
      const signature = typeof signatureHeader === 'string' ? signatureHeader : undefined;
      const rawBody = req.rawBody ?? JSON.stringify(req.body);

      if (!verifyWebhookSignature(rawBody, signature, options.appSecret, options.allowUnsigned)) {
        return reply.status(401).send({ error: 'Invalid signature' });
      }

      const tenantHeader = req.headers['x-tenant-id'];
      const tenantId = typeof tenantHeader === 'string' && tenantHeader ? tenantHeader : options.defaultTenantId;
      const parsed = parseWhatsAppWebhook(req.body, tenantId);
      if (!parsed.ok) {
        logger.warn({ reason: parsed.reason }, 'Failed to parse WhatsApp webhook');
        return reply.status(400).send({ error: parsed.reason });
      }

      // Acknowledge now; the Cloud API redelivers anything not acknowledged quickly
      const requestIds: string[] = [];
      for (const message of parsed.messages) {
        const trace = createTraceContext({
          conversationKey: message.conversationKey,
          channel: message.channel,
          tenantId,
        });
        requestIds.push(trace.requestId);
        orchestrator.handleInbound(message, trace).catch((err: unknown) => {
          logger.error({ err, requestId: trace.requestId, conversationKey: message.conversationKey }, 'Turn processing error');
        });
      }

      return reply.status(200).send({ status: 'accepted', messages: parsed.messages.length, requestIds });
    },
  );
}
