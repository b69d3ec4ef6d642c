import { Channel, InboundMessage, conversationKeyFor } from '../config/types';
import { ChannelOutbound, WebhookParseResult, WhatsAppWebhookPayload } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { redactPII } from '../observability/pii-redactor';

type WhatsAppMessage = NonNullable<
  NonNullable<NonNullable<NonNullable<WhatsAppWebhookPayload['entry']>[number]['changes']>[number]['value']>['messages']
>[number];

/** Text carried by the message types we accept; media and reactions have none */
function messageText(msg: WhatsAppMessage): string | undefined {
  switch (msg.type) {
    case 'text':
      return msg.text?.body;
    case 'button':
      return msg.button?.text;
    case 'interactive':
      return msg.interactive?.button_reply?.title ?? msg.interactive?.list_reply?.title;
    default:
      return undefined;
  }
}

/**
 * Parse a WhatsApp Cloud API webhook into inbound messages. A delivery can
 * batch several messages; status-only deliveries parse to an empty list.
 */
export function parseWhatsAppWebhook(
  payload: WhatsAppWebhookPayload,
  tenantId: string,
  now: () => number = Date.now,
): WebhookParseResult {
  if (payload.object !== 'whatsapp_business_account') {
    return { ok: false, reason: 'Unsupported webhook object' };
  }
  if (!Array.isArray(payload.entry)) {
    return { ok: false, reason: 'Missing entry in webhook payload' };
  }

  const messages: InboundMessage[] = [];
  for (const entry of payload.entry) {
    for (const change of entry.changes ?? []) {
      const value = change.value;
      if (change.field !== 'messages' || !value) continue;

      const names = new Map<string, string>();
      for (const contact of value.contacts ?? []) {
        if (contact.wa_id && contact.profile?.name) names.set(contact.wa_id, contact.profile.name);
      }

      for (const msg of value.messages ?? []) {
        const text = messageText(msg)?.trim();
        if (!msg.from || !text) {
          logger.debug({ type: msg.type, id: msg.id }, 'Skipping WhatsApp message without text');
          continue;
        }
        const seconds = msg.timestamp ? Number(msg.timestamp) : NaN;
        messages.push({
          channel: 'whatsapp',
          conversationKey: conversationKeyFor('whatsapp', msg.from),
          callerId: msg.from,
          text,
          timestamp: Number.isFinite(seconds) ? seconds * 1000 : now(),
          tenantId,
          messageId: msg.id,
          userProfile: { name: names.get(msg.from), phone: msg.from },
        });
      }
    }
  }

  return { ok: true, messages };
}

/** Recipient phone number encoded in a WhatsApp conversation key */
export function recipientFromKey(conversationKey: string): string {
  const prefix = 'whatsapp:';
  return conversationKey.startsWith(prefix) ? conversationKey.slice(prefix.length) : conversationKey;
}

export interface WhatsAppConfig {
  apiToken: string;
  phoneNumberId: string;
  apiVersion: string;
  baseUrl?: string;
}

/**
 * WhatsApp outbound adapter: sends text replies through the Cloud API.
 */
export class WhatsAppOutboundAdapter implements ChannelOutbound {
  private readonly baseUrl: string;

  constructor(private readonly config: WhatsAppConfig = env.whatsapp) {
    this.baseUrl = config.baseUrl ?? 'https://graph.facebook.com';
  }

  private async apiCall(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}/${this.config.apiVersion}/${this.config.phoneNumberId}${path}`;
    const log = logger.child({ adapter: 'whatsapp', path });

    const res = await fetch(url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const errBody = await res.text();
      log.error({ status: res.status, errBody: redactPII(errBody) }, 'WhatsApp API error');
      throw new Error(`WhatsApp API ${res.status}`);
    }

    return res.json();
  }

  async sendMessage(conversationKey: string, text: string, _channel: Channel, signal?: AbortSignal): Promise<void> {
    await this.apiCall(
      '/messages',
      {
        messaging_product: 'whatsapp',
        recipient_type: 'individual',
        to: recipientFromKey(conversationKey),
        type: 'text',
        text: { preview_url: false, body: text },
      },
      signal,
    );
  }
}
