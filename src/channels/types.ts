import { Channel, InboundMessage } from '../config/types';

/** WhatsApp Cloud API webhook payload (the parts we read) */
export interface WhatsAppWebhookPayload {
  object?: string;
  entry?: Array<{
    id?: string;
    changes?: Array<{
      field?: string;
      value?: {
        messaging_product?: string;
        metadata?: { display_phone_number?: string; phone_number_id?: string };
        contacts?: Array<{ wa_id?: string; profile?: { name?: string } }>;
        messages?: Array<{
          id?: string;
          from?: string;
          timestamp?: string;
          type?: string;
          text?: { body?: string };
          button?: { text?: string };
          interactive?: {
            type?: string;
            button_reply?: { id?: string; title?: string };
            list_reply?: { id?: string; title?: string };
          };
        }>;
        statuses?: Array<{ id?: string; status?: string; recipient_id?: string }>;
      };
    }>;
  }>;
}

/** Outbound channel adapter interface */
export interface ChannelOutbound {
  /** Resolves once the channel acknowledged the message */
  sendMessage(conversationKey: string, text: string, channel: Channel, signal?: AbortSignal): Promise<void>;
  sendTyping?(conversationKey: string, channel: Channel): Promise<void>;
}

/** Webhook parse result */
export type WebhookParseResult =
  | { ok: true; messages: InboundMessage[] }
  | { ok: false; reason: string };
