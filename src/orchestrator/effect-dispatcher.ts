/**
 * Effect Dispatcher
 *
 * Delivers the outbox a commit wrote: ticket first, so a reply quoting the
 * ticket reference never precedes the ticket, then the reply. Delivered
 * effects are acknowledged in the store; failures stay pending for the
 * redelivery sweep. Ticket creation is idempotent by reference; replies
 * are claimed by effect id before sending, so a reply whose acknowledgement
 * was lost is not sent again.
 */

import { Channel, Conversation, PendingEffect } from '../config/types';
import { ChannelOutbound } from '../channels/types';
import { TicketingService } from '../ticketing/types';
import { ConversationStore } from '../memory/types';
import { FallbackController } from '../resilience/fallback-controller';
import { AuditService } from '../audit/audit-service';
import { DedupStore } from '../security/dedup-store';
import { logger } from '../observability/logger';
import { pendingEffectsDelivered } from '../observability/metrics';
import { DeliveryReport } from './types';

const EFFECT_ORDER: Record<PendingEffect['kind'], number> = { create_ticket: 0, send_reply: 1 };

export class EffectDispatcher {
  private readonly log = logger.child({ component: 'effect-dispatcher' });

  constructor(
    private readonly store: ConversationStore,
    private readonly ticketing: TicketingService,
    private readonly outbound: ChannelOutbound,
    private readonly fallback: FallbackController,
    private readonly audit?: AuditService,
    private readonly sentReplies?: DedupStore,
  ) {}

  /** Deliver and acknowledge a committed conversation's pending effects */
  async deliver(conversation: Conversation): Promise<DeliveryReport> {
    const report = await this.deliverEffects(conversation.key, conversation.channel, conversation.pendingEffects, true);
    if (report.delivered.length > 0) {
      try {
        await this.store.acknowledgeEffects(conversation.key, report.delivered);
      } catch (err) {
        // Still pending in the store; the sweep will redeliver idempotently
        this.log.warn({ err, conversationKey: conversation.key }, 'Effect acknowledgement failed');
      }
    }
    return report;
  }

  /**
   * Deliver effects that were never committed (refusals, failed turns).
   * Nothing is left to redeliver these, so a reply goes out even when its
   * ticket failed.
   */
  async deliverDirect(conversationKey: string, channel: Channel, effects: readonly PendingEffect[]): Promise<DeliveryReport> {
    return this.deliverEffects(conversationKey, channel, effects, false);
  }

  /**
   * Retry one conversation's undelivered effects. Callers hold the
   * conversation's turn slot so this never overlaps a live delivery.
   */
  async redeliver(conversationKey: string): Promise<DeliveryReport> {
    const conversation = await this.store.peek(conversationKey);
    if (!conversation || conversation.pendingEffects.length === 0) return { delivered: [], failed: [] };
    return this.deliver(conversation);
  }

  private async deliverEffects(
    conversationKey: string,
    channel: Channel,
    effects: readonly PendingEffect[],
    holdDependents: boolean,
  ): Promise<DeliveryReport> {
    const report: DeliveryReport = { delivered: [], failed: [] };
    const ordered = [...effects].sort((a, b) => EFFECT_ORDER[a.kind] - EFFECT_ORDER[b.kind]);

    for (const effect of ordered) {
      let action: 'effect_delivered' | 'effect_failed' | 'effect_held';
      const heldBy = holdDependents && effect.kind === 'send_reply' ? effect.dependsOn : undefined;
      if (heldBy && report.failed.includes(heldBy)) {
        // The reply quotes a ticket that does not exist yet; both stay pending
        report.failed.push(effect.effectId);
        pendingEffectsDelivered.inc({ kind: effect.kind, status: 'held' });
        this.log.warn(
          { conversationKey, effectId: effect.effectId, dependsOn: heldBy },
          'Reply held until its ticket exists',
        );
        action = 'effect_held';
      } else {
        try {
          await this.deliverOne(conversationKey, channel, effect);
          report.delivered.push(effect.effectId);
          pendingEffectsDelivered.inc({ kind: effect.kind, status: 'success' });
          action = 'effect_delivered';
        } catch (err) {
          report.failed.push(effect.effectId);
          pendingEffectsDelivered.inc({ kind: effect.kind, status: 'error' });
          this.log.error({ err, conversationKey, effectId: effect.effectId, kind: effect.kind }, 'Effect delivery failed');
          action = 'effect_failed';
        }
      }
      await this.audit?.record({
        category: 'effect_delivery',
        action,
        conversationKey,
        details: { effectId: effect.effectId, kind: effect.kind },
      });
    }

    return report;
  }

  private async deliverOne(conversationKey: string, channel: Channel, effect: PendingEffect): Promise<void> {
    switch (effect.kind) {
      case 'create_ticket':
        await this.fallback.call('ticketing', 'createTicket', (signal) => this.ticketing.createTicket(effect.ticket, signal));
        return;
      case 'send_reply': {
        const claim = `effect:${effect.effectId}`;
        if (this.sentReplies && !(await this.sentReplies.isNew(claim))) {
          this.log.info({ conversationKey, effectId: effect.effectId }, 'Reply already sent; skipping');
          return;
        }
        try {
          await this.fallback.call('channel', 'sendMessage', (signal) =>
            this.outbound.sendMessage(conversationKey, effect.text, channel, signal),
          );
        } catch (err) {
          await this.sentReplies?.forget(claim);
          throw err;
        }
        return;
      }
    }
  }
}
