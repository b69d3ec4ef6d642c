import { AutomatedAgentId, Conversation, InboundMessage } from '../config/types';
import { ConversationStore } from '../memory/types';
import { DedupStore } from '../security/dedup-store';
import { AuditService } from '../audit/audit-service';
import { VersionConflict } from '../resilience/errors';
import { logger, turnLogger } from '../observability/logger';
import { TraceContext, spanTimings, withSpan } from '../observability/trace';
import { turnDuration, webhookDuplicatesTotal } from '../observability/metrics';
import { EffectDispatcher } from './effect-dispatcher';
import { TenantRuntimeRegistry } from './tenant-runtime';
import { TurnPipeline } from './turn-pipeline';
import { TurnQueue } from './turn-queue';
import { readScratch, writeScratch } from './scratch';
import { DeliveryReport, TurnOutcome } from './types';

export interface OrchestratorDeps {
  pipeline: TurnPipeline;
  dispatcher: EffectDispatcher;
  store: ConversationStore;
  tenants: TenantRuntimeRegistry;
  queue?: TurnQueue;
  dedup?: DedupStore;
  audit?: AuditService;
  now?: () => number;
}

export type ResumeResult =
  | { ok: true; conversation: Conversation }
  | { ok: false; reason: 'not_found' | 'not_held_by_human' | 'conflict' };

/**
 * Entry point for every inbound message and operator action. Turns for one
 * conversation are serialized; delivery of a turn's effects happens inside
 * the same slot so replies leave in turn order.
 */
export class Orchestrator {
  private readonly queue: TurnQueue;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.queue = deps.queue ?? new TurnQueue();
    this.now = deps.now ?? Date.now;
  }

  /** Process one inbound message. Resolves to null for a duplicate delivery. */
  async handleInbound(message: InboundMessage, trace: TraceContext, signal?: AbortSignal): Promise<TurnOutcome | null> {
    const log = turnLogger(trace, 'orchestrator');

    if (message.messageId && this.deps.dedup) {
      const fresh = await this.deps.dedup.isNew(`${message.channel}:${message.messageId}`);
      if (!fresh) {
        webhookDuplicatesTotal.inc();
        log.info({ messageId: message.messageId }, 'Duplicate message dropped');
        return null;
      }
    }

    const stopTimer = turnDuration.startTimer();
    const outcome = await this.queue.run(message.conversationKey, () =>
      withSpan(trace, 'orchestrator.turn', async () => {
        const result = await this.deps.pipeline.run({ message, trace, signal });
        const delivery = await this.dispatch(message, result);
        return { ...result, delivery };
      }),
    );
    stopTimer({ status: outcome.status });

    await this.deps.audit?.record({
      category: 'turn',
      action: `turn_${outcome.status}`,
      conversationKey: message.conversationKey,
      tenantId: message.tenantId,
      details: {
        requestId: outcome.requestId,
        agent: outcome.agent,
        previousAgent: outcome.previousAgent,
        version: outcome.version,
        attempts: outcome.attempts,
        stages: outcome.stages,
        ticketRef: outcome.ticketRef,
        failure: outcome.failure,
        delivered: outcome.delivery?.delivered.length ?? 0,
        undelivered: outcome.delivery?.failed.length ?? 0,
      },
    });

    log.info(
      {
        status: outcome.status,
        agent: outcome.agent,
        version: outcome.version,
        attempts: outcome.attempts,
        timings: spanTimings(trace),
      },
      'Turn finished',
    );
    return outcome;
  }

  /** Operator hands a human-held conversation back to an automated agent */
  async resume(conversationKey: string, agent: AutomatedAgentId, actor: string): Promise<ResumeResult> {
    return this.queue.run(conversationKey, async (): Promise<ResumeResult> => {
      const snapshot = await this.deps.store.peek(conversationKey);
      if (!snapshot) return { ok: false, reason: 'not_found' };

      const runtime = this.deps.tenants.get(snapshot.tenantId);
      if (!runtime.router.canResume(snapshot)) return { ok: false, reason: 'not_held_by_human' };

      const now = this.now();
      const scratch = readScratch(snapshot.state);
      const result = await this.deps.store.commit(
        conversationKey,
        snapshot.version,
        () => ({
          appendMessages: [
            { role: 'system', text: `Conversación retomada por ${agent}`, timestamp: now, agentAtTime: agent },
          ],
          nextAgent: { agent, reason: 'resume' },
          state: writeScratch({
            ...scratch,
            escalatedAt: undefined,
            handoffNotes: [
              ...scratch.handoffNotes,
              { from: 'HUMAN', to: agent, reason: 'resume', atTurn: scratch.turnCount },
            ],
          }),
        }),
        { tenantId: snapshot.tenantId, channel: snapshot.channel, defaultAgent: runtime.config.defaultAgent },
      );

      if (result instanceof VersionConflict) {
        logger.warn({ conversationKey, err: result.message }, 'Resume lost a version race');
        return { ok: false, reason: 'conflict' };
      }

      await this.deps.audit?.record({
        category: 'admin_action',
        action: 'conversation_resumed',
        actor,
        conversationKey,
        tenantId: snapshot.tenantId,
        details: { agent, version: result.version },
      });
      logger.info({ conversationKey, agent, actor, version: result.version }, 'Conversation resumed');
      return { ok: true, conversation: result };
    });
  }

  async getConversation(conversationKey: string): Promise<Conversation | null> {
    return this.deps.store.peek(conversationKey);
  }

  /** Sweep outboxes that an earlier delivery left pending */
  async redeliverPending(limit = 100): Promise<{ conversations: number; delivered: number; failed: number }> {
    const keys = await this.deps.store.listPendingKeys(limit);
    let delivered = 0;
    let failed = 0;
    for (const key of keys) {
      // Same slot as turns, so a sweep never races the delivery of a turn in flight
      const report = await this.queue.run(key, () => this.deps.dispatcher.redeliver(key));
      delivered += report.delivered.length;
      failed += report.failed.length;
    }
    if (keys.length > 0) {
      logger.info({ conversations: keys.length, delivered, failed }, 'Pending effects redelivered');
    }
    return { conversations: keys.length, delivered, failed };
  }

  /** Resolves once every queued turn has finished */
  async drain(): Promise<void> {
    await this.queue.drain();
  }

  private async dispatch(message: InboundMessage, outcome: TurnOutcome): Promise<DeliveryReport> {
    if (outcome.conversation) {
      return this.deps.dispatcher.deliver(outcome.conversation);
    }
    if (outcome.effects.length > 0) {
      return this.deps.dispatcher.deliverDirect(message.conversationKey, message.channel, outcome.effects);
    }
    return { delivered: [], failed: [] };
  }
}
