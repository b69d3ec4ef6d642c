/**
 * Handoff Router
 *
 * Chooses the agent that handles a turn. An explicit handoff always wins;
 * otherwise the conversation only moves on a confident intent for another
 * agent. HUMAN never hands back automatically.
 */

import { AgentId, ConversationSnapshot, RoutingPolicy } from '../config/types';
import { logger } from '../observability/logger';
import { routingDecisions } from '../observability/metrics';
import { IntentClassification, RouteReason, RoutingDecision } from './types';

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = {
  switchThreshold: 0.7,
  maxHandoffHopsPerTurn: 2,
};

export class HandoffRouter {
  private readonly log = logger.child({ component: 'handoff-router' });

  constructor(private readonly policy: RoutingPolicy) {}

  route(
    snapshot: ConversationSnapshot,
    intent: IntentClassification,
    explicitHandoff?: AgentId,
  ): RoutingDecision {
    const current = snapshot.currentAgent;

    if (current === 'HUMAN') {
      return this.decide(snapshot, intent, 'HUMAN', 'human_terminal');
    }

    if (explicitHandoff) {
      return this.decide(snapshot, intent, explicitHandoff, 'explicit_handoff');
    }

    if (intent.category === 'UNCLEAR' || intent.confidence <= this.policy.switchThreshold) {
      if (intent.category !== current) {
        this.log.debug(
          { conversationKey: snapshot.key, intent: intent.category, confidence: intent.confidence },
          'Keeping current agent',
        );
      }
      return this.decide(snapshot, intent, current, 'ambiguous');
    }

    if (intent.category === current) {
      return this.decide(snapshot, intent, current, 'sticky');
    }

    return this.decide(snapshot, intent, intent.category, 'intent_switch');
  }

  /** Whether an operator may hand a conversation back to an automated agent */
  canResume(snapshot: ConversationSnapshot): boolean {
    return snapshot.currentAgent === 'HUMAN';
  }

  get maxHandoffHopsPerTurn(): number {
    return this.policy.maxHandoffHopsPerTurn;
  }

  private decide(
    snapshot: ConversationSnapshot,
    intent: IntentClassification,
    target: AgentId,
    reason: RouteReason,
  ): RoutingDecision {
    const decision: RoutingDecision = {
      previous: snapshot.currentAgent,
      target,
      reason,
      switched: target !== snapshot.currentAgent,
      intent,
    };
    routingDecisions.inc({ reason, target });
    if (decision.switched) {
      this.log.info(
        { conversationKey: snapshot.key, from: decision.previous, to: target, reason, intent },
        'Agent handoff',
      );
    }
    return decision;
  }
}
