import type { AgentId, Conversation, InboundMessage, PendingEffect } from '../config/types';
import type { PriorityScore } from '../escalation/types';
import type { FailureClass } from '../resilience/errors';
import type { DependencyName } from '../resilience/types';
import type { RoutingDecision } from '../routing/types';
import type { SecurityVerdict } from '../security/types';
import type { TraceContext } from '../observability/trace';

/**
 * Stages of one turn. The happy path is strictly linear; REJECTED is only
 * reachable from RECEIVED, FAILED and CANCELLED from any non-terminal stage.
 */
export type TurnStage =
  | 'RECEIVED'
  | 'ADMITTED'
  | 'CLASSIFIED'
  | 'CONTEXT_RETRIEVED'
  | 'AGENT_EXECUTED'
  | 'SCORED'
  | 'COMMITTED'
  | 'REJECTED'
  | 'FAILED'
  | 'CANCELLED';

export const TERMINAL_STAGES: readonly TurnStage[] = ['COMMITTED', 'REJECTED', 'FAILED', 'CANCELLED'];

export interface StageTransition {
  conversationKey: string;
  requestId: string;
  attempt: number;
  from: TurnStage;
  to: TurnStage;
  timestamp: number;
}

export type TurnStatus = 'committed' | 'rejected' | 'failed' | 'cancelled';

export interface TurnFailure {
  failureClass: FailureClass;
  dependency?: DependencyName;
  message: string;
}

export interface DeliveryReport {
  delivered: string[];
  failed: string[];
}

export interface TurnOutcome {
  status: TurnStatus;
  conversationKey: string;
  requestId: string;
  /** Stages of the last attempt, in order */
  stages: TurnStage[];
  /** Text sent (or to be sent) to the user */
  reply?: string;
  ticketRef?: string;
  agent: AgentId;
  previousAgent: AgentId;
  /** Absent when the turn ended before the gate ran */
  verdict?: SecurityVerdict;
  priority?: PriorityScore;
  routing?: RoutingDecision;
  /** Conversation version after the commit */
  version?: number;
  attempts: number;
  /** Set when a collaborator failure shaped the outcome, including degraded commits */
  failure?: TurnFailure;
  /** Effects to deliver: the committed outbox, or direct effects for uncommitted outcomes */
  effects: PendingEffect[];
  /** Committed conversation, for the effect dispatcher */
  conversation?: Conversation;
  delivery?: DeliveryReport;
}

export interface TurnInput {
  message: InboundMessage;
  trace: TraceContext;
  /** Aborts the turn until it starts committing */
  signal?: AbortSignal;
}
