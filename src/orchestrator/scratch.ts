/**
 * Typed view of the pipeline's scratch state.
 *
 * The store keeps `Conversation.state` opaque; only this module reads or
 * writes it. Unknown or malformed fields are dropped on read.
 */

import { isAgentId, AgentId } from '../config/types';
import type { PriorityScore, TurnSignals } from '../escalation/types';
import type { IntentClassification } from '../routing/types';

export interface HandoffNote {
  from: AgentId;
  to: AgentId;
  reason: string;
  atTurn: number;
}

export interface TurnScratch {
  turnCount: number;
  openTicketRefs: string[];
  /** Plan the caller asked about or was quoted */
  detectedPlanInterest?: string;
  lastIntent?: IntentClassification;
  /** Classifier observations of the last committed turn */
  lastSignals?: TurnSignals;
  lastPriority?: PriorityScore;
  handoffNotes: HandoffNote[];
  escalatedAt?: number;
}

const MAX_HANDOFF_NOTES = 20;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHandoffNote(value: unknown): value is HandoffNote {
  return isRecord(value) && isAgentId(value.from) && isAgentId(value.to)
    && typeof value.reason === 'string' && typeof value.atTurn === 'number';
}

function isIntent(value: unknown): value is IntentClassification {
  return isRecord(value) && typeof value.category === 'string' && typeof value.confidence === 'number';
}

function isSignals(value: unknown): value is TurnSignals {
  return isRecord(value) && isRecord(value.sentiment) && isRecord(value.implications)
    && typeof value.degraded === 'boolean';
}

function isPriority(value: unknown): value is PriorityScore {
  return isRecord(value) && isRecord(value.subScores) && typeof value.total === 'number'
    && typeof value.escalate === 'boolean';
}

export function readScratch(state: Readonly<Record<string, unknown>>): TurnScratch {
  const refs = state.openTicketRefs;
  const notes = state.handoffNotes;
  return {
    turnCount: typeof state.turnCount === 'number' ? state.turnCount : 0,
    openTicketRefs: Array.isArray(refs) ? refs.filter((r): r is string => typeof r === 'string') : [],
    detectedPlanInterest: typeof state.detectedPlanInterest === 'string' ? state.detectedPlanInterest : undefined,
    lastIntent: isIntent(state.lastIntent) ? state.lastIntent : undefined,
    lastSignals: isSignals(state.lastSignals) ? state.lastSignals : undefined,
    lastPriority: isPriority(state.lastPriority) ? state.lastPriority : undefined,
    handoffNotes: Array.isArray(notes) ? notes.filter(isHandoffNote) : [],
    escalatedAt: typeof state.escalatedAt === 'number' ? state.escalatedAt : undefined,
  };
}

export function writeScratch(scratch: TurnScratch): Record<string, unknown> {
  const out: Record<string, unknown> = {
    turnCount: scratch.turnCount,
    openTicketRefs: [...scratch.openTicketRefs],
    handoffNotes: scratch.handoffNotes.slice(-MAX_HANDOFF_NOTES),
  };
  if (scratch.detectedPlanInterest !== undefined) out.detectedPlanInterest = scratch.detectedPlanInterest;
  if (scratch.lastIntent !== undefined) out.lastIntent = scratch.lastIntent;
  if (scratch.lastSignals !== undefined) out.lastSignals = scratch.lastSignals;
  if (scratch.lastPriority !== undefined) out.lastPriority = scratch.lastPriority;
  if (scratch.escalatedAt !== undefined) out.escalatedAt = scratch.escalatedAt;
  return out;
}

/** Most recent open ticket, for the human holding reply */
export function latestTicketRef(scratch: TurnScratch): string | undefined {
  return scratch.openTicketRefs[scratch.openTicketRefs.length - 1];
}
