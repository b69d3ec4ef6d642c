/**
 * Agent routing types
 */

import { AgentId, IntentCategory } from '../config/types';

export interface IntentClassification {
  category: IntentCategory;
  confidence: number;
}

export type RouteReason =
  | 'human_terminal'
  | 'explicit_handoff'
  | 'ambiguous'
  | 'sticky'
  | 'intent_switch';

export interface RoutingDecision {
  previous: AgentId;
  target: AgentId;
  reason: RouteReason;
  switched: boolean;
  intent: IntentClassification;
}
