import type { PriorityPolicy, PriorityScore } from '../escalation/types';
import type { GatePolicy } from '../security/types';
import type { RetryPolicy } from '../resilience/retry-policy';

/** Channel identifiers */
export type Channel = 'whatsapp' | 'web';

/** Agents that can hold a conversation. HUMAN is terminal until resumed. */
export type AgentId = 'SALES' | 'SUPPORT' | 'ROYALTIES' | 'HUMAN';

export type AutomatedAgentId = Exclude<AgentId, 'HUMAN'>;

export const AUTOMATED_AGENTS: readonly AutomatedAgentId[] = ['SALES', 'SUPPORT', 'ROYALTIES'];

export const ALL_AGENTS: readonly AgentId[] = [...AUTOMATED_AGENTS, 'HUMAN'];

/** Intent categories: one per automated agent plus a residual bucket */
export type IntentCategory = AutomatedAgentId | 'UNCLEAR';

export function isAgentId(value: unknown): value is AgentId {
  return typeof value === 'string' && (ALL_AGENTS as readonly string[]).includes(value);
}

export function isAutomatedAgentId(value: unknown): value is AutomatedAgentId {
  return typeof value === 'string' && (AUTOMATED_AGENTS as readonly string[]).includes(value);
}

// ───── Conversation ─────────────────────────────────────────────

export type MessageRole = 'user' | 'agent' | 'system';

export interface Message {
  readonly role: MessageRole;
  readonly text: string;
  readonly timestamp: number;
  /** Agent that received (user) or produced (agent/system) the message */
  readonly agentAtTime: AgentId;
}

export type HandoffReason =
  | 'intent_switch'
  | 'explicit_handoff'
  | 'escalation'
  | 'resume';

export interface AgentTransition {
  readonly from: AgentId;
  readonly to: AgentId;
  readonly reason: HandoffReason;
  /** Version the conversation reached with this transition */
  readonly atVersion: number;
  readonly timestamp: number;
}

export interface TicketRequest {
  readonly ticketRef: string;
  readonly conversationKey: string;
  readonly tenantId: string;
  readonly channel: Channel;
  readonly subject: string;
  readonly description: string;
  readonly reasons: readonly string[];
  readonly priority?: PriorityScore;
  readonly stateSnapshot: Readonly<Record<string, unknown>>;
  readonly requestedAt: number;
}

/**
 * Side effects recorded atomically with a commit and delivered afterwards.
 * Each carries an id derived from the committing version so redelivery is idempotent.
 */
export type PendingEffect =
  | {
      readonly kind: 'send_reply';
      readonly effectId: string;
      readonly text: string;
      /** Ticket effect whose reference the text quotes */
      readonly dependsOn?: string;
    }
  | { readonly kind: 'create_ticket'; readonly effectId: string; readonly ticket: TicketRequest };

export interface Conversation {
  readonly key: string;
  readonly tenantId: string;
  readonly channel: Channel;
  readonly messages: readonly Message[];
  readonly currentAgent: AgentId;
  readonly agentHistory: readonly AgentTransition[];
  /** Pipeline-owned scratch data. Never interpreted by the store. */
  readonly state: Readonly<Record<string, unknown>>;
  readonly version: number;
  readonly pendingEffects: readonly PendingEffect[];
  readonly createdAt: number;
  readonly updatedAt: number;
}

/** Deep-frozen view of a Conversation at one version */
export type ConversationSnapshot = Conversation;

// ───── Inbound ──────────────────────────────────────────────────

export interface UserProfile {
  name?: string;
  phone?: string;
}

export interface InboundMessage {
  channel: Channel;
  conversationKey: string;
  /** Identity used for rate limiting (phone number, session id) */
  callerId: string;
  text: string;
  timestamp: number;
  tenantId: string;
  /** Channel-assigned id, used for webhook deduplication */
  messageId?: string;
  userProfile?: UserProfile;
}

export function conversationKeyFor(channel: Channel, remoteParty: string): string {
  return `${channel}:${remoteParty}`;
}

// ───── Tenant configuration ─────────────────────────────────────

export interface RoutingPolicy {
  /** Intent confidence must exceed this to switch away from the current agent */
  switchThreshold: number;
  /** Automated-to-automated handoffs allowed inside one turn */
  maxHandoffHopsPerTurn: number;
}

export interface TenantConfig {
  tenantId: string;
  defaultAgent: AutomatedAgentId;
  enabledTools: string[];
  knowledgeTopK: number;
  gate: GatePolicy;
  routing: RoutingPolicy;
  priority: PriorityPolicy;
  retry: RetryPolicy;
}
