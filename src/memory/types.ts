import {
  AgentId,
  Channel,
  Conversation,
  ConversationSnapshot,
  HandoffReason,
  Message,
  PendingEffect,
} from '../config/types';
import { VersionConflict } from '../resilience/errors';

/** Everything a committed turn may change. Messages are only ever appended. */
export interface ConversationDelta {
  appendMessages: Message[];
  nextAgent?: { agent: AgentId; reason: HandoffReason };
  /** Replaces the pipeline scratch state when present */
  state?: Record<string, unknown>;
  /** Outbox entries persisted atomically with this version */
  effects?: PendingEffect[];
}

export type ConversationMutator = (current: ConversationSnapshot) => ConversationDelta;

/** Attributes of a conversation that does not exist yet */
export interface ConversationSeed {
  tenantId: string;
  channel: Channel;
  defaultAgent: AgentId;
}

export interface ConversationStore {
  /** Current snapshot; an unknown key yields a fresh, unpersisted version 0 */
  load(key: string, seed: ConversationSeed): Promise<ConversationSnapshot>;
  /** Stored conversation or null, without creating one */
  peek(key: string): Promise<ConversationSnapshot | null>;
  /**
   * Apply the mutator's delta iff the stored version equals `expectedVersion`.
   * Success bumps the version by exactly one.
   */
  commit(
    key: string,
    expectedVersion: number,
    mutator: ConversationMutator,
    seed: ConversationSeed,
  ): Promise<Conversation | VersionConflict>;
  /** Drop delivered outbox entries. Does not change the version. */
  acknowledgeEffects(key: string, effectIds: readonly string[]): Promise<void>;
  /** Conversations with undelivered outbox entries */
  listPendingKeys(limit?: number): Promise<string[]>;
}
