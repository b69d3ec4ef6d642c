/**
 * Conversation State Store
 *
 * Optimistic concurrency over whole conversations: a commit applies the
 * caller's delta only when the stored version matches the one it read, and
 * every successful commit advances the version by one. Snapshots handed out
 * are deep-frozen.
 */

import Redis from 'ioredis';
import { AgentTransition, Conversation, ConversationSnapshot } from '../config/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { VersionConflict } from '../resilience/errors';
import { ConversationDelta, ConversationMutator, ConversationSeed, ConversationStore } from './types';

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function newConversation(key: string, seed: ConversationSeed, now: number): Conversation {
  return {
    key,
    tenantId: seed.tenantId,
    channel: seed.channel,
    messages: [],
    currentAgent: seed.defaultAgent,
    agentHistory: [],
    state: {},
    version: 0,
    pendingEffects: [],
    createdAt: now,
    updatedAt: now,
  };
}

/** Next version of `current` after `delta`. Pure. */
export function applyDelta(current: Conversation, delta: ConversationDelta, now: number): Conversation {
  const version = current.version + 1;
  let currentAgent = current.currentAgent;
  let agentHistory = current.agentHistory;

  if (delta.nextAgent && delta.nextAgent.agent !== current.currentAgent) {
    const transition: AgentTransition = {
      from: current.currentAgent,
      to: delta.nextAgent.agent,
      reason: delta.nextAgent.reason,
      atVersion: version,
      timestamp: now,
    };
    currentAgent = delta.nextAgent.agent;
    agentHistory = [...current.agentHistory, transition];
  }

  return {
    ...current,
    messages: [...current.messages, ...delta.appendMessages],
    currentAgent,
    agentHistory,
    state: delta.state ?? current.state,
    version,
    pendingEffects: [...current.pendingEffects, ...(delta.effects ?? [])],
    updatedAt: now,
  };
}

function withoutEffects(conv: Conversation, effectIds: readonly string[]): Conversation {
  const drop = new Set(effectIds);
  return { ...conv, pendingEffects: conv.pendingEffects.filter((e) => !drop.has(e.effectId)) };
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();

  constructor(private readonly now: () => number = Date.now) {}

  async load(key: string, seed: ConversationSeed): Promise<ConversationSnapshot> {
    return this.conversations.get(key) ?? deepFreeze(newConversation(key, seed, this.now()));
  }

  async peek(key: string): Promise<ConversationSnapshot | null> {
    return this.conversations.get(key) ?? null;
  }

  async commit(
    key: string,
    expectedVersion: number,
    mutator: ConversationMutator,
    seed: ConversationSeed,
  ): Promise<Conversation | VersionConflict> {
    const current = this.conversations.get(key) ?? deepFreeze(newConversation(key, seed, this.now()));
    if (current.version !== expectedVersion) {
      return new VersionConflict(key, expectedVersion, current.version);
    }
    // Check-and-set runs without an await in between, so it is atomic on the event loop
    const next = deepFreeze(applyDelta(current, mutator(current), this.now()));
    this.conversations.set(key, next);
    return next;
  }

  async acknowledgeEffects(key: string, effectIds: readonly string[]): Promise<void> {
    const current = this.conversations.get(key);
    if (!current) return;
    this.conversations.set(key, deepFreeze(withoutEffects(current, effectIds)));
  }

  async listPendingKeys(limit = 100): Promise<string[]> {
    const keys: string[] = [];
    for (const [key, conv] of this.conversations) {
      if (keys.length >= limit) break;
      if (conv.pendingEffects.length > 0) keys.push(key);
    }
    return keys;
  }
}

// ───── Redis Implementation ─────────────────────────────────────

/**
 * Each conversation is a hash { rev, version, doc }. `rev` counts every
 * write, acknowledgements included, so two writers that read the same
 * version cannot both land. The script writes only when the stored rev
 * (absent = 0) equals ARGV[1] and returns the stored rev otherwise.
 * KEYS[2] tracks conversations with undelivered effects.
 */
const COMMIT_SCRIPT = `
local rev = redis.call('HGET', KEYS[1], 'rev')
if not rev then rev = '0' end
if rev ~= ARGV[1] then return tonumber(rev) end
redis.call('HSET', KEYS[1], 'rev', tostring(tonumber(rev) + 1), 'version', ARGV[2], 'doc', ARGV[3])
if tonumber(ARGV[4]) > 0 then redis.call('EXPIRE', KEYS[1], ARGV[4]) end
if ARGV[5] == '1' then redis.call('SADD', KEYS[2], ARGV[6]) else redis.call('SREM', KEYS[2], ARGV[6]) end
return -1
`;

const WRITE_ATTEMPTS = 3;

interface StoredConversation {
  rev: number;
  doc: Conversation;
}

export class RedisConversationStore implements ConversationStore {
  private readonly prefix: string;
  private readonly pendingSetKey: string;
  private readonly log = logger.child({ component: 'conversation-store' });

  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds = env.redis.conversationTtlSeconds,
    private readonly now: () => number = Date.now,
  ) {
    this.prefix = `${env.redis.keyPrefix}conv:`;
    this.pendingSetKey = `${env.redis.keyPrefix}conv-pending`;
  }

  private key(conversationKey: string): string {
    return `${this.prefix}${conversationKey}`;
  }

  private async read(conversationKey: string): Promise<StoredConversation | null> {
    const [rev, raw] = await this.redis.hmget(this.key(conversationKey), 'rev', 'doc');
    if (!raw) return null;
    return { rev: Number(rev ?? 0), doc: deepFreeze(JSON.parse(raw) as Conversation) };
  }

  async load(key: string, seed: ConversationSeed): Promise<ConversationSnapshot> {
    return (await this.read(key))?.doc ?? deepFreeze(newConversation(key, seed, this.now()));
  }

  async peek(key: string): Promise<ConversationSnapshot | null> {
    return (await this.read(key))?.doc ?? null;
  }

  async commit(
    key: string,
    expectedVersion: number,
    mutator: ConversationMutator,
    seed: ConversationSeed,
  ): Promise<Conversation | VersionConflict> {
    for (let attempt = 1; attempt <= WRITE_ATTEMPTS; attempt++) {
      const stored = await this.read(key);
      const current = stored?.doc ?? deepFreeze(newConversation(key, seed, this.now()));
      if (current.version !== expectedVersion) {
        return new VersionConflict(key, expectedVersion, current.version);
      }

      const next = deepFreeze(applyDelta(current, mutator(current), this.now()));
      if ((await this.compareAndSet(key, stored?.rev ?? 0, next)) === -1) return next;
      // Same version but a newer rev: an acknowledgement landed in between, so re-read and reapply
      this.log.debug({ conversationKey: key, expectedVersion, attempt }, 'Commit raced a same-version write');
    }

    const latest = await this.read(key);
    return new VersionConflict(key, expectedVersion, latest?.doc.version ?? 0);
  }

  async acknowledgeEffects(key: string, effectIds: readonly string[]): Promise<void> {
    for (let attempt = 1; attempt <= WRITE_ATTEMPTS; attempt++) {
      const stored = await this.read(key);
      if (!stored) return;
      if ((await this.compareAndSet(key, stored.rev, withoutEffects(stored.doc, effectIds))) === -1) return;
    }
    // Effects stay listed; redelivery skips replies already sent and tickets are idempotent
    this.log.warn({ conversationKey: key, effectIds }, 'Could not acknowledge effects after concurrent writes');
  }

  async listPendingKeys(limit = 100): Promise<string[]> {
    const members = await this.redis.smembers(this.pendingSetKey);
    return members.slice(0, limit);
  }

  /** -1 on success, otherwise the rev found in Redis */
  private async compareAndSet(key: string, expectedRev: number, doc: Conversation): Promise<number> {
    const result = await this.redis.eval(
      COMMIT_SCRIPT,
      2,
      this.key(key),
      this.pendingSetKey,
      String(expectedRev),
      String(doc.version),
      JSON.stringify(doc),
      String(this.ttlSeconds),
      doc.pendingEffects.length > 0 ? '1' : '0',
      key,
    );
    return Number(result);
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createConversationStore(redis?: Redis): ConversationStore {
  if (redis) {
    logger.info('Conversation store: Redis-backed (versioned hash, scripted check-and-set)');
    return new RedisConversationStore(redis);
  }
  logger.warn('Using in-memory conversation store (no Redis)');
  return new InMemoryConversationStore();
}
