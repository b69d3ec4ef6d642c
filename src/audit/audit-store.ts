/**
 * Audit Store
 *
 * Append-only store with SHA-256 chain hashing.
 * Redis-backed with in-memory fallback.
 */

import { createHash } from 'crypto';
import Redis from 'ioredis';
import { env } from '../config/env';
import { AuditEvent, AuditFilter, AuditStore, IntegrityReport } from './types';
import { logger } from '../observability/logger';

export const GENESIS_HASH = 'genesis';

export function computeHash(event: Omit<AuditEvent, 'dataHash'>): string {
  const payload = JSON.stringify({
    eventId: event.eventId,
    timestamp: event.timestamp,
    actor: event.actor,
    action: event.action,
    category: event.category,
    conversationKey: event.conversationKey,
    details: event.details,
    previousHash: event.previousHash,
  });
  return createHash('sha256').update(payload).digest('hex');
}

function applyFilter(events: AuditEvent[], filter: AuditFilter): AuditEvent[] {
  const { category, actor, tenantId, since, until, limit } = filter;
  let result = events;
  if (category) result = result.filter((e) => e.category === category);
  if (actor) result = result.filter((e) => e.actor === actor);
  if (tenantId) result = result.filter((e) => e.tenantId === tenantId);
  if (since !== undefined) result = result.filter((e) => e.timestamp >= since);
  if (until !== undefined) result = result.filter((e) => e.timestamp <= until);
  if (limit) result = result.slice(-limit);
  return result;
}

// ───── Redis Implementation ─────────────────────────────────────

class RedisAuditStore implements AuditStore {
  private readonly prefix = `${env.redis.keyPrefix}audit:`;

  constructor(private readonly redis: Redis) {}

  async append(event: AuditEvent): Promise<void> {
    const serialized = JSON.stringify(event);
    const pipeline = this.redis.multi().rpush(`${this.prefix}events`, serialized);
    // Index by conversation if present
    if (event.conversationKey) {
      pipeline.rpush(`${this.prefix}conv:${event.conversationKey}`, serialized);
    }
    pipeline.set(`${this.prefix}chain_head`, event.dataHash);
    await pipeline.exec();
  }

  async query(filter: AuditFilter): Promise<AuditEvent[]> {
    const key = filter.conversationKey
      ? `${this.prefix}conv:${filter.conversationKey}`
      : `${this.prefix}events`;
    const raw = await this.redis.lrange(key, 0, -1);
    return applyFilter(raw.map((r) => JSON.parse(r) as AuditEvent), filter);
  }

  async getLastHash(): Promise<string> {
    return (await this.redis.get(`${this.prefix}chain_head`)) ?? GENESIS_HASH;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryAuditStore implements AuditStore {
  private readonly events: AuditEvent[] = [];
  private readonly convIndex = new Map<string, AuditEvent[]>();
  private lastHash = GENESIS_HASH;

  async append(event: AuditEvent): Promise<void> {
    this.events.push(event);
    this.lastHash = event.dataHash;

    if (event.conversationKey) {
      const list = this.convIndex.get(event.conversationKey) ?? [];
      list.push(event);
      this.convIndex.set(event.conversationKey, list);
    }
  }

  async query(filter: AuditFilter): Promise<AuditEvent[]> {
    const events = filter.conversationKey
      ? (this.convIndex.get(filter.conversationKey) ?? [])
      : this.events;
    return applyFilter([...events], filter);
  }

  async getLastHash(): Promise<string> {
    return this.lastHash;
  }
}

// ───── Chain Verification ───────────────────────────────────────

/**
 * Every event must hash to its dataHash. When `contiguous` (the full log),
 * each event must also point at its predecessor's hash.
 */
export function verifyChain(events: AuditEvent[], contiguous: boolean): IntegrityReport {
  for (let i = 0; i < events.length; i++) {
    const event = events[i];
    if (computeHash(event) !== event.dataHash) {
      return { valid: false, checked: i, brokenAt: event.eventId };
    }
    if (contiguous) {
      const expectedPrevious = i === 0 ? GENESIS_HASH : events[i - 1].dataHash;
      if (event.previousHash !== expectedPrevious) {
        return { valid: false, checked: i, brokenAt: event.eventId };
      }
    }
  }
  return { valid: true, checked: events.length };
}

// ───── Factory ──────────────────────────────────────────────────

export function createAuditStore(redis?: Redis): AuditStore {
  if (redis) {
    logger.info('Audit store: Redis-backed (append-only, SHA-256 chain)');
    return new RedisAuditStore(redis);
  }
  logger.info('Audit store: In-memory (append-only, SHA-256 chain)');
  return new InMemoryAuditStore();
}
