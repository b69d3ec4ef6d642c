/**
 * Inbound message deduplication. Channels redeliver webhooks, so a message
 * id seen within the window is dropped before it reaches the gate. The
 * effect dispatcher claims reply effect ids in the same store so a reply is
 * sent at most once per window.
 */

import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const WINDOW_SECONDS = 3600;
const MAX_TRACKED_IDS = 50_000;

export interface DedupStore {
  /** True the first time an id is seen within the window */
  isNew(messageId: string): Promise<boolean>;
  /** Release an id so the next `isNew` claims it again */
  forget(messageId: string): Promise<void>;
}

/** SET NX with expiry; a Redis error lets the message through */
class RedisDedupStore implements DedupStore {
  constructor(private readonly redis: Redis, private readonly windowSeconds: number) {}

  async isNew(messageId: string): Promise<boolean> {
    try {
      const claimed = await this.redis.set(`${env.redis.keyPrefix}dedup:${messageId}`, '1', 'EX', this.windowSeconds, 'NX');
      return claimed === 'OK';
    } catch (err) {
      logger.warn({ err, messageId }, 'Dedup check failed; admitting message');
      return true;
    }
  }

  async forget(messageId: string): Promise<void> {
    await this.redis.del(`${env.redis.keyPrefix}dedup:${messageId}`);
  }
}

/**
 * Ids keyed to their expiry. Map order is insertion order and every entry
 * shares one window, so expired ids always sit at the front.
 */
class InMemoryDedupStore implements DedupStore {
  private readonly expiries = new Map<string, number>();

  constructor(private readonly windowMs: number, private readonly now: () => number) {}

  async isNew(messageId: string): Promise<boolean> {
    const now = this.now();
    this.sweep(now);

    if (this.expiries.has(messageId)) return false;

    if (this.expiries.size >= MAX_TRACKED_IDS) {
      const oldest = this.expiries.keys().next();
      if (!oldest.done) this.expiries.delete(oldest.value);
    }
    this.expiries.set(messageId, now + this.windowMs);
    return true;
  }

  async forget(messageId: string): Promise<void> {
    this.expiries.delete(messageId);
  }

  private sweep(now: number): void {
    for (const [id, expiresAt] of this.expiries) {
      if (expiresAt > now) return;
      this.expiries.delete(id);
    }
  }
}

export function createDedupStore(redis?: Redis, now: () => number = Date.now, windowSeconds = WINDOW_SECONDS): DedupStore {
  if (redis) {
    logger.info({ windowSeconds }, 'Dedup store: Redis');
    return new RedisDedupStore(redis, windowSeconds);
  }
  logger.info({ windowSeconds }, 'Dedup store: in-memory');
  return new InMemoryDedupStore(windowSeconds * 1000, now);
}
