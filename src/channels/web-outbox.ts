import { Channel } from '../config/types';
import { ChannelOutbound } from './types';

export interface WebReply {
  text: string;
  sentAt: number;
}

const MAX_QUEUED_PER_SESSION = 50;
const SESSION_TTL_MS = 60 * 60 * 1000;

/**
 * Web chat has no push transport: replies wait here until the widget polls
 * for them. Oldest replies are dropped past the per-session cap, and a
 * session whose last reply is older than the TTL is dropped whole.
 */
export class WebOutbox implements ChannelOutbound {
  // Re-inserted on every send, so the least recently active session is first
  private readonly queues = new Map<string, WebReply[]>();

  constructor(
    private readonly now: () => number = Date.now,
    private readonly ttlMs = SESSION_TTL_MS,
  ) {}

  async sendMessage(conversationKey: string, text: string, _channel: Channel): Promise<void> {
    const now = this.now();
    this.evictIdle(now);

    const queue = this.queues.get(conversationKey) ?? [];
    queue.push({ text, sentAt: now });
    if (queue.length > MAX_QUEUED_PER_SESSION) queue.splice(0, queue.length - MAX_QUEUED_PER_SESSION);
    this.queues.delete(conversationKey);
    this.queues.set(conversationKey, queue);
  }

  /** Replies not yet collected; collecting removes them */
  collect(conversationKey: string): WebReply[] {
    const queue = this.queues.get(conversationKey) ?? [];
    this.queues.delete(conversationKey);
    return queue;
  }

  pending(conversationKey: string): number {
    return this.queues.get(conversationKey)?.length ?? 0;
  }

  private evictIdle(now: number): void {
    for (const [key, queue] of this.queues) {
      const last = queue[queue.length - 1];
      if (last && now - last.sentAt < this.ttlMs) return;
      this.queues.delete(key);
    }
  }
}
