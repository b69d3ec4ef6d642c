/**
 * Audit Service
 *
 * High-level API for audit logging with automatic chain hashing. Appends are
 * serialized so concurrent turns cannot fork the chain. Recording never
 * throws: an unavailable audit sink is logged and the turn goes on.
 */

import { v4 as uuid } from 'uuid';
import { AuditEvent, AuditFilter, AuditInput, AuditStore, IntegrityReport } from './types';
import { GENESIS_HASH, computeHash, verifyChain } from './audit-store';
import { logger } from '../observability/logger';
import { redactObject } from '../observability/pii-redactor';

export class AuditService {
  private lastHash = GENESIS_HASH;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly log = logger.child({ component: 'audit-service' });

  constructor(
    private readonly store: AuditStore,
    private readonly now: () => number = Date.now,
  ) {}

  async init(): Promise<void> {
    this.lastHash = await this.store.getLastHash();
  }

  /** Append an event; resolves to undefined if the store failed */
  record(input: AuditInput): Promise<AuditEvent | undefined> {
    const next = this.tail.then(() => this.append(input));
    this.tail = next.catch(() => undefined);
    return next.catch((err: unknown) => {
      this.log.warn({ err, category: input.category, action: input.action }, 'Audit append failed');
      return undefined;
    });
  }

  async getAuditTrail(filter: AuditFilter): Promise<AuditEvent[]> {
    return this.store.query(filter);
  }

  async verifyIntegrity(conversationKey?: string): Promise<IntegrityReport> {
    const events = await this.store.query({ conversationKey });
    return verifyChain(events, conversationKey === undefined);
  }

  private async append(input: AuditInput): Promise<AuditEvent> {
    const partial = {
      eventId: uuid(),
      timestamp: this.now(),
      actor: input.actor ?? 'system',
      action: input.action,
      category: input.category,
      conversationKey: input.conversationKey,
      tenantId: input.tenantId,
      details: redactObject(input.details ?? {}),
      previousHash: this.lastHash,
    };
    const event: AuditEvent = { ...partial, dataHash: computeHash(partial) };

    await this.store.append(event);
    this.lastHash = event.dataHash;

    this.log.debug({ eventId: event.eventId, category: event.category, action: event.action }, 'Audit event logged');
    return event;
  }
}
