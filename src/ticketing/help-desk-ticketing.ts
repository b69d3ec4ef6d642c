import { TicketRequest } from '../config/types';
import { TicketRecord, TicketStatus, TicketingService, isTicketStatus, toTicketRecord } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { ticketOperations } from '../observability/metrics';

interface DeskTicketResponse {
  id?: unknown;
  status?: unknown;
}

function parseDeskTicket(body: unknown): DeskTicketResponse {
  if (typeof body !== 'object' || body === null) return {};
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(body));
  return { id: record.id, status: record.status };
}

/**
 * Help-desk backed ticketing over a REST API.
 *
 * - POST /tickets            (create, Idempotency-Key = ticketRef)
 * - PATCH /tickets/{ref}     (status)
 * - GET /tickets/{ref}       (read)
 * - GET /tickets?conversation=...
 *
 * Records are cached locally so redelivered creations skip the network.
 */
export class HelpDeskTicketingService implements TicketingService {
  private readonly cache = new Map<string, TicketRecord>();
  private readonly log = logger.child({ service: 'help-desk-ticketing' });

  constructor(
    private readonly baseUrl: string = env.ticketing.baseUrl,
    private readonly apiToken: string = env.ticketing.apiToken,
    private readonly now: () => number = Date.now,
  ) {}

  private async apiCall(
    method: string,
    path: string,
    options: { body?: unknown; idempotencyKey?: string; signal?: AbortSignal } = {},
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiToken}`,
      'Content-Type': 'application/json',
    };
    if (options.idempotencyKey) headers['Idempotency-Key'] = options.idempotencyKey;

    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: options.body ? JSON.stringify(options.body) : undefined,
      signal: options.signal ?? AbortSignal.timeout(10_000),
    });

    if (!res.ok) {
      const errBody = await res.text();
      this.log.error({ method, path, status: res.status, errBody }, 'Help desk API error');
      throw new Error(`Help desk API ${res.status}: ${errBody}`);
    }

    return res.json();
  }

  async createTicket(request: TicketRequest, signal?: AbortSignal): Promise<TicketRecord> {
    const cached = this.cache.get(request.ticketRef);
    if (cached) return cached;

    try {
      const result = parseDeskTicket(await this.apiCall('POST', '/tickets', {
        body: {
          reference: request.ticketRef,
          subject: request.subject,
          description: request.description,
          channel: request.channel,
          conversation: request.conversationKey,
          tenant: request.tenantId,
          tags: request.reasons,
          priority: request.priority?.total,
          context: request.stateSnapshot,
        },
        idempotencyKey: request.ticketRef,
        signal,
      }));

      const ticket: TicketRecord = {
        ...toTicketRecord(request, this.now()),
        externalId: typeof result.id === 'string' ? result.id : undefined,
      };
      this.cache.set(ticket.ticketRef, ticket);

      ticketOperations.inc({ operation: 'create', status: 'success' });
      this.log.info({ ticketRef: ticket.ticketRef, externalId: ticket.externalId }, 'Ticket created in help desk');
      return ticket;
    } catch (err) {
      ticketOperations.inc({ operation: 'create', status: 'error' });
      this.log.error({ err, ticketRef: request.ticketRef }, 'Failed to create ticket in help desk');
      throw err;
    }
  }

  async updateStatus(ticketRef: string, status: TicketStatus): Promise<TicketRecord> {
    const current = await this.getTicket(ticketRef);
    if (!current) {
      ticketOperations.inc({ operation: 'update', status: 'error' });
      throw new Error(`Ticket ${ticketRef} not found`);
    }

    await this.apiCall('PATCH', `/tickets/${encodeURIComponent(ticketRef)}`, { body: { status } });
    const updated: TicketRecord = { ...current, status, updatedAt: this.now() };
    this.cache.set(ticketRef, updated);

    ticketOperations.inc({ operation: 'update', status: 'success' });
    return updated;
  }

  async getTicket(ticketRef: string): Promise<TicketRecord | null> {
    const cached = this.cache.get(ticketRef);
    if (!cached) return null;

    // Status is owned by the desk; refresh it
    const remote = parseDeskTicket(await this.apiCall('GET', `/tickets/${encodeURIComponent(ticketRef)}`));
    if (isTicketStatus(remote.status) && remote.status !== cached.status) {
      const refreshed: TicketRecord = { ...cached, status: remote.status, updatedAt: this.now() };
      this.cache.set(ticketRef, refreshed);
      return refreshed;
    }
    return cached;
  }

  async listByConversation(conversationKey: string): Promise<TicketRecord[]> {
    return [...this.cache.values()].filter((t) => t.conversationKey === conversationKey);
  }
}
