import { TicketRequest } from '../config/types';
import { TicketRecord, TicketStatus, TicketingService, toTicketRecord } from './types';
import { logger } from '../observability/logger';
import { ticketOperations } from '../observability/metrics';

/**
 * Mock ticketing service for local development and testing.
 * Stores tickets in-memory and logs all operations.
 */
export class MockTicketingService implements TicketingService {
  private tickets: Map<string, TicketRecord> = new Map();
  private createCalls = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async createTicket(request: TicketRequest): Promise<TicketRecord> {
    this.createCalls++;
    const existing = this.tickets.get(request.ticketRef);
    if (existing) {
      ticketOperations.inc({ operation: 'create', status: 'duplicate' });
      return existing;
    }

    const ticket = toTicketRecord(request, this.now());
    this.tickets.set(ticket.ticketRef, ticket);

    ticketOperations.inc({ operation: 'create', status: 'success' });
    logger.info({ ticketRef: ticket.ticketRef, conversationKey: ticket.conversationKey }, '[MOCK] Ticket created');

    return ticket;
  }

  async updateStatus(ticketRef: string, status: TicketStatus): Promise<TicketRecord> {
    const ticket = this.tickets.get(ticketRef);
    if (!ticket) {
      ticketOperations.inc({ operation: 'update', status: 'error' });
      throw new Error(`Ticket ${ticketRef} not found`);
    }

    const updated: TicketRecord = { ...ticket, status, updatedAt: this.now() };
    this.tickets.set(ticketRef, updated);

    ticketOperations.inc({ operation: 'update', status: 'success' });
    logger.info({ ticketRef, status }, '[MOCK] Ticket updated');

    return updated;
  }

  async getTicket(ticketRef: string): Promise<TicketRecord | null> {
    return this.tickets.get(ticketRef) ?? null;
  }

  async listByConversation(conversationKey: string): Promise<TicketRecord[]> {
    return this.getAllTickets().filter((t) => t.conversationKey === conversationKey);
  }

  /** Test helper: get all tickets */
  getAllTickets(): TicketRecord[] {
    return Array.from(this.tickets.values());
  }

  /** Test helper: createTicket calls, duplicates included */
  get createCallCount(): number {
    return this.createCalls;
  }

  /** Test helper: reset state */
  reset(): void {
    this.tickets.clear();
    this.createCalls = 0;
  }
}
