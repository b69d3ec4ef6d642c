import { v4 as uuid } from 'uuid';
import { Channel, TicketRequest } from '../config/types';
import type { PriorityScore } from '../escalation/types';

export type TicketStatus = 'open' | 'in_progress' | 'resolved';

export const TICKET_STATUSES: readonly TicketStatus[] = ['open', 'in_progress', 'resolved'];

export function isTicketStatus(value: unknown): value is TicketStatus {
  return typeof value === 'string' && (TICKET_STATUSES as readonly string[]).includes(value);
}

export interface TicketRecord {
  /** Reference allocated by the pipeline before commit; doubles as idempotency key */
  ticketRef: string;
  /** Id assigned by the help desk, when it differs from the ref */
  externalId?: string;
  conversationKey: string;
  tenantId: string;
  channel: Channel;
  subject: string;
  description: string;
  reasons: readonly string[];
  priority?: PriorityScore;
  stateSnapshot: Readonly<Record<string, unknown>>;
  status: TicketStatus;
  createdAt: number;
  updatedAt: number;
}

/**
 * The core only emits creation requests; status changes come from the human
 * side through the admin API.
 */
export interface TicketingService {
  /** Creating the same ticketRef twice returns the first record */
  createTicket(request: TicketRequest, signal?: AbortSignal): Promise<TicketRecord>;
  updateStatus(ticketRef: string, status: TicketStatus): Promise<TicketRecord>;
  getTicket(ticketRef: string): Promise<TicketRecord | null>;
  listByConversation(conversationKey: string): Promise<TicketRecord[]>;
}

export function toTicketRecord(request: TicketRequest, now: number): TicketRecord {
  return {
    ticketRef: request.ticketRef,
    conversationKey: request.conversationKey,
    tenantId: request.tenantId,
    channel: request.channel,
    subject: request.subject,
    description: request.description,
    reasons: request.reasons,
    priority: request.priority,
    stateSnapshot: request.stateSnapshot,
    status: 'open',
    createdAt: now,
    updatedAt: now,
  };
}

/** Ticket reference allocated before commit, e.g. TKT-3F9A12C0 */
export function allocateTicketRef(): string {
  return `TKT-${uuid().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}
