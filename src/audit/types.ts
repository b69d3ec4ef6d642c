/**
 * Audit trail types
 *
 * Append-only event log with SHA-256 chain hashing. Every gate verdict,
 * routing decision, escalation and error lands here.
 */

export type AuditCategory =
  | 'security_verdict'
  | 'routing'
  | 'escalation'
  | 'turn'
  | 'error'
  | 'tool_execution'
  | 'effect_delivery'
  | 'admin_action';

export const AUDIT_CATEGORIES: readonly AuditCategory[] = [
  'security_verdict',
  'routing',
  'escalation',
  'turn',
  'error',
  'tool_execution',
  'effect_delivery',
  'admin_action',
];

export interface AuditEvent {
  eventId: string;
  timestamp: number;
  /** 'system', an agent id, or an operator identity */
  actor: string;
  /** What happened */
  action: string;
  /** Category for filtering */
  category: AuditCategory;
  conversationKey?: string;
  tenantId?: string;
  /** Additional structured details (PII-redacted) */
  details: Record<string, unknown>;
  /** SHA-256 hash of this event + previous event hash (chain integrity) */
  dataHash: string;
  previousHash: string;
}

/** What callers supply; ids, time and hashes are filled in by the service */
export interface AuditInput {
  category: AuditCategory;
  action: string;
  actor?: string;
  conversationKey?: string;
  tenantId?: string;
  details?: Record<string, unknown>;
}

export interface AuditFilter {
  conversationKey?: string;
  tenantId?: string;
  category?: AuditCategory;
  actor?: string;
  since?: number;
  until?: number;
  limit?: number;
}

export interface IntegrityReport {
  valid: boolean;
  checked: number;
  brokenAt?: string;
}

export interface AuditStore {
  append(event: AuditEvent): Promise<void>;
  query(filter: AuditFilter): Promise<AuditEvent[]>;
  getLastHash(): Promise<string>;
}
