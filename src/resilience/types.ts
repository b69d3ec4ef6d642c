/**
 * Collaborator health types
 */

export type DependencyName = 'llm' | 'knowledge' | 'store' | 'ticketing' | 'channel' | 'catalog' | 'audit';

export const DEPENDENCY_NAMES: readonly DependencyName[] = [
  'llm',
  'knowledge',
  'store',
  'ticketing',
  'channel',
  'catalog',
  'audit',
];

export type DependencyStatus = 'healthy' | 'degraded' | 'down';

export type DegradationLevel = 'none' | 'partial' | 'full';

/** closed: calls pass; open: calls fail fast; half_open: one probe in flight */
export type CircuitState = 'closed' | 'open' | 'half_open';

/** Point-in-time view of one collaborator */
export interface DependencyHealth {
  name: DependencyName;
  status: DependencyStatus;
  circuit: CircuitState;
  /** True while calls are blocked (open, or half-open with its probe taken) */
  circuitOpen: boolean;
  circuitOpenUntil?: number;
  consecutiveFailures: number;
  lastError?: string;
  lastChange: number;
}
