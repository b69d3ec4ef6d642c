/**
 * Per-collaborator circuit breakers.
 *
 * The fallback controller asks `isAvailable` before each call and reports
 * the outcome back. Status is derived from the failure streak: degraded at
 * half the threshold, down once the circuit opens.
 */

import { CircuitState, DEPENDENCY_NAMES, DependencyName, DependencyHealth, DependencyStatus, DegradationLevel } from './types';
import { logger } from '../observability/logger';
import { circuitTransitions } from '../observability/metrics';

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_CIRCUIT_RESET_MS = 30_000;

/** Collaborators without which no turn completes normally */
const CRITICAL: readonly DependencyName[] = ['llm', 'store'];

interface Circuit {
  state: CircuitState;
  failures: number;
  openUntil?: number;
  probeTaken: boolean;
  lastError?: string;
  lastChange: number;
}

export class DependencyHealthManager {
  private readonly circuits = new Map<DependencyName, Circuit>();
  private readonly log = logger.child({ component: 'dep-health' });

  constructor(
    private readonly failureThreshold = DEFAULT_FAILURE_THRESHOLD,
    private readonly circuitResetMs = DEFAULT_CIRCUIT_RESET_MS,
    private readonly now: () => number = Date.now,
  ) {
    for (const name of DEPENDENCY_NAMES) {
      this.circuits.set(name, { state: 'closed', failures: 0, probeTaken: false, lastChange: this.now() });
    }
  }

  recordSuccess(name: DependencyName): void {
    const circuit = this.circuit(name);
    if (circuit.state !== 'closed' || circuit.failures > 0) {
      this.log.info({ dependency: name, failures: circuit.failures }, 'Dependency recovered');
    }
    circuit.failures = 0;
    circuit.lastError = undefined;
    this.transition(name, circuit, 'closed');
  }

  recordFailure(name: DependencyName, error: string): void {
    const circuit = this.circuit(name);
    circuit.failures++;
    circuit.lastError = error;

    // A failed probe reopens straight away
    if (circuit.state === 'half_open' || circuit.failures >= this.failureThreshold) {
      circuit.openUntil = this.now() + this.circuitResetMs;
      this.transition(name, circuit, 'open');
      this.log.warn({ dependency: name, failures: circuit.failures, error }, 'Circuit opened');
    }
  }

  /** Closed circuits pass; an expired open circuit lets exactly one probe through */
  isAvailable(name: DependencyName): boolean {
    const circuit = this.circuit(name);
    switch (circuit.state) {
      case 'closed':
        return true;
      case 'half_open':
        if (circuit.probeTaken) return false;
        circuit.probeTaken = true;
        return true;
      case 'open':
        if (circuit.openUntil === undefined || this.now() <= circuit.openUntil) return false;
        this.transition(name, circuit, 'half_open');
        circuit.probeTaken = true;
        return true;
    }
  }

  getStatus(name: DependencyName): DependencyHealth {
    const circuit = this.circuit(name);
    return {
      name,
      status: this.statusOf(circuit),
      circuit: circuit.state,
      circuitOpen: circuit.state === 'open' || (circuit.state === 'half_open' && circuit.probeTaken),
      circuitOpenUntil: circuit.state === 'closed' ? undefined : circuit.openUntil,
      consecutiveFailures: circuit.failures,
      lastError: circuit.lastError,
      lastChange: circuit.lastChange,
    };
  }

  getAllStatuses(): DependencyHealth[] {
    return DEPENDENCY_NAMES.map((name) => this.getStatus(name));
  }

  getDegradationLevel(): DegradationLevel {
    const statuses = this.getAllStatuses();
    if (statuses.some((d) => d.status === 'down' && CRITICAL.includes(d.name))) return 'full';
    const down = statuses.filter((d) => d.status === 'down').length;
    const degraded = statuses.filter((d) => d.status === 'degraded').length;
    return down > 0 || degraded >= 2 ? 'partial' : 'none';
  }

  /** Health summary for the /ready endpoint */
  getHealthSummary(): Record<string, { status: DependencyStatus; circuitOpen: boolean; failures: number }> {
    return Object.fromEntries(
      this.getAllStatuses().map((d) => [d.name, { status: d.status, circuitOpen: d.circuitOpen, failures: d.consecutiveFailures }]),
    );
  }

  private statusOf(circuit: Circuit): DependencyStatus {
    if (circuit.state === 'open') return 'down';
    if (circuit.state === 'half_open') return 'degraded';
    return circuit.failures >= Math.floor(this.failureThreshold / 2) ? 'degraded' : 'healthy';
  }

  private circuit(name: DependencyName): Circuit {
    const existing = this.circuits.get(name);
    if (existing) return existing;
    const created: Circuit = { state: 'closed', failures: 0, probeTaken: false, lastChange: this.now() };
    this.circuits.set(name, created);
    return created;
  }

  private transition(name: DependencyName, circuit: Circuit, to: CircuitState): void {
    if (circuit.state === to) return;
    circuit.state = to;
    circuit.probeTaken = false;
    circuit.lastChange = this.now();
    if (to === 'closed') circuit.openUntil = undefined;
    circuitTransitions.inc({ dependency: name, to });
  }
}
