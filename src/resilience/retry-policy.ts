import { FailureClass } from './errors';
import { DependencyName } from './types';

export interface BackoffRule {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

/**
 * One policy object for every retry decision, keyed by failure class.
 * Timeouts are per collaborator and always finite.
 */
export interface RetryPolicy {
  rules: Record<FailureClass, BackoffRule>;
  timeoutsMs: Record<DependencyName, number>;
  /**
   * When false, a turn retried after a version conflict reuses the generated
   * reply of the previous attempt if it routed to the same agent and used no tools.
   */
  regenerateOnConflict: boolean;
  /** Circuit breaker settings shared by all collaborators */
  circuitFailureThreshold: number;
  circuitResetMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  rules: {
    timeout: { maxAttempts: 3, baseDelayMs: 250, maxDelayMs: 2000, multiplier: 2 },
    error: { maxAttempts: 3, baseDelayMs: 250, maxDelayMs: 2000, multiplier: 2 },
    version_conflict: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, multiplier: 1 },
  },
  timeoutsMs: {
    llm: 20_000,
    knowledge: 3_000,
    store: 2_000,
    ticketing: 5_000,
    channel: 10_000,
    catalog: 5_000,
    audit: 2_000,
  },
  regenerateOnConflict: true,
  circuitFailureThreshold: 5,
  circuitResetMs: 30_000,
};

/** Delay before attempt `attempt + 1`, given `attempt` attempts have failed */
export function backoffDelay(rule: BackoffRule, attempt: number): number {
  if (rule.baseDelayMs <= 0) return 0;
  const raw = rule.baseDelayMs * Math.pow(rule.multiplier, Math.max(0, attempt - 1));
  return Math.min(rule.maxDelayMs, raw);
}

/** Overlay a partial policy (from tenant config) on the defaults */
export function resolveRetryPolicy(partial?: Partial<RetryPolicy>): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    ...partial,
    rules: { ...DEFAULT_RETRY_POLICY.rules, ...partial?.rules },
    timeoutsMs: { ...DEFAULT_RETRY_POLICY.timeoutsMs, ...partial?.timeoutsMs },
  };
}
