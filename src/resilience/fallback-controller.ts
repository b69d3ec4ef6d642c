/**
 * Fallback Controller
 *
 * Every call to an external collaborator goes through `call`: circuit check,
 * finite timeout, bounded exponential backoff per failure class. Exhaustion
 * surfaces the last CollaboratorTimeout / CollaboratorError to the caller,
 * which picks the degraded path (static reply, empty context, neutral signal).
 */

import { AgentId } from '../config/types';
import { logger } from '../observability/logger';
import { collaboratorCalls, collaboratorRetries, versionConflicts } from '../observability/metrics';
import { DependencyHealthManager } from './dependency-health';
import {
  CollaboratorError,
  FailureClass,
  failureClassOf,
  isCollaboratorFailure,
} from './errors';
import { RetryPolicy, backoffDelay } from './retry-policy';
import { getStaticFallback } from './static-fallbacks';
import { sleep, withTimeout } from './timeout';
import { DependencyName } from './types';

export interface CallOptions {
  /** Disable retries for best-effort calls (default: retry) */
  retry?: boolean;
  signal?: AbortSignal;
}

export type Delay = (ms: number, signal?: AbortSignal) => Promise<void>;

export class FallbackController {
  private readonly log = logger.child({ component: 'fallback-controller' });

  constructor(
    readonly policy: RetryPolicy,
    private readonly health?: DependencyHealthManager,
    private readonly delay: Delay = sleep,
  ) {}

  async call<T>(
    dependency: DependencyName,
    operation: string,
    fn: (signal: AbortSignal) => Promise<T>,
    options: CallOptions = {},
  ): Promise<T> {
    const retry = options.retry ?? true;
    const timeoutMs = this.policy.timeoutsMs[dependency];
    let attempt = 0;

    for (;;) {
      attempt++;

      if (this.health && !this.health.isAvailable(dependency)) {
        collaboratorCalls.inc({ dependency, outcome: 'circuit_open' });
        throw new CollaboratorError(dependency, operation, new Error('circuit open'));
      }

      try {
        const result = await withTimeout(dependency, operation, timeoutMs, fn, options.signal);
        this.health?.recordSuccess(dependency);
        collaboratorCalls.inc({ dependency, outcome: 'success' });
        return result;
      } catch (err) {
        // Cancellation and programming errors are not retried
        if (!isCollaboratorFailure(err)) throw err;

        const failureClass = failureClassOf(err);
        this.health?.recordFailure(dependency, err.message);
        collaboratorCalls.inc({ dependency, outcome: failureClass });

        const rule = this.policy.rules[failureClass];
        if (!retry || attempt >= rule.maxAttempts) {
          this.log.warn({ dependency, operation, attempt, failureClass, err: err.message }, 'Collaborator call exhausted');
          throw err;
        }

        const waitMs = backoffDelay(rule, attempt);
        collaboratorRetries.inc({ dependency, failure_class: failureClass });
        this.log.info({ dependency, operation, attempt, waitMs, failureClass }, 'Retrying collaborator call');
        await this.delay(waitMs, options.signal);
      }
    }
  }

  /**
   * Decide whether a turn that lost an optimistic commit may try again.
   * Waits the configured backoff before returning true.
   */
  async allowConflictRetry(conversationKey: string, failedAttempts: number, signal?: AbortSignal): Promise<boolean> {
    const rule = this.policy.rules.version_conflict;
    if (failedAttempts >= rule.maxAttempts) {
      versionConflicts.inc({ outcome: 'exhausted' });
      this.log.error({ conversationKey, failedAttempts }, 'Version conflict retries exhausted');
      return false;
    }
    versionConflicts.inc({ outcome: 'retried' });
    await this.delay(backoffDelay(rule, failedAttempts), signal);
    return true;
  }

  /** Pre-defined reply for an agent whose generation calls were exhausted */
  staticResponse(agent: AgentId, failureClass: FailureClass): string {
    return getStaticFallback(agent, failureClass);
  }

  get regenerateOnConflict(): boolean {
    return this.policy.regenerateOnConflict;
  }
}
