/**
 * Security Gate
 *
 * Admission control for every inbound message. Checks run in a fixed order
 * (rate limit, domain, injection, malicious intent) and the first failure
 * decides the verdict. Classifier failures and timeouts reject.
 */

import { Message } from '../config/types';
import { logger } from '../observability/logger';
import { gateVerdicts } from '../observability/metrics';
import { previewText } from '../observability/pii-redactor';
import { TurnCancelled } from '../resilience/errors';
import { withTimeout } from '../resilience/timeout';
import { KeywordMatcher, compilePattern, normalizeText } from './patterns';
import { RateLimiter } from './rate-limiter';
import {
  GateCheck,
  GatePolicy,
  RejectedVerdict,
  RejectionReason,
  SafetyClassifier,
  SecurityVerdict,
} from './types';

export const DEFAULT_GATE_POLICY: GatePolicy = {
  turnsPerWindow: 10,
  windowSeconds: 60,
  offTopicKeywords: [],
  inDomainKeywords: [],
  injectionPatterns: [
    'ignore\\s+(previous|all)\\s+instructions',
    'system\\s*:',
    '<\\s*system\\s*>',
    'olvida\\s+(todo|las\\s+instrucciones)',
    'ignora\\s+las\\s+reglas',
  ],
  domainMinConfidence: 0.6,
  maliciousMinConfidence: 0.7,
  maxMessageLength: 4000,
  classifierTimeoutMs: 5000,
  classifierFailureReason: 'out-of-domain',
  contextWindow: 6,
};

export interface GateInput {
  conversationKey: string;
  /** Rate limits are per caller, not per conversation */
  callerId: string;
  text: string;
  recentMessages: readonly Message[];
  signal?: AbortSignal;
}

/** Passed a check, or a failed verdict that stops the gate */
type CheckResult = { passed: true; confidence: number } | { passed: false; verdict: RejectedVerdict };

export class SecurityGate {
  private readonly log = logger.child({ component: 'security-gate' });
  private readonly limiter: RateLimiter;
  private readonly offTopic: KeywordMatcher;
  private readonly inDomain: KeywordMatcher;
  private readonly injection: RegExp[];

  constructor(
    private readonly policy: GatePolicy,
    private readonly classifier: SafetyClassifier,
    now: () => number = Date.now,
  ) {
    this.limiter = new RateLimiter(policy.turnsPerWindow, policy.windowSeconds, now);
    this.offTopic = new KeywordMatcher(policy.offTopicKeywords);
    this.inDomain = new KeywordMatcher(policy.inDomainKeywords);
    this.injection = policy.injectionPatterns.map(compilePattern);
  }

  async evaluate(input: GateInput): Promise<SecurityVerdict> {
    const checksRun: GateCheck[] = [];
    const normalized = normalizeText(input.text);
    let minConfidence = 1;

    const checks: Array<[GateCheck, () => Promise<CheckResult>]> = [
      ['rate_limit', async () => this.checkRate(input.callerId, checksRun)],
      ['domain', () => this.checkDomain(input, normalized, checksRun)],
      ['injection', async () => this.checkInjection(normalized, checksRun)],
      ['malicious_intent', () => this.checkMalicious(input, checksRun)],
    ];

    for (const [check, run] of checks) {
      checksRun.push(check);
      const result = await run();
      if (!result.passed) {
        gateVerdicts.inc({ allowed: 'false', reason: result.verdict.reason });
        this.log.info(
          {
            conversationKey: input.conversationKey,
            reason: result.verdict.reason,
            detail: result.verdict.detail,
            preview: previewText(input.text),
          },
          'Message rejected',
        );
        return result.verdict;
      }
      minConfidence = Math.min(minConfidence, result.confidence);
    }

    gateVerdicts.inc({ allowed: 'true', reason: 'none' });
    return { allowed: true, confidence: minConfidence, checksRun: [...checksRun] };
  }

  /** Forget rate counters (admin action and tests) */
  resetRateLimit(callerId?: string): void {
    this.limiter.reset(callerId);
  }

  // ───── Checks ─────────────────────────────────────────────────

  private checkRate(key: string, checksRun: GateCheck[]): CheckResult {
    const decision = this.limiter.check(key);
    if (decision.allowed) return { passed: true, confidence: 1 };
    return this.reject('rate-limited', 'rate_limit', 1, `retry after ${decision.retryAfterMs}ms`, false, checksRun);
  }

  private async checkDomain(input: GateInput, normalized: string, checksRun: GateCheck[]): Promise<CheckResult> {
    const offTopicHit = this.offTopic.firstMatch(normalized);
    if (offTopicHit) {
      return this.reject('out-of-domain', 'domain', 1, `off-topic keyword "${offTopicHit}"`, false, checksRun);
    }
    if (this.inDomain.firstMatch(normalized)) return { passed: true, confidence: 1 };

    const context = input.recentMessages.slice(-this.policy.contextWindow);
    try {
      const reading = await withTimeout(
        'llm',
        'classifyDomain',
        this.policy.classifierTimeoutMs,
        (signal) => this.classifier.classifyDomain(input.text, context, signal),
        input.signal,
      );
      if (!reading.inDomain && reading.confidence >= this.policy.domainMinConfidence) {
        return this.reject('out-of-domain', 'domain', reading.confidence, 'classifier: out of domain', false, checksRun);
      }
      return { passed: true, confidence: reading.inDomain ? reading.confidence : 1 - reading.confidence };
    } catch (err) {
      return this.classifierFailed('domain', err, checksRun);
    }
  }

  private checkInjection(normalized: string, checksRun: GateCheck[]): CheckResult {
    const hit = this.injection.find((re) => re.test(normalized));
    if (hit) return this.reject('prompt-injection', 'injection', 1, `pattern ${hit.source}`, false, checksRun);
    return { passed: true, confidence: 1 };
  }

  private async checkMalicious(input: GateInput, checksRun: GateCheck[]): Promise<CheckResult> {
    if (input.text.length > this.policy.maxMessageLength) {
      return this.reject('malicious-intent', 'malicious_intent', 1, 'message exceeds maximum length', false, checksRun);
    }
    try {
      const reading = await withTimeout(
        'llm',
        'classifyMaliciousIntent',
        this.policy.classifierTimeoutMs,
        (signal) => this.classifier.classifyMaliciousIntent(input.text, signal),
        input.signal,
      );
      if (reading.malicious && reading.confidence >= this.policy.maliciousMinConfidence) {
        return this.reject(
          'malicious-intent',
          'malicious_intent',
          reading.confidence,
          `classifier: ${reading.category ?? 'malicious'}`,
          false,
          checksRun,
        );
      }
      return { passed: true, confidence: reading.malicious ? 1 - reading.confidence : reading.confidence };
    } catch (err) {
      return this.classifierFailed('malicious_intent', err, checksRun);
    }
  }

  // ───── Helpers ────────────────────────────────────────────────

  private classifierFailed(check: GateCheck, err: unknown, checksRun: GateCheck[]): CheckResult {
    // Cancellation is not a verdict
    if (err instanceof TurnCancelled) throw err;
    const message = err instanceof Error ? err.message : String(err);
    this.log.warn({ check, err: message }, 'Safety classifier unavailable; failing closed');
    return this.reject(this.policy.classifierFailureReason, check, 0, `classifier failure: ${message}`, true, checksRun);
  }

  private reject(
    reason: RejectionReason,
    failedCheck: GateCheck,
    confidence: number,
    detail: string,
    classifierFailure: boolean,
    checksRun: GateCheck[],
  ): CheckResult {
    return {
      passed: false,
      verdict: {
        allowed: false,
        reason,
        confidence,
        failedCheck,
        detail,
        classifierFailure,
        checksRun: [...checksRun],
      },
    };
  }
}
