import type { Message } from '../config/types';

export type RejectionReason = 'out-of-domain' | 'prompt-injection' | 'rate-limited' | 'malicious-intent';

export type GateCheck = 'rate_limit' | 'domain' | 'injection' | 'malicious_intent';

export type SecurityVerdict =
  | {
      allowed: true;
      /** Advisory; the lowest confidence among checks that ran */
      confidence: number;
      checksRun: GateCheck[];
    }
  | {
      allowed: false;
      reason: RejectionReason;
      confidence: number;
      failedCheck: GateCheck;
      detail: string;
      /** True when the rejection comes from a classifier failure, not a positive detection */
      classifierFailure: boolean;
      checksRun: GateCheck[];
    };

export type RejectedVerdict = Extract<SecurityVerdict, { allowed: false }>;

export interface DomainReading {
  inDomain: boolean;
  confidence: number;
}

export interface MaliciousReading {
  malicious: boolean;
  confidence: number;
  category?: string;
}

/** Classification capability the gate calls; any failure rejects */
export interface SafetyClassifier {
  classifyDomain(text: string, recentContext: readonly Message[], signal?: AbortSignal): Promise<DomainReading>;
  classifyMaliciousIntent(text: string, signal?: AbortSignal): Promise<MaliciousReading>;
}

export interface GatePolicy {
  turnsPerWindow: number;
  windowSeconds: number;
  /** Keywords that mark a message out of domain without asking the classifier */
  offTopicKeywords: string[];
  /** Keywords that mark a message in domain without asking the classifier */
  inDomainKeywords: string[];
  /** Regex sources matched against accent-folded, lower-cased text */
  injectionPatterns: string[];
  domainMinConfidence: number;
  maliciousMinConfidence: number;
  maxMessageLength: number;
  classifierTimeoutMs: number;
  /** Reason reported when the classifier itself fails or times out */
  classifierFailureReason: 'out-of-domain' | 'malicious-intent';
  /** Messages of recent history handed to the domain classifier */
  contextWindow: number;
}
