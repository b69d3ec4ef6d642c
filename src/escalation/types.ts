/**
 * Priority & escalation types
 */

export type RiskDimension = 'security' | 'financial' | 'legal' | 'operational';

export const RISK_DIMENSIONS: readonly RiskDimension[] = ['security', 'financial', 'legal', 'operational'];

export type Urgency = 'low' | 'medium' | 'high' | 'critical';

export interface SentimentReading {
  /** -1 (very negative) .. 1 (very positive) */
  score: number;
  urgency: Urgency;
  /** 0..10 */
  frustration: number;
}

/** Classifier estimate per risk dimension, each 0..10 */
export type ImplicationReading = Record<RiskDimension, number>;

/**
 * Classifier observations for one turn. Sampled once and stored with the
 * turn so scoring can be repeated without re-querying.
 */
export interface TurnSignals {
  sentiment: SentimentReading;
  implications: ImplicationReading;
  /** True when any reading is a neutral default after classifier failure */
  degraded: boolean;
}

export interface RiskKeyword {
  keyword: string;
  score: number;
}

export interface PriorityPolicy {
  weights: { sentiment: number } & Record<RiskDimension, number>;
  escalationThreshold: number;
  /** Any single risk at or above its ceiling escalates regardless of total */
  riskCeilings: Record<RiskDimension, number>;
  escalateOnCriticalUrgency: boolean;
  immediateThreshold: number;
  monitorThreshold: number;
  riskKeywords: Record<RiskDimension, RiskKeyword[]>;
}

export interface PrioritySubScores {
  sentiment: number;
  securityRisk: number;
  financialRisk: number;
  legalRisk: number;
  operationalRisk: number;
}

export type EscalationTrigger =
  | 'total_threshold'
  | 'critical_urgency'
  | `${RiskDimension}_ceiling`;

export type RecommendedAction =
  | 'immediate_escalation'
  | 'escalate_after_response'
  | 'respond_and_monitor'
  | 'respond';

export interface PriorityScore {
  subScores: PrioritySubScores;
  total: number;
  escalate: boolean;
  triggers: EscalationTrigger[];
  recommendedAction: RecommendedAction;
  /** Human-readable reasons for the ticket description */
  reasons: string[];
  /** Keyword hits per dimension, for audit */
  keywordHits: Partial<Record<RiskDimension, string[]>>;
}
