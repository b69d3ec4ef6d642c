/**
 * Priority & Escalation Engine
 *
 * Scores a turn on five bounded sub-scores (0..10) and decides whether it
 * must escalate. Pure: the classifier readings arrive as TurnSignals already
 * sampled for the turn, so scoring the same turn twice gives the same result.
 */

import { ConversationSnapshot } from '../config/types';
import { logger } from '../observability/logger';
import { escalationsTotal, priorityTotalScore } from '../observability/metrics';
import { compileKeyword, normalizeText } from '../security/patterns';
import {
  EscalationTrigger,
  PriorityPolicy,
  PriorityScore,
  PrioritySubScores,
  RISK_DIMENSIONS,
  RecommendedAction,
  RiskDimension,
  SentimentReading,
  TurnSignals,
  Urgency,
} from './types';

const MAX_SCORE = 10;

const URGENCY_SCORES: Record<Urgency, number> = {
  low: 0,
  medium: 4,
  high: 7,
  critical: 10,
};

export const NEUTRAL_SENTIMENT: SentimentReading = { score: 0, urgency: 'low', frustration: 0 };

export const DEFAULT_PRIORITY_POLICY: PriorityPolicy = {
  weights: { sentiment: 0.3, security: 0.2, financial: 0.15, legal: 0.2, operational: 0.15 },
  escalationThreshold: 7,
  riskCeilings: { security: 8, financial: 8, legal: 8, operational: 8 },
  escalateOnCriticalUrgency: true,
  immediateThreshold: 9,
  monitorThreshold: 5,
  riskKeywords: {
    security: [
      { keyword: 'hackearon', score: 9 },
      { keyword: 'acceso no autorizado', score: 9 },
      { keyword: 'robaron mi cuenta', score: 9 },
      { keyword: 'fraude', score: 8 },
      { keyword: 'phishing', score: 8 },
    ],
    financial: [
      { keyword: 'cobro doble', score: 8 },
      { keyword: 'cobraron dos veces', score: 8 },
      { keyword: 'disputa de pago', score: 8 },
      { keyword: 'no recibi mis pagos', score: 7 },
      { keyword: 'reembolso', score: 6 },
    ],
    legal: [
      { keyword: 'copyright', score: 9 },
      { keyword: 'derechos de autor', score: 9 },
      { keyword: 'demanda', score: 8 },
      { keyword: 'abogado', score: 8 },
      { keyword: 'plagio', score: 8 },
    ],
    operational: [
      { keyword: 'retirado de', score: 6 },
      { keyword: 'bloqueado', score: 6 },
      { keyword: 'caido', score: 6 },
      { keyword: 'no aparece', score: 5 },
      { keyword: 'no funciona', score: 5 },
    ],
  },
};

const RISK_SUBSCORE: Record<RiskDimension, keyof PrioritySubScores> = {
  security: 'securityRisk',
  financial: 'financialRisk',
  legal: 'legalRisk',
  operational: 'operationalRisk',
};

const RISK_LABELS: Record<RiskDimension, string> = {
  security: 'seguridad',
  financial: 'financiera',
  legal: 'legal',
  operational: 'operativa',
};

function clamp(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(MAX_SCORE, Math.max(0, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** More negative sentiment, higher urgency and frustration all raise the score */
export function sentimentToScore(reading: SentimentReading): number {
  const polarity = Math.min(1, Math.max(-1, reading.score));
  const negativity = (1 - polarity) * 5;
  return clamp(0.5 * negativity + 0.3 * URGENCY_SCORES[reading.urgency] + 0.2 * clamp(reading.frustration));
}

export class PriorityEngine {
  private readonly log = logger.child({ component: 'priority-engine' });
  private readonly detectors: Array<{ dimension: RiskDimension; keyword: string; score: number; regex: RegExp }>;

  constructor(private readonly policy: PriorityPolicy) {
    this.detectors = RISK_DIMENSIONS.flatMap((dimension) =>
      policy.riskKeywords[dimension].map((k) => ({
        dimension,
        keyword: k.keyword,
        score: k.score,
        regex: compileKeyword(k.keyword),
      })),
    );
  }

  score(snapshot: ConversationSnapshot, text: string, signals: TurnSignals): PriorityScore {
    const normalized = normalizeText(text);
    const keywordHits: Partial<Record<RiskDimension, string[]>> = {};
    const keywordMax: Record<RiskDimension, number> = { security: 0, financial: 0, legal: 0, operational: 0 };

    for (const detector of this.detectors) {
      if (!detector.regex.test(normalized)) continue;
      keywordMax[detector.dimension] = Math.max(keywordMax[detector.dimension], detector.score);
      keywordHits[detector.dimension] = [...(keywordHits[detector.dimension] ?? []), detector.keyword];
    }

    const risk = (dimension: RiskDimension): number =>
      round2(clamp(Math.max(signals.implications[dimension], keywordMax[dimension])));

    const subScores: PrioritySubScores = {
      sentiment: round2(sentimentToScore(signals.sentiment)),
      securityRisk: risk('security'),
      financialRisk: risk('financial'),
      legalRisk: risk('legal'),
      operationalRisk: risk('operational'),
    };

    const { weights } = this.policy;
    const total = round2(
      subScores.sentiment * weights.sentiment +
        RISK_DIMENSIONS.reduce((sum, d) => sum + subScores[RISK_SUBSCORE[d]] * weights[d], 0),
    );

    const triggers: EscalationTrigger[] = [];
    if (total >= this.policy.escalationThreshold) triggers.push('total_threshold');
    const ceilingHits = RISK_DIMENSIONS.filter((d) => subScores[RISK_SUBSCORE[d]] >= this.policy.riskCeilings[d]);
    for (const d of ceilingHits) triggers.push(`${d}_ceiling`);
    if (this.policy.escalateOnCriticalUrgency && signals.sentiment.urgency === 'critical') {
      triggers.push('critical_urgency');
    }

    const escalate = triggers.length > 0;
    const result: PriorityScore = {
      subScores,
      total,
      escalate,
      triggers,
      recommendedAction: this.recommend(total, escalate, ceilingHits.length > 0),
      reasons: this.reasons(signals.sentiment, ceilingHits, triggers),
      keywordHits,
    };

    priorityTotalScore.observe(total);
    if (escalate) {
      for (const trigger of triggers) escalationsTotal.inc({ trigger });
    }
    this.log.debug({ conversationKey: snapshot.key, total, escalate, triggers }, 'Priority calculated');
    return result;
  }

  private recommend(total: number, escalate: boolean, ceilingHit: boolean): RecommendedAction {
    if (ceilingHit || total >= this.policy.immediateThreshold) return 'immediate_escalation';
    if (escalate) return 'escalate_after_response';
    if (total >= this.policy.monitorThreshold) return 'respond_and_monitor';
    return 'respond';
  }

  private reasons(
    sentiment: SentimentReading,
    ceilingHits: readonly RiskDimension[],
    triggers: readonly EscalationTrigger[],
  ): string[] {
    if (triggers.length === 0) return [];
    const reasons: string[] = [];
    if (sentiment.score <= -0.6) reasons.push('cliente muy insatisfecho');
    if (sentiment.urgency === 'critical') reasons.push('urgencia crítica');
    if (sentiment.frustration >= 8) reasons.push('alta frustración');
    for (const d of ceilingHits) reasons.push(`implicación ${RISK_LABELS[d]} crítica`);
    return reasons.length > 0 ? reasons : ['score de prioridad alto'];
  }
}
