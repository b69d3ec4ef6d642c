/**
 * Language Service
 *
 * The one seam between the orchestration core and language models:
 * classification for the gate, router and priority engine, and generation
 * for the specialist agents. The RouterLanguageService implementation sends
 * everything through the ModelRouter and validates every JSON answer.
 */

import Ajv, { JSONSchemaType, ValidateFunction } from 'ajv';
import { Message } from '../config/types';
import { GenerationRequest, ClassifierName } from '../agent/types';
import { PromptManager } from '../agent/prompt-manager';
import { RESPONSE_CONTRACT_SCHEMA, stripFences } from '../agent/response-contract';
import { ImplicationReading, SentimentReading } from '../escalation/types';
import { IntentClassification } from '../routing/types';
import { DomainReading, MaliciousReading, SafetyClassifier } from '../security/types';
import { logger } from '../observability/logger';
import { ModelRouter } from './model-router';
import { LLMMessage, LLMPurpose, ModelRoutingContext } from './types';

export interface LanguageService extends SafetyClassifier {
  classifyIntent(text: string, recent: readonly Message[], signal?: AbortSignal): Promise<IntentClassification>;
  classifySentiment(text: string, signal?: AbortSignal): Promise<SentimentReading>;
  classifyImplications(text: string, signal?: AbortSignal): Promise<ImplicationReading>;
  /** Raw agent contract JSON for one decide or compose step */
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

// ───── Classifier output schemas ────────────────────────────────

const ajv = new Ajv({ allErrors: true });

const intentSchema: JSONSchemaType<IntentClassification> = {
  type: 'object',
  properties: {
    category: { type: 'string', enum: ['SALES', 'SUPPORT', 'ROYALTIES', 'UNCLEAR'] },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
  },
  required: ['category', 'confidence'],
};

const sentimentSchema: JSONSchemaType<SentimentReading> = {
  type: 'object',
  properties: {
    score: { type: 'number', minimum: -1, maximum: 1 },
    urgency: { type: 'string', enum: ['low', 'medium', 'high', 'critical'] },
    frustration: { type: 'number', minimum: 0, maximum: 10 },
  },
  required: ['score', 'urgency', 'frustration'],
};

const riskScore = { type: 'number', minimum: 0, maximum: 10 } as const;
const implicationsSchema: JSONSchemaType<ImplicationReading> = {
  type: 'object',
  properties: {
    security: riskScore,
    financial: riskScore,
    legal: riskScore,
    operational: riskScore,
  },
  required: ['security', 'financial', 'legal', 'operational'],
};

const domainSchema: JSONSchemaType<DomainReading> = {
  type: 'object',
  properties: {
    inDomain: { type: 'boolean' },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
  },
  required: ['inDomain', 'confidence'],
};

const maliciousSchema: JSONSchemaType<MaliciousReading> = {
  type: 'object',
  properties: {
    malicious: { type: 'boolean' },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
    category: { type: 'string', nullable: true },
  },
  required: ['malicious', 'confidence'],
};

const validators = {
  intent: ajv.compile(intentSchema),
  sentiment: ajv.compile(sentimentSchema),
  implications: ajv.compile(implicationsSchema),
  domain: ajv.compile(domainSchema),
  malicious: ajv.compile(maliciousSchema),
};

// ───── Router-backed implementation ─────────────────────────────

export interface LanguageServiceOptions {
  classifierTemperature: number;
  generationTemperature: number;
  maxTokens: number;
  /** Committed messages included with each generation */
  historyWindow: number;
  promptVersion?: string;
}

const DEFAULT_OPTIONS: LanguageServiceOptions = {
  classifierTemperature: 0.2,
  generationTemperature: 0.3,
  maxTokens: 1024,
  historyWindow: 10,
};

const CLASSIFIER_MAX_TOKENS = 150;

export class RouterLanguageService implements LanguageService {
  private readonly log = logger.child({ component: 'language-service' });
  private readonly options: LanguageServiceOptions;

  constructor(
    private readonly router: ModelRouter,
    private readonly prompts: PromptManager,
    options: Partial<LanguageServiceOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  classifyIntent(text: string, recent: readonly Message[], signal?: AbortSignal): Promise<IntentClassification> {
    return this.classify('intent', validators.intent, withHistory(text, recent), signal);
  }

  classifySentiment(text: string, signal?: AbortSignal): Promise<SentimentReading> {
    return this.classify('sentiment', validators.sentiment, text, signal);
  }

  classifyImplications(text: string, signal?: AbortSignal): Promise<ImplicationReading> {
    return this.classify('implications', validators.implications, text, signal);
  }

  classifyDomain(text: string, recent: readonly Message[], signal?: AbortSignal): Promise<DomainReading> {
    return this.classify('domain', validators.domain, withHistory(text, recent), signal);
  }

  classifyMaliciousIntent(text: string, signal?: AbortSignal): Promise<MaliciousReading> {
    return this.classify('malicious', validators.malicious, text, signal);
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const messages = this.buildGenerationMessages(request);
    const completion = await this.router.complete(
      {
        messages,
        temperature: this.options.generationTemperature,
        maxTokens: this.options.maxTokens,
        jsonMode: true,
        signal,
      },
      this.routingContext(request.snapshot.key, 'generation', request.requestId),
    );

    this.log.info(
      {
        agent: request.agent,
        phase: request.phase,
        provider: completion.provider,
        model: completion.model,
        latencyMs: completion.latencyMs,
        tokens: completion.usage.totalTokens,
      },
      'Agent generation completed',
    );
    return completion.content;
  }

  // ─── Private ──────────────────────────────────────────────────

  private async classify<T>(
    name: ClassifierName,
    validate: ValidateFunction<T>,
    userContent: string,
    signal?: AbortSignal,
  ): Promise<T> {
    const completion = await this.router.complete(
      {
        messages: [
          { role: 'system', content: this.prompts.classifierPrompt(name, this.options.promptVersion) },
          { role: 'user', content: userContent },
        ],
        temperature: this.options.classifierTemperature,
        maxTokens: CLASSIFIER_MAX_TOKENS,
        jsonMode: true,
        signal,
      },
      this.routingContext(`classifier:${name}`, 'classification'),
    );

    let parsed: unknown;
    try {
      parsed = JSON.parse(stripFences(completion.content));
    } catch {
      throw new Error(`Classifier ${name} returned invalid JSON`);
    }
    if (!validate(parsed)) {
      const errors = validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
      throw new Error(`Classifier ${name} output rejected: ${errors}`);
    }
    return parsed;
  }

  private buildGenerationMessages(request: GenerationRequest): LLMMessage[] {
    const bundle = this.prompts.get(this.options.promptVersion);
    const { snapshot } = request;

    const systemPrompt = [
      bundle.governance ? `--- GOBERNANZA ---\n${bundle.governance}` : '',
      bundle.system,
      '',
      `--- ROL: ${request.agent} ---`,
      bundle.agents[request.agent],
      '',
      bundle.brandTone ? `--- TONO ---\n${bundle.brandTone}` : '',
      '',
      '--- FORMATO DE RESPUESTA ---',
      'Responde SIEMPRE con un objeto JSON que cumpla este esquema:',
      JSON.stringify(RESPONSE_CONTRACT_SCHEMA, null, 2),
      '',
      '--- HERRAMIENTAS DISPONIBLES ---',
      request.tools.length > 0
        ? JSON.stringify(request.tools.map((t) => ({ name: t.name, description: t.description, args: t.inputSchema })), null, 2)
        : '(ninguna)',
      '',
      '--- CONTEXTO ---',
      `Canal: ${snapshot.channel}`,
      `Estado de la conversación: ${JSON.stringify(snapshot.state)}`,
      request.knowledge.length > 0
        ? `\n--- BASE DE CONOCIMIENTO ---\n${request.knowledge.map((p) => `[Fuente: ${p.source}]\n${p.content}`).join('\n\n---\n\n')}`
        : '',
      request.phase === 'compose'
        ? [
            '',
            '--- RESULTADOS DE HERRAMIENTAS ---',
            ...request.toolResults.map((r) => `- ${r.name}: ${JSON.stringify(r.result)}`),
            'Redacta ahora la respuesta final para el cliente con esta información. No pidas más herramientas.',
          ].join('\n')
        : '',
    ].join('\n');

    const history: LLMMessage[] = snapshot.messages
      .filter((m) => m.role !== 'system')
      .slice(-this.options.historyWindow)
      .map((m): LLMMessage => ({ role: m.role === 'user' ? 'user' : 'assistant', content: m.text }));

    return [{ role: 'system', content: systemPrompt }, ...history, { role: 'user', content: request.userText }];
  }

  private routingContext(conversationKey: string, purpose: LLMPurpose, requestId?: string): ModelRoutingContext {
    return { conversationKey, purpose, requestId };
  }
}

function withHistory(text: string, recent: readonly Message[]): string {
  if (recent.length === 0) return text;
  const lines = recent.map((m) => `${m.role === 'user' ? 'Cliente' : 'Agente'}: ${m.text}`);
  return `Historial reciente:\n${lines.join('\n')}\n\nÚltimo mensaje:\n${text}`;
}
