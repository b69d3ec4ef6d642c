import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse } from '../types';
import { DialogueTurn, shapeConversation } from './message-shaping';
import { logger } from '../../observability/logger';

/** Gemini names the assistant side `model` and wraps text in parts */
function toContent(turn: DialogueTurn): Content {
  return { role: turn.role === 'assistant' ? 'model' : 'user', parts: [{ text: turn.text }] };
}

/**
 * Google Gemini adapter. JSON mode maps to `responseMimeType`.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private readonly client: GoogleGenerativeAI;
  private readonly timeoutMs: number;
  private readonly log = logger.child({ component: 'gemini-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const startedAt = Date.now();
    const { system, turns } = shapeConversation(request.messages);

    const model = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: system || undefined,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
        responseMimeType: request.jsonMode ? 'application/json' : undefined,
      },
    });

    const { response } = await model.generateContent(
      { contents: turns.map(toContent) },
      { signal: request.signal, timeout: this.timeoutMs },
    );
    const content = response.text();
    if (!content) throw new Error('Gemini returned empty response');

    const usage = response.usageMetadata;
    return {
      content,
      model: this.model,
      provider: this.name,
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - startedAt,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const model = this.client.getGenerativeModel({ model: this.model });
      await model.countTokens('ping');
      return true;
    } catch (err) {
      this.log.warn({ err }, 'Gemini health check failed');
      return false;
    }
  }
}
