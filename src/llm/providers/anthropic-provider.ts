import Anthropic from '@anthropic-ai/sdk';
import { LLMProvider, LLMProviderConfig, LLMCompletionRequest, LLMCompletionResponse } from '../types';
import { shapeConversation } from './message-shaping';
import { logger } from '../../observability/logger';

const JSON_ONLY =
  'Responde únicamente con un objeto JSON válido, sin bloques de código ni texto fuera del JSON. Empieza con {';

/**
 * Anthropic Messages API adapter. The system prompt travels apart from the
 * turns, and JSON mode is an instruction plus a `{` repair on the output.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;
  private readonly log = logger.child({ component: 'anthropic-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new Anthropic({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const startedAt = Date.now();
    const { system, turns } = shapeConversation(request.messages);
    const instructions = request.jsonMode ? [system, JSON_ONLY].filter(Boolean).join('\n\n') : system;

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: instructions || undefined,
        messages: turns.map((t) => ({ role: t.role, content: t.text })),
      },
      { signal: request.signal },
    );

    const text = response.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');
    if (!text) throw new Error('Anthropic returned no text content');

    const inputTokens = response.usage.input_tokens;
    const outputTokens = response.usage.output_tokens;
    return {
      content: request.jsonMode && !text.trimStart().startsWith('{') ? `{${text}` : text,
      model: response.model,
      provider: this.name,
      usage: { promptTokens: inputTokens, completionTokens: outputTokens, totalTokens: inputTokens + outputTokens },
      latencyMs: Date.now() - startedAt,
    };
  }

  /** Anthropic has no free listing endpoint; a one-token call stands in */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 1,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.content.length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Anthropic health check failed');
      return false;
    }
  }
}
