export type LLMProviderName = 'openai' | 'anthropic' | 'gemini';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * config: fixed primary → secondary → tertiary chain
 * purpose: a provider pinned per call purpose, chain after it
 * ab_test: conversations bucketed between primary and secondary
 */
export type RoutingStrategy = 'config' | 'purpose' | 'ab_test';

/** Classifier calls are short and may go to a cheaper provider */
export type LLMPurpose = 'classification' | 'generation';

export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
  /** Output must parse as a JSON object */
  jsonMode: boolean;
  /** Timeout or turn cancellation; an aborted request never fails over */
  signal?: AbortSignal;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  /** Model id as reported by the provider */
  model: string;
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

/** One vendor SDK behind the router */
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
  /** Resolves false (never rejects) when the vendor is unreachable */
  healthCheck(): Promise<boolean>;
}

export interface ModelRouterConfig {
  primaryProvider: LLMProviderName;
  secondaryProvider?: LLMProviderName;
  tertiaryProvider?: LLMProviderName;
  strategy: RoutingStrategy;
  /** Share of conversations, 0-100, that start on the primary under ab_test */
  abTestSplit: number;
  purposeRouting?: Partial<Record<LLMPurpose, LLMProviderName>>;
}

export interface ModelRoutingContext {
  conversationKey: string;
  purpose: LLMPurpose;
  requestId?: string;
}
