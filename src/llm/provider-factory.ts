import { LLMProvider, LLMProviderName, LLMProviderConfig, ModelRouterConfig } from './types';
import { ModelRouter } from './model-router';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const PROVIDER_NAMES: readonly LLMProviderName[] = ['openai', 'anthropic', 'gemini'];

export function isProviderName(value: string): value is LLMProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

/**
 * Create a single LLM provider by name.
 */
export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build every provider whose API key is set.
 */
export function buildProviders(
  configs: Record<LLMProviderName, LLMProviderConfig>,
): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of PROVIDER_NAMES) {
    const config = configs[name];
    if (!config.apiKey) continue;
    providers.set(name, createProvider(name, config));
    log.info({ provider: name, model: config.model }, 'LLM provider initialized');
  }

  if (providers.size === 0) {
    throw new Error(
      'No LLM providers configured. Set at least one of: OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY',
    );
  }
  return providers;
}

/**
 * Model router wired from environment. The primary falls back to the first
 * configured provider when the named one has no key.
 */
export function buildModelRouterFromEnv(): ModelRouter {
  const providers = buildProviders({ openai: env.openai, anthropic: env.anthropic, gemini: env.gemini });
  const configured = Array.from(providers.keys());
  const pick = (name: string): LLMProviderName | undefined =>
    isProviderName(name) && providers.has(name) ? name : undefined;

  const classifier = pick(env.llm.classifierProvider);
  const config: ModelRouterConfig = {
    primaryProvider: pick(env.llm.primaryProvider) ?? configured[0],
    secondaryProvider: pick(env.llm.secondaryProvider),
    tertiaryProvider: pick(env.llm.tertiaryProvider),
    strategy: classifier ? 'purpose' : 'config',
    abTestSplit: 100,
    purposeRouting: classifier ? { classification: classifier } : undefined,
  };
  return new ModelRouter(config, providers);
}
