import {
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
  ModelRoutingContext,
} from './types';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmProviderFailovers, llmTokenUsage } from '../observability/metrics';

export interface ModelRouterOptions {
  /** Consecutive failures before a provider is skipped */
  failureThreshold?: number;
  /** How long a tripped provider stays skipped */
  cooldownMs?: number;
  now?: () => number;
}

interface ProviderStreak {
  failures: number;
  skipUntil: number;
}

export interface ProviderHealth {
  status: 'ok' | 'error';
  latencyMs: number;
}

/**
 * Chooses the provider chain for each completion and walks it until one
 * answers. Classification calls may be pinned to a cheaper provider
 * (`purpose`), or a conversation can be bucketed between primary and
 * secondary (`ab_test`); the remaining configured providers always follow
 * as failover.
 */
export class ModelRouter {
  private readonly streaks = new Map<LLMProviderName, ProviderStreak>();
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly log = logger.child({ component: 'model-router' });

  constructor(
    private readonly config: ModelRouterConfig,
    private readonly providers: Map<LLMProviderName, LLMProvider>,
    options: ModelRouterOptions = {},
  ) {
    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
          `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }
    this.failureThreshold = options.failureThreshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.now = options.now ?? Date.now;

    this.log.info(
      { chain: this.fallbackChain(), strategy: config.strategy, available: Array.from(providers.keys()) },
      'Model router ready',
    );
  }

  get primaryProviderName(): LLMProviderName {
    return this.config.primaryProvider;
  }

  async complete(request: LLMCompletionRequest, context: ModelRoutingContext): Promise<LLMCompletionResponse> {
    let lastError: Error | undefined;
    let lastTried: LLMProviderName | undefined;

    for (const name of this.plan(context)) {
      // An aborted call never fails over
      if (request.signal?.aborted) break;
      const provider = this.providers.get(name);
      if (!provider || this.isCoolingDown(name)) continue;

      try {
        const response = await this.attempt(provider, request);
        if (lastTried) {
          llmProviderFailovers.inc({ from_provider: lastTried, to_provider: name, reason: 'error' });
          this.log.info({ from: lastTried, to: name, requestId: context.requestId }, 'Failover succeeded');
        }
        return response;
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        lastTried = name;
        this.log.warn({ provider: name, err: lastError.message, requestId: context.requestId }, 'Provider failed');
      }
    }

    if (request.signal?.aborted) throw new Error('LLM request aborted');
    throw new Error(`All LLM providers failed. Last error: ${lastError?.message ?? 'unknown'}`);
  }

  /** Probe every provider concurrently */
  async healthCheck(): Promise<Record<string, ProviderHealth>> {
    const entries = await Promise.all(
      Array.from(this.providers, async ([name, provider]): Promise<[string, ProviderHealth]> => {
        const start = this.now();
        let healthy = false;
        try {
          healthy = await provider.healthCheck();
        } catch (err) {
          this.log.warn({ provider: name, err }, 'Provider health check threw');
        }
        return [name, { status: healthy ? 'ok' : 'error', latencyMs: this.now() - start }];
      }),
    );
    return Object.fromEntries(entries);
  }

  private async attempt(provider: LLMProvider, request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const timer = llmRequestDuration.startTimer({ provider: provider.name, model: provider.model });
    try {
      const response = await provider.complete(request);
      timer({ status: 'success' });
      this.streaks.delete(provider.name);
      llmTokenUsage.inc({ provider: provider.name, model: response.model, token_type: 'prompt' }, response.usage.promptTokens);
      llmTokenUsage.inc(
        { provider: provider.name, model: response.model, token_type: 'completion' },
        response.usage.completionTokens,
      );
      return response;
    } catch (err) {
      timer({ status: 'error' });
      this.recordFailure(provider.name);
      throw err;
    }
  }

  /** Strategy pick first, then the configured chain without repeats */
  private plan(context: ModelRoutingContext): LLMProviderName[] {
    const preferred: LLMProviderName[] = [];
    const { strategy, secondaryProvider, primaryProvider } = this.config;

    if (strategy === 'purpose') {
      const pinned = this.config.purposeRouting?.[context.purpose];
      if (pinned && this.providers.has(pinned)) preferred.push(pinned);
    } else if (strategy === 'ab_test' && secondaryProvider) {
      const bucket = bucketOf(context.conversationKey);
      preferred.push(...(bucket < this.config.abTestSplit ? [primaryProvider, secondaryProvider] : [secondaryProvider, primaryProvider]));
    }

    return Array.from(new Set([...preferred, ...this.fallbackChain()]));
  }

  private fallbackChain(): LLMProviderName[] {
    const { primaryProvider, secondaryProvider, tertiaryProvider } = this.config;
    return [primaryProvider, secondaryProvider, tertiaryProvider].filter(
      (name): name is LLMProviderName => name !== undefined,
    );
  }

  private isCoolingDown(name: LLMProviderName): boolean {
    const streak = this.streaks.get(name);
    if (!streak || this.now() >= streak.skipUntil) return false;
    this.log.debug({ provider: name }, 'Provider cooling down, skipped');
    return true;
  }

  private recordFailure(name: LLMProviderName): void {
    const streak = this.streaks.get(name) ?? { failures: 0, skipUntil: 0 };
    streak.failures++;
    if (streak.failures >= this.failureThreshold) {
      streak.skipUntil = this.now() + this.cooldownMs;
      this.log.error({ provider: name, failures: streak.failures, cooldownMs: this.cooldownMs }, 'Provider tripped');
    }
    this.streaks.set(name, streak);
  }
}

/** Stable 0-99 bucket for a conversation key */
function bucketOf(key: string): number {
  let hash = 0;
  for (let i = 0; i < key.length; i++) {
    hash = (Math.imul(hash, 31) + key.charCodeAt(i)) | 0;
  }
  return Math.abs(hash) % 100;
}
