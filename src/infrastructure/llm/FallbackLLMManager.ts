import type { ILLMProvider } from '../../core/interfaces/ILLMProvider.js';
import type {
  ChatMessage,
  CompletionOptions,
  FallbackResult,
  ProviderName,
} from '../../core/entities/LLM.js';
import {
  AllProvidersFailedError,
  NoProvidersConfiguredError,
  errorMessage,
  type ProviderAttemptError,
} from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('FallbackLLMManager');

export interface ProviderStats {
  requests: number;
  errors: number;
}

export interface RoutingStatsSnapshot {
  totalRequests: number;
  totalFallbacks: number;
  totalFailures: number;
  byProvider: Record<string, ProviderStats>;
}

/**
 * Counters shared by every chain built during the process lifetime
 */
export class RoutingStats {
  private totalRequests = 0;
  private totalFallbacks = 0;
  private totalFailures = 0;
  private byProvider = new Map<string, ProviderStats>();

  recordRequest(): void {
    this.totalRequests++;
  }

  recordAttempt(provider: string, failed: boolean): void {
    const stats = this.byProvider.get(provider) ?? { requests: 0, errors: 0 };
    stats.requests++;
    if (failed) stats.errors++;
    this.byProvider.set(provider, stats);
  }

  recordFallback(): void {
    this.totalFallbacks++;
  }

  recordFailure(): void {
    this.totalFailures++;
  }

  snapshot(): RoutingStatsSnapshot {
    return {
      totalRequests: this.totalRequests,
      totalFallbacks: this.totalFallbacks,
      totalFailures: this.totalFailures,
      byProvider: Object.fromEntries(
        Array.from(this.byProvider, ([name, stats]) => [name, { ...stats }])
      ),
    };
  }

  reset(): void {
    this.totalRequests = 0;
    this.totalFallbacks = 0;
    this.totalFailures = 0;
    this.byProvider.clear();
  }
}

export interface FallbackOptions {
  stats?: RoutingStats;
}

/**
 * Orders providers with `primaryName` first; the others keep their order.
 * An unknown primary leaves the list unchanged.
 */
export function buildProviderChain<T extends { name: string }>(providers: T[], primaryName?: string): T[] {
  const primary = providers.find((p) => p.name === primaryName);
  if (!primary) return [...providers];
  return [primary, ...providers.filter((p) => p !== primary)];
}

/**
 * Calls providers in order until one answers. Each provider gets one call.
 */
export class FallbackLLMManager {
  private readonly stats: RoutingStats;

  constructor(
    private readonly providers: ILLMProvider[],
    options: FallbackOptions = {}
  ) {
    this.stats = options.stats ?? new RoutingStats();
  }

  get providerNames(): ProviderName[] {
    return this.providers.map((p) => p.name);
  }

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<FallbackResult> {
    this.stats.recordRequest();

    if (this.providers.length === 0) {
      this.stats.recordFailure();
      throw new NoProvidersConfiguredError();
    }

    const attemptedProviders: ProviderName[] = [];
    const errors: Array<{ provider: ProviderName; message: string }> = [];

    for (const provider of this.providers) {
      attemptedProviders.push(provider.name);

      try {
        const completion = await provider.chat(messages, options);
        this.stats.recordAttempt(provider.name, false);

        const usedFallback = provider !== this.providers[0];
        if (usedFallback) {
          this.stats.recordFallback();
          logger.info(`Fallback succeeded: ${this.providers[0].name} → ${provider.name}`);
        }

        return { completion, provider: provider.name, attemptedProviders, errors, usedFallback };
      } catch (error) {
        const message = errorMessage(error);
        this.stats.recordAttempt(provider.name, true);
        errors.push({ provider: provider.name, message });
        logger.warn(`Provider ${provider.name} failed`, { provider: provider.name, error: message });
      }
    }

    this.stats.recordFailure();
    const attempts: ProviderAttemptError[] = errors;
    const failure = new AllProvidersFailedError(attempts);
    logger.error(failure.message);
    throw failure;
  }

  async generateText(prompt: string, options?: CompletionOptions): Promise<string> {
    const result = await this.complete([{ role: 'user', content: prompt }], options);
    return result.completion.content;
  }

  getStats(): RoutingStatsSnapshot {
    return this.stats.snapshot();
  }
}
