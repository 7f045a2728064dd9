import type { Config } from '../../config.js';
import { isUsableApiKey } from '../../config.js';
import {
  PROVIDER_NAMES,
  type ChainPurpose,
  type ProviderChainEntry,
  type ProviderName,
} from '../../core/entities/LLM.js';
import type { CoreSettings, LlmSettings } from '../../core/entities/Settings.js';
import type { ILLMProvider } from '../../core/interfaces/ILLMProvider.js';
import { LLMManager } from '../../infrastructure/llm/LLMManager.js';
import {
  FallbackLLMManager,
  RoutingStats,
  buildProviderChain,
  type RoutingStatsSnapshot,
} from '../../infrastructure/llm/FallbackLLMManager.js';
import type { GenAISettingsService } from './GenAISettingsService.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ProviderChainBuilder');

const PURPOSE_SETTING: Record<ChainPurpose, keyof Pick<
  CoreSettings,
  'default_chat_provider' | 'default_config_generation_provider' | 'default_analysis_provider'
>> = {
  chat: 'default_chat_provider',
  config_generation: 'default_config_generation_provider',
  analysis: 'default_analysis_provider',
};

/**
 * Whether a model name from the LLM settings belongs to the vendor that would serve it
 */
export function modelMatchesProvider(model: string, provider: ProviderName): boolean {
  const lower = model.toLowerCase();
  switch (provider) {
    case 'openai':
      return /^(gpt-|o\d|chatgpt-)/.test(lower);
    case 'anthropic':
      return lower.startsWith('claude');
    case 'openrouter':
      return lower.includes('/');
    case 'groq':
      return !lower.includes('/') && !/^(gpt-|o\d|chatgpt-|claude)/.test(lower);
  }
}

/**
 * Assembles the provider fallback chain for a request from config,
 * stored API keys and the GenAI settings
 */
export class ProviderChainBuilder {
  private readonly stats = new RoutingStats();

  constructor(
    private config: Pick<Config, 'providers' | 'llm'>,
    private settingsService: GenAISettingsService
  ) {}

  private primaryFor(purpose: ChainPurpose, core: CoreSettings): ProviderName {
    return core[PURPOSE_SETTING[purpose]];
  }

  private order(primary: ProviderName): ProviderName[] {
    return Array.from(new Set<ProviderName>([primary, ...this.config.llm.fallbackOrder]));
  }

  /**
   * A stored key for the service wins over the environment key
   */
  private apiKeyFor(name: ProviderName): string | null {
    const stored = this.settingsService.resolveApiKey(name);
    if (isUsableApiKey(stored)) return stored;
    const fromEnv = this.config.providers[name].apiKey;
    return isUsableApiKey(fromEnv) ? fromEnv : null;
  }

  private modelFor(name: ProviderName, primary: ProviderName, llm: LlmSettings): string {
    if (name === primary && modelMatchesProvider(llm.primary_llm, name)) {
      return llm.primary_llm;
    }
    return this.config.providers[name].model;
  }

  build(purpose: ChainPurpose = 'chat'): FallbackLLMManager {
    const core = this.settingsService.getSection('core');
    const llm = this.settingsService.getSection('llm');
    const primary = this.primaryFor(purpose, core);

    const manager = new LLMManager();
    for (const name of this.order(primary)) {
      const apiKey = this.apiKeyFor(name);
      if (!apiKey) continue;

      manager.addProvider(name, {
        provider: name,
        apiKey,
        model: this.modelFor(name, primary, llm),
        baseUrl: this.config.providers[name].baseUrl,
        temperature: llm.temperature,
        maxTokens: llm.max_tokens,
        timeoutMs: llm.timeout_settings * 1000,
      });
    }

    if (manager.hasProvider(primary)) {
      manager.switchProvider(primary);
    }

    const providers: ILLMProvider[] = [];
    for (const name of manager.listProviders()) {
      const provider = manager.getProvider(name);
      if (provider) providers.push(provider);
    }
    const chain = buildProviderChain(providers, manager.currentProviderName ?? undefined);

    logger.debug(`Built ${purpose} chain`, { chain: chain.map((p) => p.name) });

    return new FallbackLLMManager(chain, { stats: this.stats });
  }

  /**
   * Providers in call order, then those outside the fallback order
   */
  describeChain(purpose: ChainPurpose = 'chat'): ProviderChainEntry[] {
    const core = this.settingsService.getSection('core');
    const llm = this.settingsService.getSection('llm');
    const primary = this.primaryFor(purpose, core);
    const ordered = this.order(primary);
    const rest = PROVIDER_NAMES.filter((name) => !ordered.includes(name));

    return [...ordered, ...rest].map((name) => ({
      name,
      model: this.modelFor(name, primary, llm),
      configured: this.apiKeyFor(name) !== null,
      primary: name === primary,
    }));
  }

  getStats(): RoutingStatsSnapshot {
    return this.stats.snapshot();
  }
}
