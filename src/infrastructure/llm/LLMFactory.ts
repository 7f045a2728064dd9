import { PROVIDER_DEFAULTS, type ProviderSettings } from '../../core/entities/LLM.js';
import { ConfigurationError, UnsupportedProviderError } from '../../core/errors.js';
import type { BaseLLMProvider, ProviderOptions } from './providers/BaseLLMProvider.js';
import { OpenAICompatibleProvider } from './providers/OpenAICompatibleProvider.js';
import { AnthropicProvider } from './providers/AnthropicProvider.js';

/**
 * Creates provider adapters from plain settings
 */
export class LLMFactory {
  static createProvider(settings: ProviderSettings): BaseLLMProvider {
    const provider = settings.provider.trim().toLowerCase();

    if (provider !== 'openai' && provider !== 'groq' && provider !== 'openrouter' && provider !== 'anthropic') {
      throw new UnsupportedProviderError(settings.provider);
    }
    if (!settings.apiKey) {
      throw new ConfigurationError(`API key for ${provider} is required`);
    }

    const options: ProviderOptions = {
      apiKey: settings.apiKey,
      model: settings.model || PROVIDER_DEFAULTS[provider].model,
      baseUrl: settings.baseUrl || PROVIDER_DEFAULTS[provider].baseUrl,
      temperature: settings.temperature,
      maxTokens: settings.maxTokens,
      timeoutMs: settings.timeoutMs,
    };

    switch (provider) {
      case 'anthropic':
        return new AnthropicProvider(options);
      default:
        return new OpenAICompatibleProvider(provider, options);
    }
  }
}
