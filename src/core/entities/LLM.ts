/**
 * LLM domain entities
 */
export const PROVIDER_NAMES = ['openai', 'groq', 'openrouter', 'anthropic'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export interface ProviderProfile {
  label: string;
  model: string;
  baseUrl: string;
}

export const PROVIDER_DEFAULTS: Record<ProviderName, ProviderProfile> = {
  openai: { label: 'OpenAI', model: 'gpt-3.5-turbo', baseUrl: 'https://api.openai.com/v1' },
  groq: { label: 'Groq', model: 'llama3-70b-8192', baseUrl: 'https://api.groq.com/openai/v1' },
  openrouter: { label: 'OpenRouter', model: 'openai/gpt-3.5-turbo', baseUrl: 'https://openrouter.ai/api/v1' },
  anthropic: { label: 'Anthropic', model: 'claude-3-haiku-20240307', baseUrl: 'https://api.anthropic.com/v1' },
};

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface LLMCompletion {
  content: string;
  provider: ProviderName;
  model: string;
  latencyMs: number;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
}

/**
 * Everything needed to instantiate one provider adapter
 */
export interface ProviderSettings {
  provider: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface FallbackResult {
  completion: LLMCompletion;
  provider: ProviderName;
  attemptedProviders: ProviderName[];
  errors: Array<{ provider: ProviderName; message: string }>;
  usedFallback: boolean;
}

export type ChainPurpose = 'chat' | 'config_generation' | 'analysis';

export interface ProviderChainEntry {
  name: ProviderName;
  model: string;
  configured: boolean;
  primary: boolean;
}
