import {
  FallbackLLMManager,
  RoutingStats,
  buildProviderChain,
} from '../src/infrastructure/llm/FallbackLLMManager.js';
import type { ILLMProvider } from '../src/core/interfaces/ILLMProvider.js';
import type { ChatMessage, CompletionOptions, LLMCompletion, ProviderName } from '../src/core/entities/LLM.js';
import { AllProvidersFailedError, LLMError, NoProvidersConfiguredError } from '../src/core/errors.js';

/**
 * Provider that answers from a script of outcomes, one per call
 */
class ScriptedProvider implements ILLMProvider {
  readonly calls: Array<{ messages: ChatMessage[]; options?: CompletionOptions }> = [];

  constructor(
    readonly name: ProviderName,
    private outcomes: Array<string | Error>,
    readonly model: string = `${name}-model`
  ) {}

  async chat(messages: ChatMessage[], options?: CompletionOptions): Promise<LLMCompletion> {
    this.calls.push({ messages, options });
    const outcome = this.outcomes.length > 1 ? this.outcomes.shift() : this.outcomes[0];
    if (outcome === undefined || outcome instanceof Error) {
      throw outcome ?? new LLMError(`${this.name} has no scripted outcome`);
    }
    return { content: outcome, provider: this.name, model: this.model, latencyMs: 1 };
  }

  async generateText(prompt: string, options?: CompletionOptions): Promise<string> {
    const completion = await this.chat([{ role: 'user', content: prompt }], options);
    return completion.content;
  }
}

const MESSAGES: ChatMessage[] = [{ role: 'user', content: 'show ip route' }];

describe('buildProviderChain', () => {
  const providers = [{ name: 'groq' }, { name: 'openrouter' }, { name: 'openai' }];

  test('should move the primary to the front and keep the rest in order', () => {
    expect(buildProviderChain(providers, 'openai').map((p) => p.name)).toEqual(['openai', 'groq', 'openrouter']);
  });

  test('should leave the order alone for an unknown primary', () => {
    expect(buildProviderChain(providers, 'anthropic').map((p) => p.name)).toEqual(['groq', 'openrouter', 'openai']);
    expect(buildProviderChain(providers).map((p) => p.name)).toEqual(['groq', 'openrouter', 'openai']);
  });

  test('should not modify its input', () => {
    buildProviderChain(providers, 'openai');
    expect(providers.map((p) => p.name)).toEqual(['groq', 'openrouter', 'openai']);
  });
});

describe('FallbackLLMManager', () => {
  test('should answer from the primary when it works', async () => {
    const primary = new ScriptedProvider('openai', ['primary answer']);
    const backup = new ScriptedProvider('groq', ['backup answer']);
    const manager = new FallbackLLMManager([primary, backup]);

    const result = await manager.complete(MESSAGES, { temperature: 0.3 });

    expect(result.completion.content).toBe('primary answer');
    expect(result.provider).toBe('openai');
    expect(result.attemptedProviders).toEqual(['openai']);
    expect(result.usedFallback).toBe(false);
    expect(result.errors).toEqual([]);
    expect(primary.calls[0].options).toEqual({ temperature: 0.3 });
    expect(backup.calls).toHaveLength(0);
  });

  test('should fall back in order and collect errors', async () => {
    const first = new ScriptedProvider('openai', [new LLMError('openai 500: boom')]);
    const second = new ScriptedProvider('groq', [new LLMError('groq 429: slow down')]);
    const third = new ScriptedProvider('anthropic', ['third answer']);
    const manager = new FallbackLLMManager([first, second, third]);

    const result = await manager.complete(MESSAGES);

    expect(result.provider).toBe('anthropic');
    expect(result.usedFallback).toBe(true);
    expect(result.attemptedProviders).toEqual(['openai', 'groq', 'anthropic']);
    expect(result.errors).toEqual([
      { provider: 'openai', message: 'openai 500: boom' },
      { provider: 'groq', message: 'groq 429: slow down' },
    ]);
  });

  test('should throw AllProvidersFailedError listing every attempt', async () => {
    const manager = new FallbackLLMManager([
      new ScriptedProvider('openai', [new Error('down')]),
      new ScriptedProvider('groq', [new Error('also down')]),
    ]);

    const failure = manager.complete(MESSAGES);
    await expect(failure).rejects.toBeInstanceOf(AllProvidersFailedError);
    await expect(failure).rejects.toThrow('All 2 providers failed. Errors: openai: down; groq: also down');
  });

  test('should throw NoProvidersConfiguredError for an empty chain', async () => {
    const stats = new RoutingStats();
    const manager = new FallbackLLMManager([], { stats });

    await expect(manager.complete(MESSAGES)).rejects.toBeInstanceOf(NoProvidersConfiguredError);
    expect(stats.snapshot()).toEqual({ totalRequests: 1, totalFallbacks: 0, totalFailures: 1, byProvider: {} });
  });

  test('should call each provider once before moving on', async () => {
    const flaky = new ScriptedProvider('openai', [new Error('blip'), 'second try']);
    const backup = new ScriptedProvider('groq', ['backup']);
    const manager = new FallbackLLMManager([flaky, backup]);

    const result = await manager.complete(MESSAGES);

    expect(result.provider).toBe('groq');
    expect(result.errors).toEqual([{ provider: 'openai', message: 'blip' }]);
    expect(flaky.calls).toHaveLength(1);
    expect(backup.calls).toHaveLength(1);
  });

  test('should record a thrown non-Error value as its string form', async () => {
    const odd: ILLMProvider = {
      name: 'openrouter',
      model: 'openrouter-model',
      chat: () => Promise.reject('socket hang up'),
      generateText: () => Promise.reject('socket hang up'),
    };
    const manager = new FallbackLLMManager([odd, new ScriptedProvider('groq', ['ok'])]);

    const result = await manager.complete(MESSAGES);

    expect(result.errors).toEqual([{ provider: 'openrouter', message: 'socket hang up' }]);
  });

  test('should record routing statistics across calls', async () => {
    const stats = new RoutingStats();
    const openai = new ScriptedProvider('openai', [new Error('down')]);
    const groq = new ScriptedProvider('groq', ['ok']);
    const manager = new FallbackLLMManager([openai, groq], { stats });

    await manager.complete(MESSAGES);
    await manager.complete(MESSAGES);

    expect(manager.getStats()).toEqual({
      totalRequests: 2,
      totalFallbacks: 2,
      totalFailures: 0,
      byProvider: {
        openai: { requests: 2, errors: 2 },
        groq: { requests: 2, errors: 0 },
      },
    });

    stats.reset();
    expect(stats.snapshot()).toEqual({ totalRequests: 0, totalFallbacks: 0, totalFailures: 0, byProvider: {} });
  });

  test('should wrap a single prompt in generateText', async () => {
    const provider = new ScriptedProvider('openrouter', ['text reply']);
    const manager = new FallbackLLMManager([provider]);

    await expect(manager.generateText('hello')).resolves.toBe('text reply');
    expect(provider.calls[0].messages).toEqual([{ role: 'user', content: 'hello' }]);
    expect(manager.providerNames).toEqual(['openrouter']);
  });
});
