import { z } from 'zod';
import type { ChatMessage, CompletionOptions, LLMCompletion } from '../../../core/entities/LLM.js';
import { LLMError } from '../../../core/errors.js';
import { BaseLLMProvider, type ProviderOptions } from './BaseLLMProvider.js';

export type OpenAICompatibleName = 'openai' | 'groq' | 'openrouter';

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

/**
 * Adapter for vendors exposing the OpenAI /chat/completions API
 * (OpenAI, Groq, OpenRouter)
 */
export class OpenAICompatibleProvider extends BaseLLMProvider {
  constructor(
    readonly name: OpenAICompatibleName,
    options: ProviderOptions,
    private readonly appTitle: string = 'GenAI Network Automation'
  ) {
    super(options);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.apiKey}`,
    };
    if (this.name === 'openrouter') {
      headers['HTTP-Referer'] = 'http://localhost';
      headers['X-Title'] = this.appTitle;
    }
    return headers;
  }

  async chat(messages: ChatMessage[], options?: CompletionOptions): Promise<LLMCompletion> {
    const start = Date.now();
    const resolved = this.resolveOptions(options);

    const data = await this.postJson(
      this.endpoint('/chat/completions'),
      this.headers(),
      {
        model: this.model,
        messages,
        temperature: resolved.temperature,
        max_tokens: resolved.maxTokens,
      },
      resolved.timeoutMs
    );

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new LLMError(`${this.name} returned an unexpected response shape`, this.name);
    }

    const content = parsed.data.choices[0].message.content;
    if (!content) {
      throw new LLMError(`${this.name} returned an empty response`, this.name);
    }

    return {
      content,
      provider: this.name,
      model: parsed.data.model ?? this.model,
      latencyMs: Date.now() - start,
      usage: parsed.data.usage
        ? {
            promptTokens: parsed.data.usage.prompt_tokens,
            completionTokens: parsed.data.usage.completion_tokens,
          }
        : undefined,
    };
  }
}
