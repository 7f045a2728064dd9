import { z } from 'zod';
import type { ChatMessage, CompletionOptions, LLMCompletion } from '../../../core/entities/LLM.js';
import { LLMError } from '../../../core/errors.js';
import { BaseLLMProvider } from './BaseLLMProvider.js';

const ANTHROPIC_VERSION = '2023-06-01';

const MessagesResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

/**
 * Anthropic LLM Provider (native /messages API)
 */
export class AnthropicProvider extends BaseLLMProvider {
  readonly name = 'anthropic' as const;

  /** System messages move to the top-level `system` field */
  private convertMessages(messages: ChatMessage[]): {
    system: string;
    messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  } {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const chatMessages: Array<{ role: 'user' | 'assistant'; content: string }> = [];
    for (const m of messages) {
      if (m.role === 'system') continue;
      chatMessages.push({ role: m.role, content: m.content });
    }

    return { system, messages: chatMessages };
  }

  async chat(messages: ChatMessage[], options?: CompletionOptions): Promise<LLMCompletion> {
    const start = Date.now();
    const resolved = this.resolveOptions(options);
    const converted = this.convertMessages(messages);

    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: resolved.maxTokens,
      temperature: resolved.temperature,
      messages: converted.messages,
    };
    if (converted.system) {
      body.system = converted.system;
    }

    const data = await this.postJson(
      this.endpoint('/messages'),
      {
        'x-api-key': this.options.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body,
      resolved.timeoutMs
    );

    const parsed = MessagesResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new LLMError(`${this.name} returned an unexpected response shape`, this.name);
    }

    const content = parsed.data.content
      .filter((block) => block.type === 'text' && block.text)
      .map((block) => block.text)
      .join('');
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
            promptTokens: parsed.data.usage.input_tokens,
            completionTokens: parsed.data.usage.output_tokens,
          }
        : undefined,
    };
  }
}
