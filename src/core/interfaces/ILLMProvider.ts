import type {
  ChatMessage,
  CompletionOptions,
  LLMCompletion,
  ProviderName,
} from '../entities/LLM.js';

/**
 * Interface for a hosted LLM provider adapter
 */
export interface ILLMProvider {
  readonly name: ProviderName;
  readonly model: string;

  /**
   * Send structured messages and return the assistant reply
   */
  chat(messages: ChatMessage[], options?: CompletionOptions): Promise<LLMCompletion>;

  /**
   * Single-prompt convenience over chat()
   */
  generateText(prompt: string, options?: CompletionOptions): Promise<string>;
}
