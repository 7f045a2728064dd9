import type { ChatMessage } from '../entities/LLM.js';

/**
 * Builds the structured message list sent to a chat completion endpoint:
 * system prompt, prior turns oldest first, then the new user message
 */
export class ChatTemplate {
  formatPrompt(
    history: Array<{ role: ChatMessage['role']; content: string }>,
    newQuestion: string,
    systemPrompt?: string
  ): ChatMessage[] {
    const chatMessages: ChatMessage[] = [];

    if (systemPrompt) {
      chatMessages.push({ role: 'system', content: systemPrompt });
    }

    history.forEach((msg) => {
      // Stored system rows never reach the provider a second time
      if (msg.role === 'system') return;
      chatMessages.push({ role: msg.role, content: msg.content });
    });

    chatMessages.push({ role: 'user', content: newQuestion });

    return chatMessages;
  }
}
