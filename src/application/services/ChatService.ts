import { randomUUID } from 'crypto';
import type { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import type { ConversationMessage } from '../../core/entities/Conversation.js';
import type { ChainPurpose, ChatMessage, CompletionOptions, FallbackResult, ProviderName } from '../../core/entities/LLM.js';
import {
  AllProvidersFailedError,
  NoProvidersConfiguredError,
  ValidationError,
  errorMessage,
} from '../../core/errors.js';
import type { Config } from '../../config.js';
import { ChatTemplate } from '../../core/templates/ChatTemplate.js';
import {
  CHAT_UNAVAILABLE,
  CONFIG_ENGINEER_SYSTEM_PROMPT,
  SECURITY_ANALYST_SYSTEM_PROMPT,
  VALIDATION_UNAVAILABLE,
  assistantSystemPrompt,
  configGenerationPrompt,
  configGenerationUnavailable,
  configValidationPrompt,
  type SystemContext,
} from '../../core/templates/NetworkPrompts.js';
import type { ProviderChainBuilder } from './ProviderChainBuilder.js';
import { formatUptime, type DeviceService } from './DeviceService.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ChatService');

const SESSION_PREVIEW_LENGTH = 100;

/**
 * Event pushed to connected WebSocket clients
 */
export interface ChatEvent {
  type: string;
  session_id: string | null;
  role: 'user' | 'assistant' | 'system';
  content: string;
  timestamp: string;
}

export interface ChatBroadcaster {
  broadcast(event: ChatEvent): void;
}

export interface SendMessageResult {
  response: string;
  session_id: string;
  message_id: string;
  provider: ProviderName | null;
}

export interface HistoryEntry {
  id: string;
  role: string;
  content: string;
  timestamp: string;
  metadata: Record<string, unknown> | null;
}

export interface SessionEntry {
  session_id: string;
  last_message: string;
  last_updated: string;
  message_count: number;
}

function toHistoryEntry(message: ConversationMessage): HistoryEntry {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    timestamp: message.createdAt,
    metadata: message.metadata,
  };
}

function isRoutingFailure(error: unknown): boolean {
  return error instanceof AllProvidersFailedError || error instanceof NoProvidersConfiguredError;
}

/**
 * Chat, configuration generation and configuration review on top of the provider chains
 */
export class ChatService {
  private readonly template = new ChatTemplate();
  private broadcaster: ChatBroadcaster | null = null;

  constructor(
    private conversationRepo: IConversationRepository,
    private chainBuilder: ProviderChainBuilder,
    private deviceService: DeviceService,
    private chatConfig: Config['chat']
  ) {}

  setBroadcaster(broadcaster: ChatBroadcaster | null): void {
    this.broadcaster = broadcaster;
  }

  private systemContext(): SystemContext {
    const devices = this.deviceService.getInventory();
    return {
      devices: devices.map((d) => ({
        name: d.name,
        ip: d.ipAddress,
        type: d.deviceType,
        status: d.status,
        uptime: formatUptime(d.uptimeSeconds),
      })),
      total_devices: devices.length,
      online_devices: devices.filter((d) => d.status === 'online').length,
    };
  }

  /**
   * Runs a chain, turning a routing failure into null so callers can answer with fixed text
   */
  private async tryComplete(
    purpose: ChainPurpose,
    messages: ChatMessage[],
    options?: CompletionOptions
  ): Promise<FallbackResult | null> {
    try {
      return await this.chainBuilder.build(purpose).complete(messages, options);
    } catch (error) {
      if (isRoutingFailure(error)) {
        logger.error(`No provider answered the ${purpose} request`, {
          error: errorMessage(error),
        });
        return null;
      }
      throw error;
    }
  }

  private logExchange(prompt: string, result: FallbackResult | null, reply: string): string {
    const sessionId = randomUUID();
    const userId = this.chatConfig.userId;
    this.conversationRepo.saveMessage({ userId, sessionId, role: 'user', content: prompt });
    this.conversationRepo.saveMessage({
      userId,
      sessionId,
      role: 'assistant',
      content: reply,
      metadata: result ? { provider: result.provider, model: result.completion.model } : { provider: null },
    });
    return sessionId;
  }

  async sendMessage(body: { message?: unknown; session_id?: unknown }): Promise<SendMessageResult> {
    const message = typeof body.message === 'string' ? body.message.trim() : '';
    if (!message) {
      throw new ValidationError('Message is required');
    }

    const sessionId =
      typeof body.session_id === 'string' && body.session_id.trim() ? body.session_id.trim() : randomUUID();
    const userId = this.chatConfig.userId;

    const history = this.conversationRepo.getRecentMessages(sessionId, userId, this.chatConfig.contextWindow);
    const messages = this.template.formatPrompt(history, message, assistantSystemPrompt(this.systemContext()));

    const result = await this.tryComplete('chat', messages);
    const response = result ? result.completion.content : CHAT_UNAVAILABLE;

    this.conversationRepo.saveMessage({ userId, sessionId, role: 'user', content: message });
    const saved = this.conversationRepo.saveMessage({
      userId,
      sessionId,
      role: 'assistant',
      content: response,
      metadata: result
        ? {
            provider: result.provider,
            model: result.completion.model,
            attempted_providers: result.attemptedProviders,
            fallback: result.usedFallback,
          }
        : { provider: null, attempted_providers: [], fallback: false },
    });

    this.broadcaster?.broadcast({
      type: 'chat_response',
      session_id: sessionId,
      role: 'assistant',
      content: response,
      timestamp: saved.createdAt,
    });

    return {
      response,
      session_id: sessionId,
      message_id: saved.id,
      provider: result ? result.provider : null,
    };
  }

  getHistory(sessionId: string, limit: number = this.chatConfig.maxHistory): HistoryEntry[] {
    return this.conversationRepo.getHistory(sessionId, this.chatConfig.userId, limit).map(toHistoryEntry);
  }

  listSessions(): SessionEntry[] {
    return this.conversationRepo.getSessions(this.chatConfig.userId).map((s) => ({
      session_id: s.sessionId,
      last_message:
        s.lastMessage.length > SESSION_PREVIEW_LENGTH
          ? `${s.lastMessage.slice(0, SESSION_PREVIEW_LENGTH)}...`
          : s.lastMessage,
      last_updated: s.lastUpdated,
      message_count: s.messageCount,
    }));
  }

  deleteSession(sessionId: string): { message: string; session_id: string } {
    const deleted = this.conversationRepo.deleteSession(sessionId, this.chatConfig.userId);
    logger.info(`Deleted session ${sessionId}`, { messages: deleted });
    return { message: `Deleted ${deleted} messages from session ${sessionId}`, session_id: sessionId };
  }

  async generateConfiguration(
    configType: unknown,
    parameters: unknown
  ): Promise<{
    configuration: string;
    config_type: string;
    parameters: Record<string, unknown>;
    session_id: string;
    provider: ProviderName | null;
  }> {
    if (typeof configType !== 'string' || !configType.trim()) {
      throw new ValidationError('config_type is required');
    }
    const params: Record<string, unknown> = {};
    if (parameters !== undefined && parameters !== null) {
      if (typeof parameters !== 'object' || Array.isArray(parameters)) {
        throw new ValidationError('parameters must be an object');
      }
      Object.assign(params, parameters);
    }

    const prompt = configGenerationPrompt(configType, params);
    const result = await this.tryComplete(
      'config_generation',
      [
        { role: 'system', content: CONFIG_ENGINEER_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      { temperature: 0.3 }
    );
    const configuration = result ? result.completion.content : configGenerationUnavailable(configType, params);

    const sessionId = this.logExchange(prompt, result, configuration);
    return {
      configuration,
      config_type: configType,
      parameters: params,
      session_id: sessionId,
      provider: result ? result.provider : null,
    };
  }

  async validateConfiguration(
    configContent: unknown,
    deviceType: unknown = 'ios'
  ): Promise<{
    status: 'analyzed';
    analysis: string;
    timestamp: string;
    device_type: string;
    provider: ProviderName | null;
  }> {
    if (typeof configContent !== 'string' || !configContent.trim()) {
      throw new ValidationError('config_content is required');
    }
    const type = typeof deviceType === 'string' && deviceType.trim() ? deviceType.trim() : 'ios';

    const prompt = configValidationPrompt(configContent, type);
    const result = await this.tryComplete(
      'analysis',
      [
        { role: 'system', content: SECURITY_ANALYST_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      { temperature: 0.2 }
    );
    const analysis = result ? result.completion.content : VALIDATION_UNAVAILABLE;

    this.logExchange(prompt, result, analysis);
    return {
      status: 'analyzed',
      analysis,
      timestamp: new Date().toISOString(),
      device_type: type,
      provider: result ? result.provider : null,
    };
  }
}
