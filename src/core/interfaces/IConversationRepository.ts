import type {
  ConversationMessage,
  NewConversationMessage,
  SessionSummary,
} from '../entities/Conversation.js';

/**
 * Interface for conversation persistence
 */
export interface IConversationRepository {
  saveMessage(message: NewConversationMessage): ConversationMessage;

  /**
   * Messages of a session in chronological order, capped at `limit`
   */
  getHistory(sessionId: string, userId: string, limit: number): ConversationMessage[];

  /**
   * The newest `limit` messages of a session, returned oldest first
   */
  getRecentMessages(sessionId: string, userId: string, limit: number): ConversationMessage[];

  getSessions(userId: string): SessionSummary[];

  deleteSession(sessionId: string, userId: string): number;

  countMessages(): number;

  countSessions(): number;
}
