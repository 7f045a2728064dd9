/**
 * Conversation domain entity
 */
export type ConversationRole = 'user' | 'assistant' | 'system';

export interface ConversationMessage {
  id: string;
  userId: string;
  sessionId: string;
  role: ConversationRole;
  content: string;
  metadata: Record<string, unknown> | null;
  createdAt: string;
}

export interface NewConversationMessage {
  userId: string;
  sessionId: string;
  role: ConversationRole;
  content: string;
  metadata?: Record<string, unknown>;
}

export interface SessionSummary {
  sessionId: string;
  lastMessage: string;
  lastUpdated: string;
  messageCount: number;
}

export interface ConversationMessageRecord {
  id: string;
  user_id: string;
  session_id: string;
  role: string;
  content: string;
  metadata: string | null;
  created_at: string;
}
