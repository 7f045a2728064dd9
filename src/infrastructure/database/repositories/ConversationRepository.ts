import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import {
  ConversationMessage,
  ConversationMessageRecord,
  ConversationRole,
  NewConversationMessage,
  SessionSummary,
} from '../../../core/entities/Conversation.js';
import { parseJsonObject } from '../../../utils/json.js';

interface SessionRow {
  session_id: string;
  last_updated: string;
  message_count: number;
  last_message: string | null;
}

function toRole(value: string): ConversationRole {
  return value === 'assistant' || value === 'system' ? value : 'user';
}

function toMessage(row: ConversationMessageRecord): ConversationMessage {
  return {
    id: row.id,
    userId: row.user_id,
    sessionId: row.session_id,
    role: toRole(row.role),
    content: row.content,
    metadata: parseJsonObject(row.metadata),
    createdAt: row.created_at,
  };
}

/**
 * SQLite implementation of conversation repository
 */
export class ConversationRepository implements IConversationRepository {
  constructor(private db: Database.Database) {}

  saveMessage(message: NewConversationMessage): ConversationMessage {
    const record: ConversationMessageRecord = {
      id: randomUUID(),
      user_id: message.userId,
      session_id: message.sessionId,
      role: message.role,
      content: message.content,
      metadata: message.metadata ? JSON.stringify(message.metadata) : null,
      created_at: new Date().toISOString(),
    };

    this.db
      .prepare(`
      INSERT INTO conversations (id, user_id, session_id, role, content, metadata, created_at)
      VALUES (@id, @user_id, @session_id, @role, @content, @metadata, @created_at)
    `)
      .run(record);

    return toMessage(record);
  }

  getHistory(sessionId: string, userId: string, limit: number): ConversationMessage[] {
    const stmt = this.db.prepare<[string, string, number], ConversationMessageRecord>(`
      SELECT * FROM conversations
      WHERE session_id = ? AND user_id = ?
      ORDER BY created_at ASC, rowid ASC
      LIMIT ?
    `);

    return stmt.all(sessionId, userId, limit).map(toMessage);
  }

  getRecentMessages(sessionId: string, userId: string, limit: number): ConversationMessage[] {
    if (limit <= 0) return [];

    const stmt = this.db.prepare<[string, string, number], ConversationMessageRecord>(`
      SELECT * FROM conversations
      WHERE session_id = ? AND user_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `);

    // Reverse to maintain chronological order
    return stmt.all(sessionId, userId, limit).map(toMessage).reverse();
  }

  getSessions(userId: string): SessionSummary[] {
    const stmt = this.db.prepare<[string], SessionRow>(`
      SELECT
        c.session_id,
        MAX(c.created_at) as last_updated,
        COUNT(*) as message_count,
        (SELECT content FROM conversations
          WHERE session_id = c.session_id AND user_id = c.user_id
          ORDER BY created_at DESC, rowid DESC LIMIT 1) as last_message
      FROM conversations c
      WHERE c.user_id = ?
      GROUP BY c.session_id
      ORDER BY last_updated DESC
    `);

    return stmt.all(userId).map((row) => ({
      sessionId: row.session_id,
      lastMessage: row.last_message ?? '',
      lastUpdated: row.last_updated,
      messageCount: row.message_count,
    }));
  }

  deleteSession(sessionId: string, userId: string): number {
    const result = this.db
      .prepare('DELETE FROM conversations WHERE session_id = ? AND user_id = ?')
      .run(sessionId, userId);
    return result.changes;
  }

  countMessages(): number {
    return this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM conversations').get()?.count ?? 0;
  }

  countSessions(): number {
    return (
      this.db
        .prepare<[], { count: number }>('SELECT COUNT(DISTINCT session_id) as count FROM conversations')
        .get()?.count ?? 0
    );
  }
}
