import { randomUUID } from 'crypto';
import type { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { ChatBroadcaster, ChatEvent, ChatService } from '../../application/services/ChatService.js';
import { ValidationError, errorMessage } from '../../core/errors.js';
import { isPlainObject } from '../../utils/json.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ChatSocket');

export const CHAT_SOCKET_PATH = '/api/v1/chat/ws';

function event(type: string, sessionId: string | null, role: ChatEvent['role'], content: string): ChatEvent {
  return { type, session_id: sessionId, role, content, timestamp: new Date().toISOString() };
}

/**
 * Real-time chat over WebSocket. Each client is bound to one session at a time.
 */
export class ChatSocketManager implements ChatBroadcaster {
  private wss: WebSocketServer | null = null;
  private clients: Map<WebSocket, string> = new Map();

  constructor(private chatService: ChatService) {}

  attach(server: HttpServer): void {
    this.wss = new WebSocketServer({ server, path: CHAT_SOCKET_PATH });

    this.wss.on('connection', (ws: WebSocket) => {
      const sessionId = randomUUID();
      this.clients.set(ws, sessionId);
      logger.info(`Session ${sessionId} connected`);

      ws.on('message', (data: RawData) => {
        this.handleMessage(ws, data).catch((error: unknown) => {
          const sessionId = this.clients.get(ws) ?? null;
          if (error instanceof ValidationError) {
            this.send(ws, event('error', sessionId, 'system', error.message));
            return;
          }
          logger.error('WebSocket message handling failed', {
            error: errorMessage(error),
          });
          this.send(ws, event('error', sessionId, 'system', 'Failed to process message'));
        });
      });

      ws.on('close', () => {
        logger.info(`Session ${this.clients.get(ws) ?? 'unknown'} disconnected`);
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        logger.error('WebSocket error', { error: error.message });
        this.clients.delete(ws);
      });

      this.send(ws, event('connection_confirmed', sessionId, 'system', 'Connected to chat'));
    });
  }

  private async handleMessage(ws: WebSocket, data: RawData): Promise<void> {
    const sessionId = this.clients.get(ws) ?? randomUUID();

    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch {
      this.send(ws, event('error', sessionId, 'system', 'Invalid JSON format'));
      return;
    }

    if (!isPlainObject(message)) {
      this.send(ws, event('error', sessionId, 'system', 'Message must be a JSON object'));
      return;
    }

    switch (message.type) {
      case 'ping':
        this.send(ws, event('pong', sessionId, 'system', 'pong'));
        return;

      case 'join_session': {
        const requested = typeof message.session_id === 'string' && message.session_id ? message.session_id : sessionId;
        this.clients.set(ws, requested);
        this.send(ws, event('session_joined', requested, 'system', `Joined session ${requested}`));
        return;
      }

      case 'chat_message': {
        const content = typeof message.content === 'string' ? message.content : '';
        if (!content.trim()) {
          throw new ValidationError('Message is required');
        }
        this.send(ws, event('message_received', sessionId, 'user', content));
        // sendMessage broadcasts the chat_response event
        await this.chatService.sendMessage({ message: content, session_id: sessionId });
        return;
      }

      default:
        this.send(ws, event('error', sessionId, 'system', `Unknown message type: ${String(message.type)}`));
    }
  }

  private send(ws: WebSocket, payload: ChatEvent): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(payload));
    }
  }

  broadcast(payload: ChatEvent): void {
    this.clients.forEach((_sessionId, client) => this.send(client, payload));
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.clients.forEach((_sessionId, client) => client.close());
      this.clients.clear();

      if (!this.wss) {
        resolve();
        return;
      }
      this.wss.close(() => {
        logger.info('WebSocket server closed');
        resolve();
      });
      this.wss = null;
    });
  }
}
