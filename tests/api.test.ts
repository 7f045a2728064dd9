import fetch from 'node-fetch';
import WebSocket from 'ws';
import { createApplication, type Application } from '../src/app.js';
import type { ProbeResult } from '../src/infrastructure/network/TcpProbe.js';
import { CHAT_SOCKET_PATH } from '../src/infrastructure/web/ChatSocketManager.js';
import { isPlainObject } from '../src/utils/json.js';
import { LlmStubServer } from './helpers/llmStub.js';
import { stubProviderEnv, testConfig } from './helpers/testConfig.js';

interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

function dataOf(response: ApiResponse): Record<string, unknown> {
  const data = response.body.data;
  if (!isPlainObject(data)) {
    throw new Error(`Expected an object in data, got ${JSON.stringify(response.body)}`);
  }
  return data;
}

/**
 * Buffers socket events so none are lost between awaits
 */
class SocketReader {
  private buffered: Array<Record<string, unknown>> = [];
  private waiting: Array<(message: Record<string, unknown>) => void> = [];

  constructor(ws: WebSocket) {
    ws.on('message', (data: WebSocket.RawData) => {
      const parsed: unknown = JSON.parse(data.toString());
      const message = isPlainObject(parsed) ? parsed : {};
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter(message);
      } else {
        this.buffered.push(message);
      }
    });
  }

  next(): Promise<Record<string, unknown>> {
    const message = this.buffered.shift();
    if (message) return Promise.resolve(message);
    return new Promise((resolve) => this.waiting.push(resolve));
  }
}

describe('HTTP API', () => {
  const stub = new LlmStubServer();
  const probeResult: ProbeResult = { reachable: true, responseTimeMs: 2, error: null };
  let app: Application;
  let baseUrl: string;

  async function call(method: string, path: string, body?: unknown): Promise<ApiResponse> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const parsed: unknown = await res.json();
    return { status: res.status, body: isPlainObject(parsed) ? parsed : {} };
  }

  beforeAll(async () => {
    await stub.start();
  });

  afterAll(async () => {
    await stub.stop();
  });

  beforeEach(async () => {
    stub.requests.length = 0;
    ['openai', 'groq', 'openrouter', 'anthropic'].forEach((vendor) => stub.set(vendor, { status: 500 }));
    app = createApplication(testConfig(stubProviderEnv((vendor) => stub.baseUrl(vendor))), {
      probe: () => Promise.resolve(probeResult),
    });
    await app.start(0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${app.webServer.getPort()}`;
  });

  afterEach(async () => {
    await app.stop();
  });

  describe('service', () => {
    test('should report health', async () => {
      const response = await call('GET', '/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'healthy', version: '1.0.0', database: 'connected' });
    });

    test('should serve the pages', async () => {
      const res = await fetch(`${baseUrl}/chat`);

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toContain('text/html');
      expect(await res.text()).toContain('<title>GenAI NetOps - Chat</title>');
    });

    test('should answer unknown API routes with the error envelope', async () => {
      const response = await call('GET', '/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        error: 'Route GET /api/v1/unknown not found',
        code: 'NOT_FOUND',
      });
    });

    test('should reject malformed JSON', async () => {
      const res = await fetch(`${baseUrl}/api/v1/chat/send`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"message": ',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
    });
  });

  describe('chat', () => {
    test('should send a message and return it in the history', async () => {
      stub.set('openai', { reply: 'All interfaces are up' });

      const sent = await call('POST', '/api/v1/chat/send', { message: 'status?', session_id: 'api-session' });

      expect(sent.status).toBe(200);
      expect(sent.body.success).toBe(true);
      expect(dataOf(sent)).toMatchObject({
        response: 'All interfaces are up',
        session_id: 'api-session',
        provider: 'openai',
      });

      const history = await call('GET', '/api/v1/chat/history/api-session?limit=10');
      expect(history.body.data).toEqual([
        expect.objectContaining({ role: 'user', content: 'status?' }),
        expect.objectContaining({ role: 'assistant', content: 'All interfaces are up' }),
      ]);

      const sessions = await call('GET', '/api/v1/chat/sessions');
      expect(sessions.body.data).toEqual([
        expect.objectContaining({ session_id: 'api-session', message_count: 2 }),
      ]);

      const deleted = await call('DELETE', '/api/v1/chat/sessions/api-session');
      expect(dataOf(deleted).message).toBe('Deleted 2 messages from session api-session');
    });

    test('should reject an empty message', async () => {
      const response = await call('POST', '/api/v1/chat/send', { message: '' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, error: 'Message is required', code: 'VALIDATION_ERROR' });
    });

    test('should reject a bad history limit', async () => {
      const response = await call('GET', '/api/v1/chat/history/s?limit=0');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('limit must be an integer between 1 and 1000');
    });

    test('should generate and validate configurations', async () => {
      stub.set('openai', { reply: 'router ospf 1' });

      const generated = await call('POST', '/api/v1/chat/generate-config', {
        config_type: 'ospf',
        parameters: { area: 0 },
      });
      expect(dataOf(generated)).toMatchObject({ configuration: 'router ospf 1', config_type: 'ospf' });

      const validated = await call('POST', '/api/v1/chat/validate-config', { config_content: 'router ospf 1' });
      expect(dataOf(validated)).toMatchObject({ status: 'analyzed', analysis: 'router ospf 1', device_type: 'ios' });
    });
  });

  describe('settings', () => {
    test('should update a section and read it back', async () => {
      const updated = await call('PUT', '/api/v1/genai-settings/graph-rag', { knowledge_graph_enabled: true });
      expect(dataOf(updated).message).toBe('Graph RAG settings updated successfully');

      const section = await call('GET', '/api/v1/genai-settings/graph-rag');
      expect(dataOf(section).knowledge_graph_enabled).toBe(true);

      const all = await call('GET', '/api/v1/genai-settings');
      expect(dataOf(all).graph_rag).toEqual(dataOf(section));
    });

    test('should report Zod issues', async () => {
      const response = await call('PUT', '/api/v1/genai-settings/llm', { temperature: 'hot' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Validation failed');
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details).toEqual([{ path: 'temperature', message: 'Expected number, received string' }]);
    });

    test('should manage API keys', async () => {
      const added = await call('POST', '/api/v1/genai-settings/api-keys', {
        name: 'Lab',
        service: 'groq',
        key: 'test-groq-key-9876',
      });
      expect(added.status).toBe(201);
      expect(dataOf(added)).toEqual({ message: "API key 'Lab' added successfully", id: 1 });

      const listed = await call('GET', '/api/v1/genai-settings/api-keys');
      expect(dataOf(listed).keys).toEqual([expect.objectContaining({ id: 1, key: '********************9876' })]);

      const badId = await call('DELETE', '/api/v1/genai-settings/api-keys/abc');
      expect(badId.status).toBe(400);
      expect(badId.body.error).toBe('API key id must be an integer');

      const deleted = await call('DELETE', '/api/v1/genai-settings/api-keys/1');
      expect(dataOf(deleted)).toEqual({ message: 'API key 1 deleted successfully' });
    });

    test('should test a provider connection', async () => {
      stub.set('openrouter', { reply: 'ok' });

      const response = await call('POST', '/api/v1/genai-settings/test-connection', {
        provider: 'openrouter',
        api_key: 'test-candidate-key',
      });
      expect(dataOf(response)).toEqual({ status: 'success', message: 'OpenRouter connection successful' });

      const missing = await call('POST', '/api/v1/genai-settings/test-connection', { provider: 'openrouter' });
      expect(missing.status).toBe(400);
      expect(missing.body.error).toBe('provider and api_key are required');
    });

    test('should describe the provider chains', async () => {
      const response = await call('GET', '/api/v1/genai-settings/providers');
      const data = dataOf(response);

      expect(data.chains).toEqual(
        expect.objectContaining({
          chat: [
            expect.objectContaining({ name: 'openai', primary: true, configured: true }),
            expect.objectContaining({ name: 'groq' }),
            expect.objectContaining({ name: 'openrouter' }),
            expect.objectContaining({ name: 'anthropic' }),
          ],
        })
      );
      expect(data.stats).toEqual({ totalRequests: 0, totalFallbacks: 0, totalFailures: 0, byProvider: {} });
    });
  });

  describe('devices', () => {
    const device = {
      name: 'dist-sw-01',
      ip_address: '192.0.2.20',
      device_type: 'nxos',
      username: 'admin',
      password: 'test-password',
    };

    test('should create, read, update and delete a device', async () => {
      const created = await call('POST', '/api/v1/devices', device);
      expect(created.status).toBe(201);
      const id = dataOf(created).id;
      expect(typeof id).toBe('string');

      const listed = await call('GET', '/api/v1/devices');
      expect(listed.body.data).toEqual([expect.objectContaining({ id, name: 'dist-sw-01', port: 22 })]);

      const updated = await call('PUT', `/api/v1/devices/${String(id)}`, { port: 2222 });
      expect(dataOf(updated).port).toBe(2222);

      const deleted = await call('DELETE', `/api/v1/devices/${String(id)}`);
      expect(dataOf(deleted)).toEqual({ message: 'Device deleted successfully' });

      const missing = await call('GET', `/api/v1/devices/${String(id)}`);
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ success: false, error: 'Device not found', code: 'NOT_FOUND' });
    });

    test('should validate new devices', async () => {
      const response = await call('POST', '/api/v1/devices', { ...device, ip_address: 'not-an-ip' });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual([{ path: 'ip_address', message: 'Invalid IP address' }]);
    });

    test('should test connectivity and keep backups and operation logs', async () => {
      const id = String(dataOf(await call('POST', '/api/v1/devices', device)).id);

      const tested = await call('POST', `/api/v1/devices/${id}/test-connectivity`);
      expect(dataOf(tested)).toMatchObject({ status: 'online', response_time_ms: 2 });

      const noBackup = await call('GET', `/api/v1/devices/${id}/config`);
      expect(noBackup.status).toBe(404);

      await call('PUT', `/api/v1/devices/${id}/config`, { config: 'hostname dist-sw-01' });
      const backup = await call('GET', `/api/v1/devices/${id}/config`);
      expect(dataOf(backup)).toMatchObject({ device_id: id, config: 'hostname dist-sw-01' });

      const operations = await call('GET', `/api/v1/devices/${id}/operations?limit=1`);
      expect(operations.body.data).toEqual([
        expect.objectContaining({ operation_type: 'config_backup', status: 'success' }),
      ]);

      const stats = await call('GET', '/api/v1/devices/statistics/overview');
      expect(dataOf(stats)).toMatchObject({ total_devices: 1, online_devices: 1, devices_with_backup: 1 });
    });

    test('should run bulk operations', async () => {
      const id = String(dataOf(await call('POST', '/api/v1/devices', device)).id);

      const response = await call('POST', '/api/v1/devices/bulk-operations/test-connectivity', { device_ids: [id] });
      expect(dataOf(response)).toMatchObject({ total_devices: 1, successful: 1, failed: 0 });

      const unknown = await call('POST', '/api/v1/devices/bulk-operations/reboot', { device_ids: [id] });
      expect(unknown.status).toBe(400);
      expect(unknown.body.error).toBe('Unknown operation: reboot');
    });
  });

  describe('dashboard', () => {
    test('should summarise devices, conversations and routing', async () => {
      stub.set('groq', { reply: 'ok' });
      await call('POST', '/api/v1/chat/send', { message: 'hi', session_id: 'dash' });

      const response = await call('GET', '/api/v1/dashboard/stats');
      const data = dataOf(response);

      expect(data.conversations).toEqual({ total_messages: 2, total_sessions: 1 });
      expect(data.routing).toEqual({
        totalRequests: 1,
        totalFallbacks: 1,
        totalFailures: 0,
        byProvider: {
          openai: { requests: 1, errors: 1 },
          groq: { requests: 1, errors: 0 },
        },
      });
      expect(data.recent_operations).toEqual([]);
    });
  });

  describe('chat socket', () => {
    let ws: WebSocket;
    let reader: SocketReader;

    beforeEach(async () => {
      ws = new WebSocket(`ws://127.0.0.1:${app.webServer.getPort()}${CHAT_SOCKET_PATH}`);
      reader = new SocketReader(ws);
      await new Promise<void>((resolve, reject) => {
        ws.once('open', () => resolve());
        ws.once('error', reject);
      });
    });

    afterEach(() => {
      ws.close();
    });

    test('should confirm the connection and answer pings', async () => {
      const confirmed = await reader.next();
      expect(confirmed).toMatchObject({ type: 'connection_confirmed', role: 'system', content: 'Connected to chat' });
      expect(typeof confirmed.session_id).toBe('string');

      ws.send(JSON.stringify({ type: 'ping' }));
      expect(await reader.next()).toMatchObject({ type: 'pong', session_id: confirmed.session_id });
    });

    test('should report bad frames', async () => {
      await reader.next();

      ws.send('not json');
      expect(await reader.next()).toMatchObject({ type: 'error', content: 'Invalid JSON format' });

      ws.send(JSON.stringify([1, 2]));
      expect(await reader.next()).toMatchObject({ type: 'error', content: 'Message must be a JSON object' });

      ws.send(JSON.stringify({ type: 'shout' }));
      expect(await reader.next()).toMatchObject({ type: 'error', content: 'Unknown message type: shout' });

      ws.send(JSON.stringify({ type: 'chat_message', content: '  ' }));
      expect(await reader.next()).toMatchObject({ type: 'error', content: 'Message is required' });

      ws.send(JSON.stringify({ type: 'ping' }));
      expect(await reader.next()).toMatchObject({ type: 'pong' });
      expect(stub.requests).toHaveLength(0);
    });

    test('should chat in a joined session', async () => {
      stub.set('openai', { reply: 'socket reply' });
      await reader.next();

      ws.send(JSON.stringify({ type: 'join_session', session_id: 'ws-session' }));
      expect(await reader.next()).toMatchObject({
        type: 'session_joined',
        session_id: 'ws-session',
        content: 'Joined session ws-session',
      });

      ws.send(JSON.stringify({ type: 'chat_message', content: 'hello' }));
      expect(await reader.next()).toMatchObject({ type: 'message_received', role: 'user', content: 'hello' });
      expect(await reader.next()).toMatchObject({
        type: 'chat_response',
        session_id: 'ws-session',
        role: 'assistant',
        content: 'socket reply',
      });

      expect(app.chat.getHistory('ws-session')).toHaveLength(2);
    });
  });
});
