import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../src/infrastructure/database/repositories/ConversationRepository.js';
import { DeviceRepository } from '../src/infrastructure/database/repositories/DeviceRepository.js';
import { OperationLogRepository } from '../src/infrastructure/database/repositories/OperationLogRepository.js';
import { SettingsRepository } from '../src/infrastructure/database/repositories/SettingsRepository.js';
import type { DeviceFields } from '../src/core/entities/Device.js';

const USER = 'default_user';

function deviceFields(overrides: Partial<DeviceFields> = {}): DeviceFields {
  return {
    name: 'core-sw-01',
    ipAddress: '10.0.0.1',
    deviceType: 'iosxe',
    protocol: 'ssh',
    port: 22,
    username: 'admin',
    passwordEncrypted: 'encrypted-blob',
    metadata: null,
    ...overrides,
  };
}

describe('ConversationRepository', () => {
  let connection: DatabaseConnection;
  let repo: ConversationRepository;

  beforeEach(() => {
    // Use in-memory database for tests
    connection = new DatabaseConnection(':memory:');
    repo = new ConversationRepository(connection.getDatabase());
  });

  afterEach(() => {
    jest.useRealTimers();
    connection.close();
  });

  test('should save and retrieve a message with metadata', () => {
    const saved = repo.saveMessage({
      userId: USER,
      sessionId: 'session1',
      role: 'assistant',
      content: 'Hi there',
      metadata: { provider: 'groq', fallback: true },
    });

    const history = repo.getHistory('session1', USER, 50);
    expect(history).toHaveLength(1);
    expect(history[0].id).toBe(saved.id);
    expect(history[0].role).toBe('assistant');
    expect(history[0].metadata).toEqual({ provider: 'groq', fallback: true });
  });

  test('should store null metadata when none is given', () => {
    repo.saveMessage({ userId: USER, sessionId: 'session1', role: 'user', content: 'Hello' });
    expect(repo.getHistory('session1', USER, 10)[0].metadata).toBeNull();
  });

  test('should keep chronological order and honour the limit', () => {
    repo.saveMessage({ userId: USER, sessionId: 's', role: 'user', content: 'one' });
    repo.saveMessage({ userId: USER, sessionId: 's', role: 'assistant', content: 'two' });
    repo.saveMessage({ userId: USER, sessionId: 's', role: 'user', content: 'three' });

    expect(repo.getHistory('s', USER, 10).map((m) => m.content)).toEqual(['one', 'two', 'three']);
    expect(repo.getHistory('s', USER, 2).map((m) => m.content)).toEqual(['one', 'two']);
  });

  test('should return the newest messages oldest first', () => {
    ['a', 'b', 'c', 'd'].forEach((content) =>
      repo.saveMessage({ userId: USER, sessionId: 's', role: 'user', content })
    );

    expect(repo.getRecentMessages('s', USER, 2).map((m) => m.content)).toEqual(['c', 'd']);
    expect(repo.getRecentMessages('s', USER, 0)).toEqual([]);
  });

  test('should keep users and sessions apart', () => {
    repo.saveMessage({ userId: USER, sessionId: 's1', role: 'user', content: 'mine' });
    repo.saveMessage({ userId: 'other', sessionId: 's1', role: 'user', content: 'theirs' });
    repo.saveMessage({ userId: USER, sessionId: 's2', role: 'user', content: 'second' });

    expect(repo.getHistory('s1', USER, 10).map((m) => m.content)).toEqual(['mine']);
    expect(repo.getSessions(USER).map((s) => s.sessionId).sort()).toEqual(['s1', 's2']);
  });

  test('should summarise sessions newest first', () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-05-01T10:00:00.000Z'));
    repo.saveMessage({ userId: USER, sessionId: 'old', role: 'user', content: 'first question' });
    jest.setSystemTime(new Date('2024-05-01T10:00:01.000Z'));
    repo.saveMessage({ userId: USER, sessionId: 'old', role: 'assistant', content: 'first answer' });
    jest.setSystemTime(new Date('2024-05-01T11:00:00.000Z'));
    repo.saveMessage({ userId: USER, sessionId: 'new', role: 'user', content: 'latest' });

    expect(repo.getSessions(USER)).toEqual([
      { sessionId: 'new', lastMessage: 'latest', lastUpdated: '2024-05-01T11:00:00.000Z', messageCount: 1 },
      { sessionId: 'old', lastMessage: 'first answer', lastUpdated: '2024-05-01T10:00:01.000Z', messageCount: 2 },
    ]);
  });

  test('should delete a session and report how many rows went', () => {
    repo.saveMessage({ userId: USER, sessionId: 's1', role: 'user', content: 'a' });
    repo.saveMessage({ userId: USER, sessionId: 's1', role: 'assistant', content: 'b' });
    repo.saveMessage({ userId: USER, sessionId: 's2', role: 'user', content: 'c' });

    expect(repo.deleteSession('s1', USER)).toBe(2);
    expect(repo.getHistory('s1', USER, 10)).toEqual([]);
    expect(repo.countMessages()).toBe(1);
    expect(repo.countSessions()).toBe(1);
  });
});

describe('SettingsRepository', () => {
  let connection: DatabaseConnection;
  let repo: SettingsRepository;

  beforeEach(() => {
    connection = new DatabaseConnection(':memory:');
    repo = new SettingsRepository(connection.getDatabase());
  });

  afterEach(() => {
    connection.close();
  });

  test('should return null for a missing key', () => {
    expect(repo.get('llm_settings')).toBeNull();
  });

  test('should roll back every write in a failed transaction', () => {
    expect(() =>
      repo.transaction(() => {
        repo.upsert('llm_settings', { temperature: 0.1 });
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(repo.get('llm_settings')).toBeNull();
    expect(repo.transaction(() => repo.upsert('core_settings', {}).key)).toBe('core_settings');
  });

  test('should round-trip JSON values', () => {
    repo.upsert('llm_settings', { temperature: 0.5, nested: { a: [1, 2] } }, 'LLM configuration');

    const entry = repo.get('llm_settings');
    expect(entry?.value).toEqual({ temperature: 0.5, nested: { a: [1, 2] } });
    expect(entry?.description).toBe('LLM configuration');
    expect(entry?.isEncrypted).toBe(false);
  });

  test('should overwrite on upsert and keep the description when none is given', () => {
    repo.upsert('api_keys', { keys: [] }, 'API keys configuration', true);
    repo.upsert('api_keys', { keys: [{ id: 1 }] }, undefined, true);

    const entry = repo.get('api_keys');
    expect(entry?.value).toEqual({ keys: [{ id: 1 }] });
    expect(entry?.description).toBe('API keys configuration');
    expect(entry?.isEncrypted).toBe(true);
    expect(repo.count()).toBe(1);
  });

  test('should list and delete keys', () => {
    repo.upsert('rag_settings', {});
    repo.upsert('core_settings', {});

    expect(repo.listKeys()).toEqual(['core_settings', 'rag_settings']);
    expect(repo.delete('rag_settings')).toBe(true);
    expect(repo.delete('rag_settings')).toBe(false);
    expect(repo.listKeys()).toEqual(['core_settings']);
  });
});

describe('DeviceRepository and OperationLogRepository', () => {
  let connection: DatabaseConnection;
  let devices: DeviceRepository;
  let operations: OperationLogRepository;

  beforeEach(() => {
    connection = new DatabaseConnection(':memory:');
    devices = new DeviceRepository(connection.getDatabase());
    operations = new OperationLogRepository(connection.getDatabase());
  });

  afterEach(() => {
    connection.close();
  });

  test('should create a device with unknown status', () => {
    const device = devices.create(deviceFields({ metadata: { site: 'lab' } }));

    expect(device.status).toBe('unknown');
    expect(device.uptimeSeconds).toBe(0);
    expect(device.lastSeen).toBeNull();
    expect(devices.findById(device.id)).toEqual(device);
  });

  test('should list devices by name ignoring case', () => {
    devices.create(deviceFields({ name: 'edge-rtr' }));
    devices.create(deviceFields({ name: 'Access-sw' }));
    devices.create(deviceFields({ name: 'core-sw' }));

    expect(devices.findAll().map((d) => d.name)).toEqual(['Access-sw', 'core-sw', 'edge-rtr']);
  });

  test('should update only the given fields', () => {
    const device = devices.create(deviceFields());
    const updated = devices.update(device.id, { port: 2222, metadata: { rack: 4 } });

    expect(updated?.port).toBe(2222);
    expect(updated?.metadata).toEqual({ rack: 4 });
    expect(updated?.name).toBe('core-sw-01');
    expect(devices.update('missing', { port: 1 })).toBeNull();
  });

  test('should update status and keep last_seen when not given', () => {
    const device = devices.create(deviceFields());
    devices.updateStatus(device.id, { status: 'online', lastSeen: '2024-05-01T10:00:00.000Z', uptimeSeconds: 90000 });
    devices.updateStatus(device.id, { status: 'offline' });

    const stored = devices.findById(device.id);
    expect(stored?.status).toBe('offline');
    expect(stored?.lastSeen).toBe('2024-05-01T10:00:00.000Z');
    expect(stored?.uptimeSeconds).toBe(90000);
  });

  test('should count devices by status and backup', () => {
    const a = devices.create(deviceFields({ name: 'a' }));
    const b = devices.create(deviceFields({ name: 'b' }));
    devices.create(deviceFields({ name: 'c' }));
    devices.updateStatus(a.id, { status: 'online' });
    devices.updateStatus(b.id, { status: 'warning' });
    devices.saveConfigBackup(a.id, 'hostname a');

    expect(devices.countByStatus()).toEqual({
      total: 3,
      online: 1,
      offline: 0,
      warning: 1,
      unknown: 1,
      error: 0,
      withBackup: 1,
    });
  });

  test('should count zero for an empty inventory', () => {
    expect(devices.countByStatus()).toEqual({
      total: 0,
      online: 0,
      offline: 0,
      warning: 0,
      unknown: 0,
      error: 0,
      withBackup: 0,
    });
  });

  test('should return operations newest first and cascade on device delete', () => {
    const device = devices.create(deviceFields());
    operations.create({ deviceId: device.id, operationType: 'connectivity_test', status: 'failed', errorMessage: 'Connection refused' });
    operations.create({ deviceId: device.id, operationType: 'connectivity_test', status: 'success', executionTimeMs: 4 });

    const logs = operations.findByDevice(device.id, 10);
    expect(logs.map((l) => l.status)).toEqual(['success', 'failed']);
    expect(logs[1].errorMessage).toBe('Connection refused');
    expect(logs[0].executionTimeMs).toBe(4);
    expect(operations.findByDevice(device.id, 1)).toHaveLength(1);

    expect(devices.delete(device.id)).toBe(true);
    expect(operations.findRecent(10)).toEqual([]);
    expect(devices.delete(device.id)).toBe(false);
  });

  test('should reject an operation for an unknown device', () => {
    expect(() =>
      operations.create({ deviceId: 'missing', operationType: 'connectivity_test', status: 'success' })
    ).toThrow();
  });
});

describe('DatabaseConnection', () => {
  test('should report table statistics', () => {
    const connection = new DatabaseConnection(':memory:');
    const db = connection.getDatabase();
    new ConversationRepository(db).saveMessage({ userId: USER, sessionId: 's', role: 'user', content: 'x' });
    new SettingsRepository(db).upsert('core_settings', {});
    new DeviceRepository(db).create(deviceFields());

    expect(connection.getStatistics()).toEqual({
      totalMessages: 1,
      totalSessions: 1,
      totalDevices: 1,
      totalSettings: 1,
      totalOperations: 0,
      databaseSize: 0,
    });

    connection.close();
    expect(connection.isOpen()).toBe(false);
  });
});
