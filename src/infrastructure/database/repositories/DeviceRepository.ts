import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IDeviceRepository } from '../../../core/interfaces/IDeviceRepository.js';
import {
  DEVICE_PROTOCOLS,
  DEVICE_STATUSES,
  DEVICE_TYPES,
  DeviceFields,
  DeviceStatusCounts,
  DeviceStatusUpdate,
  NetworkDevice,
  NetworkDeviceRecord,
} from '../../../core/entities/Device.js';
import { parseJsonObject } from '../../../utils/json.js';

const COLUMN_NAMES: Record<keyof DeviceFields, string> = {
  name: 'name',
  ipAddress: 'ip_address',
  deviceType: 'device_type',
  protocol: 'protocol',
  port: 'port',
  username: 'username',
  passwordEncrypted: 'password_encrypted',
  metadata: 'metadata',
};

const FIELD_KEYS: ReadonlyArray<keyof DeviceFields> = [
  'name',
  'ipAddress',
  'deviceType',
  'protocol',
  'port',
  'username',
  'passwordEncrypted',
  'metadata',
];

function pick<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function toDevice(row: NetworkDeviceRecord): NetworkDevice {
  return {
    id: row.id,
    name: row.name,
    ipAddress: row.ip_address,
    deviceType: pick(DEVICE_TYPES, row.device_type, 'ios'),
    protocol: pick(DEVICE_PROTOCOLS, row.protocol, 'ssh'),
    port: row.port,
    username: row.username,
    passwordEncrypted: row.password_encrypted,
    status: pick(DEVICE_STATUSES, row.status, 'unknown'),
    uptimeSeconds: row.uptime_seconds,
    lastSeen: row.last_seen,
    configBackup: row.config_backup,
    metadata: parseJsonObject(row.metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toColumnValue(key: keyof DeviceFields, fields: Partial<DeviceFields>): string | number | null {
  if (key === 'metadata') {
    return fields.metadata ? JSON.stringify(fields.metadata) : null;
  }
  return fields[key] ?? null;
}

/**
 * SQLite implementation of the device inventory
 */
export class DeviceRepository implements IDeviceRepository {
  constructor(private db: Database.Database) {}

  create(fields: DeviceFields): NetworkDevice {
    const now = new Date().toISOString();
    const record: NetworkDeviceRecord = {
      id: randomUUID(),
      name: fields.name,
      ip_address: fields.ipAddress,
      device_type: fields.deviceType,
      protocol: fields.protocol,
      port: fields.port,
      username: fields.username,
      password_encrypted: fields.passwordEncrypted,
      status: 'unknown',
      uptime_seconds: 0,
      last_seen: null,
      config_backup: null,
      metadata: fields.metadata ? JSON.stringify(fields.metadata) : null,
      created_at: now,
      updated_at: now,
    };

    this.db
      .prepare(`
      INSERT INTO network_devices (
        id, name, ip_address, device_type, protocol, port, username, password_encrypted,
        status, uptime_seconds, last_seen, config_backup, metadata, created_at, updated_at
      ) VALUES (
        @id, @name, @ip_address, @device_type, @protocol, @port, @username, @password_encrypted,
        @status, @uptime_seconds, @last_seen, @config_backup, @metadata, @created_at, @updated_at
      )
    `)
      .run(record);

    return toDevice(record);
  }

  findById(id: string): NetworkDevice | null {
    const row = this.db
      .prepare<[string], NetworkDeviceRecord>('SELECT * FROM network_devices WHERE id = ?')
      .get(id);
    return row ? toDevice(row) : null;
  }

  findAll(): NetworkDevice[] {
    return this.db
      .prepare<[], NetworkDeviceRecord>('SELECT * FROM network_devices ORDER BY name COLLATE NOCASE, created_at')
      .all()
      .map(toDevice);
  }

  update(id: string, fields: Partial<DeviceFields>): NetworkDevice | null {
    const keys = FIELD_KEYS.filter((key) => fields[key] !== undefined);

    if (keys.length > 0) {
      const assignments = keys.map((key) => `${COLUMN_NAMES[key]} = ?`).join(', ');
      const values = keys.map((key) => toColumnValue(key, fields));
      this.db
        .prepare(`UPDATE network_devices SET ${assignments}, updated_at = ? WHERE id = ?`)
        .run(...values, new Date().toISOString(), id);
    }

    return this.findById(id);
  }

  updateStatus(id: string, update: DeviceStatusUpdate): void {
    this.db
      .prepare(`
      UPDATE network_devices
      SET status = ?,
          last_seen = COALESCE(?, last_seen),
          uptime_seconds = COALESCE(?, uptime_seconds),
          updated_at = ?
      WHERE id = ?
    `)
      .run(update.status, update.lastSeen ?? null, update.uptimeSeconds ?? null, new Date().toISOString(), id);
  }

  saveConfigBackup(id: string, config: string): void {
    this.db
      .prepare('UPDATE network_devices SET config_backup = ?, updated_at = ? WHERE id = ?')
      .run(config, new Date().toISOString(), id);
  }

  delete(id: string): boolean {
    return this.db.prepare('DELETE FROM network_devices WHERE id = ?').run(id).changes > 0;
  }

  countByStatus(): DeviceStatusCounts {
    const row = this.db
      .prepare<[], Record<keyof DeviceStatusCounts, number | null>>(`
      SELECT
        COUNT(*) as total,
        SUM(CASE WHEN status = 'online' THEN 1 ELSE 0 END) as online,
        SUM(CASE WHEN status = 'offline' THEN 1 ELSE 0 END) as offline,
        SUM(CASE WHEN status = 'warning' THEN 1 ELSE 0 END) as warning,
        SUM(CASE WHEN status = 'unknown' THEN 1 ELSE 0 END) as unknown,
        SUM(CASE WHEN status = 'error' THEN 1 ELSE 0 END) as error,
        SUM(CASE WHEN config_backup IS NOT NULL AND config_backup != '' THEN 1 ELSE 0 END) as withBackup
      FROM network_devices
    `)
      .get();

    return {
      total: row?.total ?? 0,
      online: row?.online ?? 0,
      offline: row?.offline ?? 0,
      warning: row?.warning ?? 0,
      unknown: row?.unknown ?? 0,
      error: row?.error ?? 0,
      withBackup: row?.withBackup ?? 0,
    };
  }
}
