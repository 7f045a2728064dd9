import { isIP } from 'net';
import { z } from 'zod';

/**
 * Network device inventory entities
 */
export const DEVICE_TYPES = ['ios', 'iosxe', 'iosxr', 'nxos', 'asa'] as const;
export const DEVICE_PROTOCOLS = ['ssh', 'telnet'] as const;
export const DEVICE_STATUSES = ['online', 'offline', 'warning', 'unknown', 'error'] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];
export type DeviceProtocol = (typeof DEVICE_PROTOCOLS)[number];
export type DeviceStatus = (typeof DEVICE_STATUSES)[number];

const ipAddress = z
  .string()
  .trim()
  .refine((value) => isIP(value) !== 0, { message: 'Invalid IP address' });

export const NewDeviceSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(255),
  ip_address: ipAddress,
  device_type: z.enum(DEVICE_TYPES),
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  port: z.number().int().min(1).max(65535).optional(),
  protocol: z.enum(DEVICE_PROTOCOLS).default('ssh'),
  metadata: z.record(z.unknown()).optional(),
});

export const DeviceUpdateSchema = z
  .object({
    name: z.string().trim().min(1).max(255),
    ip_address: ipAddress,
    device_type: z.enum(DEVICE_TYPES),
    username: z.string().min(1),
    password: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    protocol: z.enum(DEVICE_PROTOCOLS),
    metadata: z.record(z.unknown()),
  })
  .partial();

export interface NetworkDevice {
  id: string;
  name: string;
  ipAddress: string;
  deviceType: DeviceType;
  protocol: DeviceProtocol;
  port: number;
  username: string;
  passwordEncrypted: string;
  status: DeviceStatus;
  uptimeSeconds: number;
  lastSeen: string | null;
  configBackup: string | null;
  metadata: Record<string, unknown> | null;
  createdAt: string;
  updatedAt: string;
}

export interface NetworkDeviceRecord {
  id: string;
  name: string;
  ip_address: string;
  device_type: string;
  protocol: string;
  port: number;
  username: string;
  password_encrypted: string;
  status: string;
  uptime_seconds: number;
  last_seen: string | null;
  config_backup: string | null;
  metadata: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Columns a repository write may touch
 */
export interface DeviceFields {
  name: string;
  ipAddress: string;
  deviceType: DeviceType;
  protocol: DeviceProtocol;
  port: number;
  username: string;
  passwordEncrypted: string;
  metadata: Record<string, unknown> | null;
}

export interface DeviceStatusUpdate {
  status: DeviceStatus;
  lastSeen?: string;
  uptimeSeconds?: number;
}

export interface DeviceStatusCounts {
  total: number;
  online: number;
  offline: number;
  warning: number;
  unknown: number;
  error: number;
  withBackup: number;
}

// Operation logs

export type OperationStatus = 'success' | 'failed' | 'pending';

export interface OperationLog {
  id: string;
  deviceId: string;
  operationType: string;
  status: OperationStatus;
  command: string | null;
  result: string | null;
  errorMessage: string | null;
  executionTimeMs: number | null;
  createdAt: string;
}

export interface NewOperationLog {
  deviceId: string;
  operationType: string;
  status: OperationStatus;
  command?: string;
  result?: string;
  errorMessage?: string;
  executionTimeMs?: number;
}

export interface OperationLogRecord {
  id: string;
  device_id: string;
  operation_type: string;
  status: string;
  command: string | null;
  result: string | null;
  error_message: string | null;
  execution_time_ms: number | null;
  created_at: string;
}
