import type { IDeviceRepository } from '../../core/interfaces/IDeviceRepository.js';
import type { IOperationLogRepository } from '../../core/interfaces/IOperationLogRepository.js';
import {
  DeviceUpdateSchema,
  NewDeviceSchema,
  type DeviceFields,
  type DeviceProtocol,
  type NetworkDevice,
  type OperationLog,
} from '../../core/entities/Device.js';
import { NotFoundError, ValidationError, errorMessage } from '../../core/errors.js';
import type { Config } from '../../config.js';
import type { ConnectivityProbe } from '../../infrastructure/network/TcpProbe.js';
import type { SecretBox } from '../../utils/secrets.js';
import type { GenAISettingsService } from './GenAISettingsService.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('DeviceService');

export const BULK_OPERATIONS = ['test-connectivity'] as const;

export interface DeviceResponse {
  id: string;
  name: string;
  ip_address: string;
  device_type: string;
  protocol: string;
  port: number;
  username: string;
  status: string;
  uptime: string;
  uptime_seconds: number;
  last_seen: string | null;
  has_config_backup: boolean;
  metadata: Record<string, unknown>;
  created_at: string;
  updated_at: string;
}

export interface ConnectivityResult {
  device_id: string;
  device_name: string;
  ip_address: string;
  status: 'online' | 'offline';
  response_time_ms: number;
  error: string | null;
}

export interface OperationResponse {
  id: string;
  operation_type: string;
  status: string;
  command: string | null;
  result: string | null;
  error_message: string | null;
  execution_time_ms: number | null;
  created_at: string;
}

export interface DeviceStatistics {
  total_devices: number;
  online_devices: number;
  offline_devices: number;
  warning_devices: number;
  unknown_devices: number;
  devices_with_backup: number;
  online_percentage: number;
  backup_coverage: number;
}

export type BulkItemResult =
  | { device_id: string; success: true; result: ConnectivityResult }
  | { device_id: string; success: false; error: string };

export interface BulkOperationResult {
  operation: string;
  total_devices: number;
  successful: number;
  failed: number;
  results: BulkItemResult[];
}

export function formatUptime(seconds: number): string {
  if (!seconds) return '0d 0h';
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  return `${days}d ${hours}h`;
}

function percentage(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 1000) / 10 : 0;
}

export function toDeviceResponse(device: NetworkDevice): DeviceResponse {
  return {
    id: device.id,
    name: device.name,
    ip_address: device.ipAddress,
    device_type: device.deviceType,
    protocol: device.protocol,
    port: device.port,
    username: device.username,
    status: device.status,
    uptime: formatUptime(device.uptimeSeconds),
    uptime_seconds: device.uptimeSeconds,
    last_seen: device.lastSeen,
    has_config_backup: Boolean(device.configBackup),
    metadata: device.metadata ?? {},
    created_at: device.createdAt,
    updated_at: device.updatedAt,
  };
}

function toOperationResponse(op: OperationLog): OperationResponse {
  return {
    id: op.id,
    operation_type: op.operationType,
    status: op.status,
    command: op.command,
    result: op.result,
    error_message: op.errorMessage,
    execution_time_ms: op.executionTimeMs,
    created_at: op.createdAt,
  };
}

/**
 * Service for the network device inventory
 */
export class DeviceService {
  constructor(
    private deviceRepo: IDeviceRepository,
    private operationRepo: IOperationLogRepository,
    private secrets: SecretBox,
    private settingsService: GenAISettingsService,
    private devicesConfig: Config['devices'],
    private probe: ConnectivityProbe
  ) {}

  private defaultPort(protocol: DeviceProtocol): number {
    return protocol === 'telnet' ? this.devicesConfig.defaultTelnetPort : this.devicesConfig.defaultSshPort;
  }

  private requireDevice(id: string): NetworkDevice {
    const device = this.deviceRepo.findById(id);
    if (!device) {
      throw new NotFoundError('Device not found');
    }
    return device;
  }

  listDevices(): DeviceResponse[] {
    return this.deviceRepo.findAll().map(toDeviceResponse);
  }

  getDevice(id: string): DeviceResponse {
    return toDeviceResponse(this.requireDevice(id));
  }

  /**
   * Devices as stored, for callers that summarise the inventory
   */
  getInventory(): NetworkDevice[] {
    return this.deviceRepo.findAll();
  }

  createDevice(body: unknown): DeviceResponse {
    const input = NewDeviceSchema.parse(body);

    const device = this.deviceRepo.create({
      name: input.name,
      ipAddress: input.ip_address,
      deviceType: input.device_type,
      protocol: input.protocol,
      port: input.port ?? this.defaultPort(input.protocol),
      username: input.username,
      passwordEncrypted: this.secrets.encrypt(input.password),
      metadata: input.metadata ?? null,
    });

    logger.info(`Device created: ${device.name} (${device.ipAddress})`, { id: device.id });
    return toDeviceResponse(device);
  }

  updateDevice(id: string, body: unknown): DeviceResponse {
    const existing = this.requireDevice(id);
    const input = DeviceUpdateSchema.parse(body);

    const fields: Partial<DeviceFields> = {
      name: input.name,
      ipAddress: input.ip_address,
      deviceType: input.device_type,
      protocol: input.protocol,
      port: input.port,
      username: input.username,
      metadata: input.metadata,
    };
    if (input.password !== undefined) {
      fields.passwordEncrypted = this.secrets.encrypt(input.password);
    }
    // A protocol switch without an explicit port moves to that protocol's default port
    if (input.protocol && input.port === undefined && input.protocol !== existing.protocol) {
      fields.port = this.defaultPort(input.protocol);
    }

    const updated = this.deviceRepo.update(id, fields);
    if (!updated) {
      throw new NotFoundError('Device not found');
    }
    return toDeviceResponse(updated);
  }

  deleteDevice(id: string): { message: string } {
    if (!this.deviceRepo.delete(id)) {
      throw new NotFoundError('Device not found');
    }
    logger.info(`Device deleted`, { id });
    return { message: 'Device deleted successfully' };
  }

  async testConnectivity(id: string): Promise<ConnectivityResult> {
    const device = this.requireDevice(id);
    const probe = await this.probe(device.ipAddress, device.port, this.devicesConfig.connectionTimeoutMs);
    // The device may have been deleted during the check
    if (!this.deviceRepo.findById(device.id)) {
      throw new NotFoundError('Device not found');
    }

    const result: ConnectivityResult = {
      device_id: device.id,
      device_name: device.name,
      ip_address: device.ipAddress,
      status: probe.reachable ? 'online' : 'offline',
      response_time_ms: probe.responseTimeMs,
      error: probe.error,
    };

    this.deviceRepo.updateStatus(
      device.id,
      probe.reachable ? { status: 'online', lastSeen: new Date().toISOString() } : { status: 'offline' }
    );

    if (this.settingsService.getSection('core').log_all_operations) {
      this.operationRepo.create({
        deviceId: device.id,
        operationType: 'connectivity_test',
        status: probe.reachable ? 'success' : 'failed',
        result: JSON.stringify(result),
        errorMessage: probe.error ?? undefined,
        executionTimeMs: Math.round(probe.responseTimeMs),
      });
    }

    logger.info(`Connectivity test result for ${device.id}: ${result.status}`);
    return result;
  }

  getConfig(id: string): { device_id: string; device_name: string; config: string; backup_time: string } {
    const device = this.requireDevice(id);
    if (!device.configBackup) {
      throw new NotFoundError('No configuration backup found');
    }
    return {
      device_id: device.id,
      device_name: device.name,
      config: device.configBackup,
      backup_time: device.updatedAt,
    };
  }

  /**
   * Stores a configuration captured outside this service as the device's backup
   */
  saveConfig(id: string, config: unknown): { device_id: string; device_name: string; config: string; backup_time: string } {
    const device = this.requireDevice(id);
    if (typeof config !== 'string' || !config.trim()) {
      throw new ValidationError('config is required');
    }

    this.deviceRepo.saveConfigBackup(device.id, config);
    if (this.settingsService.getSection('core').log_all_operations) {
      this.operationRepo.create({
        deviceId: device.id,
        operationType: 'config_backup',
        status: 'success',
        result: `${config.length} bytes stored`,
      });
    }

    return this.getConfig(device.id);
  }

  getOperations(id: string, limit: number = 50): OperationResponse[] {
    this.requireDevice(id);
    return this.operationRepo.findByDevice(id, limit).map(toOperationResponse);
  }

  getRecentOperations(limit: number): Array<OperationResponse & { device_id: string }> {
    return this.operationRepo
      .findRecent(limit)
      .map((op) => ({ ...toOperationResponse(op), device_id: op.deviceId }));
  }

  getStatistics(): DeviceStatistics {
    const counts = this.deviceRepo.countByStatus();
    return {
      total_devices: counts.total,
      online_devices: counts.online,
      offline_devices: counts.offline,
      warning_devices: counts.warning,
      unknown_devices: counts.unknown,
      devices_with_backup: counts.withBackup,
      online_percentage: percentage(counts.online, counts.total),
      backup_coverage: percentage(counts.withBackup, counts.total),
    };
  }

  async bulkOperation(operation: string, deviceIds: unknown): Promise<BulkOperationResult> {
    if (!BULK_OPERATIONS.some((op) => op === operation)) {
      throw new ValidationError(`Unknown operation: ${operation}`);
    }
    if (!Array.isArray(deviceIds) || !deviceIds.every((id): id is string => typeof id === 'string')) {
      throw new ValidationError('device_ids must be an array of strings');
    }

    const limit = this.settingsService.getSection('core').max_devices_per_operation;
    if (deviceIds.length > limit) {
      throw new ValidationError(`At most ${limit} devices can be processed per operation`);
    }

    const results: BulkItemResult[] = [];
    // Sequential: one probe at a time per request
    for (const deviceId of deviceIds) {
      try {
        results.push({ device_id: deviceId, success: true, result: await this.testConnectivity(deviceId) });
      } catch (error) {
        results.push({
          device_id: deviceId,
          success: false,
          error: errorMessage(error),
        });
      }
    }

    const successful = results.filter((r) => r.success).length;
    return {
      operation,
      total_devices: deviceIds.length,
      successful,
      failed: deviceIds.length - successful,
      results,
    };
  }
}
