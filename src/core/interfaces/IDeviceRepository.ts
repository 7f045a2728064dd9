import type {
  DeviceFields,
  DeviceStatusCounts,
  DeviceStatusUpdate,
  NetworkDevice,
} from '../entities/Device.js';

/**
 * Interface for device inventory persistence
 */
export interface IDeviceRepository {
  create(fields: DeviceFields): NetworkDevice;
  findById(id: string): NetworkDevice | null;
  findAll(): NetworkDevice[];
  update(id: string, fields: Partial<DeviceFields>): NetworkDevice | null;
  updateStatus(id: string, update: DeviceStatusUpdate): void;
  saveConfigBackup(id: string, config: string): void;
  delete(id: string): boolean;
  countByStatus(): DeviceStatusCounts;
}
