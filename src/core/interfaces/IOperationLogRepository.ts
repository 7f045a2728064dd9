import type { NewOperationLog, OperationLog } from '../entities/Device.js';

export interface IOperationLogRepository {
  create(log: NewOperationLog): OperationLog;

  /**
   * Newest first
   */
  findByDevice(deviceId: string, limit: number): OperationLog[];

  findRecent(limit: number): OperationLog[];
}
