import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IOperationLogRepository } from '../../../core/interfaces/IOperationLogRepository.js';
import {
  NewOperationLog,
  OperationLog,
  OperationLogRecord,
  OperationStatus,
} from '../../../core/entities/Device.js';

function toStatus(value: string): OperationStatus {
  return value === 'success' || value === 'pending' ? value : 'failed';
}

function toOperationLog(row: OperationLogRecord): OperationLog {
  return {
    id: row.id,
    deviceId: row.device_id,
    operationType: row.operation_type,
    status: toStatus(row.status),
    command: row.command,
    result: row.result,
    errorMessage: row.error_message,
    executionTimeMs: row.execution_time_ms,
    createdAt: row.created_at,
  };
}

/**
 * SQLite implementation of the device operation log
 */
export class OperationLogRepository implements IOperationLogRepository {
  constructor(private db: Database.Database) {}

  create(log: NewOperationLog): OperationLog {
    const record: OperationLogRecord = {
      id: randomUUID(),
      device_id: log.deviceId,
      operation_type: log.operationType,
      status: log.status,
      command: log.command ?? null,
      result: log.result ?? null,
      error_message: log.errorMessage ?? null,
      execution_time_ms: log.executionTimeMs ?? null,
      created_at: new Date().toISOString(),
    };

    this.db
      .prepare(`
      INSERT INTO operation_logs (id, device_id, operation_type, status, command, result, error_message, execution_time_ms, created_at)
      VALUES (@id, @device_id, @operation_type, @status, @command, @result, @error_message, @execution_time_ms, @created_at)
    `)
      .run(record);

    return toOperationLog(record);
  }

  findByDevice(deviceId: string, limit: number): OperationLog[] {
    return this.db
      .prepare<[string, number], OperationLogRecord>(`
      SELECT * FROM operation_logs
      WHERE device_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `)
      .all(deviceId, limit)
      .map(toOperationLog);
  }

  findRecent(limit: number): OperationLog[] {
    return this.db
      .prepare<[number], OperationLogRecord>(`
      SELECT * FROM operation_logs
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `)
      .all(limit)
      .map(toOperationLog);
  }
}
