import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseError, errorMessage } from '../../core/errors.js';

export const IN_MEMORY = ':memory:';

export interface DatabaseStatistics {
  totalMessages: number;
  totalSessions: number;
  totalDevices: number;
  totalSettings: number;
  totalOperations: number;
  databaseSize: number;
}

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/netops.db') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    try {
      this.db = new Database(this.dbPath);
    } catch (error) {
      throw new DatabaseError(
        `Failed to open database at ${this.dbPath}: ${errorMessage(error)}`
      );
    }

    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        session_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
        content TEXT NOT NULL,
        metadata TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_session_created ON conversations(session_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_conversations_user ON conversations(user_id);

      CREATE TABLE IF NOT EXISTS system_config (
        config_key TEXT PRIMARY KEY,
        config_value TEXT NOT NULL,
        description TEXT,
        is_encrypted INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS network_devices (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        ip_address TEXT NOT NULL,
        device_type TEXT NOT NULL,
        protocol TEXT NOT NULL DEFAULT 'ssh',
        port INTEGER NOT NULL,
        username TEXT NOT NULL,
        password_encrypted TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'unknown',
        uptime_seconds INTEGER NOT NULL DEFAULT 0,
        last_seen TEXT,
        config_backup TEXT,
        metadata TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_network_devices_status ON network_devices(status);

      CREATE TABLE IF NOT EXISTS operation_logs (
        id TEXT PRIMARY KEY,
        device_id TEXT NOT NULL,
        operation_type TEXT NOT NULL,
        status TEXT NOT NULL,
        command TEXT,
        result TEXT,
        error_message TEXT,
        execution_time_ms INTEGER,
        created_at TEXT NOT NULL,
        FOREIGN KEY (device_id) REFERENCES network_devices(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_operation_logs_device ON operation_logs(device_id, created_at);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): DatabaseStatistics {
    const count = (sql: string): number =>
      this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

    // Get database file size
    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalMessages: count('SELECT COUNT(*) as count FROM conversations'),
      totalSessions: count('SELECT COUNT(DISTINCT session_id) as count FROM conversations'),
      totalDevices: count('SELECT COUNT(*) as count FROM network_devices'),
      totalSettings: count('SELECT COUNT(*) as count FROM system_config'),
      totalOperations: count('SELECT COUNT(*) as count FROM operation_logs'),
      databaseSize,
    };
  }
}
