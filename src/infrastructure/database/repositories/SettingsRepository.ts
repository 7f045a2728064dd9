import Database from 'better-sqlite3';
import { ISettingsRepository } from '../../../core/interfaces/ISettingsRepository.js';
import { SystemConfigEntry } from '../../../core/entities/Settings.js';
import { DatabaseError, errorMessage } from '../../../core/errors.js';

interface SystemConfigRecord {
  config_key: string;
  config_value: string;
  description: string | null;
  is_encrypted: number;
  created_at: string;
  updated_at: string;
}

/**
 * SQLite implementation of the system_config key/value store
 */
export class SettingsRepository implements ISettingsRepository {
  constructor(private db: Database.Database) {}

  get(key: string): SystemConfigEntry | null {
    const row = this.db
      .prepare<[string], SystemConfigRecord>('SELECT * FROM system_config WHERE config_key = ?')
      .get(key);
    return row ? this.toEntry(row) : null;
  }

  upsert(key: string, value: unknown, description?: string, isEncrypted: boolean = false): SystemConfigEntry {
    const now = new Date().toISOString();
    this.db
      .prepare(`
      INSERT INTO system_config (config_key, config_value, description, is_encrypted, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(config_key) DO UPDATE SET
        config_value = excluded.config_value,
        description = COALESCE(excluded.description, system_config.description),
        is_encrypted = excluded.is_encrypted,
        updated_at = excluded.updated_at
    `)
      .run(key, JSON.stringify(value), description ?? null, isEncrypted ? 1 : 0, now, now);

    const saved = this.get(key);
    if (!saved) {
      throw new DatabaseError(`Failed to persist setting ${key}`);
    }
    return saved;
  }

  delete(key: string): boolean {
    return this.db.prepare('DELETE FROM system_config WHERE config_key = ?').run(key).changes > 0;
  }

  listKeys(): string[] {
    return this.db
      .prepare<[], { config_key: string }>('SELECT config_key FROM system_config ORDER BY config_key')
      .all()
      .map((row) => row.config_key);
  }

  count(): number {
    return this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM system_config').get()?.count ?? 0;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private toEntry(row: SystemConfigRecord): SystemConfigEntry {
    let value: unknown;
    try {
      value = JSON.parse(row.config_value);
    } catch (error) {
      throw new DatabaseError(
        `Stored value for ${row.config_key} is not valid JSON: ${errorMessage(error)}`
      );
    }
    return {
      key: row.config_key,
      value,
      description: row.description,
      isEncrypted: row.is_encrypted === 1,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
