import type { SystemConfigEntry } from '../entities/Settings.js';

/**
 * Interface for the key/value system_config store
 */
export interface ISettingsRepository {
  get(key: string): SystemConfigEntry | null;

  /**
   * Insert or replace a value; created_at is kept on replace
   */
  upsert(key: string, value: unknown, description?: string, isEncrypted?: boolean): SystemConfigEntry;

  delete(key: string): boolean;

  listKeys(): string[];

  count(): number;

  /**
   * Runs `fn` in one transaction; a throw rolls back every write it made
   */
  transaction<T>(fn: () => T): T;
}
