/**
 * Schedule Store Factory
 *
 * Creates schedule store instances from explicit configuration or from the
 * validated environment.
 */

import { getDatabasePath, getStoreType } from '../../config/index.js';
import type { IScheduleStore } from './IScheduleStore.js';
import { MemoryScheduleStore } from './MemoryScheduleStore.js';
import { SqliteScheduleStore } from './SqliteScheduleStore.js';
import type { StoreConfig } from './types.js';

export class ScheduleStoreFactory {
  static create(config: StoreConfig): IScheduleStore {
    ScheduleStoreFactory.validateConfig(config);

    switch (config.type) {
      case 'memory':
        return new MemoryScheduleStore();

      case 'sqlite':
        if (!config.sqlite) {
          throw new Error('SQLite store configuration is required when type is "sqlite"');
        }
        return new SqliteScheduleStore(config.sqlite);
    }
  }

  /**
   * Uses VESTING_STORE and VESTING_DB_PATH
   */
  static createFromConfig(): IScheduleStore {
    const type = getStoreType();
    if (type === 'memory') {
      return this.create({ type });
    }

    return this.create({
      type,
      sqlite: {
        dbPath: getDatabasePath(),
        walMode: true,
      },
    });
  }

  static validateConfig(config: StoreConfig): boolean {
    switch (config.type) {
      case 'memory':
        break;

      case 'sqlite':
        if (!config.sqlite?.dbPath) {
          throw new Error('Database path is required for the sqlite store');
        }
        break;

      default:
        throw new Error('Invalid store type: expected "memory" or "sqlite"');
    }

    return true;
  }
}
