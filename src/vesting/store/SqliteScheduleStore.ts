/**
 * SQLite Schedule Store
 *
 * File-backed schedule ledger. Amounts and timestamps are stored as decimal
 * TEXT so values beyond 2^53 survive the round trip; every multi-row write
 * runs inside one SQLite transaction.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { storeLogger } from '../../logging/index.js';
import type { Schedule } from '../types.js';
import type { IScheduleStore } from './IScheduleStore.js';
import type { SqliteStoreConfig } from './types.js';

const log = storeLogger.child({ store: 'sqlite' });

const uintText = z.string().regex(/^\d+$/, 'expected an unsigned decimal string').transform((value) => BigInt(value));

const scheduleRowSchema = z.object({
  schedule_index: z.number().int().nonnegative(),
  total_amount: uintText,
  claimed_amount: uintText,
  upfront_amount: uintText,
  claimable_cache: uintText,
  cliff_time: uintText,
  ramp_start: uintText,
  ramp_end: uintText,
});

const countRowSchema = z.object({ count: z.number().int().nonnegative() });
const beneficiaryRowSchema = z.object({ beneficiary: z.string() });

type ScheduleRow = z.infer<typeof scheduleRowSchema>;

interface PreparedStatements {
  insert: Database.Statement;
  selectAll: Database.Statement;
  selectOne: Database.Statement;
  count: Database.Statement;
  deleteAll: Database.Statement;
  beneficiaries: Database.Statement;
}

export class SqliteScheduleStore implements IScheduleStore {
  private db: Database.Database;
  private config: SqliteStoreConfig;
  private statements: PreparedStatements | null = null;

  constructor(config: SqliteStoreConfig) {
    this.config = {
      walMode: true,
      cacheSize: 16000, // 16MB
      ...config
    };

    if (this.config.dbPath !== ':memory:') {
      const dbDir = dirname(this.config.dbPath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(this.config.dbPath);
    this.configureDatabase();
  }

  async initialize(): Promise<void> {
    this.createTables();
    this.statements = this.prepareStatements();
    log.debug({ dbPath: this.config.dbPath }, 'Schedule store initialized');
  }

  private configureDatabase(): void {
    if (this.config.walMode && this.config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.pragma('synchronous = NORMAL');

    if (this.config.cacheSize) {
      this.db.pragma(`cache_size = -${this.config.cacheSize}`);
    }

    this.db.pragma('busy_timeout = 30000');
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vesting_schedules (
        beneficiary TEXT NOT NULL,
        schedule_index INTEGER NOT NULL,
        total_amount TEXT NOT NULL,
        claimed_amount TEXT NOT NULL,
        upfront_amount TEXT NOT NULL,
        claimable_cache TEXT NOT NULL,
        cliff_time TEXT NOT NULL,
        ramp_start TEXT NOT NULL,
        ramp_end TEXT NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (beneficiary, schedule_index)
      )
    `);
  }

  private prepareStatements(): PreparedStatements {
    return {
      insert: this.db.prepare(`
        INSERT INTO vesting_schedules (
          beneficiary, schedule_index, total_amount, claimed_amount, upfront_amount,
          claimable_cache, cliff_time, ramp_start, ramp_end, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `),
      selectAll: this.db.prepare(`
        SELECT * FROM vesting_schedules
        WHERE beneficiary = ?
        ORDER BY schedule_index ASC
      `),
      selectOne: this.db.prepare(`
        SELECT * FROM vesting_schedules
        WHERE beneficiary = ? AND schedule_index = ?
      `),
      count: this.db.prepare(`
        SELECT COUNT(*) AS count FROM vesting_schedules WHERE beneficiary = ?
      `),
      deleteAll: this.db.prepare(`
        DELETE FROM vesting_schedules WHERE beneficiary = ?
      `),
      beneficiaries: this.db.prepare(`
        SELECT beneficiary FROM vesting_schedules
        GROUP BY beneficiary
        ORDER BY MIN(rowid) ASC
      `),
    };
  }

  private requireStatements(): PreparedStatements {
    if (!this.statements) {
      throw new Error('SqliteScheduleStore used before initialize()');
    }
    return this.statements;
  }

  async getSchedules(beneficiary: string): Promise<Schedule[]> {
    const rows = this.requireStatements().selectAll.all(beneficiary);
    return rows.map((row) => this.deserializeSchedule(scheduleRowSchema.parse(row)));
  }

  async getScheduleCount(beneficiary: string): Promise<number> {
    return this.countFor(beneficiary);
  }

  async getSchedule(beneficiary: string, index: number): Promise<Schedule | null> {
    const row = this.requireStatements().selectOne.get(beneficiary, index);
    return row === undefined ? null : this.deserializeSchedule(scheduleRowSchema.parse(row));
  }

  async append(beneficiary: string, schedules: Schedule[]): Promise<number> {
    return this.db.transaction(() => {
      const firstIndex = this.countFor(beneficiary);
      this.insertAll(beneficiary, schedules, firstIndex);
      return firstIndex;
    })();
  }

  async replace(beneficiary: string, schedules: Schedule[]): Promise<void> {
    this.db.transaction(() => {
      this.requireStatements().deleteAll.run(beneficiary);
      this.insertAll(beneficiary, schedules, 0);
    })();
  }

  async clear(beneficiary: string): Promise<Schedule[]> {
    return this.db.transaction(() => {
      const statements = this.requireStatements();
      const removed = statements.selectAll
        .all(beneficiary)
        .map((row) => this.deserializeSchedule(scheduleRowSchema.parse(row)));
      statements.deleteAll.run(beneficiary);
      return removed;
    })();
  }

  async listBeneficiaries(): Promise<string[]> {
    const rows = this.requireStatements().beneficiaries.all();
    return rows.map((row) => beneficiaryRowSchema.parse(row).beneficiary);
  }

  async close(): Promise<void> {
    this.statements = null;
    this.db.close();
  }

  private countFor(beneficiary: string): number {
    return countRowSchema.parse(this.requireStatements().count.get(beneficiary)).count;
  }

  private insertAll(beneficiary: string, schedules: Schedule[], firstIndex: number): void {
    const { insert } = this.requireStatements();
    const now = Date.now();
    schedules.forEach((schedule, offset) => {
      insert.run(
        beneficiary,
        firstIndex + offset,
        schedule.totalAmount.toString(),
        schedule.claimedAmount.toString(),
        schedule.upfrontAmount.toString(),
        schedule.claimableCache.toString(),
        schedule.cliffTime.toString(),
        schedule.rampStart.toString(),
        schedule.rampEnd.toString(),
        now,
      );
    });
  }

  private deserializeSchedule(row: ScheduleRow): Schedule {
    return {
      totalAmount: row.total_amount,
      claimedAmount: row.claimed_amount,
      upfrontAmount: row.upfront_amount,
      claimableCache: row.claimable_cache,
      cliffTime: row.cliff_time,
      rampStart: row.ramp_start,
      rampEnd: row.ramp_end,
    };
  }
}
