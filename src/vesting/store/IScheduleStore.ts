/**
 * Schedule Store Interface
 *
 * Ordered schedule lists keyed by beneficiary. Implementations hold data
 * only; every rule about what may be written lives in the vesting service.
 */

import type { Schedule } from '../types.js';

export interface IScheduleStore {
  /**
   * Create tables, open connections, etc.
   */
  initialize(): Promise<void>;

  /**
   * All schedules of a beneficiary in insertion order (empty when none)
   */
  getSchedules(beneficiary: string): Promise<Schedule[]>;

  getScheduleCount(beneficiary: string): Promise<number>;

  /**
   * @returns The schedule at `index`, or null if there is none
   */
  getSchedule(beneficiary: string, index: number): Promise<Schedule | null>;

  /**
   * Append schedules after the existing ones, all or nothing
   * @returns Index assigned to the first appended schedule
   */
  append(beneficiary: string, schedules: Schedule[]): Promise<number>;

  /**
   * Overwrite the beneficiary's whole list, all or nothing
   */
  replace(beneficiary: string, schedules: Schedule[]): Promise<void>;

  /**
   * Remove every schedule of a beneficiary
   * @returns The removed schedules, in order
   */
  clear(beneficiary: string): Promise<Schedule[]>;

  /**
   * Beneficiaries holding at least one schedule
   */
  listBeneficiaries(): Promise<string[]>;

  close(): Promise<void>;
}
