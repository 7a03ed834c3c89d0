import type { Schedule } from '../types.js';
import type { IScheduleStore } from './IScheduleStore.js';

function copy(schedule: Schedule): Schedule {
  return { ...schedule };
}

/**
 * In-process store. Returns copies so callers cannot mutate stored records.
 */
export class MemoryScheduleStore implements IScheduleStore {
  private ledger = new Map<string, Schedule[]>();

  async initialize(): Promise<void> {}

  async getSchedules(beneficiary: string): Promise<Schedule[]> {
    return (this.ledger.get(beneficiary) ?? []).map(copy);
  }

  async getScheduleCount(beneficiary: string): Promise<number> {
    return this.ledger.get(beneficiary)?.length ?? 0;
  }

  async getSchedule(beneficiary: string, index: number): Promise<Schedule | null> {
    const schedule = this.ledger.get(beneficiary)?.[index];
    return schedule ? copy(schedule) : null;
  }

  async append(beneficiary: string, schedules: Schedule[]): Promise<number> {
    const existing = this.ledger.get(beneficiary) ?? [];
    const firstIndex = existing.length;
    this.ledger.set(beneficiary, [...existing, ...schedules.map(copy)]);
    return firstIndex;
  }

  async replace(beneficiary: string, schedules: Schedule[]): Promise<void> {
    if (schedules.length === 0) {
      this.ledger.delete(beneficiary);
      return;
    }
    this.ledger.set(beneficiary, schedules.map(copy));
  }

  async clear(beneficiary: string): Promise<Schedule[]> {
    const removed = this.ledger.get(beneficiary) ?? [];
    this.ledger.delete(beneficiary);
    return removed.map(copy);
  }

  async listBeneficiaries(): Promise<string[]> {
    return [...this.ledger.keys()];
  }

  async close(): Promise<void> {
    this.ledger.clear();
  }
}
