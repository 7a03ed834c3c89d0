/**
 * Vesting Service
 *
 * Owns the administrator/recovery configuration and drives the schedule
 * store, token ledger and event sink through the four state-changing
 * operations: create (single and batch), claim and recover.
 *
 * Every state-changing operation runs under one ReentrancyGuard and
 * finishes its bookkeeping before it calls out to the token ledger. If the
 * ledger reports failure, the bookkeeping is written back to what it was,
 * so callers never observe a partially applied operation. A transfer the
 * ledger broadcast but could not confirm (`TransferUnconfirmed`) keeps the
 * bookkeeping as if it landed.
 */

import { serializeError, vestingLogger } from '../logging/index.js';
import { isZeroAddress, normalizeAddress } from './address.js';
import { systemClock, type Clock } from './clock.js';
import { isVestingError, VestingError } from './errors.js';
import { LoggingEventSink, type VestingEventSink } from './events.js';
import { ReentrancyGuard } from './guard.js';
import type { IScheduleStore } from './store/IScheduleStore.js';
import type { ITokenLedger } from './token/ITokenLedger.js';
import type {
  AdminState,
  BatchScheduleRequest,
  Schedule,
  ScheduleRequest,
  ScheduleStatus,
  VestingSummary,
} from './types.js';
import { dueAt, unlockedAt, upfrontFor } from './unlock.js';

const DEFAULT_MAX_SCHEDULES_PER_BENEFICIARY = 100;

export interface VestingServiceOptions {
  store: IScheduleStore;
  token: ITokenLedger;
  administrator: string;
  recoveryAccount?: string | null;
  clock?: Clock;
  events?: VestingEventSink;
  maxSchedulesPerBeneficiary?: number;
}

export interface Solvency {
  outstanding: bigint;  // Σ (total − claimed) over every schedule
  custody: bigint;      // Tokens the ledger reports in custody
  surplus: bigint;      // custody − outstanding; negative means underfunded
}

interface ValidatedRequest {
  beneficiary: string;
  schedule: Schedule;
}

export class VestingService {
  private readonly store: IScheduleStore;
  private readonly token: ITokenLedger;
  private readonly clock: Clock;
  private readonly events: VestingEventSink;
  private readonly guard = new ReentrancyGuard();
  private readonly maxSchedules: number;
  private admin: AdminState;

  constructor(options: VestingServiceOptions) {
    this.store = options.store;
    this.token = options.token;
    this.clock = options.clock ?? systemClock;
    this.events = options.events ?? new LoggingEventSink();
    this.maxSchedules = options.maxSchedulesPerBeneficiary ?? DEFAULT_MAX_SCHEDULES_PER_BENEFICIARY;

    const recoveryAccount = options.recoveryAccount ?? null;
    this.admin = {
      administrator: this.requireAccount(options.administrator, 'administrator'),
      recoveryAccount: recoveryAccount === null ? null : this.requireAccount(recoveryAccount, 'recoveryAccount'),
    };
  }

  // ==========================================================================
  // Administration
  // ==========================================================================

  getAdminState(): AdminState {
    return { ...this.admin };
  }

  isAdministrator(caller: string): boolean {
    const normalized = normalizeAddress(caller);
    return this.admin.administrator !== null && normalized === this.admin.administrator;
  }

  setRecoveryAccount(caller: string, account: string): void {
    this.requireAdministrator(caller, 'setRecoveryAccount');
    const next = this.requireAccount(account, 'recoveryAccount');
    const previous = this.admin.recoveryAccount;

    this.admin = { ...this.admin, recoveryAccount: next };
    this.events.emit({ type: 'RecoveryAccountChanged', previous, next });
  }

  transferAdministrator(caller: string, next: string): void {
    this.requireAdministrator(caller, 'transferAdministrator');
    const administrator = this.requireAccount(next, 'administrator');
    const previous = this.admin.administrator;

    this.admin = { ...this.admin, administrator };
    this.events.emit({ type: 'AdministratorChanged', previous, next: administrator });
  }

  /**
   * Leaves the service without an administrator. Creation and recovery are
   * impossible afterwards; claims keep working.
   */
  renounceAdministrator(caller: string): void {
    this.requireAdministrator(caller, 'renounceAdministrator');
    const previous = this.admin.administrator;

    this.admin = { ...this.admin, administrator: null };
    this.events.emit({ type: 'AdministratorChanged', previous, next: null });
  }

  // ==========================================================================
  // Schedule creation
  // ==========================================================================

  /**
   * Commit `totalAmount` from the administrator and record a new schedule.
   * @returns Index of the schedule within the beneficiary's list
   */
  async createSchedule(caller: string, request: ScheduleRequest): Promise<number> {
    return this.execute('createSchedule', { beneficiary: request.beneficiary }, () => this.guard.run('createSchedule', async () => {
      const administrator = this.requireAdministrator(caller, 'createSchedule');
      const validated = this.validateRequest(request);
      await this.ensureCapacity([validated]);

      const [index] = await this.commit(administrator, [validated]);
      return index;
    }));
  }

  /**
   * All-or-nothing batch creation over parallel arrays. Every entry is
   * validated before anything is transferred, and the summed total is pulled
   * from the administrator in one transfer.
   * @returns Indexes assigned to each entry, in input order
   */
  async createSchedules(caller: string, batch: BatchScheduleRequest): Promise<number[]> {
    return this.execute('createSchedules', { entries: batch.beneficiaries.length }, () => this.guard.run('createSchedules', async () => {
      const administrator = this.requireAdministrator(caller, 'createSchedules');

      const length = batch.beneficiaries.length;
      const lengths = [
        batch.totalAmounts.length,
        batch.upfrontPercents.length,
        batch.cliffTimes.length,
        batch.rampEnds.length,
      ];
      if (lengths.some((other) => other !== length)) {
        throw new VestingError('LengthMismatch', 'Batch arrays must all have the same length', {
          lengths: [length, ...lengths],
        });
      }

      const validated: ValidatedRequest[] = [];
      for (let entry = 0; entry < length; entry++) {
        try {
          validated.push(this.validateRequest({
            beneficiary: batch.beneficiaries[entry],
            totalAmount: batch.totalAmounts[entry],
            upfrontPercent: batch.upfrontPercents[entry],
            cliffTime: batch.cliffTimes[entry],
            rampEnd: batch.rampEnds[entry],
          }));
        } catch (error) {
          if (isVestingError(error)) {
            throw new VestingError(error.code, `Batch entry ${entry}: ${error.message}`, { ...error.details, entry });
          }
          throw error;
        }
      }

      if (validated.length === 0) {
        return [];
      }

      await this.ensureCapacity(validated);
      return this.commit(administrator, validated);
    }));
  }

  // ==========================================================================
  // Claiming
  // ==========================================================================

  /**
   * Pay out everything unlocked and unclaimed across the beneficiary's
   * schedules. Claims always act on the caller's own schedules.
   * @returns Amount transferred
   */
  async claim(beneficiary: string): Promise<bigint> {
    return this.execute('claim', { beneficiary }, () => this.guard.run('claim', async () => {
      const owner = this.requireBeneficiary(beneficiary);
      const schedules = await this.store.getSchedules(owner);
      if (schedules.length === 0) {
        throw new VestingError('NoSchedules', `No schedules for ${owner}`, { beneficiary: owner });
      }

      const now = this.clock.now();
      let totalPaid = 0n;
      const updated = schedules.map((schedule) => {
        const due = dueAt(schedule, now);
        totalPaid += due;
        return {
          ...schedule,
          claimedAmount: schedule.claimedAmount + due,
          claimableCache: schedule.claimableCache > due ? schedule.claimableCache - due : 0n,
        };
      });

      if (totalPaid === 0n) {
        throw new VestingError('NothingToClaim', `Nothing unlocked to claim for ${owner}`, {
          beneficiary: owner,
          now: now.toString(),
        });
      }

      await this.store.replace(owner, updated);
      await this.transferOrRestore('out', owner, totalPaid, () => this.store.replace(owner, schedules));

      this.events.emit({ type: 'Claimed', beneficiary: owner, totalPaid });
      vestingLogger.claimed(owner, totalPaid, schedules.length);
      return totalPaid;
    }));
  }

  /**
   * Read-only counterpart of claim: what claim would pay at `now`.
   */
  async previewClaimable(beneficiary: string, now: bigint = this.clock.now()): Promise<bigint> {
    const owner = normalizeAddress(beneficiary);
    if (owner === null) {
      return 0n;
    }
    const schedules = await this.store.getSchedules(owner);
    return schedules.reduce((sum, schedule) => sum + dueAt(schedule, now), 0n);
  }

  async getVestingSummary(beneficiary: string, now: bigint = this.clock.now()): Promise<VestingSummary> {
    const owner = this.requireBeneficiary(beneficiary);
    const schedules = await this.store.getSchedules(owner);

    const statuses: ScheduleStatus[] = schedules.map((schedule, index) => {
      const unlocked = unlockedAt(schedule, now);
      return {
        index,
        total: schedule.totalAmount,
        claimed: schedule.claimedAmount,
        unlocked,
        claimable: dueAt(schedule, now),
        locked: schedule.totalAmount - unlocked,
      };
    });

    const sum = (pick: (status: ScheduleStatus) => bigint): bigint =>
      statuses.reduce((acc, status) => acc + pick(status), 0n);

    return {
      beneficiary: owner,
      asOf: now,
      schedules: statuses,
      total: sum((s) => s.total),
      claimed: sum((s) => s.claimed),
      unlocked: sum((s) => s.unlocked),
      claimable: sum((s) => s.claimable),
      locked: sum((s) => s.locked),
    };
  }

  // ==========================================================================
  // Recovery
  // ==========================================================================

  /**
   * Sweep every unclaimed unit (unlocked or not) of a beneficiary to the
   * recovery account and delete their schedules. Irreversible.
   * @returns Amount transferred to the recovery account
   */
  async recover(caller: string, beneficiary: string): Promise<bigint> {
    return this.execute('recover', { beneficiary }, () => this.guard.run('recover', async () => {
      this.requireAdministrator(caller, 'recover');
      const owner = this.requireBeneficiary(beneficiary);
      const recoveryAccount = this.admin.recoveryAccount;
      if (recoveryAccount === null) {
        throw new VestingError('RecoveryAccountNotSet', 'No recovery account configured');
      }

      const schedules = await this.store.getSchedules(owner);
      if (schedules.length === 0) {
        throw new VestingError('NoSchedules', `No schedules for ${owner}`, { beneficiary: owner });
      }

      const unclaimed = schedules.reduce(
        (sum, schedule) => sum + (schedule.totalAmount - schedule.claimedAmount),
        0n,
      );

      const removed = await this.store.clear(owner);
      const restore = () => this.store.replace(owner, removed);

      if (unclaimed === 0n) {
        await restore();
        throw new VestingError('NothingToWithdraw', `Every schedule of ${owner} is fully claimed`, {
          beneficiary: owner,
        });
      }

      await this.transferOrRestore('out', recoveryAccount, unclaimed, restore);

      this.events.emit({ type: 'Recovered', beneficiary: owner, recoveryAccount, amount: unclaimed });
      vestingLogger.recovered(owner, unclaimed, recoveryAccount);
      return unclaimed;
    }));
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async getSchedules(beneficiary: string): Promise<Schedule[]> {
    return this.store.getSchedules(this.requireBeneficiary(beneficiary));
  }

  async getSchedule(beneficiary: string, index: number): Promise<Schedule | null> {
    return this.store.getSchedule(this.requireBeneficiary(beneficiary), index);
  }

  async getScheduleCount(beneficiary: string): Promise<number> {
    return this.store.getScheduleCount(this.requireBeneficiary(beneficiary));
  }

  /**
   * Compare what custody holds with what schedules still owe.
   */
  async getSolvency(): Promise<Solvency> {
    let outstanding = 0n;
    for (const beneficiary of await this.store.listBeneficiaries()) {
      for (const schedule of await this.store.getSchedules(beneficiary)) {
        outstanding += schedule.totalAmount - schedule.claimedAmount;
      }
    }
    const custody = await this.token.custodyBalance();
    return { outstanding, custody, surplus: custody - outstanding };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isVestingError(error)) {
        vestingLogger.rejected(operation, error.code, { ...context, ...error.details });
      } else {
        vestingLogger.error({ operation, ...context, error: serializeError(error) }, `${operation} failed`);
      }
      throw error;
    }
  }

  private async commit(administrator: string, requests: ValidatedRequest[]): Promise<number[]> {
    const total = requests.reduce((sum, request) => sum + request.schedule.totalAmount, 0n);
    await this.transfer('in', administrator, total);

    const grouped = new Map<string, Schedule[]>();
    for (const { beneficiary, schedule } of requests) {
      grouped.set(beneficiary, [...(grouped.get(beneficiary) ?? []), schedule]);
    }

    const appended = new Map<string, number>();
    try {
      for (const [beneficiary, schedules] of grouped) {
        const firstIndex = await this.store.append(beneficiary, schedules);
        appended.set(beneficiary, firstIndex);
      }
    } catch (error) {
      await this.undoCommit(administrator, total, appended);
      throw error;
    }

    const nextIndex = new Map(appended);
    return requests.map(({ beneficiary, schedule }) => {
      const index = nextIndex.get(beneficiary) ?? 0;
      nextIndex.set(beneficiary, index + 1);

      this.events.emit({
        type: 'ScheduleCreated',
        beneficiary,
        index,
        totalAmount: schedule.totalAmount,
        upfrontAmount: schedule.upfrontAmount,
        cliffTime: schedule.cliffTime,
        rampEnd: schedule.rampEnd,
      });
      vestingLogger.created(beneficiary, index, schedule.totalAmount);
      return index;
    });
  }

  /**
   * The store rejected a write after tokens were already committed: drop
   * whatever was appended and hand the tokens back.
   */
  private async undoCommit(administrator: string, total: bigint, appended: Map<string, number>): Promise<void> {
    for (const [beneficiary, firstIndex] of appended) {
      const schedules = await this.store.getSchedules(beneficiary);
      await this.store.replace(beneficiary, schedules.slice(0, firstIndex));
    }
    const refunded = await this.token.transferOut(administrator, total).catch((error: unknown) => {
      vestingLogger.error({ administrator, error: serializeError(error) }, 'Refund transfer threw');
      return false;
    });
    if (!refunded) {
      vestingLogger.fatal(
        { administrator, amount: total.toString() },
        'Refund after failed schedule write did not go through; custody holds uncommitted tokens',
      );
    }
  }

  private async transfer(direction: 'in' | 'out', counterparty: string, amount: bigint): Promise<void> {
    let succeeded: boolean;
    try {
      succeeded = direction === 'in'
        ? await this.token.transferInto(counterparty, amount)
        : await this.token.transferOut(counterparty, amount);
    } catch (error) {
      if (isVestingError(error, 'TransferUnconfirmed')) {
        throw error;
      }
      throw new VestingError('TransferFailed', `Token transfer ${direction} failed`, {
        direction,
        counterparty,
        amount: amount.toString(),
      }, { cause: error });
    }

    if (!succeeded) {
      throw new VestingError('TransferFailed', `Token transfer ${direction} was refused`, {
        direction,
        counterparty,
        amount: amount.toString(),
      });
    }
  }

  private async transferOrRestore(
    direction: 'in' | 'out',
    counterparty: string,
    amount: bigint,
    restore: () => Promise<void>,
  ): Promise<void> {
    try {
      await this.transfer(direction, counterparty, amount);
    } catch (error) {
      // A broadcast transfer may still be mined, so its bookkeeping stays
      if (!isVestingError(error, 'TransferUnconfirmed')) {
        await restore();
      }
      throw error;
    }
  }

  private validateRequest(request: ScheduleRequest): ValidatedRequest {
    const beneficiary = this.requireBeneficiary(request.beneficiary);
    const { totalAmount, upfrontPercent, cliffTime, rampEnd } = request;

    if (totalAmount <= 0n) {
      throw new VestingError('InvalidAmount', 'totalAmount must be greater than zero', {
        totalAmount: totalAmount.toString(),
      });
    }

    if (!Number.isInteger(upfrontPercent) || upfrontPercent < 0 || upfrontPercent > 100) {
      throw new VestingError('InvalidPercent', 'upfrontPercent must be an integer between 0 and 100', {
        upfrontPercent,
      });
    }

    if (cliffTime < 0n || cliffTime >= rampEnd) {
      throw new VestingError('InvalidTimeline', 'cliffTime must be before rampEnd', {
        cliffTime: cliffTime.toString(),
        rampEnd: rampEnd.toString(),
      });
    }

    const upfrontAmount = upfrontFor(totalAmount, upfrontPercent);
    return {
      beneficiary,
      schedule: {
        totalAmount,
        claimedAmount: 0n,
        upfrontAmount,
        claimableCache: upfrontAmount,
        cliffTime,
        rampStart: cliffTime,
        rampEnd,
      },
    };
  }

  private async ensureCapacity(requests: ValidatedRequest[]): Promise<void> {
    const incoming = new Map<string, number>();
    for (const { beneficiary } of requests) {
      incoming.set(beneficiary, (incoming.get(beneficiary) ?? 0) + 1);
    }

    for (const [beneficiary, added] of incoming) {
      const existing = await this.store.getScheduleCount(beneficiary);
      if (existing + added > this.maxSchedules) {
        throw new VestingError(
          'ScheduleLimitExceeded',
          `${beneficiary} would hold ${existing + added} schedules (limit ${this.maxSchedules})`,
          { beneficiary, existing, added, limit: this.maxSchedules },
        );
      }
    }
  }

  private requireAdministrator(caller: string, operation: string): string {
    const administrator = this.admin.administrator;
    if (administrator === null || normalizeAddress(caller) !== administrator) {
      throw new VestingError('Unauthorized', `${operation} is restricted to the administrator`, {
        caller,
        operation,
      });
    }
    return administrator;
  }

  private requireBeneficiary(value: string): string {
    const address = normalizeAddress(value);
    if (address === null || isZeroAddress(address)) {
      throw new VestingError('InvalidBeneficiary', `Invalid beneficiary: ${value}`, { beneficiary: value });
    }
    return address;
  }

  private requireAccount(value: string, field: string): string {
    const address = normalizeAddress(value);
    if (address === null || isZeroAddress(address)) {
      throw new VestingError('InvalidAddress', `Invalid ${field}: ${value}`, { field, value });
    }
    return address;
  }
}
