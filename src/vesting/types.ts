/**
 * Vesting ledger types
 *
 * Amounts are token base units and timestamps are unix seconds, both as
 * bigint so the ramp arithmetic never loses precision or overflows.
 */

export interface Schedule {
  totalAmount: bigint;  // Immutable allocation, > 0
  claimedAmount: bigint;  // Cumulative payout, never exceeds totalAmount
  upfrontAmount: bigint;  // Unlocked at creation, <= totalAmount
  claimableCache: bigint;  // Advisory only; never read by any decision
  cliffTime: bigint;  // Before this only upfrontAmount is obtainable
  rampStart: bigint;  // Always equal to cliffTime
  rampEnd: bigint;  // Full unlock at and after this instant
}

export interface ScheduleRequest {
  beneficiary: string;
  totalAmount: bigint;
  upfrontPercent: number;  // 0-100
  cliffTime: bigint;
  rampEnd: bigint;
}

export interface BatchScheduleRequest {
  beneficiaries: string[];
  totalAmounts: bigint[];
  upfrontPercents: number[];
  cliffTimes: bigint[];
  rampEnds: bigint[];
}

export interface AdminState {
  administrator: string | null;  // null once renounced
  recoveryAccount: string | null;
}

export interface ScheduleStatus {
  index: number;
  total: bigint;
  claimed: bigint;
  unlocked: bigint;
  claimable: bigint;
  locked: bigint;
}

export interface VestingSummary {
  beneficiary: string;
  asOf: bigint;
  schedules: ScheduleStatus[];
  total: bigint;
  claimed: bigint;
  unlocked: bigint;
  claimable: bigint;
  locked: bigint;
}

export type VestingEvent =
  | {
      type: 'ScheduleCreated';
      beneficiary: string;
      index: number;
      totalAmount: bigint;
      upfrontAmount: bigint;
      cliffTime: bigint;
      rampEnd: bigint;
    }
  | { type: 'Claimed'; beneficiary: string; totalPaid: bigint }
  | { type: 'Recovered'; beneficiary: string; recoveryAccount: string; amount: bigint }
  | { type: 'RecoveryAccountChanged'; previous: string | null; next: string }
  | { type: 'AdministratorChanged'; previous: string | null; next: string | null };

export type VestingEventType = VestingEvent['type'];
