/**
 * Unlock arithmetic for a single schedule.
 *
 * Pure functions of the schedule and a timestamp. All division truncates,
 * so the final unit of the ramp only unlocks at exactly `rampEnd`.
 */

import type { Schedule } from './types.js';

type UnlockTerms = Pick<Schedule, 'totalAmount' | 'upfrontAmount' | 'cliffTime' | 'rampStart' | 'rampEnd'>;

export function upfrontFor(totalAmount: bigint, upfrontPercent: number): bigint {
  return (totalAmount * BigInt(upfrontPercent)) / 100n;
}

export function unlockedAt(schedule: UnlockTerms, now: bigint): bigint {
  const { totalAmount, upfrontAmount, cliffTime, rampStart, rampEnd } = schedule;

  if (now < cliffTime) {
    return upfrontAmount;
  }

  if (now >= rampEnd) {
    return totalAmount;
  }

  const linearPortion = totalAmount - upfrontAmount;
  const elapsed = now - rampStart;
  const duration = rampEnd - rampStart;
  const unlocked = upfrontAmount + (linearPortion * elapsed) / duration;

  return unlocked > totalAmount ? totalAmount : unlocked;
}

/**
 * Unlocked but not yet claimed. Zero rather than negative if the clock ever
 * reads earlier than a previous claim.
 */
export function dueAt(schedule: UnlockTerms & Pick<Schedule, 'claimedAmount'>, now: bigint): bigint {
  const unlocked = unlockedAt(schedule, now);
  return unlocked > schedule.claimedAmount ? unlocked - schedule.claimedAmount : 0n;
}
