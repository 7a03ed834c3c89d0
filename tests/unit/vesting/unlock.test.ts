import { describe, it, expect } from 'vitest';
import { dueAt, unlockedAt, upfrontFor } from '../../../src/vesting/unlock.js';
import type { Schedule } from '../../../src/vesting/types.js';

// ==========================================
// Test Fixtures
// ==========================================

const createSchedule = (overrides: Partial<Schedule> = {}): Schedule => ({
  totalAmount: 1000n,
  claimedAmount: 0n,
  upfrontAmount: 100n,
  claimableCache: 100n,
  cliffTime: 100n,
  rampStart: 100n,
  rampEnd: 1100n,
  ...overrides,
});

describe('upfrontFor', () => {
  it('truncates the percentage share', () => {
    expect(upfrontFor(1000n, 10)).toBe(100n);
    expect(upfrontFor(999n, 33)).toBe(329n);
    expect(upfrontFor(1n, 99)).toBe(0n);
  });

  it('covers the 0 and 100 percent extremes', () => {
    expect(upfrontFor(12345n, 0)).toBe(0n);
    expect(upfrontFor(12345n, 100)).toBe(12345n);
  });
});

describe('unlockedAt', () => {
  const schedule = createSchedule();

  it('returns only the upfront amount before the cliff', () => {
    expect(unlockedAt(schedule, 0n)).toBe(100n);
    expect(unlockedAt(schedule, 50n)).toBe(100n);
    expect(unlockedAt(schedule, 99n)).toBe(100n);
  });

  it('starts the linear ramp at the cliff', () => {
    expect(unlockedAt(schedule, 100n)).toBe(100n);
    expect(unlockedAt(schedule, 101n)).toBe(100n);
    expect(unlockedAt(schedule, 102n)).toBe(101n);
  });

  it('interpolates linearly mid-ramp', () => {
    expect(unlockedAt(schedule, 600n)).toBe(550n);
    expect(unlockedAt(schedule, 350n)).toBe(325n);
  });

  it('holds back the final unit until rampEnd', () => {
    expect(unlockedAt(schedule, 1099n)).toBe(999n);
    expect(unlockedAt(schedule, 1100n)).toBe(1000n);
  });

  it('saturates at the total after rampEnd', () => {
    expect(unlockedAt(schedule, 5000n)).toBe(1000n);
  });

  it('is monotonic and bounded across the timeline', () => {
    let previous = 0n;
    for (let now = 0n; now <= 1200n; now += 7n) {
      const unlocked = unlockedAt(schedule, now);
      expect(unlocked).toBeGreaterThanOrEqual(previous);
      expect(unlocked).toBeLessThanOrEqual(schedule.totalAmount);
      previous = unlocked;
    }
  });

  it('keeps full precision for very large totals', () => {
    const total = 2n ** 200n;
    const big = createSchedule({
      totalAmount: total,
      upfrontAmount: 0n,
      cliffTime: 0n,
      rampStart: 0n,
      rampEnd: 3n,
    });

    expect(unlockedAt(big, 1n)).toBe(total / 3n);
    expect(unlockedAt(big, 2n)).toBe((total * 2n) / 3n);
    expect(unlockedAt(big, 3n)).toBe(total);
  });

  it('unlocks everything up front at 100 percent', () => {
    const full = createSchedule({ upfrontAmount: 1000n });
    expect(unlockedAt(full, 0n)).toBe(1000n);
    expect(unlockedAt(full, 600n)).toBe(1000n);
  });
});

describe('dueAt', () => {
  it('subtracts what was already claimed', () => {
    expect(dueAt(createSchedule({ claimedAmount: 550n }), 1100n)).toBe(450n);
  });

  it('never goes negative when claimed exceeds what is unlocked now', () => {
    expect(dueAt(createSchedule({ claimedAmount: 550n }), 50n)).toBe(0n);
  });
});
