import { describe, it, expect } from 'vitest';
import { VestingService } from '../../../src/vesting/VestingService.js';
import { ManualClock } from '../../../src/vesting/clock.js';
import { RecordingEventSink } from '../../../src/vesting/events.js';
import { VestingError, isVestingError } from '../../../src/vesting/errors.js';
import { ReentrancyGuard } from '../../../src/vesting/guard.js';
import { MemoryScheduleStore } from '../../../src/vesting/store/MemoryScheduleStore.js';
import { InMemoryTokenLedger } from '../../../src/vesting/token/InMemoryTokenLedger.js';

const ADMIN = '0x' + '1'.repeat(40);
const BENEFICIARY = '0x' + '2'.repeat(40);
const OTHER = '0x' + '3'.repeat(40);
const RECOVERY = '0x' + '4'.repeat(40);

const setup = async () => {
  const token = new InMemoryTokenLedger({ [ADMIN]: 10_000n });
  const clock = new ManualClock(0n);
  const service = new VestingService({
    store: new MemoryScheduleStore(),
    token,
    clock,
    events: new RecordingEventSink(),
    administrator: ADMIN,
    recoveryAccount: RECOVERY,
  });
  await service.createSchedule(ADMIN, {
    beneficiary: BENEFICIARY,
    totalAmount: 1000n,
    upfrontPercent: 10,
    cliffTime: 100n,
    rampEnd: 1100n,
  });
  return { token, clock, service };
};

describe('ReentrancyGuard', () => {
  it('runs the operation and returns its result', async () => {
    const guard = new ReentrancyGuard();
    await expect(guard.run('op', async () => 42)).resolves.toBe(42);
    expect(guard.entered).toBe(false);
  });

  it('rejects a nested entry', async () => {
    const guard = new ReentrancyGuard();
    let nested: unknown;

    await guard.run('outer', async () => {
      expect(guard.entered).toBe(true);
      nested = await guard.run('inner', async () => 1).catch((error: unknown) => error);
    });

    expect(isVestingError(nested, 'ReentrantCall')).toBe(true);
    expect(nested instanceof VestingError && nested.message).toBe('inner called while outer is in progress');
  });

  it('queues independent callers in arrival order', async () => {
    const guard = new ReentrancyGuard();
    const order: string[] = [];
    let openGate: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const first = guard.run('first', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = guard.run('second', async () => {
      order.push('second');
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(['first:start']);
    expect(guard.pending).toBe(1);

    openGate();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(guard.pending).toBe(0);
  });

  it('releases after the operation throws', async () => {
    const guard = new ReentrancyGuard();

    await expect(guard.run('op', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(guard.entered).toBe(false);
    await expect(guard.run('op', async () => 'again')).resolves.toBe('again');
  });
});

describe('VestingService reentrancy', () => {
  it('rejects a claim issued from inside the claim payout', async () => {
    const { token, clock, service } = await setup();
    clock.set(600n);

    let nested: unknown;
    let previewDuringPayout: bigint | undefined;
    token.onTransfer(async (transfer) => {
      if (transfer.direction !== 'out') return;
      token.onTransfer(null);
      previewDuringPayout = await service.previewClaimable(BENEFICIARY);
      nested = await service.claim(BENEFICIARY).catch((error: unknown) => error);
    });

    expect(await service.claim(BENEFICIARY)).toBe(550n);
    expect(isVestingError(nested, 'ReentrantCall')).toBe(true);
    // Bookkeeping is already final when the token calls back
    expect(previewDuringPayout).toBe(0n);
    expect(token.balanceOf(BENEFICIARY)).toBe(550n);
  });

  it('rejects schedule creation from inside a recovery sweep', async () => {
    const { token, service } = await setup();

    let nested: unknown;
    token.onTransfer(async () => {
      token.onTransfer(null);
      nested = await service.createSchedule(ADMIN, {
        beneficiary: BENEFICIARY,
        totalAmount: 5n,
        upfrontPercent: 0,
        cliffTime: 0n,
        rampEnd: 1n,
      }).catch((error: unknown) => error);
    });

    expect(await service.recover(ADMIN, BENEFICIARY)).toBe(1000n);
    expect(isVestingError(nested, 'ReentrantCall')).toBe(true);
    expect(await service.getScheduleCount(BENEFICIARY)).toBe(0);
  });

  it('lets claims of different beneficiaries overlap without rejecting either', async () => {
    const { clock, service } = await setup();
    await service.createSchedule(ADMIN, {
      beneficiary: OTHER,
      totalAmount: 1000n,
      upfrontPercent: 10,
      cliffTime: 100n,
      rampEnd: 1100n,
    });
    clock.set(600n);

    const results = await Promise.allSettled([
      service.claim(BENEFICIARY),
      service.claim(OTHER),
    ]);

    expect(results).toEqual([
      { status: 'fulfilled', value: 550n },
      { status: 'fulfilled', value: 550n },
    ]);
  });

  it('runs overlapping claims one after the other', async () => {
    const { clock, service, token } = await setup();
    clock.set(600n);

    const [first, second] = await Promise.allSettled([
      service.claim(BENEFICIARY),
      service.claim(BENEFICIARY),
    ]);

    expect(first).toEqual({ status: 'fulfilled', value: 550n });
    // The second claim sees the first one's bookkeeping
    expect(second.status === 'rejected' && isVestingError(second.reason, 'NothingToClaim')).toBe(true);
    expect(token.balanceOf(BENEFICIARY)).toBe(550n);
  });
});
