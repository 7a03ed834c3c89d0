import { describe, it, expect } from 'vitest';
import { ManualClock, systemClock } from '../../../src/vesting/clock.js';
import { RecordingEventSink } from '../../../src/vesting/events.js';
import { normalizeAddress, isZeroAddress } from '../../../src/vesting/address.js';
import { InMemoryTokenLedger } from '../../../src/vesting/token/InMemoryTokenLedger.js';

const HOLDER = '0x' + '7'.repeat(40);
const RECEIVER = '0x' + '8'.repeat(40);

describe('ManualClock', () => {
  it('moves forward only', () => {
    const clock = new ManualClock(10n);
    clock.advance(5n);
    expect(clock.now()).toBe(15n);

    clock.set(15n);
    expect(() => clock.set(14n)).toThrow('ManualClock cannot move backwards (15 -> 14)');
  });
});

describe('systemClock', () => {
  it('reports whole unix seconds', () => {
    const before = BigInt(Math.floor(Date.now() / 1000));
    const now = systemClock.now();
    expect(now >= before && now <= before + 1n).toBe(true);
  });
});

describe('address helpers', () => {
  it('checksums valid addresses and rejects the rest', () => {
    const lower = normalizeAddress('0x' + 'ab'.repeat(20));
    expect(lower).not.toBeNull();
    expect(lower).toBe(normalizeAddress('0x' + 'AB'.repeat(20)));
    expect(normalizeAddress(HOLDER)).toBe(HOLDER);
    expect(normalizeAddress('0x1234')).toBeNull();
  });

  it('recognises the zero address', () => {
    expect(isZeroAddress('0x' + '0'.repeat(40))).toBe(true);
    expect(isZeroAddress(HOLDER)).toBe(false);
  });
});

describe('InMemoryTokenLedger', () => {
  it('moves balances into and out of custody', async () => {
    const ledger = new InMemoryTokenLedger({ [HOLDER]: 100n });

    expect(await ledger.transferInto(HOLDER, 60n)).toBe(true);
    expect(await ledger.transferOut(RECEIVER, 25n)).toBe(true);

    expect(ledger.balanceOf(HOLDER)).toBe(40n);
    expect(ledger.balanceOf(RECEIVER)).toBe(25n);
    expect(await ledger.custodyBalance()).toBe(35n);
    expect(ledger.transfers).toEqual([
      { direction: 'in', counterparty: HOLDER, amount: 60n },
      { direction: 'out', counterparty: RECEIVER, amount: 25n },
    ]);
  });

  it('refuses transfers that are not covered', async () => {
    const ledger = new InMemoryTokenLedger({ [HOLDER]: 10n });

    expect(await ledger.transferInto(HOLDER, 11n)).toBe(false);
    expect(await ledger.transferOut(RECEIVER, 1n)).toBe(false);
    expect(ledger.transfers).toEqual([]);
  });

  it('fails on demand per direction', async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.mint(HOLDER, 10n);
    ledger.failTransfers('in');

    expect(await ledger.transferInto(HOLDER, 1n)).toBe(false);
    ledger.failTransfers('in', false);
    expect(await ledger.transferInto(HOLDER, 1n)).toBe(true);
  });
});

describe('RecordingEventSink', () => {
  it('filters recorded events by type', () => {
    const sink = new RecordingEventSink();
    sink.emit({ type: 'Claimed', beneficiary: HOLDER, totalPaid: 3n });
    sink.emit({ type: 'AdministratorChanged', previous: HOLDER, next: null });

    expect(sink.ofType('Claimed')).toEqual([{ type: 'Claimed', beneficiary: HOLDER, totalPaid: 3n }]);
    expect(sink.events).toHaveLength(2);
  });
});
