import { describe, it, expect, beforeEach, vi } from 'vitest';
import { makeError } from 'ethers';
import { VestingError } from '../../../../src/vesting/errors.js';
import {
  Erc20TokenLedger,
  type Erc20Contract,
  type SubmittedTransfer,
  type TransferReceipt,
} from '../../../../src/vesting/token/Erc20TokenLedger.js';

// ==========================================
// Test Fixtures
// ==========================================

const CUSTODY = '0x' + '9'.repeat(40);
const ADMIN = '0x' + '1'.repeat(40);
const RECEIVER = '0x' + '2'.repeat(40);
const TX_HASH = '0x' + 'ab'.repeat(32);

const receipt = (status: number): TransferReceipt => ({ status, blockNumber: 42, gasUsed: 21_000n });

const submitted = (wait: () => Promise<TransferReceipt | null>): SubmittedTransfer => ({
  hash: TX_HASH,
  wait: vi.fn(wait),
});

class FakeErc20 implements Erc20Contract {
  balance: unknown = 0n;
  submit: () => Promise<SubmittedTransfer> = async () => submitted(async () => receipt(1));
  readonly calls: Array<{ method: string; args: unknown[] }> = [];

  async balanceOf(owner: string): Promise<unknown> {
    this.calls.push({ method: 'balanceOf', args: [owner] });
    return this.balance;
  }

  async transfer(to: string, amount: bigint): Promise<SubmittedTransfer> {
    this.calls.push({ method: 'transfer', args: [to, amount] });
    return this.submit();
  }

  async transferFrom(from: string, to: string, amount: bigint): Promise<SubmittedTransfer> {
    this.calls.push({ method: 'transferFrom', args: [from, to, amount] });
    return this.submit();
  }
}

describe('Erc20TokenLedger', () => {
  let contract: FakeErc20;
  let ledger: Erc20TokenLedger;

  beforeEach(() => {
    contract = new FakeErc20();
    ledger = new Erc20TokenLedger(contract, CUSTODY, { confirmations: 2 });
  });

  describe('transfers', () => {
    it('pays out with transfer and waits for the configured confirmations', async () => {
      const tx = submitted(async () => receipt(1));
      contract.submit = async () => tx;

      expect(await ledger.transferOut(RECEIVER, 5n)).toBe(true);
      expect(contract.calls).toEqual([{ method: 'transfer', args: [RECEIVER, 5n] }]);
      expect(tx.wait).toHaveBeenCalledWith(2);
    });

    it('pulls committed tokens into custody with transferFrom', async () => {
      expect(await ledger.transferInto(ADMIN, 7n)).toBe(true);
      expect(contract.calls).toEqual([{ method: 'transferFrom', args: [ADMIN, CUSTODY, 7n] }]);
    });

    it('reports failure when the transaction cannot be sent', async () => {
      contract.submit = async () => { throw new Error('insufficient allowance'); };

      expect(await ledger.transferInto(ADMIN, 7n)).toBe(false);
    });

    it('reports failure for a mined transaction with status 0', async () => {
      contract.submit = async () => submitted(async () => receipt(0));

      expect(await ledger.transferOut(RECEIVER, 5n)).toBe(false);
    });

    it('reports failure when waiting surfaces a revert', async () => {
      contract.submit = async () => submitted(async () => {
        throw makeError('transaction execution reverted', 'CALL_EXCEPTION');
      });

      expect(await ledger.transferOut(RECEIVER, 5n)).toBe(false);
    });

    it('throws TransferUnconfirmed when a broadcast transaction cannot be confirmed', async () => {
      contract.submit = async () => submitted(async () => {
        throw new Error('timeout waiting for receipt');
      });

      const error = await ledger.transferOut(RECEIVER, 5n).catch((rejection: unknown) => rejection);

      expect(error).toBeInstanceOf(VestingError);
      expect(error instanceof VestingError && error.code).toBe('TransferUnconfirmed');
      expect(error instanceof VestingError && error.details).toEqual({
        txHash: TX_HASH,
        direction: 'out',
        counterparty: RECEIVER,
        amount: '5',
      });
    });

    it('throws TransferUnconfirmed when no receipt comes back', async () => {
      contract.submit = async () => submitted(async () => null);

      await expect(ledger.transferInto(ADMIN, 5n)).rejects.toThrow(
        `Token transfer in ${TX_HASH} was broadcast but not confirmed`,
      );
    });
  });

  describe('custodyBalance', () => {
    it('reads the balance of the custody account', async () => {
      contract.balance = 123n;

      expect(await ledger.custodyBalance()).toBe(123n);
      expect(contract.calls).toEqual([{ method: 'balanceOf', args: [CUSTODY] }]);
    });

    it('rejects a non-integer balance', async () => {
      contract.balance = '123';

      await expect(ledger.custodyBalance()).rejects.toThrow('balanceOf returned a non-integer value');
    });
  });
});
