import type { ITokenLedger } from './ITokenLedger.js';

export type TransferDirection = 'in' | 'out';

export interface TransferRecord {
  direction: TransferDirection;
  counterparty: string;
  amount: bigint;
}

/**
 * Called after a transfer has been applied and before it resolves. Lets
 * tests act as a token that calls back into the service mid-transfer.
 */
export type TransferHook = (transfer: TransferRecord) => Promise<void> | void;

/**
 * Balance-map token ledger for tests, simulations and offline CLI use.
 */
export class InMemoryTokenLedger implements ITokenLedger {
  private balances = new Map<string, bigint>();
  private custody = 0n;
  private failures: Partial<Record<TransferDirection, boolean>> = {};
  private hook: TransferHook | null = null;

  readonly transfers: TransferRecord[] = [];

  constructor(initialBalances: Record<string, bigint> = {}) {
    for (const [account, amount] of Object.entries(initialBalances)) {
      this.balances.set(account, amount);
    }
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  mint(account: string, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  /**
   * Make every subsequent transfer in `direction` report failure
   */
  failTransfers(direction: TransferDirection, fail: boolean = true): void {
    this.failures[direction] = fail;
  }

  onTransfer(hook: TransferHook | null): void {
    this.hook = hook;
  }

  async transferInto(from: string, amount: bigint): Promise<boolean> {
    const balance = this.balanceOf(from);
    if (this.failures.in || balance < amount) {
      return false;
    }
    this.balances.set(from, balance - amount);
    this.custody += amount;
    return this.settle({ direction: 'in', counterparty: from, amount });
  }

  async transferOut(to: string, amount: bigint): Promise<boolean> {
    if (this.failures.out || this.custody < amount) {
      return false;
    }
    this.custody -= amount;
    this.balances.set(to, this.balanceOf(to) + amount);
    return this.settle({ direction: 'out', counterparty: to, amount });
  }

  async custodyBalance(): Promise<bigint> {
    return this.custody;
  }

  private async settle(transfer: TransferRecord): Promise<boolean> {
    this.transfers.push(transfer);
    if (this.hook) {
      await this.hook(transfer);
    }
    return true;
  }
}
